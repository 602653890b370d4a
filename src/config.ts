import process from 'process';
import { ClientConfigSchema, EnvironmentSchema, formatIssues } from './schemas/validation.js';
import type { AppEnvironment, ClientConfig } from './types/common.js';
import { ErrorType } from './types/error-handler.js';
import { SecureError } from './utils/error-handler.js';
import { DEFAULT_MAX_RETRIES, DEFAULT_TIMEOUT_SECONDS } from './constants/config.js';

/**
 * Builds the immutable settings bundle an {@link ApiClient} is created with.
 *
 * Throws an `INVALID_CONFIG` {@link SecureError} when the credential is empty,
 * the timeout is not a positive integer or the retry budget is negative.
 */
export const createClientConfig = (
  credential: string,
  timeoutSeconds: number = DEFAULT_TIMEOUT_SECONDS,
  maxRetries: number = DEFAULT_MAX_RETRIES
): ClientConfig => {
  const result = ClientConfigSchema.safeParse({ credential, timeoutSeconds, maxRetries });

  if (!result.success) {
    throw new SecureError(
      `Invalid configuration: ${formatIssues(result.error)}`,
      ErrorType.INVALID_CONFIG,
      { operation: 'createClientConfig' }
    );
  }

  return Object.freeze({ ...result.data });
};

/**
 * Reads the process-wide settings once. The result is passed to constructors;
 * nothing in the library looks at `process.env` on its own.
 */
export const loadEnvironment = (env: NodeJS.ProcessEnv = process.env): AppEnvironment => {
  const result = EnvironmentSchema.safeParse(env);

  if (!result.success) {
    throw new SecureError(
      `Invalid environment configuration: ${formatIssues(result.error)}`,
      ErrorType.INVALID_CONFIG,
      { operation: 'loadEnvironment' }
    );
  }

  const { API_KEY, API_BASE_URL, ALLOWED_ROOT, LOG_LEVEL } = result.data;

  return {
    ...(API_KEY ? { apiKey: API_KEY } : {}),
    baseUrl: API_BASE_URL,
    allowedRoot: ALLOWED_ROOT,
    logLevel: LOG_LEVEL,
  };
};
