import type { JsonValue } from 'type-fest';
import { createClientConfig, loadEnvironment } from '../config.js';
import { ApiClient } from '../services/api-client.js';
import { PathGuard } from '../services/path-guard.js';
import { SecureApp } from './secure-app.js';
import type { FetchLike } from '../types/common.js';
import type { AuthenticatedEnvironment } from '../schemas/validation.js';
import { logger, setLogLevel } from '../utils/logger.js';
import { ERROR_MESSAGES, INFO_MESSAGES } from '../constants/messages.js';

export interface DemoOptions {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  retryDelayMs?: number;
}

export const buildApp = (
  environment: AuthenticatedEnvironment,
  options: Pick<DemoOptions, 'fetch' | 'retryDelayMs'> = {}
): SecureApp => {
  const config = createClientConfig(environment.apiKey);
  const client = new ApiClient(config, {
    baseUrl: environment.baseUrl,
    fetch: options.fetch,
    retryDelayMs: options.retryDelayMs,
  });
  const pathGuard = new PathGuard({ allowedRoot: environment.allowedRoot });

  return new SecureApp({ client, pathGuard });
};

/**
 * Fetches the sample user. A missing API key is reported and ends the run
 * with `null` instead of an exception.
 */
export const runDemo = async (options: DemoOptions = {}): Promise<JsonValue | null> => {
  const environment = loadEnvironment(options.env);
  setLogLevel(environment.logLevel);

  const { apiKey } = environment;
  if (!apiKey) {
    logger.error(ERROR_MESSAGES.API_KEY_NOT_FOUND);
    return null;
  }

  const app = buildApp({ ...environment, apiKey }, options);
  const userInfo = await app.processUserRequest(INFO_MESSAGES.DEMO_USER_ID, 'safe input');
  logger.success(INFO_MESSAGES.USER_RETRIEVED, userInfo);

  return userInfo;
};
