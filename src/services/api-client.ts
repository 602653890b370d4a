import type { JsonValue } from 'type-fest';
import type { ApiClientOptions, ClientConfig, HttpMethod, NewUser } from '../types/common.js';
import { ErrorType, type ErrorContext } from '../types/error-handler.js';
import { ErrorHandler, SecureError, withRetry } from '../utils/error-handler.js';
import { checkUserInput } from '../utils/security.js';
import { logger } from '../utils/logger.js';
import { NewUserSchema, UserIdSchema, formatIssues } from '../schemas/validation.js';
import { createSession, type HttpSession } from './http-session.js';
import { RETRYABLE_STATUS_CODES } from '../constants/http.js';
import { DEFAULT_RETRY_DELAY_MS } from '../constants/error-handler.js';
import { ERROR_MESSAGES } from '../constants/messages.js';

const isRetryable = (error: SecureError): boolean => {
  if (error.type !== ErrorType.REQUEST_FAILED) return false;
  // No status means the request never got an answer (timeout, refused, reset).
  return error.status === undefined || RETRYABLE_STATUS_CODES.some((code) => code === error.status);
};

export const buildUrl = (baseUrl: string, endpoint: string): string =>
  `${baseUrl}/${endpoint.replace(/^\/+/, '')}`;

export class ApiClient {
  readonly config: ClientConfig;
  private readonly session: HttpSession;
  private readonly baseUrl: string;
  private readonly retryDelayMs: number;
  private readonly errorHandler: ErrorHandler;

  constructor(config: ClientConfig, { baseUrl, fetch, retryDelayMs = DEFAULT_RETRY_DELAY_MS }: ApiClientOptions) {
    this.config = config;
    this.baseUrl = baseUrl;
    this.retryDelayMs = retryDelayMs;
    this.errorHandler = ErrorHandler.getInstance();
    this.session = createSession(config, { fetch });
  }

  /**
   * Sends one JSON request and returns the decoded body.
   *
   * Transport failures, 408, 429 and 5xx are retried up to `maxRetries` times
   * with exponential backoff. Other statuses and undecodable bodies fail at
   * once. Each failed attempt is logged before the last one is rethrown.
   */
  request = async (endpoint: string, method: HttpMethod = 'GET', body?: unknown): Promise<JsonValue> => {
    const url = buildUrl(this.baseUrl, endpoint);
    const context: ErrorContext = { operation: 'request', url, method };

    return withRetry(() => this.attempt(url, method, body, context), {
      retries: this.config.maxRetries,
      baseDelayMs: this.retryDelayMs,
      shouldRetry: isRetryable,
      context,
    });
  };

  getUserInfo = async (userId: string): Promise<JsonValue> => {
    const result = UserIdSchema.safeParse(userId);
    if (!result.success) {
      throw this.invalidArgument(formatIssues(result.error), 'getUserInfo');
    }

    return this.request(`users/${encodeURIComponent(result.data)}`);
  };

  createUser = async (user: NewUser): Promise<JsonValue> => {
    const result = NewUserSchema.safeParse(user);
    if (!result.success) {
      throw this.invalidArgument(formatIssues(result.error), 'createUser');
    }

    const nameCheck = checkUserInput(result.data.name);
    if (!nameCheck.isValid) {
      throw this.invalidArgument(`${ERROR_MESSAGES.INVALID_USER_INPUT}: ${nameCheck.error}`, 'createUser');
    }

    return this.request('users', 'POST', result.data);
  };

  private readonly attempt = async (
    url: string,
    method: HttpMethod,
    body: unknown,
    context: ErrorContext
  ): Promise<JsonValue> => {
    logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.session.send({
        method,
        url,
        body,
        timeoutMs: this.config.timeoutSeconds * 1000,
      });
    } catch (error) {
      throw new SecureError(
        `${ERROR_MESSAGES.REQUEST_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorType.REQUEST_FAILED,
        context,
        true
      );
    }

    if (!response.ok) {
      throw new SecureError(
        `HTTP ${response.status}: ${response.statusText}`,
        ErrorType.REQUEST_FAILED,
        { ...context, status: response.status },
        true
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new SecureError(
        `${ERROR_MESSAGES.REQUEST_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorType.REQUEST_FAILED,
        { ...context, status: response.status },
        true
      );
    }

    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new SecureError(
        `${ERROR_MESSAGES.INVALID_JSON_RESPONSE}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorType.DECODE_ERROR,
        { ...context, status: response.status }
      );
    }
  };

  private readonly invalidArgument = (message: string, operation: string): SecureError =>
    this.errorHandler.handleError(new SecureError(message, ErrorType.INVALID_ARGUMENT, { operation }, true), {
      operation,
    });
}
