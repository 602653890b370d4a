import process from 'process';
import { match } from 'ts-pattern';
import { sanitizeError } from './redaction.js';
import { logger } from './logger.js';
import {
  ERROR_LOG_LIMIT,
  RECENT_ERROR_THRESHOLD_MS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  ERROR_PATTERNS,
} from '../constants/error-handler.js';
import { ErrorType, type ErrorContext } from '../types/error-handler.js';

export class SecureError extends Error {
  public readonly type: ErrorType;
  public readonly context: ErrorContext;
  public readonly isRecoverable: boolean;
  public readonly userMessage: string;

  constructor(
    message: string,
    type: ErrorType = ErrorType.UNKNOWN_ERROR,
    context: ErrorContext = {},
    isRecoverable: boolean = false,
    userMessage?: string
  ) {
    super(sanitizeError(message));
    this.name = 'SecureError';
    this.type = type;
    this.context = { ...context, timestamp: new Date() };
    this.isRecoverable = isRecoverable;
    this.userMessage = userMessage ?? this.getDefaultUserMessage();
  }

  /** HTTP status of a failed request, when the server answered at all. */
  get status(): number | undefined {
    return this.context.status;
  }

  private getDefaultUserMessage(): string {
    return match(this.type)
      .with(ErrorType.INVALID_CONFIG, () => 'Invalid configuration. Please check your settings.')
      .with(
        ErrorType.SESSION_UNAVAILABLE,
        () => 'HTTP session could not be created. A fetch implementation is required.'
      )
      .with(ErrorType.INVALID_ARGUMENT, () => 'Invalid input provided. Please check your input and try again.')
      .with(ErrorType.REQUEST_FAILED, () =>
        this.context.status === undefined
          ? 'API request failed. Please check your connection and try again.'
          : `API request failed with HTTP ${this.context.status}.`
      )
      .with(ErrorType.DECODE_ERROR, () => 'The API returned a response that is not valid JSON.')
      .with(ErrorType.PATH_REJECTED, () => 'File access was rejected by the path guard.')
      .with(ErrorType.UNSUPPORTED_OPERATION, () => 'This operation is not supported yet.')
      .with(ErrorType.FILE_SYSTEM_ERROR, () => 'File operation failed. Please check the path and permissions.')
      .otherwise(() => 'An unexpected error occurred. Please try again.');
  }
}

export const isSecureError = (error: unknown, type?: ErrorType): error is SecureError =>
  error instanceof SecureError && (type === undefined || error.type === type);

export class ErrorHandler {
  private static instance: ErrorHandler;
  private errorLog: Array<{ error: SecureError; timestamp: Date }> = [];

  private constructor() {
    // Private constructor for singleton pattern
  }

  public static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  public handleError = (error: unknown, context: ErrorContext = {}): SecureError => {
    const secureError = error instanceof SecureError ? error : this.createSecureError(error, context);

    this.logError(secureError);
    this.displayError(secureError, context);

    return secureError;
  };

  private readonly createSecureError = (error: unknown, context: ErrorContext): SecureError => {
    const message = error instanceof Error ? error.message : sanitizeError(error);
    const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;

    const errorType = match(code)
      .with('ENOENT', 'EACCES', 'EPERM', 'ENOTDIR', 'EISDIR', () => ErrorType.FILE_SYSTEM_ERROR)
      .with('ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', () => ErrorType.REQUEST_FAILED)
      .otherwise(() =>
        error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
          ? ErrorType.REQUEST_FAILED
          : this.detectErrorTypeFromMessage(message)
      );

    const isRecoverable = match(errorType)
      .with(ErrorType.REQUEST_FAILED, ErrorType.FILE_SYSTEM_ERROR, ErrorType.INVALID_ARGUMENT, () => true)
      .otherwise(() => false);

    return new SecureError(message, errorType, context, isRecoverable);
  };

  private readonly detectErrorTypeFromMessage = (message: string): ErrorType => {
    const lowerMsg = message.toLowerCase();

    for (const { type, patterns } of ERROR_PATTERNS) {
      if (patterns.some((pattern) => lowerMsg.includes(pattern))) {
        return type;
      }
    }

    return ErrorType.UNKNOWN_ERROR;
  };

  private readonly logError = (error: SecureError): void => {
    this.errorLog.push({ error, timestamp: new Date() });

    if (this.errorLog.length > ERROR_LOG_LIMIT) {
      this.errorLog = this.errorLog.slice(-ERROR_LOG_LIMIT);
    }
  };

  private readonly displayError = (error: SecureError, context: ErrorContext): void => {
    logger.error(`[${error.type}] ${error.message}`);

    const operation = context.operation ?? error.context.operation;
    if (operation) {
      logger.debug(`   Operation: ${operation}`);
    }

    if (context.attempt !== undefined && context.maxRetries !== undefined) {
      logger.debug(`   Attempt: ${context.attempt} (max retries: ${context.maxRetries})`);
    }
  };

  public getErrorStats = (): { total: number; byType: Record<string, number>; recent: number } => {
    const byType: Record<string, number> = {};
    const recent = this.errorLog.filter(
      (entry) => Date.now() - entry.timestamp.getTime() < RECENT_ERROR_THRESHOLD_MS
    ).length;

    this.errorLog.forEach((entry) => {
      byType[entry.error.type] = (byType[entry.error.type] ?? 0) + 1;
    });

    return {
      total: this.errorLog.length,
      byType,
      recent,
    };
  };

  public clear = (): void => {
    this.errorLog = [];
  };

  public handleProcessExit = (code: number = 1): void => {
    if (this.errorLog.length > 0) {
      logger.debug(`Error Summary: ${this.errorLog.length} errors logged`);
    }
    process.exit(code);
  };
}

/**
 * CLI boundary: reports any failure and exits on the ones that cannot be
 * retried by the user.
 */
export const withErrorHandling = async <T>(
  operation: () => Promise<T>,
  context: ErrorContext = {}
): Promise<T> => {
  const errorHandler = ErrorHandler.getInstance();

  try {
    return await operation();
  } catch (error) {
    const secureError = errorHandler.handleError(error, context);

    if (!secureError.isRecoverable) {
      errorHandler.handleProcessExit(1);
    }

    throw secureError;
  }
};

export interface RetryOptions {
  /** Attempts after the first one. */
  retries?: number;
  baseDelayMs?: number;
  shouldRetry?: (error: SecureError) => boolean;
  context?: ErrorContext;
}

export const withRetry = async <T>(
  operation: (attempt: number) => Promise<T>,
  {
    retries = DEFAULT_RETRY_ATTEMPTS,
    baseDelayMs = DEFAULT_RETRY_DELAY_MS,
    shouldRetry = (error: SecureError): boolean => error.isRecoverable,
    context = {},
  }: RetryOptions = {}
): Promise<T> => {
  const errorHandler = ErrorHandler.getInstance();
  const maxAttempts = retries + 1;
  let lastError: SecureError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = errorHandler.handleError(error, {
        ...context,
        attempt,
        maxRetries: retries,
      });

      if (!shouldRetry(lastError) || attempt === maxAttempts) {
        break;
      }

      const delay = baseDelayMs * Math.pow(2, attempt - 1);
      logger.warn(`Retrying in ${delay}ms... (attempt ${attempt + 1}/${maxAttempts})`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new SecureError('Retry failed with unknown error', ErrorType.UNKNOWN_ERROR, context);
};
