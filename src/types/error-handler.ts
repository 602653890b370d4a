export enum ErrorType {
  INVALID_CONFIG = 'INVALID_CONFIG',
  SESSION_UNAVAILABLE = 'SESSION_UNAVAILABLE',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  REQUEST_FAILED = 'REQUEST_FAILED',
  DECODE_ERROR = 'DECODE_ERROR',
  PATH_REJECTED = 'PATH_REJECTED',
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

export interface ErrorContext {
  operation?: string;
  file?: string;
  url?: string;
  method?: string;
  status?: number;
  userId?: string;
  timestamp?: Date;
  attempt?: number;
  maxRetries?: number;
  additionalInfo?: Record<string, unknown>;
}
