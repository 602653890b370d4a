import { ErrorType } from '../types/error-handler.js';

export const ERROR_LOG_LIMIT = 100;
export const RECENT_ERROR_THRESHOLD_MS = 24 * 60 * 60 * 1000; // 24 hours
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 500;

export const ERROR_PATTERNS = [
  { type: ErrorType.REQUEST_FAILED, patterns: ['timeout', 'timed out', 'fetch failed', 'network'] },
  { type: ErrorType.DECODE_ERROR, patterns: ['json', 'unexpected token'] },
  { type: ErrorType.PATH_REJECTED, patterns: ['path traversal', 'outside allowed directory'] },
  { type: ErrorType.INVALID_ARGUMENT, patterns: ['invalid', 'required'] },
  { type: ErrorType.INVALID_CONFIG, patterns: ['config', 'configuration'] },
];
