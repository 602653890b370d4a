export { createClientConfig, loadEnvironment } from './config.js';
export { ApiClient, buildUrl } from './services/api-client.js';
export { HttpSession, createSession, type SessionRequest } from './services/http-session.js';
export { PathGuard, isContained } from './services/path-guard.js';
export { SecureApp, type SecureAppDependencies } from './core/secure-app.js';
export { buildApp, runDemo, type DemoOptions } from './core/demo.js';
export {
  checkUserInput,
  validateUserInput,
  sanitizeInput,
  validateEmail,
  validateOrigin,
  sanitizeError,
} from './utils/security.js';
export { SecureError, ErrorHandler, isSecureError, withRetry, type RetryOptions } from './utils/error-handler.js';
export { logger, setLogLevel, getLogLevel, type LogLevel } from './utils/logger.js';
export { ErrorType, type ErrorContext } from './types/error-handler.js';
export { UserRole } from './types/common.js';
export { DANGEROUS_INPUT_PATTERNS } from './constants/security.js';

// Type exports are compile-time only
export type * from './types/common.js';
export type * from './types/security.js';
