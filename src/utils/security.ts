import type { ValidationResult } from '../types/security.js';
import { DANGEROUS_INPUT_PATTERNS, DEFAULT_ALLOWED_ORIGINS } from '../constants/security.js';
import { WARNING_MESSAGES } from '../constants/messages.js';
import { EmailSchema, formatIssues } from '../schemas/validation.js';
import { logger } from './logger.js';

export { sanitizeError } from './redaction.js';

/**
 * Scans free-form input for known script-injection markers.
 *
 * This is an advisory denylist, not a security boundary: it folds case and
 * nothing else, so entity-encoded, whitespace-padded or otherwise disguised
 * payloads pass. Escape output where it is rendered.
 */
export const checkUserInput = (input: unknown): ValidationResult => {
  if (!input || typeof input !== 'string') {
    return {
      isValid: false,
      error: 'Input must be a non-empty string'
    };
  }

  const lowered = input.toLowerCase();

  for (const pattern of DANGEROUS_INPUT_PATTERNS) {
    if (lowered.includes(pattern)) {
      logger.warn(`${WARNING_MESSAGES.DANGEROUS_INPUT} ${pattern}`);
      return {
        isValid: false,
        error: `Input contains a dangerous pattern: ${pattern}`,
        matchedPattern: pattern
      };
    }
  }

  return {
    isValid: true,
    sanitizedValue: input
  };
};

export const validateUserInput = (input: unknown): boolean => checkUserInput(input).isValid;

/**
 * Strips angle brackets, `javascript:` and inline `on*=` handlers, then trims.
 * Advisory like {@link checkUserInput}; the result is for display, not for
 * building markup.
 */
export const sanitizeInput = (input: string): string =>
  input
    .replace(/[<>]/g, '')
    .replace(/javascript:/gi, '')
    .replace(/on\w+=/gi, '')
    .trim();

export const validateEmail = (email: string): ValidationResult => {
  const result = EmailSchema.safeParse(email);

  if (!result.success) {
    return {
      isValid: false,
      error: formatIssues(result.error)
    };
  }

  return {
    isValid: true,
    sanitizedValue: result.data
  };
};

// Exact match only; no wildcard or subdomain expansion.
export const validateOrigin = (
  origin: string,
  allowedOrigins: readonly string[] = DEFAULT_ALLOWED_ORIGINS
): boolean => allowedOrigins.includes(origin);
