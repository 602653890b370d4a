import { SECRET_REDACTIONS } from '../constants/security.js';

const redact = (text: string): string =>
  SECRET_REDACTIONS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);

/**
 * Renders any thrown value or log detail as a string with credentials masked.
 */
export const sanitizeError = (error: unknown): string => {
  if (typeof error === 'string') {
    return redact(error);
  }

  if (error instanceof Error) {
    return sanitizeError(error.message);
  }

  if (error === null || error === undefined) {
    return 'An unknown error occurred';
  }

  try {
    return redact(JSON.stringify(error) ?? String(error));
  } catch {
    return redact(String(error));
  }
};
