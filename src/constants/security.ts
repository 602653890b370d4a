import type { ContainmentMode } from '../types/security.js';

// Matched case-insensitively as plain substrings. Advisory only: encoded or
// otherwise disguised payloads are not caught.
export const DANGEROUS_INPUT_PATTERNS = [
  '<script>',
  'javascript:',
  'data:text/html',
  'vbscript:',
  'onload=',
  'onerror=',
] as const;

export const PARENT_DIR_MARKER = '..';

export const DEFAULT_ALLOWED_ROOT = '/allowed/directory';

export const DEFAULT_CONTAINMENT: ContainmentMode = 'prefix';

export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024; // 1 MiB

export const DEFAULT_ALLOWED_ORIGINS = ['https://example.com', 'https://api.example.com'];

export const SECRET_REDACTIONS: ReadonlyArray<[RegExp, string]> = [
  [/bearer\s+[^\s"']+/gi, 'Bearer ***'],
  [/api[_-]?key[=:]\s*[^\s]+/gi, 'api_key=***'],
  [/token[=:]\s*[^\s]+/gi, 'token=***'],
  [/password[=:]\s*[^\s]+/gi, 'password=***'],
  [/secret[=:]\s*[^\s]+/gi, 'secret=***'],
];
