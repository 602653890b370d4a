export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_URL = 'https://api.example.com';
export const DEFAULT_LOG_LEVEL = 'info' as const;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
