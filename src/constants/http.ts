export const USER_AGENT = 'SecureAPI/1.0';
export const JSON_CONTENT_TYPE = 'application/json';

// Statuses worth another attempt; every other non-2xx fails immediately.
export const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504] as const;

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;
