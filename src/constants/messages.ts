export const ERROR_MESSAGES = {
  API_KEY_NOT_FOUND: 'API_KEY environment variable not set',
  CREDENTIAL_REQUIRED: 'API key is required',
  TIMEOUT_NOT_POSITIVE: 'Timeout must be positive',
  RETRIES_NEGATIVE: 'Max retries cannot be negative',
  FETCH_UNAVAILABLE: 'No fetch implementation available to create an HTTP session',
  USER_ID_REQUIRED: 'User ID is required',
  USER_NAME_REQUIRED: 'User name is required',
  INVALID_EMAIL: 'Invalid email format',
  INVALID_USER_INPUT: 'Invalid user input detected',
  TRAVERSAL_DETECTED: 'Directory traversal attempt detected',
  OUTSIDE_ALLOWED_DIR: 'File access outside allowed directory',
  FILE_TYPE_NOT_ALLOWED: 'File type not allowed',
  WRITE_NOT_SUPPORTED: 'Write operations are not supported yet',
  REQUEST_FAILED: 'API request failed',
  INVALID_JSON_RESPONSE: 'Response body is not valid JSON',
} as const;

export const WARNING_MESSAGES = {
  DANGEROUS_INPUT: 'Potentially dangerous input detected:',
} as const;

export const INFO_MESSAGES = {
  FETCHING_USER: 'Fetching user',
  USER_RETRIEVED: 'Retrieved user info:',
  INPUT_ACCEPTED: 'Input passed the pattern check',
  SANITIZED_INPUT: 'Sanitized:',
  DEMO_USER_ID: '12345',
} as const;
