import { z } from 'zod';
import type { SetRequired } from 'type-fest';
import {
  DEFAULT_BASE_URL,
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_SECONDS,
  LOG_LEVELS,
} from '../constants/config.js';
import { DEFAULT_ALLOWED_ROOT } from '../constants/security.js';
import { ERROR_MESSAGES } from '../constants/messages.js';
import { UserRole, type AppEnvironment } from '../types/common.js';

// Base validation schemas
export const CredentialSchema = z.string().min(1, ERROR_MESSAGES.CREDENTIAL_REQUIRED);

export const ClientConfigSchema = z.object({
  credential: CredentialSchema,
  timeoutSeconds: z
    .number()
    .int('Timeout must be a whole number of seconds')
    .positive(ERROR_MESSAGES.TIMEOUT_NOT_POSITIVE)
    .default(DEFAULT_TIMEOUT_SECONDS),
  maxRetries: z
    .number()
    .int('Max retries must be a whole number')
    .min(0, ERROR_MESSAGES.RETRIES_NEGATIVE)
    .default(DEFAULT_MAX_RETRIES),
});

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

// Environment schema; unset and blank variables fall back to defaults
export const EnvironmentSchema = z.object({
  API_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  API_BASE_URL: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .url('API_BASE_URL must be an absolute URL')
      .default(DEFAULT_BASE_URL)
      .transform((url) => url.replace(/\/+$/, ''))
  ),
  ALLOWED_ROOT: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_ALLOWED_ROOT)),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? emptyToUndefined(value.toLowerCase()) : value),
    z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL)
  ),
});

export const UserIdSchema = z
  .string()
  .refine((id) => id.trim().length > 0, ERROR_MESSAGES.USER_ID_REQUIRED);

export const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email(ERROR_MESSAGES.INVALID_EMAIL);

export const NewUserSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, ERROR_MESSAGES.USER_NAME_REQUIRED),
  email: EmailSchema,
  role: z.nativeEnum(UserRole).default(UserRole.USER),
});

export const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => issue.message).join(', ');

export type AuthenticatedEnvironment = SetRequired<AppEnvironment, 'apiKey'>;
