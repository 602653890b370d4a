import type { HTTP_METHODS } from '../constants/http.js';
import type { LogLevel } from '../utils/logger.js';

export interface ClientConfig {
  readonly credential: string;
  readonly timeoutSeconds: number;
  readonly maxRetries: number;
}

export interface AppEnvironment {
  apiKey?: string;
  baseUrl: string;
  allowedRoot: string;
  logLevel: LogLevel;
}

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  baseUrl: string;
  fetch?: FetchLike;
  retryDelayMs?: number;
}

export enum UserRole {
  ADMIN = 'admin',
  USER = 'user',
  GUEST = 'guest',
}

export interface NewUser {
  name: string;
  email: string;
  role?: UserRole;
}
