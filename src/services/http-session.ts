import type { ClientConfig, FetchLike, HttpMethod } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { SecureError } from '../utils/error-handler.js';
import { JSON_CONTENT_TYPE, USER_AGENT } from '../constants/http.js';
import { ERROR_MESSAGES } from '../constants/messages.js';

export interface SessionRequest {
  method: HttpMethod;
  url: string;
  body?: unknown;
  timeoutMs: number;
}

/**
 * Reusable transport settings: default headers bound to one fetch
 * implementation. Safe for sequential reuse; concurrent use is only as safe
 * as the underlying fetch.
 */
export class HttpSession {
  readonly headers: Readonly<Record<string, string>>;
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl: FetchLike, headers: Record<string, string>) {
    this.fetchImpl = fetchImpl;
    this.headers = Object.freeze({ ...headers });
  }

  send = ({ method, url, body, timeoutMs }: SessionRequest): Promise<Response> =>
    this.fetchImpl(url, {
      method,
      headers: { ...this.headers },
      ...(body === undefined || body === null ? {} : { body: JSON.stringify(body) }),
      signal: AbortSignal.timeout(timeoutMs),
    });
}

const resolveFetch = (candidate: FetchLike | undefined): FetchLike | undefined => {
  if (candidate) return candidate;
  return typeof globalThis.fetch === 'function' ? globalThis.fetch.bind(globalThis) : undefined;
};

export const createSession = (config: ClientConfig, options: { fetch?: FetchLike } = {}): HttpSession => {
  const fetchImpl = resolveFetch(options.fetch);

  if (!fetchImpl) {
    throw new SecureError(ERROR_MESSAGES.FETCH_UNAVAILABLE, ErrorType.SESSION_UNAVAILABLE, {
      operation: 'createSession',
    });
  }

  return new HttpSession(fetchImpl, {
    Authorization: `Bearer ${config.credential}`,
    'Content-Type': JSON_CONTENT_TYPE,
    'User-Agent': USER_AGENT,
  });
};
