import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import { NetworkError, ProtocolError } from './errors';
import { DEFAULT_TIMEOUT_MS } from './constants';

/**
 * Build the axios instance every component uses by default.
 * All statuses resolve; callers decide what a status means.
 */
export function createHttpClient(config: AxiosRequestConfig = {}): AxiosInstance {
  return axios.create({
    timeout: DEFAULT_TIMEOUT_MS,
    ...config,
    validateStatus: () => true,
  });
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Wrap a transport failure. Errors that already belong to the taxonomy
 * pass through untouched.
 */
export function toNetworkError(error: unknown, what: string): Error {
  if (error instanceof NetworkError || error instanceof ProtocolError) {
    return error;
  }
  return new NetworkError(`${what} failed: ${formatError(error)}`, { cause: error });
}

export function formatError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code} ${error.message}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Validate a response payload, turning schema mismatches into ProtocolError. */
export function parsePayload<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProtocolError(`Unexpected ${what} response: ${issues}`);
  }
  return result.data;
}

export function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}
