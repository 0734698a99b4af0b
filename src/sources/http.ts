/**
 * Shared axios setup for platform adapters
 */

import axios, { type AxiosInstance, isAxiosError } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import { FetchError } from '../utils';

const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export const DEFAULT_TIMEOUT_MS = 30 * 1000;

export function createHttpClient(
  timeout: number = DEFAULT_TIMEOUT_MS
): AxiosInstance {
  return axios.create({
    timeout,
    headers: { 'User-Agent': USER_AGENT },
  });
}

/**
 * Validate a response body, turning schema mismatches into FetchError
 */
export function parseResponse<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  what: string
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new FetchError(
      `unexpected ${what} response: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
        .join('; ')}`
    );
  }
  return result.data;
}

/**
 * Wrap transport failures into FetchError, keeping FetchError as is
 */
export function toFetchError(error: unknown, what: string): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (isAxiosError(error)) {
    const status = error.response?.status;
    return new FetchError(
      status
        ? `${what} failed with status ${status}`
        : `${what} failed: ${error.message}`,
      { cause: error }
    );
  }
  return new FetchError(
    `${what} failed: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error }
  );
}
