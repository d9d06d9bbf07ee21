import { AuthError } from '../core/errors.js';

/**
 * The subset of `fetch` the clients rely on. Pass a stub in tests.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * A response whose body has been read and, when possible, parsed as JSON.
 */
export interface JsonResponse {
  status: number;
  ok: boolean;
  /** Parsed body, or undefined when the body is empty or not JSON */
  body: unknown;
}

/**
 * Options for {@link requestJson}.
 */
export interface RequestJsonOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Service name used in error messages, e.g. `Token endpoint` */
  service: string;
}

/**
 * Send a request and read the body as JSON.
 *
 * Non-2xx statuses are returned, not thrown; the caller decides what they mean.
 *
 * @throws AuthError `ProviderUnavailable` when the request fails or times out
 */
export async function requestJson(
  url: string,
  init: RequestInit,
  options: RequestJsonOptions
): Promise<JsonResponse> {
  const doFetch = options.fetch ?? fetch;

  let response: Response;
  let text: string;
  try {
    response = await doFetch(url, { ...init, signal: AbortSignal.timeout(options.timeoutMs) });
    text = await response.text();
  } catch (error) {
    const reason =
      error instanceof Error && error.name === 'TimeoutError'
        ? `timed out after ${options.timeoutMs}ms`
        : 'could not be reached';
    throw new AuthError('ProviderUnavailable', `${options.service} ${reason}`, { cause: error });
  }

  let body: unknown;
  try {
    body = text.length > 0 ? JSON.parse(text) : undefined;
  } catch {
    body = undefined;
  }

  return { status: response.status, ok: response.ok, body };
}

/**
 * Narrow an unknown JSON value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
