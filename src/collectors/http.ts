/**
 * HTTP Helpers for Collectors
 *
 * Thin wrappers over the global fetch with a per-request timeout, typed
 * errors and retry with exponential backoff for retryable failures.
 *
 * @module collectors/http
 */

import { HttpError, isRetryableError } from './errors.js';

// ============================================================================
// Constants
// ============================================================================

/** Default per-request timeout (15 seconds) */
export const DEFAULT_HTTP_TIMEOUT_MS = 15000;

/** Browser-like headers; several directories refuse unknown agents */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/json;q=0.9,*/*;q=0.8',
};

/** Base delay in milliseconds for exponential backoff */
const BASE_DELAY_MS = 500;

/** Maximum delay in milliseconds for exponential backoff */
const MAX_DELAY_MS = 4000;

// ============================================================================
// Types
// ============================================================================

/**
 * Options for a single HTTP request.
 */
export interface RequestOptions {
  /** Request timeout in milliseconds */
  timeoutMs?: number;

  /** Extra headers merged over DEFAULT_HEADERS */
  headers?: Record<string, string>;

  /** Query parameters appended to the URL */
  params?: Record<string, string | number | boolean>;

  /** Retry attempts for retryable failures (default: 0) */
  retries?: number;
}

// ============================================================================
// Request Helpers
// ============================================================================

/**
 * Append query parameters to a URL.
 */
export function buildUrl(url: string, params?: RequestOptions['params']): string {
  if (!params) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/**
 * Fetch a URL and read the response inside one timeout.
 *
 * The abort timer stays armed until `read` settles, so a server that sends
 * headers and then stalls the body still times out.
 *
 * @throws HttpError with status 408 on timeout
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestOptions,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const target = buildUrl(url, options.params);
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(target, {
      headers: { ...DEFAULT_HEADERS, ...options.headers },
      signal: controller.signal,
    });
    return await read(response);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new HttpError(`Request to ${target} timed out after ${timeoutMs}ms`, target, 408, true, {
        cause: error,
      });
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Convert a non-2xx response into an HttpError.
 */
async function toHttpError(url: string, response: Response): Promise<HttpError> {
  const text = await response.text().catch(() => '');
  const isRetryable = response.status === 429 || response.status >= 500;
  const detail = text ? `: ${text.slice(0, 200)}` : '';
  return new HttpError(`HTTP ${response.status} from ${url}${detail}`, url, response.status, isRetryable);
}

/**
 * Sleep for a specified duration.
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a request with retry logic.
 *
 * Only retryable errors (429, 5xx, timeouts) are retried.
 *
 * @throws Last error if all retries exhausted or error is not retryable
 */
export async function withRetry<T>(fn: () => Promise<T>, retries: number = 0): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error) || attempt >= retries) {
        throw error;
      }
      await sleep(Math.min(MAX_DELAY_MS, BASE_DELAY_MS * Math.pow(2, attempt)));
    }
  }
}

/**
 * GET a URL and return its body as text.
 *
 * @throws HttpError on non-2xx responses and timeouts
 */
export async function fetchText(url: string, options: RequestOptions = {}): Promise<string> {
  return withRetry(
    () =>
      fetchWithTimeout(url, options, async (response) => {
        if (!response.ok) {
          throw await toHttpError(buildUrl(url, options.params), response);
        }
        return response.text();
      }),
    options.retries
  );
}

/**
 * GET a URL and parse its body as JSON.
 *
 * Some directories answer with an HTML error page and status 200; that
 * body is reported as a non-retryable HttpError.
 *
 * @throws HttpError on non-2xx responses, timeouts and non-JSON bodies
 */
export async function fetchJson(url: string, options: RequestOptions = {}): Promise<unknown> {
  const body = await fetchText(url, {
    ...options,
    headers: { Accept: 'application/json', ...options.headers },
  });

  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    const target = buildUrl(url, options.params);
    throw new HttpError(`Expected JSON from ${target}, got a non-JSON body`, target, 200, false);
  }
}

/**
 * Prefix a bare domain with https://; empty input stays empty.
 *
 * @example ensureScheme('razorpay.com') // 'https://razorpay.com'
 */
export function ensureScheme(url: string | undefined): string {
  const trimmed = (url ?? '').trim();
  if (!trimmed || trimmed.startsWith('http')) {
    return trimmed;
  }
  return `https://${trimmed}`;
}
