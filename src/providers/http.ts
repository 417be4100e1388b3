import { fetch, type FormData } from 'undici';
import { ProviderError, type ProviderErrorKind } from '../types/errors.js';

export interface PostFormOptions {
  providerName: string;
  url: string;
  form: FormData;
  timeoutMs: number;
}

/**
 * POSTs a multipart form and returns the parsed JSON body. Non-2xx statuses,
 * timeouts and network failures are turned into ProviderErrors.
 */
export async function postForm({
  providerName,
  url,
  form,
  timeoutMs,
}: PostFormOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'POST',
      body: form,
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new ProviderError(
        providerName,
        classifyHttpStatus(response.status),
        `HTTP ${response.status}`,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }

    try {
      return await response.json();
    } catch {
      throw new ProviderError(providerName, 'Unknown', 'Response body is not JSON');
    }
  } catch (error) {
    if (error instanceof ProviderError) throw error;
    if (controller.signal.aborted) {
      throw new ProviderError(providerName, 'Timeout', `No response within ${timeoutMs}ms`);
    }
    throw ProviderError.from(providerName, error);
  } finally {
    clearTimeout(timeout);
  }
}

export function classifyHttpStatus(status: number): ProviderErrorKind {
  if (status === 429) return 'RateLimited';
  if (status === 401 || status === 403) return 'AuthError';
  if (status === 408 || status === 504) return 'Timeout';
  if (status === 400 || status === 413 || status === 415 || status === 422) return 'MalformedRequest';
  return 'Unknown';
}

/**
 * Parses a Retry-After header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}
