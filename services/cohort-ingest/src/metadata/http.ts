import { fetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import type { z } from 'zod';
import { MetadataServiceError } from '../errors';

export type HttpOptions = {
  fetchTimeoutMs?: number | null;
  userAgent?: string;
};

export const DEFAULT_USER_AGENT = 'cohort-ingest/0.1.0';

/**
 * Issues a request and hands the response to `read`. The timeout stays armed
 * until `read` settles, so a body that stalls after the headers still aborts.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  options: HttpOptions,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutMs = options.fetchTimeoutMs ?? null;
  const timer = timeoutMs && timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : null;
  const headers = new Headers(init.headers);
  if (!headers.has('user-agent')) {
    headers.set('user-agent', options.userAgent ?? DEFAULT_USER_AGENT);
  }
  try {
    const response = await fetch(url, { ...init, headers, signal: controller.signal });
    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new MetadataServiceError(
        `Request to ${url} failed with status ${response.status}`,
        response.status,
        url,
        body.slice(0, 500)
      );
    }
    return await read(response);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request to ${url} timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw error;
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init: RequestInit = {},
  options: HttpOptions = {}
): Promise<T> {
  return fetchWithTimeout(url, init, options, async (response) => {
    const payload: unknown = await response.json();
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new MetadataServiceError(
        `Malformed response from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        response.status,
        url
      );
    }
    return parsed.data;
  });
}

export async function fetchBuffer(url: string, options: HttpOptions = {}): Promise<Buffer> {
  return fetchWithTimeout(url, { method: 'GET' }, options, async (response) =>
    Buffer.from(await response.arrayBuffer())
  );
}
