/**
 * HTTP Module
 *
 * Shared axios client for the wiki origin, the query API and the image CDN,
 * plus the small timing and cancellation helpers the crawl loops use.
 */

import axios, { type AxiosInstance } from 'axios';
import type { CollectorConfig } from '../config/index.js';

/**
 * Create the axios client used for every request of a run.
 * The request timeout is the page/image timeout; API calls pass a shorter one per request.
 */
export function createWikiClient(config: CollectorConfig): AxiosInstance {
  return axios.create({
    timeout: config.timeoutMs,
    headers: {
      'User-Agent': config.userAgent,
    },
  });
}

/**
 * Fetch a page as text
 */
export async function fetchText(client: AxiosInstance, url: string): Promise<string> {
  const response = await client.get<string>(url, { responseType: 'text' });
  return response.data;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Error raised when a run is cancelled through its AbortSignal
 */
export function createAbortError(): Error {
  const error = new Error('Operation aborted');
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Cooperative cancellation point between iterations
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

/**
 * One-line description of a failed request, for logs and error lists
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status} for ${error.config?.url ?? 'unknown URL'}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
