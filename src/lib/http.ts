/** Timeouts for every outbound call, in milliseconds. */
export const NEWS_TIMEOUT_MS = 15000;
export const SEARCH_TIMEOUT_MS = 15000;
export const DOWNLOAD_TIMEOUT_MS = 20000;
export const POST_TIMEOUT_MS = 20000;

export const USER_AGENT = "daily-post/0.1";

/**
 * fetch() bounded by `timeoutMs`. The deadline also covers reading the
 * response body; a stalled body read rejects with a TimeoutError.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  return fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
}
