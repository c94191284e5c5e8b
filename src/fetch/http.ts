import fetch, { type RequestInit, type Response } from 'node-fetch';

/**
 * Sends one request and hands the response to `read`. The timeout stays armed
 * until `read` settles, so a body that stalls after the headers aborts like a
 * slow connect; both surface as node-fetch's `AbortError` (see `isAbortError`).
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    return await read(response);
  } finally {
    clearTimeout(timer);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export interface CappedText {
  text: string;
  truncated: boolean;
}

/**
 * Reads at most `maxBytes` of the body as UTF-8. Leaving the loop early
 * destroys the stream, so the rest is never downloaded.
 */
export async function readTextCapped(response: Response, maxBytes: number): Promise<CappedText> {
  if (!response.body) return { text: '', truncated: false };
  const chunks: Buffer[] = [];
  let total = 0;
  let truncated = false;
  for await (const chunk of response.body) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    if (total + buffer.length > maxBytes) {
      chunks.push(buffer.subarray(0, maxBytes - total));
      total = maxBytes;
      truncated = true;
      break;
    }
    chunks.push(buffer);
    total += buffer.length;
  }
  return { text: Buffer.concat(chunks).toString('utf-8'), truncated };
}
