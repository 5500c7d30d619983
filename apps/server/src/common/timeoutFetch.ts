/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */

/** Wrap a fetch implementation so every request carries a bounded timeout. */
export function createTimeoutFetcher(timeoutMs: number, fetcher: typeof fetch = fetch): typeof fetch {
  return (input, init) =>
    fetcher(input, {
      ...init,
      signal: init?.signal ?? AbortSignal.timeout(timeoutMs),
    });
}

/** Check whether a fetch rejection came from an elapsed timeout signal. */
export function isTimeoutError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) return false;
  return error.name === "TimeoutError" || error.name === "AbortError";
}

/**
 * Read a response body as JSON. Stream failures (including an elapsed timeout
 * while the body is still arriving) reject; a body that is not JSON yields null.
 */
export async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
