/**
 * doFetch - fetch wrapper with timeout and an Accept header suited to SDL.
 *
 * - Uses the global fetch of Node 20.
 * - Uses AbortController to enforce the timeout.
 * - Non-2xx responses are turned into errors carrying the status.
 */

export const DEFAULT_FETCH_TIMEOUT_MS = 15000;

export async function doFetch(target: string, timeoutMs: number = DEFAULT_FETCH_TIMEOUT_MS): Promise<Response> {
  if (!target) throw new Error("doFetch requires a target URL");

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(target, {
      signal: controller.signal,
      redirect: "follow",
      headers: { Accept: "application/graphql, text/plain, */*" },
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
    }
    return res;
  } finally {
    clearTimeout(timer);
  }
}

export async function fetchText(target: string, timeoutMs?: number): Promise<string> {
  const res = await doFetch(target, timeoutMs);
  return res.text();
}
