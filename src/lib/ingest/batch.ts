/**
 * Run an async task over items in fixed-size batches.
 * Results keep the input order.
 */
export async function runInBatches<T, R>(
  items: T[],
  maxConcurrent: number,
  task: (item: T) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.floor(maxConcurrent));
  const results: R[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    results.push(...(await Promise.all(batch.map(task))));
  }

  return results;
}

export interface TextResponse {
  ok: boolean;
  status: number;
  url: string;
  text: string;
}

/**
 * fetch() and read the body as text; the abort after timeoutMs covers both
 */
export async function fetchTextWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<TextResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const resp = await fetch(url, { ...init, signal: controller.signal });
    const text = await resp.text();
    return { ok: resp.ok, status: resp.status, url: resp.url, text };
  } finally {
    clearTimeout(timeout);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
