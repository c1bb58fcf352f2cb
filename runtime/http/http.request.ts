export type FetchLike = typeof fetch;

export interface TimedRequest {
  readonly url: string;
  readonly headers?: Record<string, string>;
  readonly timeoutMs: number;
}

export function isAbortError(error: unknown): boolean {
  // Node's DOMException extends Error.
  return error instanceof Error && /abort/i.test(error.name);
}

export function isNetworkError(error: unknown): boolean {
  return error instanceof TypeError && /fetch failed/i.test(error.message);
}

export interface TextResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly body: string;
}

/** GET and read the body as text; the timeout covers both. */
export async function getText(fetchImpl: FetchLike, request: TimedRequest): Promise<TextResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), request.timeoutMs);
  try {
    const response = await fetchImpl(request.url, {
      method: "GET",
      headers: request.headers,
      signal: controller.signal,
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  } finally {
    clearTimeout(timer);
  }
}
