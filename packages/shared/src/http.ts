export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface RetryPolicy {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

const defaultPolicy: RetryPolicy = {
  timeoutMs: 3000,
  retries: 3,
  backoffMs: 300
};

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`Request failed: HTTP ${status}`);
    this.name = "HttpStatusError";
  }
}

export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

/**
 * fetch with a per-attempt timeout and exponential backoff between attempts.
 * An abort of `init.signal` stops immediately and is never retried.
 * Non-2xx responses are read and raised as {@link HttpStatusError}.
 */
export async function requestWithRetry(
  url: string,
  init: RequestInit,
  policy: Partial<RetryPolicy> = {}
): Promise<Response> {
  const merged = { ...defaultPolicy, ...policy };
  const outer = init.signal ?? undefined;
  let lastError: unknown;

  for (let attempt = 0; attempt <= merged.retries; attempt += 1) {
    if (outer?.aborted) {
      throw outer.reason instanceof Error ? outer.reason : new Error("request aborted");
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, merged.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    outer?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(url, {
        ...init,
        signal: controller.signal,
        headers: {
          "content-type": "application/json",
          ...(init.headers ?? {})
        }
      });

      if (response.ok) {
        return response;
      }

      lastError = new HttpStatusError(response.status, await response.text());
    } catch (error) {
      if (outer?.aborted) {
        throw error;
      }
      lastError = timedOut ? new RequestTimeoutError(merged.timeoutMs) : error;
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", forwardAbort);
    }

    if (attempt < merged.retries) {
      const backoff = merged.backoffMs * Math.pow(2, attempt);
      await sleep(backoff, outer);
    }
  }

  throw lastError instanceof Error ? lastError : new Error("requestWithRetry failed");
}
