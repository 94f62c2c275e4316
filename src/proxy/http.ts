import { BackendUnavailable, CancelledError, WatcherError } from "./errors.js";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
  text: string;
}

export interface Deadline {
  signal: AbortSignal;
  timedOut(): boolean;
  cancelled(): boolean;
  dispose(): void;
}

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 250, maxDelayMs: 2_000 };

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("sleep"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError("sleep"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function createDeadline(timeoutMs: number, outer?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, Math.max(1, timeoutMs));
  const onAbort = (): void => controller.abort();
  if (outer?.aborted) {
    controller.abort();
  } else {
    outer?.addEventListener("abort", onAbort, { once: true });
  }
  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    cancelled: () => Boolean(outer?.aborted),
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    },
  };
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export function trunc(value: unknown, max = 200): string {
  if (typeof value === "string") return value.slice(0, max);
  try {
    return JSON.stringify(value).slice(0, max);
  } catch {
    return String(value).slice(0, max);
  }
}

export async function requestJson(
  fetchImpl: FetchLike,
  method: string,
  url: string,
  options: {
    headers?: Record<string, string>;
    body?: unknown;
    timeoutMs: number;
    signal?: AbortSignal;
    onTimeout?: () => WatcherError;
  },
): Promise<JsonResponse> {
  const headers: Record<string, string> = { Accept: "application/json", ...(options.headers || {}) };
  let payload: string | undefined;
  if (options.body !== undefined) {
    payload = JSON.stringify(options.body);
    headers["Content-Type"] = "application/json";
  }

  const deadline = createDeadline(options.timeoutMs, options.signal);
  try {
    const resp = await fetchImpl(url, {
      method: method.toUpperCase(),
      headers,
      body: payload,
      signal: deadline.signal,
    });
    const text = await resp.text();
    return { status: resp.status, ok: resp.ok, body: parseBody(text), text };
  } catch (error) {
    if (error instanceof WatcherError) throw error;
    if (deadline.cancelled()) {
      throw new CancelledError(`${method} ${url}`);
    }
    if (deadline.timedOut()) {
      throw options.onTimeout?.() ?? new BackendUnavailable(`mihomo_http_timeout:${options.timeoutMs}ms`);
    }
    throw new BackendUnavailable(`mihomo_http_failed:${method} ${url}`, { cause: error });
  } finally {
    deadline.dispose();
  }
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options?: { signal?: AbortSignal; onRetry?: (error: WatcherError, attempt: number, delayMs: number) => void },
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  let attempt = 0;
  for (;;) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof WatcherError) || !error.retryable || attempt >= attempts) {
        throw error;
      }
      const delayMs = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
      options?.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options?.signal);
    }
  }
}
