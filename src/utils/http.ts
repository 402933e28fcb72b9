/**
 * Outbound HTTP helpers for identity-provider calls.
 */

/** Non-2xx answer from the identity provider */
export class ProviderHttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "ProviderHttpError";
  }
}

/**
 * Fetches with a per-call timeout. The caller's signal, if any, aborts the call as well.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  options: { timeoutMs: number; signal?: AbortSignal },
): Promise<Response> {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
  return fetch(url, { ...init, signal });
}

function errorName(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "name" in error) {
    return typeof error.name === "string" ? error.name : undefined;
  }
  return undefined;
}

/**
 * Network failures, timeouts, throttling and 5xx answers are worth another attempt.
 * Anything the provider rejected on purpose (4xx) is not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ProviderHttpError) {
    return error.status >= 500 || error.status === 429;
  }
  // fetch() rejects with a TypeError when the connection itself fails
  if (error instanceof TypeError) {
    return true;
  }
  return errorName(error) === "TimeoutError";
}

/**
 * Settles with `promise`, or rejects as soon as `signal` aborts. The underlying
 * work is left running for anyone else waiting on it.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
