import { CanceledError } from "../types/errors.js";

/**
 * Wait `ms` milliseconds, or reject with CanceledError as soon as `signal`
 * fires. The timer is cleared on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CanceledError("Operation canceled", { cause: signal.reason }));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CanceledError("Operation canceled", { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Throw CanceledError if `signal` has fired. */
export function throwIfCanceled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CanceledError("Operation canceled", { cause: signal.reason });
  }
}
