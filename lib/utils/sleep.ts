export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export class AbortedError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

/**
 * Promise-based delay that rejects with AbortedError when the signal fires
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new AbortedError());
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
