/**
 * @module primitives/abort
 * @description Abort races for awaits that take no signal of their own.
 */

/**
 * Settle with `promise`, or reject with `signal.reason` as soon as the
 * signal aborts. The raced operation itself keeps running.
 */
export async function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  signal.throwIfAborted();

  let onAbort: () => void = () => {};
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}
