/**
 * Follow `promise`, unless `signal` aborts first; then resolve with
 * `onAbort(reason)`. The underlying promise keeps running; only this wait
 * ends.
 */
export function raceAbort<T, A>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort: (reason: unknown) => A
): Promise<T | A> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.resolve(onAbort(signal.reason));
  }

  return new Promise<T | A>((resolve, reject) => {
    const abortListener = () => resolve(onAbort(signal.reason));
    signal.addEventListener('abort', abortListener, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', abortListener);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abortListener);
        reject(error);
      }
    );
  });
}
