/**
 * Settle `request` early with the signal's reason when `signal` aborts.
 *
 * The client's request keeps running to completion; only the caller stops
 * waiting for it. Its late result or error is discarded.
 */
export function abortable<T>(request: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return request;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    request.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
