export class RevocationLookupTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Revocation lookup exceeded ${timeoutMs}ms`);
    this.name = 'RevocationLookupTimeoutError';
  }
}

export class RequestAbandonedError extends Error {
  constructor() {
    super('Request was cancelled before admission completed');
    this.name = 'RequestAbandonedError';
  }
}

/**
 * Starts `work` and settles with it, unless the deadline passes or `signal`
 * aborts first. Work is never started for an already-aborted signal.
 */
export function withTimeout<T>(
  work: () => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new RequestAbandonedError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      cleanup();
      reject(new RequestAbandonedError());
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new RevocationLookupTimeoutError(timeoutMs));
    }, timeoutMs);

    function cleanup(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    signal?.addEventListener('abort', onAbort, { once: true });

    work().then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}
