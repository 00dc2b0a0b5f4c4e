export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor() {
    super('operation aborted');
    this.name = 'AbortedError';
  }
}

/**
 * Settles with `work`, or rejects once `timeoutMs` elapses or `signal` aborts,
 * whichever comes first. The underlying work is not cancelled; its late
 * outcome is ignored.
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs?: number, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) {
    // the caller has gone; a late rejection is not theirs to handle
    work.catch(() => undefined);
    return Promise.reject(new AbortedError());
  }
  if (timeoutMs === undefined && !signal) return work;

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      cleanup();
      reject(new AbortedError());
    };
    const cleanup = () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(timeoutMs));
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const elapsed = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  return withTimeout(elapsed, undefined, signal).finally(() => clearTimeout(timer));
}
