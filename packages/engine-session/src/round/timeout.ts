/** Raised when a guarded call runs past its deadline. */
export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race the task `start` returns against a timer. On timeout the signal handed
 * to `start` is aborted with the TimeoutError; a task that keeps running must
 * check it before touching shared state. The timer is always cleared.
 */
export async function withTimeout<T>(
  start: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let expire: (err: Error) => void = () => undefined;
  const timeout = new Promise<never>((_, reject) => {
    expire = reject;
  });
  const timer = setTimeout(() => {
    const err = new TimeoutError(label, ms);
    controller.abort(err);
    expire(err);
  }, ms);
  try {
    return await Promise.race([start(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
