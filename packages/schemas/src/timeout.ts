/**
 * Races a collaborator call against a timeout. Rejects with a TimeoutError if
 * the timeout fires first. The timer is always cleaned up and never keeps the
 * process alive.
 */
export class TimeoutError extends Error {
  readonly code = "COLLABORATOR_TIMEOUT";

  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "Operation",
): Promise<T> {
  if (ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/**
 * Invokes `fn` and bounds the result with {@link withTimeout}. A synchronous
 * throw inside `fn` surfaces as a rejection, same as an async failure.
 */
export function callWithTimeout<T>(
  fn: () => Promise<T>,
  ms: number,
  label = "Operation",
): Promise<T> {
  let pending: Promise<T>;
  try {
    pending = fn();
  } catch (err) {
    return Promise.reject(err);
  }
  return withTimeout(pending, ms, label);
}
