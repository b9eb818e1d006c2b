/**
 * Timeout error thrown when a boundary call exceeds its budget.
 */
export class TimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    operation = 'Operation'
  ) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a boundary call against a timer.
 *
 * The timer is always cleared, so a settled call leaves nothing pending.
 * The wrapped promise is not cancelled; its late result is ignored.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation?: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMs, operation));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
