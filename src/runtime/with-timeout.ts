/**
 * Races an operation against a timeout and rejects with a descriptive error
 * if the timeout fires first. The timer is cleared once the race settles so
 * short-lived CLI processes are not kept alive by it.
 */
export class TimeoutError extends Error {
  constructor(
    readonly operationName: string,
    readonly timeoutMs: number
  ) {
    super(`${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  operationName: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([operation, timeoutPromise]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
