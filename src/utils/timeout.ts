export class TimeoutError extends Error {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  // SDK clients surface aborted requests under different names
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIConnectionTimeoutError');
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with TimeoutError even if the task ignores the signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
