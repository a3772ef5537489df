import { AppError } from '@/src/lib/errors/app-error';

/**
 * Race a promise against a timer. The timer is always cleared so a settled
 * call leaves nothing pending on the event loop.
 *
 * @param label - Included in the TIMEOUT error details (e.g. "safety-gate-2")
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new AppError('TIMEOUT', `${label} timed out after ${timeoutMs}ms`, {
          label,
          timeoutMs,
        }),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
