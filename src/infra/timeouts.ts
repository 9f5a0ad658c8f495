import { TimeoutError } from '../domain/errors.js';

/**
 * Races a promise against a timer; the timer is always cleared
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([run(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
