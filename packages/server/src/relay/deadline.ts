import { DeadlineExceededError } from './errors.js';

/**
 * Races `operation` against a timer. The underlying operation is not cancelled on expiry;
 * callers close the connection it belongs to.
 */
export const withDeadline = async <T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new DeadlineExceededError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
};
