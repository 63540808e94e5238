import { TTL_JITTER_PERCENT } from "../constants/index.js";

/**
 * Raised when an I/O call does not settle within its budget.
 */
export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Race a promise against a timer. The timer is always cleared so a
 * settled call leaves nothing scheduled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Apply ±8% jitter to a TTL so keys written together expire apart.
 * Never returns less than 1 second.
 */
export function applyJitter(ttlSeconds: number, random: () => number = Math.random): number {
  const jitter = ttlSeconds * TTL_JITTER_PERCENT * (random() * 2 - 1);
  return Math.max(1, Math.round(ttlSeconds + jitter));
}
