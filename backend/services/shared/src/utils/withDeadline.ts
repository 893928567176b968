// backend/services/shared/src/utils/withDeadline.ts
/**
 * Purpose:
 * - Bound any awaited external call (store write, chat send) by a deadline.
 *
 * Notes:
 * - The underlying operation is not cancelled; its late result is ignored.
 * - The timer is always cleared so nothing keeps the event loop alive.
 */

export class DeadlineExceededError extends Error {
  constructor(public readonly label: string, public readonly ms: number) {
    super(`${label} exceeded deadline of ${ms}ms`);
    this.name = "DeadlineExceededError";
  }
}

export async function withDeadline<T>(
  op: () => Promise<T>,
  ms: number,
  label = "operation"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(label, ms)), ms);
  });
  try {
    return await Promise.race([op(), deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
