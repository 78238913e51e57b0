import { TransientRemoteError } from "@/sync/errors";
import type { SyncStep } from "@/sync/types";

/**
 * Race a store call against a timer. The call itself is not cancelled;
 * its late result is ignored.
 */
export async function withTimeout<T>(
  call: () => Promise<T>,
  ms: number,
  label: string,
  step?: SyncStep,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientRemoteError(`${label} timed out after ${ms}ms`, { step, timedOut: true }));
    }, ms);
  });
  try {
    return await Promise.race([call(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
