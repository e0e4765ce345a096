/**
 * Run an abortable operation with a deadline.
 * On expiry the signal is aborted and the returned promise rejects with
 * TimeoutError, whether or not the operation honours the signal.
 */

import { TimeoutError } from "./errors";

export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(`${label} timed out after ${ms}ms`);
      controller.abort(err);
      reject(err);
    }, ms);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
