import { ExecutionTimeoutError } from "@agentmd/types";

export interface DeadlineOptions {
  /** Milliseconds before the work is abandoned; `0` disables the timer. */
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs `work` under a deadline. The signal handed to `work` aborts when the
 * deadline passes or the caller's signal aborts, and the returned promise
 * rejects at that moment even if `work` ignores the signal.
 */
export const runWithDeadline = async <T>(
  work: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> => {
  const { timeoutMs, signal } = options;
  signal?.throwIfAborted();

  const controller = new AbortController();

  const timer =
    timeoutMs > 0
      ? setTimeout(() => controller.abort(new ExecutionTimeoutError(timeoutMs)), timeoutMs)
      : undefined;

  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", forwardAbort, { once: true });

  let rejectAborted: (reason: unknown) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const onAbort = () => rejectAborted(controller.signal.reason);
  controller.signal.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([work(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
    controller.signal.removeEventListener("abort", onAbort);
  }
};
