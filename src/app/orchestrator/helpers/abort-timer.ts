/*
Run budget timer for the per-stage AbortSignal.
setTimeout caps its delay at 2^31-1 ms and fires after 1 ms beyond that,
so long budgets are waited out in capped steps.
*/

export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Aborts `controller` once `remainingMs()` reaches zero. Returns a cancel function. */
export function abortWhenExhausted(
  controller: AbortController,
  remainingMs: () => number,
  maxDelayMs: number = MAX_TIMER_DELAY_MS,
): () => void {
  let timer: NodeJS.Timeout | undefined;

  const arm = (): void => {
    const remaining = remainingMs();
    if (remaining <= 0) {
      controller.abort();
      return;
    }
    timer = setTimeout(arm, Math.min(remaining, maxDelayMs));
    timer.unref();
  };

  arm();
  return () => clearTimeout(timer);
}
