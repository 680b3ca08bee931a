/**
 * Session-scoped abort signal combining a caller's signal with a timeout.
 */

export interface SessionSignal {
  readonly signal: AbortSignal;
  /** Why the session was aborted (undefined while it is still live) */
  reason(): string | undefined;
  /** Clears the timer and detaches from the caller's signal. */
  dispose(): void;
}

export function createSessionSignal(external?: AbortSignal, timeoutMs?: number): SessionSignal {
  const controller = new AbortController();
  let reason: string | undefined;

  const abort = (why: string): void => {
    if (controller.signal.aborted) return;
    reason = why;
    controller.abort();
  };

  const onExternalAbort = (): void => abort('session aborted by caller');
  if (external?.aborted) {
    onExternalAbort();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => abort(`session timed out after ${timeoutMs} ms`), timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    reason: () => reason,
    dispose: () => {
      if (timer) clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
    },
  };
}
