/**
 * Request deadlines.
 *
 * A deadline is an AbortSignal that fires when either the caller's signal
 * aborts or `timeoutMs` elapse without a `refresh()`. Streams refresh on every
 * chunk, which turns the deadline into an idle timeout for long transfers.
 */

export interface Deadline {
  readonly signal: AbortSignal;
  /** True once the timer (not the caller) aborted the signal */
  readonly expired: boolean;
  refresh(): void;
  dispose(): void;
}

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`);
    this.name = 'TimeoutError';
  }
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const arm = (): void => {
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      expired = true;
      controller.abort(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);
    timer.unref?.();
  };

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
    arm();
  }

  return {
    signal: controller.signal,
    get expired() {
      return expired;
    },
    refresh() {
      if (!controller.signal.aborted) arm();
    },
    dispose() {
      if (timer) clearTimeout(timer);
      timer = undefined;
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}
