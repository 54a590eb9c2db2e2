/**
 * Cooperative cancellation.
 *
 * A token is polled at every suspension point of a run; nothing is
 * preempted. Sources are backed by AbortController so the same signal can be
 * handed to fetch-style collaborators.
 */

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly reason: string | undefined;
  /** Returns an unsubscribe function. Fires immediately when already cancelled. */
  onCancellationRequested(listener: (reason: string) => void): () => void;
  /** AbortSignal view for collaborators that accept one */
  readonly signal: AbortSignal;
}

export class CancellationTokenSource {
  private readonly controller = new AbortController();
  private cancelReason: string | undefined;

  readonly token: CancellationToken;

  constructor() {
    const controller = this.controller;
    const source = this;
    this.token = {
      get isCancellationRequested() {
        return controller.signal.aborted;
      },
      get reason() {
        return source.cancelReason;
      },
      get signal() {
        return controller.signal;
      },
      onCancellationRequested(listener) {
        if (controller.signal.aborted) {
          listener(source.cancelReason ?? "cancelled");
          return () => undefined;
        }
        const handler = () => listener(source.cancelReason ?? "cancelled");
        controller.signal.addEventListener("abort", handler, { once: true });
        return () => controller.signal.removeEventListener("abort", handler);
      },
    };
  }

  cancel(reason = "cancelled"): void {
    if (this.controller.signal.aborted) {
      return;
    }
    this.cancelReason = reason;
    this.controller.abort(reason);
  }
}

/** A token that is never cancelled. */
export const NEVER_CANCELLED: CancellationToken = new CancellationTokenSource().token;

/**
 * Sleep for `ms`, resolving early when the token is cancelled.
 * Resolves true when the full delay elapsed, false when cancelled.
 */
export function sleep(ms: number, token: CancellationToken = NEVER_CANCELLED): Promise<boolean> {
  if (token.isCancellationRequested) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    let unsubscribe: () => void = () => undefined;
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(true);
    }, ms);
    unsubscribe = token.onCancellationRequested(() => {
      clearTimeout(timer);
      resolve(false);
    });
  });
}
