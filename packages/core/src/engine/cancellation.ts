// packages/core/src/engine/cancellation.ts — Caller-driven session cancellation

export class CancellationToken {
  private readonly controller = new AbortController();
  private callbacks = new Set<() => void>();

  /** Signal cancellation. Idempotent. In-flight model calls observe it through `signal`. */
  cancel(reason = 'Operation was cancelled'): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort(new CancellationError(reason));
    const pending = [...this.callbacks];
    this.callbacks.clear();
    for (const cb of pending) cb();
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Aborts when the token is cancelled; hand it to anything that accepts an AbortSignal. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Throw if already cancelled. Call before starting expensive work. */
  throwIfCancelled(): void {
    if (!this.isCancelled) return;
    const reason: unknown = this.controller.signal.reason;
    throw reason instanceof CancellationError ? reason : new CancellationError('Operation was cancelled');
  }

  /**
   * Register a callback to run on cancellation.
   * If already cancelled, the callback fires immediately.
   */
  onCancel(callback: () => void): void {
    if (this.isCancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
