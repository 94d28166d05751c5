// packages/core/src/engine/cancellation.ts — Cooperative stop signal for long-running loops

type CancelCallback = (reason: string) => void;

export class CancellationToken {
  private reasonText: string | null = null;
  private readonly callbacks = new Set<CancelCallback>();

  /** Signal cancellation. Only the first call has any effect. */
  cancel(reason = 'cancelled'): void {
    if (this.reasonText !== null) return;
    this.reasonText = reason;
    const pending = [...this.callbacks];
    this.callbacks.clear();
    for (const cb of pending) cb(reason);
  }

  get isCancelled(): boolean {
    return this.reasonText !== null;
  }

  get reason(): string | null {
    return this.reasonText;
  }

  /**
   * Run `callback` on cancellation, or right away if already cancelled.
   * Returns a function that unregisters it.
   */
  onCancel(callback: CancelCallback): () => void {
    if (this.reasonText !== null) {
      callback(this.reasonText);
      return () => {};
    }
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  /**
   * Wait `ms`, waking early on cancellation.
   * Resolves true if the full delay elapsed, false if cancelled.
   */
  sleep(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      if (this.isCancelled) {
        resolve(false);
        return;
      }
      const timer = setTimeout(() => {
        dispose();
        resolve(true);
      }, ms);
      const dispose = this.onCancel(() => {
        clearTimeout(timer);
        resolve(false);
      });
    });
  }
}

