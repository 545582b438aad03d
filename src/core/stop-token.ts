/**
 * Process-wide cooperative cancellation.
 *
 * Set once by SIGINT/SIGTERM and checked between documents and between
 * companies. In-flight requests are left to finish.
 */
export class StopToken {
  private readonly controller = new AbortController();

  get requested(): boolean {
    return this.controller.signal.aborted;
  }

  /** Aborts when a stop is requested; used to wake backoff sleeps early. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get reason(): string | null {
    if (!this.requested) return null;
    const reason: unknown = this.controller.signal.reason;
    return typeof reason === 'string' ? reason : 'interrupted';
  }

  request(reason: string = 'interrupted'): void {
    if (!this.requested) this.controller.abort(reason);
  }
}
