import { IngestionError } from "../errors";

/**
 * Invocation time budget shared by every stage of one load.
 *
 * `signal` aborts once a raced stage runs out of time so in-flight SDK calls
 * stop instead of outliving the invocation.
 */
export class Deadline {
  private readonly controller = new AbortController();

  constructor(
    readonly expiresAt: number,
    private readonly now: () => number = Date.now
  ) {}

  static after(ms: number, now: () => number = Date.now): Deadline {
    return new Deadline(now() + Math.max(0, ms), now);
  }

  /**
   * Budget from a Lambda context, keeping `safetyMs` in reserve for reporting.
   */
  static fromRemaining(
    remainingMs: number,
    safetyMs: number,
    now: () => number = Date.now
  ): Deadline {
    return Deadline.after(remainingMs - safetyMs, now);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.remainingMs() <= 0 || this.controller.signal.aborted;
  }

  check(stage: string): void {
    if (this.expired()) {
      this.controller.abort();
      throw this.exceeded(stage);
    }
  }

  /**
   * Starts `work` only while time is left and rejects with DeadlineExceeded
   * if it is still pending when the budget runs out.
   */
  async race<T>(work: () => Promise<T>, stage: string): Promise<T> {
    this.check(stage);
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        this.controller.abort();
        reject(this.exceeded(stage));
      }, this.remainingMs());
      timer.unref();
    });
    try {
      return await Promise.race([work(), timeout]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  private exceeded(stage: string): IngestionError {
    return new IngestionError(
      `Invocation deadline reached during ${stage}`,
      "DeadlineExceeded",
      { stage, expiresAt: new Date(this.expiresAt).toISOString() }
    );
  }
}
