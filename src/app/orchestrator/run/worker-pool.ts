/**
 * WorkerPool runs up to `concurrency` drivers over a shared ready set of keys.
 * Purpose: bound concurrent work and guarantee a key is never held by two drivers at once.
 * Assumptions: the handler owns all state changes for the key it was given.
 * Usage: new WorkerPool({ concurrency, ready, handler, stopSignal }).run()
 */

// =============================================================================
// TYPES
// =============================================================================

/**
 * What happens to a key once the handler returns:
 * - `requeue`: back into the ready set (front, so started files finish before new ones start).
 * - `release`: dropped from this run, either terminal or left for a later run.
 */
export type ClaimDisposition = "requeue" | "release";

export type ClaimContext = {
  workerId: number;
  // True once a stop was requested or another driver failed; no new external work should start.
  stopRequested(): boolean;
};

export type ClaimHandler = (key: string, context: ClaimContext) => Promise<ClaimDisposition>;

export type WorkerPoolOptions = {
  concurrency: number;
  ready: Iterable<string>;
  handler: ClaimHandler;
  stopSignal?: AbortSignal;
};

export type WorkerPoolResult = {
  // Set when the pool ended because of the stop signal rather than running dry.
  stopped: { signal?: string } | null;
  // Keys still waiting when the pool ended.
  remaining: string[];
  peakActive: number;
};

// =============================================================================
// POOL
// =============================================================================

export class WorkerPool {
  private readonly ready: string[] = [];
  private readonly claimed = new Set<string>();
  private waiters: Array<() => void> = [];
  private stopReason: { signal?: string } | null = null;
  private failure: { error: unknown } | null = null;
  private peakActive = 0;

  constructor(private readonly options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`concurrency must be a positive integer (received ${options.concurrency})`);
    }
    for (const key of options.ready) {
      if (!this.ready.includes(key)) this.ready.push(key);
    }
  }

  get activeCount(): number {
    return this.claimed.size;
  }

  /** Rejects with the first handler error after every other driver has drained. */
  async run(): Promise<WorkerPoolResult> {
    const { stopSignal } = this.options;
    const onAbort = (): void => this.requestStop(signalName(stopSignal?.reason));

    if (stopSignal?.aborted) {
      onAbort();
    } else {
      stopSignal?.addEventListener("abort", onAbort);
    }

    try {
      const drivers = Array.from({ length: this.options.concurrency }, (_, index) =>
        this.drive(index + 1),
      );
      await Promise.all(drivers);
    } finally {
      stopSignal?.removeEventListener("abort", onAbort);
    }

    if (this.failure) {
      throw this.failure.error;
    }

    return {
      stopped: this.stopReason,
      remaining: [...this.ready],
      peakActive: this.peakActive,
    };
  }

  requestStop(signal?: string): void {
    if (this.stopReason) return;
    this.stopReason = signal ? { signal } : {};
    this.wakeAll();
  }

  private isHalted(): boolean {
    return this.stopReason !== null || this.failure !== null;
  }

  private async drive(workerId: number): Promise<void> {
    const context: ClaimContext = { workerId, stopRequested: () => this.isHalted() };

    while (!this.isHalted()) {
      const key = this.claim();
      if (key === undefined) {
        if (this.claimed.size === 0) {
          // Nothing ready and nothing in flight that could become ready again.
          this.wakeAll();
          return;
        }
        await this.waitForChange();
        continue;
      }

      let disposition: ClaimDisposition = "release";
      try {
        disposition = await this.options.handler(key, context);
      } catch (error) {
        if (!this.failure) this.failure = { error };
      } finally {
        this.claimed.delete(key);
      }

      if (disposition === "requeue") {
        this.ready.unshift(key);
      }
      this.wakeAll();
    }
  }

  private claim(): string | undefined {
    const key = this.ready.shift();
    if (key === undefined) return undefined;

    if (this.claimed.has(key)) {
      throw new Error(`Key ${key} is already claimed`);
    }
    this.claimed.add(key);
    this.peakActive = Math.max(this.peakActive, this.claimed.size);
    return key;
  }

  private waitForChange(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private wakeAll(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}

// A stop handler aborts with `{ signal }`; a plain string reason is taken as the name.
function signalName(reason: unknown): string | undefined {
  if (typeof reason === "string") return reason;
  if (typeof reason === "object" && reason !== null && "signal" in reason) {
    return typeof reason.signal === "string" ? reason.signal : undefined;
  }
  return undefined;
}
