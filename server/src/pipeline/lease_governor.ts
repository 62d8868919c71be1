import { ResourceExhausted } from "./errors.js";
import type { NewVramLog } from "./types.js";
import { epochSeconds } from "./utils.js";

export type LeaseMode = "wait" | "fail_fast";

export type Lease = {
  readonly id: number;
  readonly sessionId: string;
  readonly stage: string;
  readonly model: string;
  readonly mb: number;
  readonly acquiredAtMs: number;
};

export type AcquireOptions = {
  sessionId: string;
  model?: string;
  /** Overrides the governor's mode for this request. */
  wait?: boolean;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export type AcquireResult = { ok: true; lease: Lease } | { ok: false; error: ResourceExhausted };
export type LeasedResult<T> = { ok: true; value: T } | { ok: false; error: ResourceExhausted };

export type GovernorOptions = {
  budgetMb: number;
  mode?: LeaseMode;
  waitTimeoutMs?: number;
  tickIntervalMs?: number;
  onSample?: (sample: NewVramLog) => void;
  clock?: () => number;
};

export type GovernorSnapshot = {
  budget_mb: number;
  mode: LeaseMode;
  allocated_mb: number;
  available_mb: number;
  queued_mb: number;
  peak_mb: number;
  active: Array<{ id: number; session_id: string; stage: string; model: string; mb: number }>;
  queued: Array<{ session_id: string; stage: string; mb: number }>;
};

type Waiter = {
  mb: number;
  stage: string;
  model: string;
  sessionId: string;
  settle: (result: AcquireResult) => void;
};

const DEFAULT_WAIT_TIMEOUT_MS = 30_000;
const DEFAULT_TICK_INTERVAL_MS = 1_000;

/**
 * Process-wide admission control for accelerator memory. The sum of held lease
 * sizes never exceeds `budgetMb`; waiters are served strictly first come first served.
 */
export class ResourceLeaseGovernor {
  readonly budgetMb: number;
  readonly mode: LeaseMode;
  private readonly waitTimeoutMs: number;
  private readonly tickIntervalMs: number;
  private readonly onSample?: (sample: NewVramLog) => void;
  private readonly clock: () => number;
  private readonly startedAtMs: number;
  private readonly active = new Map<number, Lease>();
  private readonly waiters: Waiter[] = [];
  private nextLeaseId = 1;
  private peakMb = 0;

  constructor(options: GovernorOptions) {
    if (!Number.isFinite(options.budgetMb) || options.budgetMb <= 0) {
      throw new RangeError(`budgetMb must be a positive number (got ${options.budgetMb})`);
    }
    this.budgetMb = options.budgetMb;
    this.mode = options.mode ?? "fail_fast";
    this.waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.onSample = options.onSample;
    this.clock = options.clock ?? Date.now;
    this.startedAtMs = this.clock();
  }

  inUseMb(): number {
    let sum = 0;
    for (const lease of this.active.values()) sum += lease.mb;
    return sum;
  }

  availableMb(): number {
    return this.budgetMb - this.inUseMb();
  }

  canFit(mb: number): boolean {
    return mb <= this.availableMb();
  }

  peak(): number {
    return this.peakMb;
  }

  acquire(mb: number, stage: string, options: AcquireOptions): Promise<AcquireResult> {
    if (!Number.isFinite(mb) || mb < 0) {
      return Promise.reject(new RangeError(`lease size must be a non-negative number (got ${mb})`));
    }
    const model = options.model ?? stage;

    if (mb > this.budgetMb) {
      return Promise.resolve(this.exhausted(stage, mb, "exceeds total budget"));
    }
    if (options.signal?.aborted) return Promise.resolve(this.exhausted(stage, mb, "cancelled"));
    if (this.waiters.length === 0 && this.canFit(mb)) {
      return Promise.resolve({ ok: true, lease: this.grant(mb, stage, model, options.sessionId) });
    }

    const wait = options.wait ?? this.mode === "wait";
    if (!wait) return Promise.resolve(this.exhausted(stage, mb));

    return new Promise<AcquireResult>((resolve) => {
      const timeoutMs = options.timeoutMs ?? this.waitTimeoutMs;
      let timer: NodeJS.Timeout | null = null;

      const onAbort = () => {
        if (this.removeWaiter(waiter)) waiter.settle(this.exhausted(stage, mb, "cancelled"));
      };

      const waiter: Waiter = {
        mb,
        stage,
        model,
        sessionId: options.sessionId,
        settle: (result) => {
          if (timer) clearTimeout(timer);
          options.signal?.removeEventListener("abort", onAbort);
          resolve(result);
        }
      };

      timer = setTimeout(() => {
        if (this.removeWaiter(waiter)) waiter.settle(this.exhausted(stage, mb, `no capacity within ${timeoutMs} ms`));
      }, timeoutMs);
      options.signal?.addEventListener("abort", onAbort, { once: true });

      this.waiters.push(waiter);
      this.sample(options.sessionId, `${stage}_queued`, model);
    });
  }

  /** Releases a lease. Returns false when it was already released. */
  release(lease: Lease): boolean {
    if (!this.active.delete(lease.id)) return false;
    this.sample(lease.sessionId, `${lease.stage}_released`, this.activeModels());
    this.pump();
    return true;
  }

  /**
   * Acquires, runs `fn`, and releases on every exit path. While `fn` runs a tick
   * sample is emitted every `tickIntervalMs`.
   */
  async withLease<T>(
    mb: number,
    stage: string,
    options: AcquireOptions,
    fn: (lease: Lease) => Promise<T>
  ): Promise<LeasedResult<T>> {
    const acquired = await this.acquire(mb, stage, options);
    if (!acquired.ok) return acquired;
    const lease = acquired.lease;

    const ticker = setInterval(() => {
      if (this.active.has(lease.id)) this.sample(lease.sessionId, `${stage}_tick`, lease.model);
    }, this.tickIntervalMs);
    ticker.unref();

    try {
      return { ok: true, value: await fn(lease) };
    } finally {
      clearInterval(ticker);
      this.release(lease);
    }
  }

  /** Drops every lease and queued request a session holds. Used on cancellation. */
  releaseAllFor(sessionId: string): number {
    // Waiters go first so the memory freed below is never handed back to this session.
    for (const waiter of [...this.waiters]) {
      if (waiter.sessionId !== sessionId) continue;
      if (this.removeWaiter(waiter)) waiter.settle(this.exhausted(waiter.stage, waiter.mb, "cancelled"));
    }
    let released = 0;
    for (const lease of [...this.active.values()]) {
      if (lease.sessionId !== sessionId) continue;
      if (this.release(lease)) released++;
    }
    return released;
  }

  snapshot(): GovernorSnapshot {
    const allocated = this.inUseMb();
    return {
      budget_mb: this.budgetMb,
      mode: this.mode,
      allocated_mb: allocated,
      available_mb: this.budgetMb - allocated,
      queued_mb: this.queuedMb(),
      peak_mb: this.peakMb,
      active: [...this.active.values()].map((l) => ({
        id: l.id,
        session_id: l.sessionId,
        stage: l.stage,
        model: l.model,
        mb: l.mb
      })),
      queued: this.waiters.map((w) => ({ session_id: w.sessionId, stage: w.stage, mb: w.mb }))
    };
  }

  private grant(mb: number, stage: string, model: string, sessionId: string): Lease {
    const lease: Lease = Object.freeze({
      id: this.nextLeaseId++,
      sessionId,
      stage,
      model,
      mb,
      acquiredAtMs: this.clock()
    });
    this.active.set(lease.id, lease);
    this.peakMb = Math.max(this.peakMb, this.inUseMb());
    this.sample(sessionId, `${stage}_acquired`, model);
    return lease;
  }

  private pump(): void {
    while (this.waiters.length > 0) {
      const head = this.waiters[0];
      if (!this.canFit(head.mb)) return;
      this.waiters.shift();
      head.settle({ ok: true, lease: this.grant(head.mb, head.stage, head.model, head.sessionId) });
    }
  }

  private removeWaiter(waiter: Waiter): boolean {
    const idx = this.waiters.indexOf(waiter);
    if (idx === -1) return false;
    this.waiters.splice(idx, 1);
    // A head that gave up may have been blocking smaller requests behind it.
    if (idx === 0) this.pump();
    return true;
  }

  private exhausted(stage: string, mb: number, reason?: string): { ok: false; error: ResourceExhausted } {
    return { ok: false, error: new ResourceExhausted(stage, mb, this.availableMb(), this.budgetMb, reason) };
  }

  private queuedMb(): number {
    return this.waiters.reduce((sum, w) => sum + w.mb, 0);
  }

  private activeModels(): string | null {
    const models = [...this.active.values()].map((l) => l.model);
    return models.length > 0 ? models.join(",") : null;
  }

  private sample(sessionId: string, phase: string, modelActive: string | null): void {
    if (!this.onSample) return;
    const now = this.clock();
    const allocated = this.inUseMb();
    this.onSample({
      session_id: sessionId,
      timestamp: epochSeconds(now),
      elapsed_s: Math.max(0, (now - this.startedAtMs) / 1000),
      phase,
      allocated_mb: allocated,
      reserved_mb: allocated + this.queuedMb(),
      model_active: modelActive
    });
  }
}
