import axios, { type AxiosInstance } from "axios";
import type { OverridableField, OverrideRow, SyncStatus } from "./types.js";
import { errorMessage } from "./utils.js";

export type SyncPayload = {
  session_id: string;
  field: OverridableField;
  old_value: string | null;
  new_value: string;
  reason: string;
  clinician_id: string;
  timestamp: string;
};

export type SyncTransport = (payload: SyncPayload) => Promise<void>;

export type SyncEvent =
  | { type: "delivered"; payload: SyncPayload; attempt: number }
  | { type: "retry"; payload: SyncPayload; attempt: number; delayMs: number; error: string }
  | { type: "failed"; payload: SyncPayload; attempt: number; error: string }
  | { type: "unrecorded"; payload: SyncPayload; attempt: number; error: string };

export type SyncOutcome = {
  status: Exclude<SyncStatus, "PENDING">;
  attempts: number;
  error: string | null;
};

/** Where delivery outcomes are kept, so unfinished work survives a restart. */
export interface SyncLedger {
  settle(row: OverrideRow, outcome: SyncOutcome): Promise<void>;
}

export type SyncStats = {
  enabled: boolean;
  pending: number;
  delivered: number;
  failed: number;
  attempts: number;
};

export type RemoteSyncOptions = {
  transport: SyncTransport | null;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  ledger?: SyncLedger;
  onEvent?: (event: SyncEvent) => void;
};

export function toSyncPayload(row: OverrideRow): SyncPayload {
  return {
    session_id: row.session_id,
    field: row.field,
    old_value: row.old_value,
    new_value: row.new_value,
    reason: row.reason,
    clinician_id: row.clinician_id,
    timestamp: row.created_at
  };
}

export function axiosSyncTransport(url: string, client: AxiosInstance = axios.create({ timeout: 10_000 })): SyncTransport {
  return async (payload) => {
    await client.post(url, payload, { headers: { "Content-Type": "application/json" } });
  };
}

function syncKey(row: OverrideRow): string {
  return `${row.session_id}:${row.id}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms).unref();
  });
}

/**
 * Forwards recorded overrides to the remote specialist review system in the
 * background. Local persistence never waits on delivery.
 */
export class RemoteReviewSync {
  private readonly transport: SyncTransport | null;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly onEvent?: (event: SyncEvent) => void;
  private readonly ledger: SyncLedger | null;
  private readonly queue: OverrideRow[] = [];
  private readonly inFlight = new Set<string>();
  private running: Promise<void> | null = null;
  private counters = { delivered: 0, failed: 0, attempts: 0 };

  constructor(options: RemoteSyncOptions) {
    this.transport = options.transport;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.onEvent = options.onEvent;
    this.ledger = options.ledger ?? null;
  }


  get enabled(): boolean {
    return this.transport !== null;
  }

  /** Queues a row for delivery. A row already queued or in flight is not queued twice. */
  enqueue(row: OverrideRow): void {
    if (!this.transport) return;
    const key = syncKey(row);
    if (this.inFlight.has(key)) return;
    this.inFlight.add(key);
    this.queue.push(row);
    if (!this.running) {
      this.running = this.drain(this.transport).finally(() => {
        this.running = null;
      });
    }
  }

  /** Resolves once everything queued so far has been delivered or given up on. */
  async idle(): Promise<void> {
    while (this.running) await this.running;
  }

  stats(): SyncStats {
    return { enabled: this.enabled, pending: this.queue.length + (this.running ? 1 : 0), ...this.counters };
  }

  backoffMs(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
  }

  private async drain(transport: SyncTransport): Promise<void> {
    for (let next = this.queue.shift(); next; next = this.queue.shift()) {
      const outcome = await this.deliver(transport, next);
      await this.settle(next, outcome);
      this.inFlight.delete(syncKey(next));
    }
  }

  private async settle(row: OverrideRow, outcome: SyncOutcome): Promise<void> {
    if (!this.ledger) return;
    try {
      await this.ledger.settle(row, outcome);
    } catch (err) {
      this.onEvent?.({ type: "unrecorded", payload: toSyncPayload(row), attempt: outcome.attempts, error: errorMessage(err) });
    }
  }

  private async deliver(transport: SyncTransport, row: OverrideRow): Promise<SyncOutcome> {
    const payload = toSyncPayload(row);
    for (let attempt = 1; ; attempt++) {
      this.counters.attempts++;
      try {
        await transport(payload);
        this.counters.delivered++;
        this.onEvent?.({ type: "delivered", payload, attempt });
        return { status: "SYNCED", attempts: attempt, error: null };
      } catch (err) {
        if (attempt >= this.maxAttempts) {
          this.counters.failed++;
          this.onEvent?.({ type: "failed", payload, attempt, error: errorMessage(err) });
          return { status: "FAILED", attempts: attempt, error: errorMessage(err) };
        }
        const delayMs = this.backoffMs(attempt);
        this.onEvent?.({ type: "retry", payload, attempt, delayMs, error: errorMessage(err) });
        await sleep(delayMs);
      }
    }
  }
}
