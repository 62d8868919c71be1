import { describe, expect, it, vi } from "vitest";
import axios, { type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import {
  axiosSyncTransport,
  RemoteReviewSync,
  toSyncPayload,
  type SyncEvent,
  type SyncLedger,
  type SyncOutcome,
  type SyncPayload
} from "../src/pipeline/remote_sync.js";
import type { OverrideRow } from "../src/pipeline/types.js";

function overrideRow(id: number, newValue: string): OverrideRow {
  return {
    id,
    session_id: "sess-a",
    clinician_id: "dr-a",
    field: "staging",
    old_value: "IIB",
    new_value: newValue,
    reason: "Review",
    created_at: "2026-01-01T00:00:00.000Z"
  };
}

class MemoryLedger implements SyncLedger {
  readonly settled: Array<{ id: number } & SyncOutcome> = [];

  async settle(row: OverrideRow, outcome: SyncOutcome): Promise<void> {
    this.settled.push({ id: row.id, ...outcome });
  }
}

describe("RemoteReviewSync", () => {
  it("does nothing without a transport", async () => {
    const sync = new RemoteReviewSync({ transport: null });
    sync.enqueue(overrideRow(1, "IV"));
    await sync.idle();
    expect(sync.stats()).toEqual({ enabled: false, pending: 0, delivered: 0, failed: 0, attempts: 0 });
  });

  it("retries with backoff until delivery", async () => {
    const events: SyncEvent[] = [];
    let calls = 0;
    const sync = new RemoteReviewSync({
      transport: async () => {
        calls++;
        if (calls < 3) throw new Error("503 Service Unavailable");
      },
      baseDelayMs: 1,
      onEvent: (e) => events.push(e)
    });

    sync.enqueue(overrideRow(1, "IV"));
    await sync.idle();

    expect(events.map((e) => [e.type, e.attempt])).toEqual([
      ["retry", 1],
      ["retry", 2],
      ["delivered", 3]
    ]);
    expect(events[1]).toMatchObject({ delayMs: 2, error: "503 Service Unavailable" });
    expect(sync.stats()).toEqual({ enabled: true, pending: 0, delivered: 1, failed: 0, attempts: 3 });
  });

  it("gives up after the last attempt", async () => {
    const events: SyncEvent[] = [];
    const sync = new RemoteReviewSync({
      transport: async () => {
        throw new Error("unreachable");
      },
      maxAttempts: 2,
      baseDelayMs: 1,
      onEvent: (e) => events.push(e)
    });

    sync.enqueue(overrideRow(1, "IV"));
    await sync.idle();

    expect(events.map((e) => e.type)).toEqual(["retry", "failed"]);
    expect(sync.stats()).toMatchObject({ delivered: 0, failed: 1, attempts: 2 });
  });

  it("delivers in the order overrides were queued", async () => {
    const transport = vi.fn(async (_payload: SyncPayload) => undefined);
    const sync = new RemoteReviewSync({ transport });
    sync.enqueue(overrideRow(1, "III"));
    sync.enqueue(overrideRow(2, "IV"));
    await sync.idle();
    expect(transport.mock.calls.map((c) => c[0].new_value)).toEqual(["III", "IV"]);
  });

  it("queues a row once while it is still pending", async () => {
    const transport = vi.fn(async (_payload: SyncPayload) => undefined);
    const sync = new RemoteReviewSync({ transport });
    sync.enqueue(overrideRow(1, "III"));
    sync.enqueue(overrideRow(1, "III"));
    await sync.idle();
    expect(transport).toHaveBeenCalledTimes(1);

    sync.enqueue(overrideRow(1, "III"));
    await sync.idle();
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it("settles each row in the ledger as synced or failed", async () => {
    const ledger = new MemoryLedger();
    const sync = new RemoteReviewSync({
      transport: async (payload) => {
        if (payload.new_value === "IV") throw new Error("unreachable");
      },
      maxAttempts: 2,
      baseDelayMs: 1,
      ledger
    });

    sync.enqueue(overrideRow(1, "III"));
    sync.enqueue(overrideRow(2, "IV"));
    await sync.idle();

    expect(ledger.settled).toEqual([
      { id: 1, status: "SYNCED", attempts: 1, error: null },
      { id: 2, status: "FAILED", attempts: 2, error: "unreachable" }
    ]);
  });

  it("reports an outcome the ledger could not keep", async () => {
    const events: SyncEvent[] = [];
    const sync = new RemoteReviewSync({
      transport: async () => undefined,
      ledger: {
        settle: async () => {
          throw new Error("disk full");
        }
      },
      onEvent: (e) => events.push(e)
    });

    sync.enqueue(overrideRow(1, "III"));
    await sync.idle();

    expect(events).toEqual([
      { type: "delivered", payload: toSyncPayload(overrideRow(1, "III")), attempt: 1 },
      { type: "unrecorded", payload: toSyncPayload(overrideRow(1, "III")), attempt: 1, error: "disk full" }
    ]);
  });

  it("caps the exponential backoff", () => {
    const sync = new RemoteReviewSync({ transport: null, baseDelayMs: 500, maxDelayMs: 30_000 });
    expect([1, 2, 3, 7].map((n) => sync.backoffMs(n))).toEqual([500, 1000, 2000, 30_000]);
  });
});

describe("axiosSyncTransport", () => {
  it("posts the payload as JSON", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = axios.create({
      adapter: async (config) => {
        seen.push(config);
        const response: AxiosResponse = { data: {}, status: 200, statusText: "OK", headers: {}, config };
        return response;
      }
    });

    await axiosSyncTransport("https://review.example.test/sync", client)(toSyncPayload(overrideRow(1, "IV")));

    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe("post");
    expect(seen[0].url).toBe("https://review.example.test/sync");
    expect(JSON.parse(String(seen[0].data))).toEqual({
      session_id: "sess-a",
      field: "staging",
      old_value: "IIB",
      new_value: "IV",
      reason: "Review",
      clinician_id: "dr-a",
      timestamp: "2026-01-01T00:00:00.000Z"
    });
  });
});
