import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import request from "supertest";
import { TriagePolicyStore } from "../src/config.js";
import { SessionExecutor } from "../src/executor.js";
import { OverrideAuditLog } from "../src/pipeline/override_log.js";
import { makeHarness, makeTmpOutputDir, removeTmpOutputDir, type Harness } from "./helpers.js";

type Handler = (err: Error) => void;
type PipedResponse = { write?: (chunk: string) => void; end?: () => void };

let tmpOut: string | null = null;
let emit: "warning" | "error" = "warning";

beforeEach(async () => {
  tmpOut = await makeTmpOutputDir();

  vi.resetModules();
  vi.doMock("archiver", () => {
    return {
      default: () => {
        const handlers: Record<string, Handler | undefined> = {};
        let res: PipedResponse | null = null;
        const archive = {
          on: (evt: string, cb: Handler) => {
            handlers[evt] = cb;
            return archive;
          },
          pipe: (next: PipedResponse) => {
            res = next;
          },
          directory: () => undefined,
          finalize: () => {
            if (emit === "error") {
              handlers.error?.(new Error("boom"));
              return;
            }
            handlers.warning?.(new Error("warn"));
            // Minimal zip magic so the response completes.
            res?.write?.("PK");
            res?.end?.();
          }
        };
        return archive;
      }
    };
  });
});

afterEach(async () => {
  vi.doUnmock("archiver");
  vi.resetModules();
  await removeTmpOutputDir(tmpOut);
  tmpOut = null;
});

async function appFor(h: Harness) {
  const { createApp } = await import("../src/app.js");
  return createApp({
    sessions: h.sessions,
    executor: new SessionExecutor(h.sessions, async () => undefined, h.governor),
    governor: h.governor,
    overrides: new OverrideAuditLog(h.sessions),
    policy: new TriagePolicyStore()
  });
}

describe("export zip archiver events", () => {
  it("logs warnings and still sends the archive", async () => {
    emit = "warning";
    const h = await makeHarness();
    const s = await h.sessions.createSession("patient-1", {});
    const logs: string[] = [];
    h.sessions.subscribe(s.session_id, (type, payload) => {
      if (type !== "log" || typeof payload !== "object" || payload === null || !("message" in payload)) return;
      logs.push(String(payload.message));
    });

    const res = await request(await appFor(h)).get(`/api/sessions/${s.session_id}/export`);

    expect(res.status).toBe(200);
    expect(logs).toContain("zip warning: warn");
  });

  it("returns 500 when archiver emits an error", async () => {
    emit = "error";
    const h = await makeHarness();
    const s = await h.sessions.createSession("patient-1", {});
    const errors: string[] = [];
    h.sessions.subscribe(s.session_id, (type, payload) => {
      if (type !== "error" || typeof payload !== "object" || payload === null || !("message" in payload)) return;
      errors.push(String(payload.message));
    });

    const res = await request(await appFor(h)).get(`/api/sessions/${s.session_id}/export`);

    expect(res.status).toBe(500);
    expect(errors).toEqual(["zip error: boom"]);
  });
});
