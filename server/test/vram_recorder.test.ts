import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import { childTablePath } from "../src/pipeline/store.js";
import type { NewVramLog } from "../src/pipeline/types.js";
import { makeHarness, makeTmpOutputDir, removeTmpOutputDir } from "./helpers.js";

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await makeTmpOutputDir();
});

afterEach(async () => {
  await removeTmpOutputDir(tmpOut);
  tmpOut = null;
});

function sample(sessionId: string, phase: string): NewVramLog {
  return {
    session_id: sessionId,
    timestamp: 1,
    elapsed_s: 0.5,
    phase,
    allocated_mb: 500,
    reserved_mb: 500,
    model_active: "cxr-foundation"
  };
}

describe("VramRecorder", () => {
  it("persists samples in order and mirrors them as lease events", async () => {
    const h = await makeHarness();
    const s = await h.sessions.createSession("p", {});
    const events: Array<{ type: string; payload: unknown }> = [];
    h.sessions.subscribe(s.session_id, (type, payload) => events.push({ type, payload }));

    h.recorder.record(sample(s.session_id, "cxr_acquired"));
    h.recorder.record(sample(s.session_id, "cxr_released"));
    await h.recorder.flush();

    expect(h.store.listVramLogs(s.session_id).map((l) => [l.id, l.phase])).toEqual([
      [1, "cxr_acquired"],
      [2, "cxr_released"]
    ]);
    expect(events.map((e) => e.type)).toEqual(["lease", "lease"]);
    expect(events[0].payload).toEqual(sample(s.session_id, "cxr_acquired"));
  });

  it("reports a failed write without stopping later ones", async () => {
    const h = await makeHarness();
    const s = await h.sessions.createSession("p", {});
    const errors: unknown[] = [];
    h.sessions.subscribe(s.session_id, (type, payload) => {
      if (type === "error") errors.push(payload);
    });

    h.recorder.record(sample("sess-unknown", "cxr_acquired"));
    h.recorder.record(sample(s.session_id, "cxr_acquired"));
    await h.recorder.flush();
    expect(h.recorder.failedWrites).toBe(1);
    expect(h.store.listVramLogs(s.session_id)).toHaveLength(1);

    const table = childTablePath(s.session_id, "vram_logs");
    await fs.rm(table, { force: true });
    await fs.mkdir(table);
    h.recorder.record(sample(s.session_id, "cxr_released"));
    await h.recorder.flush();

    expect(h.recorder.failedWrites).toBe(2);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ stage: "vram" });
  });
});
