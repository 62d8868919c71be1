import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { UnknownSession } from "../src/pipeline/errors.js";
import { childTablePath, FileCaseStore, INPUTS_FILENAME, SESSION_FILENAME } from "../src/pipeline/store.js";
import type { SessionRecord } from "../src/pipeline/types.js";
import { sessionDirAbs } from "../src/pipeline/utils.js";
import { caseRow, evidenceRow, makeTmpOutputDir, removeTmpOutputDir } from "./helpers.js";

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await makeTmpOutputDir();
});

afterEach(async () => {
  await removeTmpOutputDir(tmpOut);
  tmpOut = null;
});

function sessionRow(id: string, overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    session_id: id,
    patient_id: "patient-1",
    created_at: "2026-01-01T00:00:00.000Z",
    status: "INITIALIZED",
    degradation: "FULL",
    staging: null,
    transcript: null,
    clinical_frame: null,
    updated_at: "2026-01-01T00:00:00.000Z",
    ...overrides
  };
}

describe("FileCaseStore", () => {
  it("writes session.json and inputs.json for a new session", async () => {
    const store = new FileCaseStore();
    await store.init();
    await store.createSession(sessionRow("sess-a"), { cxr: { ref: "dicom://1" } });

    const session = JSON.parse(await fs.readFile(path.join(sessionDirAbs("sess-a"), SESSION_FILENAME), "utf8"));
    const inputs = JSON.parse(await fs.readFile(path.join(sessionDirAbs("sess-a"), INPUTS_FILENAME), "utf8"));
    expect(session.status).toBe("INITIALIZED");
    expect(inputs).toEqual({ cxr: { ref: "dicom://1" } });
    expect(Object.isFrozen(store.getSession("sess-a"))).toBe(true);
  });

  it("rejects a duplicate session id", async () => {
    const store = new FileCaseStore();
    await store.init();
    await store.createSession(sessionRow("sess-a"), {});
    await expect(store.createSession(sessionRow("sess-a"), {})).rejects.toThrow(/already exists/);
  });

  it("numbers child rows per table across sessions", async () => {
    const store = new FileCaseStore();
    await store.init();
    const sessionA = await store.createSession(sessionRow("sess-a"), {});
    await store.createSession(sessionRow("sess-b"), {});

    const a1 = await store.appendEvidence(evidenceRow("sess-a"));
    const b1 = await store.appendEvidence(evidenceRow("sess-b"));
    const a2 = await store.appendEvidence(evidenceRow("sess-a", { modality: "cxr" }));
    const o1 = await store.recordOverride(
      { session_id: "sess-a", clinician_id: "dr-1", field: "staging", old_value: null, new_value: "IIA", reason: "review" },
      { ...sessionA, staging: "IIA" }
    );

    expect([a1.id, b1.id, a2.id]).toEqual([1, 2, 3]);
    expect(o1.id).toBe(1);
    expect(store.listEvidence("sess-a").map((e) => e.id)).toEqual([1, 3]);
    expect(store.listEvidence("sess-b").map((e) => e.id)).toEqual([2]);
  });

  it("rejects appends for an unknown session", async () => {
    const store = new FileCaseStore();
    await store.init();
    await expect(store.appendEvidence(evidenceRow("sess-missing"))).rejects.toBeInstanceOf(UnknownSession);
  });

  it("rejects an out-of-order debate pass without consuming an id", async () => {
    const store = new FileCaseStore();
    await store.init();
    await store.createSession(sessionRow("sess-a"), {});

    await expect(
      store.appendDebateOutput({ session_id: "sess-a", pass_number: 2, persona: "Radiologist", output_text: "x [EV-1]" })
    ).rejects.toThrow(/out of order/);

    const first = await store.appendDebateOutput({
      session_id: "sess-a",
      pass_number: 1,
      persona: "Pathologist",
      output_text: "x [EV-1]"
    });
    expect(first.id).toBe(1);
    expect(store.listDebateOutputs("sess-a")).toHaveLength(1);
  });

  it("reloads rows from disk and continues the id sequence", async () => {
    const first = new FileCaseStore();
    await first.init();
    await first.createSession(sessionRow("sess-a"), {});
    await first.appendEvidence(evidenceRow("sess-a"));
    await first.appendEvidence(evidenceRow("sess-a", { modality: "cxr" }));

    const second = new FileCaseStore();
    await second.init();
    expect(second.getSession("sess-a")?.patient_id).toBe("patient-1");
    expect(second.listEvidence("sess-a").map((e) => e.modality)).toEqual(["histopathology", "cxr"]);

    const next = await second.appendEvidence(evidenceRow("sess-a", { modality: "derm" }));
    expect(next.id).toBe(3);
  });

  it("drops a torn final line on load", async () => {
    const first = new FileCaseStore();
    await first.init();
    await first.createSession(sessionRow("sess-a"), {});
    await first.appendEvidence(evidenceRow("sess-a"));
    await fs.appendFile(childTablePath("sess-a", "evidence_items"), '{"id":2,"session_', "utf8");

    const second = new FileCaseStore();
    await second.init();
    expect(second.listEvidence("sess-a")).toHaveLength(1);
  });

  it("cuts a torn final line off the file so later appends stay readable", async () => {
    const first = new FileCaseStore();
    await first.init();
    await first.createSession(sessionRow("sess-a"), {});
    await first.appendEvidence(evidenceRow("sess-a"));
    await fs.appendFile(childTablePath("sess-a", "evidence_items"), '{"id":2,"session_', "utf8");

    const second = new FileCaseStore();
    await second.init();
    const appended = await second.appendEvidence(evidenceRow("sess-a", { modality: "cxr" }));
    expect(appended.id).toBe(2);

    const third = new FileCaseStore();
    await third.init();
    expect(third.listEvidence("sess-a").map((e) => [e.id, e.modality])).toEqual([
      [1, "histopathology"],
      [2, "cxr"]
    ]);
    const lines = (await fs.readFile(childTablePath("sess-a", "evidence_items"), "utf8")).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
  });

  it("still refuses a malformed row that is not the last one", async () => {
    const first = new FileCaseStore();
    await first.init();
    await first.createSession(sessionRow("sess-a"), {});
    await first.appendEvidence(evidenceRow("sess-a"));
    const file = childTablePath("sess-a", "evidence_items");
    await fs.writeFile(file, `{"broken\n${await fs.readFile(file, "utf8")}`, "utf8");

    await expect(new FileCaseStore().init()).rejects.toThrow(/Corrupt JSONL row 1/);
  });

  it("finalizes a case and the session together, once", async () => {
    const store = new FileCaseStore();
    await store.init();
    const session = await store.createSession(sessionRow("sess-a", { status: "DEBATE" }), {});

    const row = await store.finalizeCase(caseRow("sess-a"), { ...session, status: "FINALIZED", staging: "IIB" });
    expect(row.id).toBe(1);
    expect(store.getCase("sess-a")?.staging).toBe("IIB");
    expect(store.getSession("sess-a")?.status).toBe("FINALIZED");

    await expect(
      store.finalizeCase(caseRow("sess-a"), { ...session, status: "FINALIZED", staging: "IIB" })
    ).rejects.toThrow(/already finalized/);
  });

  it("rolls the case row back when the session write fails", async () => {
    const store = new FileCaseStore();
    await store.init();
    const session = await store.createSession(sessionRow("sess-a", { status: "DEBATE" }), {});

    // A directory in place of session.json makes the atomic rename fail.
    const sessionFile = path.join(sessionDirAbs("sess-a"), SESSION_FILENAME);
    await fs.rm(sessionFile);
    await fs.mkdir(sessionFile);

    await expect(
      store.finalizeCase(caseRow("sess-a"), { ...session, status: "FINALIZED", staging: "IIB" })
    ).rejects.toThrow();

    expect(store.getCase("sess-a")).toBeNull();
    expect(store.getSession("sess-a")?.status).toBe("DEBATE");
    expect(await fs.readFile(childTablePath("sess-a", "onco_cases"), "utf8")).toBe("");
  });

  it("rolls the override row back when the session write fails", async () => {
    const store = new FileCaseStore();
    await store.init();
    const session = await store.createSession(sessionRow("sess-a", { staging: "IIB" }), {});
    const sessionFile = path.join(sessionDirAbs("sess-a"), SESSION_FILENAME);
    await fs.rm(sessionFile);
    await fs.mkdir(sessionFile);

    await expect(
      store.recordOverride(
        { session_id: "sess-a", clinician_id: "dr-1", field: "staging", old_value: "IIB", new_value: "III", reason: "review" },
        { ...session, staging: "III" }
      )
    ).rejects.toThrow();

    expect(store.listOverrides("sess-a")).toEqual([]);
    expect(store.getSession("sess-a")?.staging).toBe("IIB");
    expect(await fs.readFile(childTablePath("sess-a", "overrides"), "utf8")).toBe("");
  });

  it("keeps override sync rows and reloads them", async () => {
    const store = new FileCaseStore();
    await store.init();
    await store.createSession(sessionRow("sess-a"), {});
    await store.appendOverrideSync({ session_id: "sess-a", override_id: 1, status: "FAILED", attempts: 5, error: "timeout" });

    const reloaded = new FileCaseStore();
    await reloaded.init();
    expect(reloaded.listOverrideSync("sess-a")).toEqual([
      expect.objectContaining({ id: 1, override_id: 1, status: "FAILED", attempts: 5, error: "timeout" })
    ]);
  });

  it("forgets a write chain once its last task settles", async () => {
    const store = new FileCaseStore();
    await store.init();
    await store.createSession(sessionRow("sess-a", { status: "DEBATE" }), {});
    await Promise.all([
      store.appendEvidence(evidenceRow("sess-a")),
      store.appendEvidence(evidenceRow("sess-a", { modality: "cxr" })),
      store.appendEvidence(evidenceRow("sess-missing")).catch(() => undefined)
    ]);
    await new Promise((resolve) => setImmediate(resolve));

    expect(store.activeChains).toBe(0);
  });
});
