import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DebateAborted, InvalidTransition, ResourceExhausted, WorkerInferenceFailure } from "../src/pipeline/errors.js";
import { PersonaDebateEngine } from "../src/pipeline/persona_debate.js";
import { PERSONAS } from "../src/pipeline/personas.js";
import { assembleClinicalFrame } from "../src/pipeline/scheduler.js";
import {
  citingLanguageWorker,
  contextFor,
  evidenceRow,
  makeHarness,
  makeTmpOutputDir,
  removeTmpOutputDir,
  ScriptedLanguageWorker,
  type Harness
} from "./helpers.js";

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await makeTmpOutputDir();
});

afterEach(async () => {
  await removeTmpOutputDir(tmpOut);
  tmpOut = null;
});

/** Session with [EV-1] histopathology SUCCESS and [EV-2] cxr MISSING, parked in ESCALATED. */
async function escalatedSession(h: Harness): Promise<string> {
  const s = await h.sessions.createSession("patient-1", {});
  const histo = await h.sessions.recordEvidence(evidenceRow(s.session_id));
  const cxr = await h.sessions.recordEvidence(
    evidenceRow(s.session_id, {
      modality: "cxr",
      model: "cxr-foundation",
      status: "MISSING",
      finding: null,
      confidence: null,
      nba: "Get a chest X-ray"
    })
  );
  await h.sessions.transition(s.session_id, "beginTriage", "scheduler", {
    clinical_frame: assembleClinicalFrame({ complaint: "painless neck swelling" }, [histo, cxr])
  });
  await h.sessions.transition(s.session_id, "escalate", "mode_bridge");
  return s.session_id;
}

describe("PersonaDebateEngine", () => {
  it("runs five ordered passes, each seeing the earlier ones", async () => {
    const h = await makeHarness();
    const id = await escalatedSession(h);
    const worker = citingLanguageWorker();

    const outputs = await new PersonaDebateEngine(worker).run(contextFor(h, id));

    expect(outputs.map((o) => [o.pass_number, o.persona])).toEqual(PERSONAS.map((p, i) => [i + 1, p.name]));
    expect(outputs[0].output_text).toBe("Pathologist reviewed the case [EV-1].");
    expect(worker.requests.map((r) => r.maxTokens)).toEqual([200, 200, 200, 600, 300]);
    expect(worker.requests[0].prompt).toContain("CLINICAL ENTITIES:");
    expect(worker.requests[0].prompt).not.toContain("PRIOR PASSES:");
    expect(worker.requests[2].prompt).toContain("Pass 1, Pathologist:\nPathologist reviewed the case [EV-1].");
    expect(worker.requests[2].prompt).toContain("Pass 2, Radiologist:");

    const session = h.sessions.requireSession(id);
    expect(session.status).toBe("DEBATE");
    expect(session.degradation).toBe("FULL");
    expect(h.governor.inUseMb()).toBe(0);
  });

  it("retries a failed pass once with reduced context and degrades", async () => {
    const h = await makeHarness();
    const id = await escalatedSession(h);
    const worker = new ScriptedLanguageWorker((req, i) =>
      i === 0
        ? { status: "FAILED", text: null, error: "timeout" }
        : { status: "SUCCESS", text: `${req.persona} notes lymphoma [EV-1].` }
    );

    const outputs = await new PersonaDebateEngine(worker).run(contextFor(h, id));

    expect(outputs).toHaveLength(5);
    expect(worker.requests).toHaveLength(6);
    expect(worker.requests.map((r) => r.passNumber)).toEqual([1, 1, 2, 3, 4, 5]);
    const retry = worker.requests[1].prompt;
    expect(retry).not.toContain("CLINICAL ENTITIES:");
    expect(retry).not.toContain("[EV-2] cxr");
    expect(retry).toContain("[EV-1] histopathology");
    expect(h.sessions.requireSession(id).degradation).toBe("DEGRADED");
  });

  it("rejects a pass whose citations do not resolve and retries it", async () => {
    const h = await makeHarness();
    const id = await escalatedSession(h);
    const worker = new ScriptedLanguageWorker((req, i) => ({
      status: "SUCCESS",
      text: i === 0 ? "Stage IV disease [EV-99]." : `${req.persona} notes lymphoma [EV-1].`
    }));

    const outputs = await new PersonaDebateEngine(worker).run(contextFor(h, id));

    expect(worker.requests).toHaveLength(6);
    expect(outputs[0].output_text).toBe("Pathologist notes lymphoma [EV-1].");
    expect(outputs.some((o) => o.output_text.includes("[EV-99]"))).toBe(false);
  });

  it("aborts to ESCALATED when a pass fails twice and resumes from there", async () => {
    const h = await makeHarness();
    const id = await escalatedSession(h);
    const failing = new ScriptedLanguageWorker((req) =>
      req.passNumber === 3
        ? { status: "FAILED", text: null, error: "model unavailable" }
        : { status: "SUCCESS", text: `${req.persona} notes lymphoma [EV-1].` }
    );

    const err = await new PersonaDebateEngine(failing).run(contextFor(h, id)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DebateAborted);
    if (!(err instanceof DebateAborted)) return;
    expect(err.passNumber).toBe(3);
    expect(err.cause).toBeInstanceOf(WorkerInferenceFailure);
    expect(h.sessions.requireSession(id).status).toBe("ESCALATED");
    expect(h.sessions.listDebateOutputs(id).map((o) => o.pass_number)).toEqual([1, 2]);

    const resumed = citingLanguageWorker();
    const outputs = await new PersonaDebateEngine(resumed).run(contextFor(h, id));
    expect(resumed.requests.map((r) => r.passNumber)).toEqual([3, 4, 5]);
    expect(outputs.map((o) => o.pass_number)).toEqual([1, 2, 3, 4, 5]);
    expect(h.sessions.requireSession(id).status).toBe("DEBATE");
  });

  it("aborts without calling the model when no lease can be had", async () => {
    const h = await makeHarness({ budgetMb: 4000 });
    const id = await escalatedSession(h);
    const worker = new ScriptedLanguageWorker(
      () => ({ status: "SUCCESS", text: "unused [EV-1]." }),
      { model: "huge-lm", estimatedMb: 9000 }
    );

    const err = await new PersonaDebateEngine(worker).run(contextFor(h, id)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DebateAborted);
    if (!(err instanceof DebateAborted)) return;
    expect(err.cause).toBeInstanceOf(ResourceExhausted);
    expect(worker.requests).toHaveLength(0);
    expect(h.sessions.requireSession(id).status).toBe("ESCALATED");
  });

  it("refuses a session that never escalated", async () => {
    const h = await makeHarness();
    const s = await h.sessions.createSession("patient-1", {});
    await h.sessions.transition(s.session_id, "beginTriage", "scheduler");

    await expect(new PersonaDebateEngine(citingLanguageWorker()).run(contextFor(h, s.session_id))).rejects.toBeInstanceOf(
      InvalidTransition
    );
  });
});
