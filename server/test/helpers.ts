import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { SessionManager } from "../src/session_manager.js";
import { createSessionContext, type SessionContext } from "../src/pipeline/context.js";
import { ResourceLeaseGovernor, type LeaseMode } from "../src/pipeline/lease_governor.js";
import { FileCaseStore } from "../src/pipeline/store.js";
import type {
  InputKind,
  Modality,
  ModalityPayload,
  NewEvidenceItem,
  NewOncoCase,
  NewVramLog,
  SessionInputs
} from "../src/pipeline/types.js";
import { VramRecorder } from "../src/pipeline/vram_recorder.js";
import type {
  LanguageRequest,
  LanguageResult,
  LanguageWorker,
  ModalityWorker,
  ModelTier,
  WorkerConfig,
  WorkerResult
} from "../src/pipeline/workers.js";

export async function makeTmpOutputDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "onco-out-"));
  process.env.ONCO_OUTPUT_DIR = dir;
  return dir;
}

export async function removeTmpOutputDir(dir: string | null): Promise<void> {
  delete process.env.ONCO_OUTPUT_DIR;
  if (dir) await fs.rm(dir, { recursive: true, force: true }).catch(() => undefined);
}

export type Harness = {
  store: FileCaseStore;
  sessions: SessionManager;
  recorder: VramRecorder;
  governor: ResourceLeaseGovernor;
  samples: NewVramLog[];
};

export async function makeHarness(options: { budgetMb?: number; mode?: LeaseMode; waitTimeoutMs?: number } = {}): Promise<Harness> {
  const store = new FileCaseStore();
  const sessions = new SessionManager(store);
  await sessions.initFromDisk();
  const recorder = new VramRecorder(sessions);
  const samples: NewVramLog[] = [];
  const governor = new ResourceLeaseGovernor({
    budgetMb: options.budgetMb ?? 8192,
    mode: options.mode,
    waitTimeoutMs: options.waitTimeoutMs,
    tickIntervalMs: 60_000,
    onSample: (sample) => {
      samples.push(sample);
      recorder.record(sample);
    }
  });
  return { store, sessions, recorder, governor, samples };
}

export function contextFor(h: Harness, sessionId: string, signal: AbortSignal = new AbortController().signal): SessionContext {
  return createSessionContext({ sessionId, sessions: h.sessions, governor: h.governor, signal });
}

export function payload(ref: string, metadata?: ModalityPayload["metadata"]): ModalityPayload {
  return metadata ? { ref, metadata } : { ref };
}

export const ALL_INPUTS: SessionInputs = {
  audio: payload("audio://consult-1.wav"),
  cxr: payload("dicom://cxr-1"),
  histopathology: payload("wsi://node-biopsy-1"),
  derm: payload("img://lesion-1.jpg")
};

type ModalityScript = (input: ModalityPayload, config: WorkerConfig) => WorkerResult | Promise<WorkerResult>;

export class ScriptedModalityWorker implements ModalityWorker {
  readonly name: string;
  readonly calls: WorkerConfig[] = [];

  constructor(
    readonly modality: Modality,
    readonly input: InputKind,
    readonly tiers: readonly ModelTier[],
    private readonly script: ModalityScript
  ) {
    this.name = `scripted-${modality}`;
  }

  async invoke(input: ModalityPayload, config: WorkerConfig): Promise<WorkerResult> {
    this.calls.push(config);
    return this.script(input, config);
  }
}

export function succeed(finding: string, confidence: number, transcript?: string): WorkerResult {
  const result: WorkerResult = { status: "SUCCESS", finding, confidence, nba: null };
  if (transcript !== undefined) result.transcript = transcript;
  return result;
}

type LanguageScript = (request: LanguageRequest, callIndex: number) => LanguageResult | Promise<LanguageResult>;

export class ScriptedLanguageWorker implements LanguageWorker {
  readonly name = "scripted-language";
  readonly requests: LanguageRequest[] = [];

  constructor(
    private readonly script: LanguageScript,
    readonly tier: ModelTier = { model: "scripted-lm", estimatedMb: 1000 }
  ) {}

  async invoke(request: LanguageRequest, _config: WorkerConfig): Promise<LanguageResult> {
    this.requests.push(request);
    return this.script(request, this.requests.length - 1);
  }
}

/** Language worker that cites the first evidence line listed in the prompt. */
export function citingLanguageWorker(extra = ""): ScriptedLanguageWorker {
  return new ScriptedLanguageWorker((req) => {
    const tag = /^\[EV-\d+\]/m.exec(req.prompt)?.[0] ?? "[EV-0]";
    return { status: "SUCCESS", text: `${req.persona} reviewed the case ${tag}.${extra}` };
  });
}

export function evidenceRow(sessionId: string, overrides: Partial<NewEvidenceItem> = {}): NewEvidenceItem {
  return {
    session_id: sessionId,
    modality: "histopathology",
    model: "path-foundation",
    status: "SUCCESS",
    finding: "Atypical lymphoid infiltrate consistent with lymphoma.",
    confidence: 0.8,
    nba: null,
    ...overrides
  };
}

export function caseRow(sessionId: string, staging = "IIB"): NewOncoCase {
  return {
    session_id: sessionId,
    degradation: "FULL",
    staging,
    nba: "Proceed with the treatment plan; all modalities available.",
    oncocase_payload: {
      session_id: sessionId,
      patient_id: "patient-1",
      degradation: "FULL",
      risk: {
        score: 0.65,
        stage: staging,
        staging_confidence: "CONFIRMED",
        evidence_signal: 0.65,
        debate_corroboration: 0,
        uncertainty_flags: []
      },
      comorbidity: { tb_score: 0, tb_level: "LOW", hiv_score: 0, overall: "GREEN" },
      escalation: { score: 0.65, threshold: 0.5, triggers: ["lymphoma"], uncertainty: "LOW" },
      evidence: [],
      debate: [],
      treatment: {
        summary: "Plan.",
        actions: [],
        regimen: "CHOP",
        drugs: ["cyclophosphamide", "doxorubicin", "vincristine", "prednisone"],
        safety: { status: "UNCHECKED", model: null, interactions: [], substitutions: [], note: "No interaction checker configured." },
        override: "RECOMMENDATION_ONLY — NOT PRESCRIPTION"
      },
      trace: {
        schema_version: "1.0.0",
        generated_at: "2026-01-01T00:00:00.000Z",
        known_tags: [],
        total_references: 0,
        unique_reference_ids: 0,
        references: [],
        unresolved_references: []
      },
      generated_at: "2026-01-01T00:00:00.000Z"
    }
  };
}
