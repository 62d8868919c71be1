import { DRUG_INTERACTION_TIER, LANGUAGE_TIER, STAGE_DEFINITIONS, type StageDefinition } from "./catalog.js";
import type { DrugInteraction, InputKind, InteractionSeverity, Modality, ModalityPayload } from "./types.js";
import {
  WorkerRegistry,
  type DrugInteractionRequest,
  type DrugInteractionResult,
  type DrugInteractionWorker,
  type LanguageRequest,
  type LanguageResult,
  type LanguageWorker,
  type ModalityWorker,
  type ModelTier,
  type WorkerConfig,
  type WorkerResult
} from "./workers.js";

// Each step down a tier costs this much confidence.
export const REDUCED_TIER_CONFIDENCE_FACTOR = 0.8;

const DEMO_FINDINGS: Record<Modality, { finding: string; confidence: number }> = {
  audio: {
    finding: "Two months of night sweats, weight loss and a painless left neck swelling reported.",
    confidence: 0.92
  },
  cough: { finding: "Cough acoustics within normal limits; low likelihood of active tuberculosis.", confidence: 0.71 },
  histopathology: {
    finding: "Effaced nodal architecture with large atypical lymphoid cells, consistent with lymphoma.",
    confidence: 0.88
  },
  cxr: { finding: "Widened mediastinum suggestive of an anterior mediastinal mass.", confidence: 0.8 },
  derm: { finding: "Benign-appearing pigmented naevus.", confidence: 0.65 }
};

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("Cancelled"));
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Deterministic stand-in for a modality model. `metadata.finding`,
 * `metadata.confidence` and `metadata.fail` on the payload steer its answer.
 */
export class FakeModalityWorker implements ModalityWorker {
  readonly name: string;
  readonly modality: Modality;
  readonly input: InputKind;
  readonly tiers: readonly ModelTier[];

  constructor(
    def: StageDefinition,
    private readonly latencyMs = 0
  ) {
    this.name = `fake-${def.modality}`;
    this.modality = def.modality;
    this.input = def.input;
    this.tiers = def.tiers;
  }

  async invoke(payload: ModalityPayload, config: WorkerConfig): Promise<WorkerResult> {
    await delay(this.latencyMs, config.signal);
    const meta = payload.metadata ?? {};
    if (meta.fail === true) return { status: "FAILED", finding: null, confidence: null, nba: null };

    const demo = DEMO_FINDINGS[this.modality];
    const finding = typeof meta.finding === "string" ? meta.finding : demo.finding;
    const base = typeof meta.confidence === "number" ? meta.confidence : demo.confidence;
    const confidence = round3(base * REDUCED_TIER_CONFIDENCE_FACTOR ** config.tier);

    const result: WorkerResult = { status: "SUCCESS", finding, confidence, nba: null };
    if (this.modality === "audio") {
      result.transcript = typeof meta.transcript === "string" ? meta.transcript : finding;
    }
    return result;
  }
}

const EVIDENCE_LINE = /^(\[EV-\d+\]) (\S+) \([^)]*\) (\S+) confidence=\S+: (.*)$/;

/**
 * Writes a short persona statement that cites the successful evidence listed in
 * the prompt, or the first listed item when nothing succeeded.
 */
export class FakeLanguageWorker implements LanguageWorker {
  readonly name = "fake-persona";
  readonly tier: ModelTier;

  constructor(
    tier: ModelTier = LANGUAGE_TIER,
    private readonly latencyMs = 0
  ) {
    this.tier = tier;
  }

  async invoke(request: LanguageRequest, config: WorkerConfig): Promise<LanguageResult> {
    await delay(this.latencyMs, config.signal);
    const lines = request.prompt
      .split("\n")
      .map((l) => EVIDENCE_LINE.exec(l))
      .filter((m): m is RegExpExecArray => m !== null);

    if (lines.length === 0) return { status: "FAILED", text: null, error: "no evidence in prompt" };

    const usable = lines.filter((m) => m[3] === "SUCCESS").slice(0, 3);
    const sentences =
      usable.length > 0
        ? usable.map((m) => `${m[2]}: ${m[4].replace(/\.$/, "")} ${m[1]}.`)
        : [`Evidence is incomplete; ${lines[0][2]} produced no result ${lines[0][1]}.`];
    return { status: "SUCCESS", text: `${request.persona} assessment. ${sentences.join(" ")}` };
  }
}

const KNOWN_INTERACTIONS: ReadonlyArray<{ pair: [string, string]; severity: InteractionSeverity; detail: string }> = [
  { pair: ["tenofovir", "cyclophosphamide"], severity: "LOW", detail: "Monitor renal function." },
  { pair: ["dolutegravir", "vincristine"], severity: "MODERATE", detail: "Watch for peripheral neuropathy." },
  { pair: ["rifampicin", "dolutegravir"], severity: "CRITICAL", detail: "Rifampicin lowers dolutegravir levels; double the dose." },
  { pair: ["tenofovir", "liposomal doxorubicin"], severity: "CRITICAL", detail: "Additive nephrotoxicity." },
  { pair: ["tenofovir", "cisplatin"], severity: "CRITICAL", detail: "Additive nephrotoxicity; avoid together." }
];

const SUBSTITUTES: Readonly<Record<string, string>> = {
  doxorubicin: "liposomal doxorubicin",
  cisplatin: "carboplatin"
};

/**
 * Looks pairs up in a small fixed interaction table. Drugs listed as out of
 * stock are offered a substitute where one is known.
 */
export class FakeDrugInteractionWorker implements DrugInteractionWorker {
  readonly name = "fake-interactions";
  readonly tier: ModelTier;
  private readonly outOfStock: Set<string>;
  private readonly latencyMs: number;

  constructor(options: { tier?: ModelTier; outOfStock?: readonly string[]; latencyMs?: number } = {}) {
    this.tier = options.tier ?? DRUG_INTERACTION_TIER;
    this.outOfStock = new Set((options.outOfStock ?? []).map((d) => d.toLowerCase()));
    this.latencyMs = options.latencyMs ?? 0;
  }

  async invoke(request: DrugInteractionRequest, config: WorkerConfig): Promise<DrugInteractionResult> {
    await delay(this.latencyMs, config.signal);
    const present = new Set([...request.medications, ...request.drugs].map((d) => d.toLowerCase()));
    const interactions: DrugInteraction[] = KNOWN_INTERACTIONS.filter(
      ({ pair: [a, b] }) => present.has(a) && present.has(b)
    ).map(({ pair: [a, b], severity, detail }) => ({ severity, drugs: `${a} + ${b}`, detail }));

    const substitutions: string[] = [];
    for (const drug of request.drugs) {
      const alt = SUBSTITUTES[drug.toLowerCase()];
      if (alt && this.outOfStock.has(drug.toLowerCase())) substitutions.push(`${drug} -> ${alt}`);
    }
    return { status: "SUCCESS", interactions, substitutions };
  }
}

export function createFakeRegistry(latencyMs = 0): WorkerRegistry {
  const registry = new WorkerRegistry();
  for (const def of STAGE_DEFINITIONS) registry.register(new FakeModalityWorker(def, latencyMs));
  return registry;
}
