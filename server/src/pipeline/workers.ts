import type { DrugInteraction, EvidenceStatus, InputKind, Modality, ModalityPayload } from "./types.js";

export type WorkerResult = {
  status: Extract<EvidenceStatus, "SUCCESS" | "FAILED">;
  finding: string | null;
  confidence: number | null;
  nba: string | null;
  /** Only the transcription stage fills this in. */
  transcript?: string;
};

export type WorkerConfig = {
  sessionId: string;
  model: string;
  /** 0 is the full-fidelity variant; higher numbers are smaller fallbacks. */
  tier: number;
  signal: AbortSignal;
};

export interface Worker<I, R = WorkerResult> {
  readonly name: string;
  invoke(input: I, config: WorkerConfig): Promise<R>;
}

export type ModelTier = {
  model: string;
  estimatedMb: number;
};

export interface ModalityWorker extends Worker<ModalityPayload> {
  readonly modality: Modality;
  /** Which submitted input this stage reads. */
  readonly input: InputKind;
  /** Largest first. The scheduler steps down this list when a lease is refused. */
  readonly tiers: readonly ModelTier[];
}

export type LanguageRequest = {
  persona: string;
  passNumber: number;
  prompt: string;
  maxTokens: number;
};

export type LanguageResult = { status: "SUCCESS"; text: string } | { status: "FAILED"; text: null; error: string };

export interface LanguageWorker extends Worker<LanguageRequest, LanguageResult> {
  readonly tier: ModelTier;
}

export type DrugInteractionRequest = {
  regimen: string;
  drugs: string[];
  /** Medications the patient already takes. */
  medications: string[];
  conditions: string[];
};

export type DrugInteractionResult =
  | { status: "SUCCESS"; interactions: DrugInteraction[]; substitutions: string[] }
  | { status: "FAILED"; error: string };

export interface DrugInteractionWorker extends Worker<DrugInteractionRequest, DrugInteractionResult> {
  readonly tier: ModelTier;
}

export class WorkerRegistry {
  private readonly workers = new Map<Modality, ModalityWorker>();

  register(worker: ModalityWorker): this {
    if (this.workers.has(worker.modality)) {
      throw new Error(`a worker is already registered for ${worker.modality}`);
    }
    if (worker.tiers.length === 0) {
      throw new Error(`${worker.name} declares no model tiers`);
    }
    this.workers.set(worker.modality, worker);
    return this;
  }

  get(modality: Modality): ModalityWorker | null {
    return this.workers.get(modality) ?? null;
  }

  /** Registration order. */
  list(): ModalityWorker[] {
    return [...this.workers.values()];
  }
}
