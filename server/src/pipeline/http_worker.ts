import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { DRUG_INTERACTION_TIER, STAGE_DEFINITIONS, type StageDefinition } from "./catalog.js";
import { ModalityUnavailable, WorkerInferenceFailure } from "./errors.js";
import { INTERACTION_SEVERITIES, type InputKind, type Modality, type ModalityPayload } from "./types.js";
import { errorMessage } from "./utils.js";
import {
  WorkerRegistry,
  type DrugInteractionRequest,
  type DrugInteractionResult,
  type DrugInteractionWorker,
  type ModalityWorker,
  type ModelTier,
  type WorkerConfig,
  type WorkerResult
} from "./workers.js";

const InferenceResponseSchema = z.object({
  status: z.enum(["SUCCESS", "FAILED"]),
  finding: z.string().nullable(),
  confidence: z.number().min(0).max(1).nullable(),
  nba: z.string().nullable().optional(),
  transcript: z.string().optional()
});

const InteractionResponseSchema = z.object({
  interactions: z.array(
    z.object({
      severity: z.enum(INTERACTION_SEVERITIES),
      drugs: z.string(),
      detail: z.string()
    })
  ),
  substitutions: z.array(z.string()).default([])
});

/** Calls a remote inference endpoint: POST {baseURL}/v1/infer/{modality}. */
export class HttpModalityWorker implements ModalityWorker {
  readonly name: string;
  readonly modality: Modality;
  readonly input: InputKind;
  readonly tiers: readonly ModelTier[];

  constructor(
    def: StageDefinition,
    private readonly client: AxiosInstance
  ) {
    this.name = `http-${def.modality}`;
    this.modality = def.modality;
    this.input = def.input;
    this.tiers = def.tiers;
  }

  async invoke(payload: ModalityPayload, config: WorkerConfig): Promise<WorkerResult> {
    let data: unknown;
    try {
      const res = await this.client.post(
        `/v1/infer/${this.modality}`,
        { session_id: config.sessionId, model: config.model, tier: config.tier, input: payload },
        { signal: config.signal }
      );
      data = res.data;
    } catch (err) {
      // 422 means the endpoint could not decode the input; treat it as absent data.
      if (axios.isAxiosError(err) && err.response?.status === 422) {
        throw new ModalityUnavailable(this.modality, `${this.modality} input rejected by endpoint`, { cause: err });
      }
      throw new WorkerInferenceFailure(this.modality, `${this.name} request failed: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = InferenceResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new WorkerInferenceFailure(this.modality, `${this.name} returned an invalid body: ${parsed.error.message}`);
    }
    const result: WorkerResult = {
      status: parsed.data.status,
      finding: parsed.data.finding,
      confidence: parsed.data.confidence,
      nba: parsed.data.nba ?? null
    };
    if (parsed.data.transcript !== undefined) result.transcript = parsed.data.transcript;
    return result;
  }
}

/** POST {baseURL}/v1/infer/drug_interaction. Transport and body errors come back as FAILED. */
export class HttpDrugInteractionWorker implements DrugInteractionWorker {
  readonly name = "http-drug-interaction";

  constructor(
    private readonly client: AxiosInstance,
    readonly tier: ModelTier = DRUG_INTERACTION_TIER
  ) {}

  async invoke(request: DrugInteractionRequest, config: WorkerConfig): Promise<DrugInteractionResult> {
    let data: unknown;
    try {
      const res = await this.client.post(
        "/v1/infer/drug_interaction",
        { session_id: config.sessionId, model: config.model, ...request },
        { signal: config.signal }
      );
      data = res.data;
    } catch (err) {
      if (config.signal.aborted) throw err;
      return { status: "FAILED", error: `${this.name} request failed: ${errorMessage(err)}` };
    }

    const parsed = InteractionResponseSchema.safeParse(data);
    if (!parsed.success) return { status: "FAILED", error: `${this.name} returned an invalid body: ${parsed.error.message}` };
    return { status: "SUCCESS", interactions: parsed.data.interactions, substitutions: parsed.data.substitutions };
  }
}

export function createHttpClient(baseURL: string, timeoutMs = 120_000): AxiosInstance {
  return axios.create({ baseURL, timeout: timeoutMs });
}

export function createHttpRegistry(baseURL: string, timeoutMs = 120_000): WorkerRegistry {
  const client = createHttpClient(baseURL, timeoutMs);
  const registry = new WorkerRegistry();
  for (const def of STAGE_DEFINITIONS) registry.register(new HttpModalityWorker(def, client));
  return registry;
}
