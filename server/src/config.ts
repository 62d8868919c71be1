import path from "node:path";
import { z } from "zod";
import { ONCOLOGY_TRIGGER_TERMS } from "./pipeline/catalog.js";
import type { LeaseMode } from "./pipeline/lease_governor.js";
import { keywordSignalScorer, type EscalationPolicy } from "./pipeline/mode_bridge.js";
import { DEFAULT_STAGING_POLICY, type StagingPolicy, type StagingRule } from "./pipeline/risk_engine.js";
import { ensureDir, nowIso, outputRootAbs, tryReadJsonFile, writeJsonFile } from "./pipeline/utils.js";

export type PipelineMode = "fake" | "live";

export type ServerConfig = {
  port: number;
  pipelineMode: PipelineMode;
  maxVramMb: number;
  leaseMode: LeaseMode;
  leaseWaitTimeoutMs: number;
  tickIntervalMs: number;
  maxConcurrentSessions: number;
  workerUrl: string | null;
  syncUrl: string | null;
  syncMaxAttempts: number;
};

function positive(raw: string | undefined, fallback: number): number {
  const n = raw ? Number(raw) : NaN;
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function nonEmpty(raw: string | undefined): string | null {
  const v = raw?.trim();
  return v ? v : null;
}

/** Reads process settings. Live mode is the default only when a worker endpoint is configured. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const workerUrl = nonEmpty(env.ONCO_WORKER_URL);
  const mode = env.ONCO_PIPELINE_MODE?.trim().toLowerCase();
  const pipelineMode: PipelineMode = mode === "fake" || mode === "live" ? mode : workerUrl ? "live" : "fake";

  return {
    port: positive(env.PORT, 5050),
    pipelineMode,
    maxVramMb: positive(env.ONCO_MAX_VRAM_MB, 8192),
    leaseMode: env.ONCO_LEASE_MODE?.trim().toLowerCase() === "wait" ? "wait" : "fail_fast",
    leaseWaitTimeoutMs: positive(env.ONCO_LEASE_WAIT_TIMEOUT_MS, 30_000),
    tickIntervalMs: positive(env.ONCO_TICK_INTERVAL_MS, 1_000),
    maxConcurrentSessions: Math.floor(positive(env.MAX_CONCURRENT_SESSIONS, 2)),
    workerUrl,
    syncUrl: nonEmpty(env.ONCO_SYNC_URL),
    syncMaxAttempts: Math.floor(positive(env.ONCO_SYNC_MAX_ATTEMPTS, 5))
  };
}

export const DEFAULT_ESCALATION_THRESHOLD = 0.5;
export const DEFAULT_ENTITY_WEIGHT = 0.6;
export const MAX_TIE_EPSILON = 0.01;

const StagingRuleSchema = z
  .object({
    stage: z.string().trim().min(1).max(16),
    minScore: z.number().min(0).max(1)
  })
  .strict();

export const StagingSettingsSchema = z
  .object({
    rules: z
      .array(StagingRuleSchema)
      .min(1)
      .refine((rules) => new Set(rules.map((r) => r.stage)).size === rules.length, "stage names must be unique"),
    tieEpsilon: z.number().min(0).max(MAX_TIE_EPSILON),
    corroborationPerPass: z.number().min(0).max(1)
  })
  .strict();

const TriagePolicySchema = z
  .object({
    threshold: z.number().min(0).max(1),
    entityWeight: z.number().min(0).max(1),
    triggerTerms: z.array(z.string().trim().min(2)).min(1),
    staging: StagingSettingsSchema,
    updatedAt: z.string().datetime().optional()
  })
  .strict();

export const TriagePolicyUpdateSchema = z
  .object({
    reset: z.boolean().optional(),
    threshold: z.number().min(0).max(1).optional(),
    entityWeight: z.number().min(0).max(1).optional(),
    triggerTerms: z.array(z.string().trim().min(2)).min(1).optional(),
    staging: StagingSettingsSchema.optional()
  })
  .strict();

export type TriagePolicyUpdate = z.infer<typeof TriagePolicyUpdateSchema>;

export type TriagePolicy = {
  threshold: number;
  entityWeight: number;
  triggerTerms: string[];
  staging: { rules: StagingRule[]; tieEpsilon: number; corroborationPerPass: number };
  updatedAt: string;
};

export function triagePolicyPathAbs(): string {
  return path.join(outputRootAbs(), "triage_policy.json");
}

export function defaultTriagePolicy(): TriagePolicy {
  return {
    threshold: DEFAULT_ESCALATION_THRESHOLD,
    entityWeight: DEFAULT_ENTITY_WEIGHT,
    triggerTerms: [...ONCOLOGY_TRIGGER_TERMS],
    staging: {
      rules: DEFAULT_STAGING_POLICY.rules.map((r) => ({ ...r })),
      tieEpsilon: DEFAULT_STAGING_POLICY.tieEpsilon,
      corroborationPerPass: DEFAULT_STAGING_POLICY.corroborationPerPass
    },
    updatedAt: nowIso()
  };
}

/** The stored policy, or the defaults when the file is absent or fails validation. */
export async function loadTriagePolicy(): Promise<TriagePolicy> {
  await ensureDir(outputRootAbs());
  const raw = await tryReadJsonFile<unknown>(triagePolicyPathAbs());
  if (!raw) return defaultTriagePolicy();

  const parsed = TriagePolicySchema.safeParse(raw);
  if (!parsed.success) return defaultTriagePolicy();

  return { ...parsed.data, updatedAt: parsed.data.updatedAt ?? nowIso() };
}

export async function saveTriagePolicy(policy: TriagePolicy): Promise<void> {
  await ensureDir(outputRootAbs());
  await writeJsonFile(triagePolicyPathAbs(), policy);
}

export function applyPolicyUpdate(base: TriagePolicy, update: TriagePolicyUpdate): TriagePolicy {
  const start = update.reset ? defaultTriagePolicy() : base;
  return {
    threshold: update.threshold ?? start.threshold,
    entityWeight: update.entityWeight ?? start.entityWeight,
    triggerTerms: update.triggerTerms ?? start.triggerTerms,
    staging: update.staging ?? start.staging,
    updatedAt: nowIso()
  };
}

export function escalationPolicyFrom(policy: TriagePolicy): EscalationPolicy {
  return {
    scorer: keywordSignalScorer({ terms: policy.triggerTerms, entityWeight: policy.entityWeight }),
    threshold: policy.threshold
  };
}

export function stagingPolicyFrom(policy: TriagePolicy): StagingPolicy {
  return {
    rules: policy.staging.rules,
    tieEpsilon: policy.staging.tieEpsilon,
    corroborationPerPass: policy.staging.corroborationPerPass,
    triggerTerms: policy.triggerTerms
  };
}

/**
 * Holds the live policy. Pipeline components read it through `escalation()` and
 * `staging()` on every decision, so an update applies to the next decision made.
 */
export class TriagePolicyStore {
  private policy: TriagePolicy;

  constructor(initial: TriagePolicy = defaultTriagePolicy()) {
    this.policy = initial;
  }

  static async load(): Promise<TriagePolicyStore> {
    return new TriagePolicyStore(await loadTriagePolicy());
  }

  current(): TriagePolicy {
    return this.policy;
  }

  async update(update: TriagePolicyUpdate): Promise<TriagePolicy> {
    const next = applyPolicyUpdate(this.policy, update);
    await saveTriagePolicy(next);
    this.policy = next;
    return next;
  }

  readonly escalation = (): EscalationPolicy => escalationPolicyFrom(this.policy);
  readonly staging = (): StagingPolicy => stagingPolicyFrom(this.policy);
}
