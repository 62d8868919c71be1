import { NBA_CATALOG } from "./catalog.js";
import { throwIfCancelled, type SessionContext } from "./context.js";
import { InvalidTransition, ModalityUnavailable } from "./errors.js";
import { evidenceTag } from "./evidence_trace.js";
import type { ModalityWorker, WorkerRegistry, WorkerResult } from "./workers.js";
import type {
  ClinicalFrame,
  DegradationLevel,
  EvidenceItem,
  EvidenceStatus,
  FrameModalityEntry,
  Modality,
  ModalityPayload
} from "./types.js";
import { errorMessage, nowIso } from "./utils.js";

export type StageOutcome = {
  modality: Modality;
  status: EvidenceStatus;
  /** Index into the worker's tiers that produced the result, or null if nothing ran. */
  tierIndex: number | null;
  evidence: EvidenceItem;
  transcript?: string;
};

export type SchedulerReport = {
  outcomes: StageOutcome[];
  batches: Modality[][];
  degradation: DegradationLevel;
  frame: ClinicalFrame;
};

/**
 * FULL when every stage ran at its first tier; MINIMAL when fewer than half the
 * configured stages produced a result; DEGRADED otherwise.
 */
export function deriveDegradation(outcomes: readonly Pick<StageOutcome, "status" | "tierIndex">[]): DegradationLevel {
  const total = outcomes.length;
  const succeeded = outcomes.filter((o) => o.status === "SUCCESS").length;
  if (total === 0 || succeeded * 2 < total) return "MINIMAL";
  if (outcomes.every((o) => o.status === "SUCCESS" && o.tierIndex === 0)) return "FULL";
  return "DEGRADED";
}

export function assembleClinicalFrame(
  entities: ClinicalFrame["entities"] | undefined,
  evidence: readonly EvidenceItem[]
): ClinicalFrame {
  const modalities: ClinicalFrame["modalities"] = {};
  for (const item of evidence) {
    const entry: FrameModalityEntry = {
      status: item.status,
      model: item.model,
      finding: item.finding,
      confidence: item.confidence,
      evidence_tag: evidenceTag(item.id)
    };
    // Later items win; a re-run appends rather than rewrites.
    modalities[item.modality] = entry;
  }
  return { entities: entities ?? {}, modalities, assembled_at: nowIso() };
}

/**
 * Runs every registered modality stage for a session under the lease governor,
 * records one evidence item per stage and moves the session to TRIAGE.
 */
export class CortexController {
  constructor(private readonly registry: WorkerRegistry) {}

  /**
   * Groups stages whose combined first-tier footprint currently fits. The
   * governor is asked on every decision; a stage that fits nowhere runs alone.
   */
  planBatches(ctx: SessionContext, workers: readonly ModalityWorker[]): ModalityWorker[][] {
    const batches: ModalityWorker[][] = [];
    let current: ModalityWorker[] = [];
    let currentMb = 0;
    for (const worker of workers) {
      const mb = worker.tiers[0].estimatedMb;
      if (current.length > 0 && !ctx.governor.canFit(currentMb + mb)) {
        batches.push(current);
        current = [];
        currentMb = 0;
      }
      current.push(worker);
      currentMb += mb;
    }
    if (current.length > 0) batches.push(current);
    return batches;
  }

  async run(ctx: SessionContext): Promise<SchedulerReport> {
    const { sessions, sessionId, inputs } = ctx;
    const session = sessions.requireSession(sessionId);
    if (session.status !== "INITIALIZED") {
      throw new InvalidTransition(sessionId, session.status, "beginTriage", `triage already ran for ${sessionId}`);
    }
    const skip = new Set(inputs.skip ?? []);
    const outcomes: StageOutcome[] = [];
    const runnable: Array<{ worker: ModalityWorker; payload: ModalityPayload }> = [];

    for (const worker of this.registry.list()) {
      const payload = inputs[worker.input];
      if (!payload) {
        outcomes.push(await this.record(ctx, worker, "MISSING", null, null));
        sessions.log(sessionId, `${worker.modality}: no ${worker.input} input; recorded as missing`, worker.modality);
        continue;
      }
      if (skip.has(worker.modality)) {
        outcomes.push(await this.record(ctx, worker, "SKIPPED", null, null));
        sessions.log(sessionId, `${worker.modality}: skipped on request`, worker.modality);
        continue;
      }
      runnable.push({ worker, payload });
    }

    const payloads = new Map(runnable.map((r) => [r.worker.modality, r.payload]));
    const batches = this.planBatches(
      ctx,
      runnable.map((r) => r.worker)
    );

    for (const batch of batches) {
      throwIfCancelled(ctx);
      sessions.log(sessionId, `Running stages: ${batch.map((w) => w.modality).join(", ")}`);
      const results = await Promise.all(
        batch.map((worker) => {
          const payload = payloads.get(worker.modality);
          if (!payload) throw new Error(`no payload for ${worker.modality}`);
          return this.runStage(ctx, worker, payload);
        })
      );
      outcomes.push(...results);
    }
    throwIfCancelled(ctx);

    const ordered = this.registry
      .list()
      .map((w) => outcomes.find((o) => o.modality === w.modality))
      .filter((o): o is StageOutcome => Boolean(o));

    const degradation = deriveDegradation(ordered);
    const summary = ordered.map((o) => `${o.modality}=${o.status}${o.tierIndex ? `@tier${o.tierIndex}` : ""}`).join(" ");
    await sessions.degrade(sessionId, degradation, summary);

    const frame = assembleClinicalFrame(
      inputs.entities,
      ordered.map((o) => o.evidence)
    );
    const transcript = ordered.find((o) => o.transcript !== undefined)?.transcript ?? null;
    await sessions.transition(sessionId, "beginTriage", "scheduler", { clinical_frame: frame, transcript });

    return {
      outcomes: ordered,
      batches: batches.map((b) => b.map((w) => w.modality)),
      degradation,
      frame
    };
  }

  private async runStage(ctx: SessionContext, worker: ModalityWorker, payload: ModalityPayload): Promise<StageOutcome> {
    const { sessions, sessionId, governor } = ctx;

    for (let tierIndex = 0; tierIndex < worker.tiers.length; tierIndex++) {
      const tier = worker.tiers[tierIndex];
      let result: WorkerResult;
      try {
        const leased = await governor.withLease(
          tier.estimatedMb,
          worker.modality,
          { sessionId, model: tier.model, signal: ctx.signal },
          () => worker.invoke(payload, { sessionId, model: tier.model, tier: tierIndex, signal: ctx.signal })
        );
        if (!leased.ok) {
          throwIfCancelled(ctx);
          sessions.log(sessionId, `${leased.error.message}; stepping down`, worker.modality);
          continue;
        }
        result = leased.value;
      } catch (err) {
        throwIfCancelled(ctx);
        if (err instanceof ModalityUnavailable) {
          sessions.log(sessionId, `${worker.modality}: ${err.message}; recorded as missing`, worker.modality);
          return this.record(ctx, worker, "MISSING", null, null);
        }
        sessions.error(sessionId, `${worker.name} failed: ${errorMessage(err)}`, worker.modality);
        return this.record(ctx, worker, "FAILED", tier.model, tierIndex);
      }

      const outcome = await this.record(ctx, worker, result.status, tier.model, tierIndex, result);
      if (result.transcript !== undefined && result.status === "SUCCESS") outcome.transcript = result.transcript;
      return outcome;
    }

    sessions.error(sessionId, `${worker.modality}: no tier fit the memory budget`, worker.modality);
    return this.record(ctx, worker, "FAILED", worker.tiers[worker.tiers.length - 1].model, null);
  }

  private async record(
    ctx: SessionContext,
    worker: ModalityWorker,
    status: EvidenceStatus,
    model: string | null,
    tierIndex: number | null,
    result?: WorkerResult
  ): Promise<StageOutcome> {
    const succeeded = status === "SUCCESS";
    const evidence = await ctx.sessions.recordEvidence({
      session_id: ctx.sessionId,
      modality: worker.modality,
      model: model ?? worker.tiers[0].model,
      status,
      finding: succeeded ? (result?.finding ?? null) : null,
      confidence: succeeded ? (result?.confidence ?? null) : null,
      nba: succeeded ? (result?.nba ?? null) : (result?.nba ?? NBA_CATALOG[worker.modality].nba)
    });
    return { modality: worker.modality, status, tierIndex, evidence };
  }
}
