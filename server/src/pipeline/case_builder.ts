import { NBA_CATALOG } from "./catalog.js";
import { throwIfCancelled, type SessionContext } from "./context.js";
import { checkDrugSafety, RECOMMENDATION_ONLY_TAG, suggestRegimen } from "./drug_safety.js";
import { CasePersistenceFailure, InvalidTransition, UngroundedClaim } from "./errors.js";
import { EvidenceTrace, evidenceTag } from "./evidence_trace.js";
import type { EscalationPolicy } from "./mode_bridge.js";
import { evaluateEscalation } from "./mode_bridge.js";
import { assessComorbidity, assessRisk, entityStrings, type StagingPolicy } from "./risk_engine.js";
import type {
  ClinicalEntities,
  DebateOutput,
  EvidenceItem,
  OncoCasePayload,
  OncoCaseRow,
  RiskAssessment,
  SessionRecord,
  TreatmentRecommendation
} from "./types.js";
import { errorMessage, nowIso } from "./utils.js";
import type { DrugInteractionWorker } from "./workers.js";

export interface TreatmentRouter {
  recommend(args: {
    ctx: SessionContext;
    session: SessionRecord;
    evidence: readonly EvidenceItem[];
    debate: readonly DebateOutput[];
    risk: RiskAssessment;
  }): Promise<TreatmentRecommendation>;
}

export function sessionEntities(ctx: SessionContext, session: SessionRecord): ClinicalEntities {
  return session.clinical_frame?.entities ?? ctx.inputs.entities ?? {};
}

/**
 * Routes each modality that produced nothing to its catalog next step, most
 * valuable first, and takes the plan summary from the treatment planner's pass.
 * The suggested regimen goes through the interaction check before it is returned.
 */
export class CatalogTreatmentRouter implements TreatmentRouter {
  private readonly interactions: DrugInteractionWorker | null;

  constructor(options: { interactions?: DrugInteractionWorker } = {}) {
    this.interactions = options.interactions ?? null;
  }

  async recommend(args: {
    ctx: SessionContext;
    session: SessionRecord;
    evidence: readonly EvidenceItem[];
    debate: readonly DebateOutput[];
    risk: RiskAssessment;
  }): Promise<TreatmentRecommendation> {
    const seen = new Set<string>();
    const actions: TreatmentRecommendation["actions"] = [];
    for (const item of args.evidence) {
      if (item.status === "SUCCESS" || seen.has(item.modality)) continue;
      seen.add(item.modality);
      const entry = NBA_CATALOG[item.modality];
      actions.push({
        modality: item.modality,
        priority: entry.priority,
        nba: item.nba ?? entry.nba,
        patient_language: entry.patient_language,
        cost_hint: entry.cost_hint
      });
    }
    actions.sort((a, b) => a.priority - b.priority);

    const planner = args.debate.find((d) => d.persona === "Treatment Planner") ?? args.debate[args.debate.length - 1];
    const summary = planner
      ? planner.output_text
      : `Stage ${args.risk.stage} (${args.risk.staging_confidence.toLowerCase()}); no treatment synthesis available.`;

    const entities = sessionEntities(args.ctx, args.session);
    const conditions = entityStrings(entities, "conditions");
    const { regimen, drugs } = suggestRegimen(conditions);
    const safety = await checkDrugSafety(
      args.ctx,
      this.interactions,
      { regimen, drugs, medications: entityStrings(entities, "medications"), conditions },
      args.evidence
    );
    return {
      summary,
      actions,
      regimen,
      drugs,
      safety,
      override: safety.status === "CLEARED" ? null : RECOMMENDATION_ONLY_TAG
    };
  }
}

export type CaseBuilderOptions = {
  router?: TreatmentRouter;
  /** Used by the default router; ignored when `router` is given. */
  interactions?: DrugInteractionWorker;
  staging: () => StagingPolicy;
  escalation: () => EscalationPolicy;
};

function primaryNba(treatment: TreatmentRecommendation): string {
  const first = treatment.actions[0];
  return first ? first.nba : "Proceed with the treatment plan; all modalities available.";
}

export class CaseBuilder {
  private readonly router: TreatmentRouter;

  constructor(private readonly options: CaseBuilderOptions) {
    this.router = options.router ?? new CatalogTreatmentRouter({ interactions: options.interactions });
  }

  /**
   * Freezes the case and finalizes the session in one commit. On a persistence
   * failure the session stays in DEBATE with no case row, and can be rebuilt.
   */
  async build(ctx: SessionContext): Promise<OncoCaseRow> {
    const { sessions, sessionId } = ctx;
    const session = sessions.requireSession(sessionId);
    if (session.status !== "DEBATE") {
      throw new InvalidTransition(sessionId, session.status, "finalize", `cannot build a case for a ${session.status} session`);
    }

    const evidence = sessions.listEvidence(sessionId);
    const debate = sessions.listDebateOutputs(sessionId);
    if (debate.length === 0) {
      throw new InvalidTransition(sessionId, session.status, "finalize", "no debate passes committed");
    }

    const assessed = assessRisk({ evidence, debate, degradation: session.degradation, policy: this.options.staging() });
    const treatment = await this.router.recommend({ ctx, session, evidence, debate, risk: assessed });
    throwIfCancelled(ctx);
    const risk: RiskAssessment =
      treatment.safety.status === "BLOCKED"
        ? { ...assessed, uncertainty_flags: [...assessed.uncertainty_flags, "RECOMMENDATION_ONLY"].sort((a, b) => a.localeCompare(b)) }
        : assessed;

    const trace = new EvidenceTrace(sessionId, evidence);
    const report = trace.buildReport([
      ...debate.map((d) => ({ source: `pass_${d.pass_number}:${d.persona}`, text: d.output_text })),
      { source: "treatment", text: treatment.summary }
    ]);
    if (report.unresolved_references.length > 0) {
      const tags = [...new Set(report.unresolved_references.map((r) => r.tag))];
      throw new UngroundedClaim(0, tags, `case payload cites unresolved evidence: ${tags.join(", ")}`);
    }

    const escalation = session.clinical_frame
      ? evaluateEscalation(session.clinical_frame, evidence, this.options.escalation())
      : null;

    const payload: OncoCasePayload = {
      session_id: sessionId,
      patient_id: session.patient_id,
      degradation: session.degradation,
      risk,
      comorbidity: assessComorbidity(sessionEntities(ctx, session), evidence),
      escalation: {
        score: escalation?.score ?? 0,
        threshold: escalation?.threshold ?? this.options.escalation().threshold,
        triggers: escalation?.triggers ?? [],
        uncertainty: escalation?.uncertainty ?? "CRITICAL"
      },
      evidence: evidence.map((e) => ({
        tag: evidenceTag(e.id),
        modality: e.modality,
        model: e.model,
        status: e.status,
        finding: e.finding,
        confidence: e.confidence
      })),
      debate: debate.map((d) => ({ pass_number: d.pass_number, persona: d.persona, output_text: d.output_text })),
      treatment,
      trace: report,
      generated_at: nowIso()
    };

    try {
      const { oncoCase } = await sessions.finalizeWithCase(sessionId, {
        session_id: sessionId,
        oncocase_payload: payload,
        degradation: session.degradation,
        staging: risk.stage,
        nba: primaryNba(treatment)
      });
      sessions.log(sessionId, `Case finalized: stage ${oncoCase.staging} (${risk.staging_confidence})`, "case_builder");
      return oncoCase;
    } catch (err) {
      if (err instanceof InvalidTransition) throw err;
      throw new CasePersistenceFailure(sessionId, `Failed to persist case: ${errorMessage(err)}`, { cause: err });
    }
  }
}
