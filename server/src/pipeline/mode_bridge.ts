import { ONCOLOGY_TRIGGER_TERMS } from "./catalog.js";
import type { SessionContext } from "./context.js";
import { InvalidTransition } from "./errors.js";
import { termMatcher } from "./terms.js";
import type { ClinicalFrame, EvidenceItem, UncertaintyLevel } from "./types.js";

export type SignalScore = {
  /** Aggregate malignancy signal in [0, 1]. */
  score: number;
  triggers: string[];
};

export type SignalScorer = (frame: ClinicalFrame, evidence: readonly EvidenceItem[]) => SignalScore;

export type EscalationPolicy = {
  scorer: SignalScorer;
  threshold: number;
};

export type BridgeDecision = {
  escalate: boolean;
  score: number;
  threshold: number;
  triggers: string[];
  uncertainty: UncertaintyLevel;
  rationale: string;
};

function collectStrings(value: unknown, out: string[] = []): string[] {
  if (typeof value === "string") out.push(value);
  else if (Array.isArray(value)) for (const v of value) collectStrings(v, out);
  else if (value && typeof value === "object") for (const v of Object.values(value)) collectStrings(v, out);
  return out;
}

/**
 * Default scorer: the strongest confidence among successful findings that name an
 * oncology trigger term, or `entityWeight` when only the extracted entities do.
 */
export function keywordSignalScorer(options: { terms?: readonly string[]; entityWeight?: number } = {}): SignalScorer {
  const match = termMatcher(options.terms ?? ONCOLOGY_TRIGGER_TERMS);
  const entityWeight = options.entityWeight ?? 0.6;

  return (frame, evidence) => {
    const triggers = new Set<string>();
    let score = 0;

    for (const item of evidence) {
      if (item.status !== "SUCCESS" || !item.finding) continue;
      const hits = match(item.finding);
      if (hits.length === 0) continue;
      for (const h of hits) triggers.add(h);
      score = Math.max(score, item.confidence ?? 0);
    }

    const entityHits = match(collectStrings(frame.entities).join(" \n "));
    if (entityHits.length > 0) {
      for (const h of entityHits) triggers.add(h);
      score = Math.max(score, entityWeight);
    }

    return { score: Math.min(1, Math.max(0, score)), triggers: [...triggers].sort((a, b) => a.localeCompare(b)) };
  };
}

/** CRITICAL whenever the consultation audio produced nothing usable. */
export function gradeUncertainty(evidence: readonly EvidenceItem[], triggerCount: number): UncertaintyLevel {
  const audio = evidence.find((e) => e.modality === "audio");
  if (!audio || audio.status !== "SUCCESS") return "CRITICAL";
  const unusable = evidence.filter((e) => e.status !== "SUCCESS").length;
  if (unusable >= 2) return "HIGH";
  if (unusable === 1 || triggerCount < 3) return "MEDIUM";
  return "LOW";
}

export function evaluateEscalation(
  frame: ClinicalFrame,
  evidence: readonly EvidenceItem[],
  policy: EscalationPolicy
): BridgeDecision {
  const { score, triggers } = policy.scorer(frame, evidence);
  // An unscoreable signal goes to the full workup rather than being silently dropped.
  const escalate = !Number.isFinite(score) || score >= policy.threshold;
  const uncertainty = gradeUncertainty(evidence, triggers.length);

  const parts: string[] = [];
  if (uncertainty === "CRITICAL") parts.push("Audio unavailable; assessment based on uploaded data and history only.");
  parts.push(
    escalate
      ? `Signal ${formatScore(score)} meets threshold ${policy.threshold}; escalating to oncology workup.`
      : `Signal ${formatScore(score)} below threshold ${policy.threshold}; remaining in triage.`
  );
  if (triggers.length > 0) parts.push(`Triggers: ${triggers.join(", ")}.`);

  return { escalate, score, threshold: policy.threshold, triggers, uncertainty, rationale: parts.join(" ") };
}

function formatScore(score: number): string {
  return Number.isFinite(score) ? score.toFixed(2) : String(score);
}

export class ModeBridge {
  constructor(private readonly policy: () => EscalationPolicy) {}

  /** Scores a triaged session and fires `escalate` when the signal clears the threshold. */
  async apply(ctx: SessionContext): Promise<BridgeDecision> {
    const session = ctx.sessions.requireSession(ctx.sessionId);
    if (session.status !== "TRIAGE" || !session.clinical_frame) {
      throw new InvalidTransition(ctx.sessionId, session.status, "escalate", "mode bridge needs a triaged session with a clinical frame");
    }

    const decision = evaluateEscalation(session.clinical_frame, ctx.sessions.listEvidence(ctx.sessionId), this.policy());
    ctx.sessions.log(ctx.sessionId, decision.rationale, "mode_bridge");
    if (decision.escalate) {
      await ctx.sessions.transition(ctx.sessionId, "escalate", "mode_bridge");
    }
    return decision;
  }
}
