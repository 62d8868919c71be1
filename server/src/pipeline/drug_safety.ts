import { throwIfCancelled, type SessionContext } from "./context.js";
import type { DrugSafetyCheck, EvidenceItem } from "./types.js";
import { errorMessage } from "./utils.js";
import type { DrugInteractionRequest, DrugInteractionWorker } from "./workers.js";

/** Attached to any regimen that no interaction check has cleared. */
export const RECOMMENDATION_ONLY_TAG = "RECOMMENDATION_ONLY — NOT PRESCRIPTION";

/** More missing modalities than this and no regimen is checked. */
export const MAX_MISSING_FOR_CHECK = 2;

export type RegimenSuggestion = { regimen: string; drugs: string[] };

const CHOP: RegimenSuggestion = {
  regimen: "CHOP",
  drugs: ["cyclophosphamide", "doxorubicin", "vincristine", "prednisone"]
};

const REGIMEN_RULES: ReadonlyArray<{ match: readonly string[]; suggestion: RegimenSuggestion }> = [
  { match: ["lymphoma"], suggestion: CHOP },
  {
    match: ["kaposi"],
    suggestion: { regimen: "Liposomal Doxorubicin + ART optimization", drugs: ["liposomal doxorubicin"] }
  },
  { match: ["cervical"], suggestion: { regimen: "Cisplatin + RT", drugs: ["cisplatin"] } },
  { match: ["lung", "adenocarcinoma"], suggestion: { regimen: "Carboplatin + Paclitaxel", drugs: ["carboplatin", "paclitaxel"] } }
];

/** First rule whose term appears in a condition wins; CHOP otherwise. */
export function suggestRegimen(conditions: readonly string[]): RegimenSuggestion {
  const lower = conditions.map((c) => c.toLowerCase());
  for (const rule of REGIMEN_RULES) {
    if (rule.match.some((term) => lower.some((c) => c.includes(term)))) {
      return { regimen: rule.suggestion.regimen, drugs: [...rule.suggestion.drugs] };
    }
  }
  return { regimen: CHOP.regimen, drugs: [...CHOP.drugs] };
}

function unchecked(note: string, model: string | null = null): DrugSafetyCheck {
  return { status: "UNCHECKED", model, interactions: [], substitutions: [], note };
}

/**
 * Screens a suggested regimen against the patient's medications. The check runs
 * under a lease like any other model; a refusal or a failure leaves the regimen
 * UNCHECKED rather than failing the case.
 */
export async function checkDrugSafety(
  ctx: SessionContext,
  worker: DrugInteractionWorker | null,
  request: DrugInteractionRequest,
  evidence: readonly EvidenceItem[]
): Promise<DrugSafetyCheck> {
  const missing = evidence.filter((e) => e.status === "MISSING").length;
  if (missing > MAX_MISSING_FOR_CHECK) {
    return {
      status: "BLOCKED",
      model: null,
      interactions: [],
      substitutions: [],
      note: `Insufficient data: ${missing} modalities missing.`
    };
  }
  if (!worker) return unchecked("No interaction checker configured.");

  const { sessionId, sessions, governor, signal } = ctx;
  const model = worker.tier.model;
  try {
    const leased = await governor.withLease(worker.tier.estimatedMb, "drug_interaction", { sessionId, model, signal }, () =>
      worker.invoke(request, { sessionId, model, tier: 0, signal })
    );
    if (!leased.ok) {
      sessions.log(sessionId, `Interaction check skipped: ${leased.error.message}`, "drug_interaction");
      return unchecked(`Interaction check skipped: ${leased.error.message}`, model);
    }
    const result = leased.value;
    if (result.status === "FAILED") return unchecked(`Interaction check failed: ${result.error}`, model);

    const critical = result.interactions.some((i) => i.severity === "CRITICAL");
    return {
      status: critical ? "FLAGGED" : "CLEARED",
      model,
      interactions: result.interactions,
      substitutions: result.substitutions,
      note: critical ? "Critical interaction found; review before prescribing." : null
    };
  } catch (err) {
    throwIfCancelled(ctx);
    sessions.error(sessionId, `Interaction check failed: ${errorMessage(err)}`, "drug_interaction");
    return unchecked(`Interaction check failed: ${errorMessage(err)}`, model);
  }
}
