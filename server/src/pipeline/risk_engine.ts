import { ADVANCED_DISEASE_TERMS, ONCOLOGY_TRIGGER_TERMS } from "./catalog.js";
import { termMatcher } from "./terms.js";
import type {
  ClinicalEntities,
  ComorbidityRisk,
  DebateOutput,
  DegradationLevel,
  EvidenceItem,
  RiskAssessment,
  StagingConfidence
} from "./types.js";

export type StagingRule = {
  stage: string;
  /** Inclusive lower bound of the score band. */
  minScore: number;
};

export type StagingPolicy = {
  rules: readonly StagingRule[];
  /** Scores this close below a boundary are treated as on it. */
  tieEpsilon: number;
  corroborationPerPass: number;
  /** Terms that make a finding count toward the evidence signal. */
  triggerTerms: readonly string[];
};

export const DEFAULT_STAGING_RULES: readonly StagingRule[] = [
  { stage: "I", minScore: 0 },
  { stage: "IIA", minScore: 0.45 },
  { stage: "IIB", minScore: 0.6 },
  { stage: "III", minScore: 0.75 },
  { stage: "IV", minScore: 0.9 }
];

export const DEFAULT_STAGING_POLICY: StagingPolicy = {
  rules: DEFAULT_STAGING_RULES,
  tieEpsilon: 1e-6,
  corroborationPerPass: 0.1,
  triggerTerms: ONCOLOGY_TRIGGER_TERMS
};

const UNCERTAINTY_FLAG_BY_MODALITY = {
  audio: "NO_AUDIO_DATA",
  cough: "NO_RESPIRATORY_DATA",
  cxr: "NO_CXR_DATA",
  histopathology: "NO_PATH_DATA",
  derm: "NO_DERM_DATA"
} as const;

const advancedDisease = termMatcher(ADVANCED_DISEASE_TERMS);

/** Strongest confidence among successful findings that name one of `terms`. */
export function evidenceSignal(evidence: readonly EvidenceItem[], terms: readonly string[] = ONCOLOGY_TRIGGER_TERMS): number {
  const match = termMatcher(terms);
  let signal = 0;
  for (const item of evidence) {
    if (item.status !== "SUCCESS" || !item.finding) continue;
    if (match(item.finding).length === 0) continue;
    signal = Math.max(signal, item.confidence ?? 0);
  }
  return signal;
}

export function computeRiskScore(
  evidence: readonly EvidenceItem[],
  debate: readonly DebateOutput[],
  policy: Pick<StagingPolicy, "corroborationPerPass" | "triggerTerms"> = DEFAULT_STAGING_POLICY
): { score: number; evidence_signal: number; debate_corroboration: number } {
  const signal = evidenceSignal(evidence, policy.triggerTerms);
  const corroborating = debate.filter((d) => advancedDisease(d.output_text).length > 0).length;
  const corroboration = corroborating * policy.corroborationPerPass;
  const raw = signal + corroboration;
  const score = Number.isFinite(raw) ? Math.min(1, Math.max(0, raw)) : raw;
  return { score, evidence_signal: signal, debate_corroboration: corroboration };
}

/**
 * Maps a score onto the rule table. Ties (within `tieEpsilon` below a boundary)
 * take the more severe stage; an unusable score takes the most severe one.
 */
export function classifyStage(score: number, policy: Pick<StagingPolicy, "rules" | "tieEpsilon"> = DEFAULT_STAGING_POLICY): string {
  const rules = [...policy.rules].sort((a, b) => a.minScore - b.minScore);
  if (rules.length === 0) throw new Error("staging rule table is empty");
  const mostSevere = rules[rules.length - 1];
  if (!Number.isFinite(score)) return mostSevere.stage;

  let stage = rules[0].stage;
  for (const rule of rules) {
    if (score + policy.tieEpsilon >= rule.minScore) stage = rule.stage;
  }
  return stage;
}

export function stagingConfidence(evidence: readonly EvidenceItem[], degradation: DegradationLevel): StagingConfidence {
  if (degradation === "MINIMAL") return "INSUFFICIENT_DATA";
  const path = evidence.find((e) => e.modality === "histopathology");
  if (!path || path.status !== "SUCCESS") return "PROVISIONAL";
  return "CONFIRMED";
}

export function uncertaintyFlags(evidence: readonly EvidenceItem[]): string[] {
  const flags = new Set<string>();
  for (const item of evidence) {
    if (item.status === "SUCCESS") continue;
    flags.add(UNCERTAINTY_FLAG_BY_MODALITY[item.modality]);
  }
  if (evidence.filter((e) => e.status === "MISSING").length >= 3) flags.add("INSUFFICIENT_DATA");
  return [...flags].sort((a, b) => a.localeCompare(b));
}

export function assessRisk(args: {
  evidence: readonly EvidenceItem[];
  debate: readonly DebateOutput[];
  degradation: DegradationLevel;
  policy?: StagingPolicy;
}): RiskAssessment {
  const policy = args.policy ?? DEFAULT_STAGING_POLICY;
  const { score, evidence_signal, debate_corroboration } = computeRiskScore(args.evidence, args.debate, policy);
  return {
    score,
    stage: classifyStage(score, policy),
    staging_confidence: stagingConfidence(args.evidence, args.degradation),
    evidence_signal,
    debate_corroboration,
    uncertainty_flags: uncertaintyFlags(args.evidence)
  };
}

const TB_SYMPTOM_WEIGHTS: ReadonlyArray<[string, number]> = [
  ["cough", 0.15],
  ["night sweats", 0.15],
  ["weight loss", 0.15],
  ["fever", 0.1],
  ["fatigue", 0.05]
];

/** Lower-cased strings under `key`, ignoring anything that is not a string list. */
export function entityStrings(entities: ClinicalEntities, key: string): string[] {
  const value = entities[key];
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string").map((v) => v.trim().toLowerCase());
}

/** Last number on the first CD4 lab line, e.g. 180 from "CD4 count 180". */
function cd4Count(labs: readonly string[]): number | null {
  for (const lab of labs) {
    if (!lab.includes("cd4")) continue;
    const numbers = lab.replace(/cd4/g, "").match(/\d+(?:\.\d+)?/g);
    if (numbers && numbers.length > 0) return Number(numbers[numbers.length - 1]);
  }
  return null;
}

function capped(score: number): number {
  return Math.round(Math.min(1, score) * 1000) / 1000;
}

/**
 * TB and HIV co-infection scores from extracted entities and the respiratory
 * evidence. Above 0.7 is HIGH (RED), above 0.4 MODERATE (AMBER).
 */
export function assessComorbidity(entities: ClinicalEntities, evidence: readonly EvidenceItem[]): ComorbidityRisk {
  const symptoms = entityStrings(entities, "symptoms");
  const conditions = entityStrings(entities, "conditions");
  const labs = entityStrings(entities, "lab_values");
  const hasCondition = (...names: string[]) => conditions.some((c) => names.some((n) => c.includes(n)));

  let tb = 0;
  for (const [symptom, weight] of TB_SYMPTOM_WEIGHTS) {
    if (symptoms.some((s) => s.includes(symptom))) tb += weight;
  }
  if (hasCondition("tb", "tuberculosis")) tb += 0.25;
  if (hasCondition("hiv")) tb += 0.1;
  const cough = evidence.find((e) => e.modality === "cough");
  if (cough?.status === "SUCCESS" && (cough.confidence ?? 0) > 0.5) tb += 0.15;
  const cxr = evidence.find((e) => e.modality === "cxr");
  if (cxr?.status === "SUCCESS" && /infiltrate|opacity/i.test(cxr.finding ?? "")) tb += 0.1;

  let hiv = 0;
  if (hasCondition("hiv")) hiv += 0.5;
  const cd4 = cd4Count(labs);
  if (cd4 !== null) {
    if (cd4 < 100) hiv += 0.35;
    else if (cd4 < 200) hiv += 0.25;
    else if (cd4 < 350) hiv += 0.1;
  }
  if (hasCondition("lymphoma")) hiv += 0.1;
  if (hasCondition("kaposi")) hiv += 0.15;

  const tbScore = capped(tb);
  const hivScore = capped(hiv);
  const worst = Math.max(tbScore, hivScore);
  return {
    tb_score: tbScore,
    tb_level: tbScore > 0.7 ? "HIGH" : tbScore > 0.4 ? "MODERATE" : "LOW",
    hiv_score: hivScore,
    overall: worst > 0.7 ? "RED" : worst > 0.4 ? "AMBER" : "GREEN"
  };
}
