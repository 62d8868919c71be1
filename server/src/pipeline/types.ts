export const SESSION_STATUSES = ["INITIALIZED", "TRIAGE", "ESCALATED", "DEBATE", "FINALIZED", "ERRORED"] as const;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

// Ordered best to worst. Within a run the level only ever moves right.
export const DEGRADATION_LEVELS = ["FULL", "DEGRADED", "MINIMAL"] as const;
export type DegradationLevel = (typeof DEGRADATION_LEVELS)[number];

export const EVIDENCE_STATUSES = ["SUCCESS", "FAILED", "MISSING", "SKIPPED"] as const;
export type EvidenceStatus = (typeof EVIDENCE_STATUSES)[number];

export const MODALITIES = ["audio", "cough", "cxr", "histopathology", "derm"] as const;
export type Modality = (typeof MODALITIES)[number];

// Raw inputs a session can be submitted with. The cough stage reads the audio input.
export const INPUT_KINDS = ["audio", "cxr", "histopathology", "derm"] as const;
export type InputKind = (typeof INPUT_KINDS)[number];

export const OVERRIDABLE_FIELDS = ["staging", "transcript", "patient_id"] as const;
export type OverridableField = (typeof OVERRIDABLE_FIELDS)[number];

export const SYNC_STATUSES = ["PENDING", "SYNCED", "FAILED"] as const;
export type SyncStatus = (typeof SYNC_STATUSES)[number];

export const INTERACTION_SEVERITIES = ["CRITICAL", "MODERATE", "LOW"] as const;
export type InteractionSeverity = (typeof INTERACTION_SEVERITIES)[number];

export type UncertaintyLevel = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";
export type StagingConfidence = "CONFIRMED" | "PROVISIONAL" | "INSUFFICIENT_DATA";

export type ModalityPayload = {
  ref: string;
  metadata?: Record<string, string | number | boolean>;
};

/** Extracted clinical entities. Produced upstream; the pipeline never interprets their shape. */
export type ClinicalEntities = Record<string, unknown>;

export type SessionInputs = Partial<Record<InputKind, ModalityPayload>> & {
  entities?: ClinicalEntities;
  skip?: Modality[];
};

export type FrameModalityEntry = {
  status: EvidenceStatus;
  model: string;
  finding: string | null;
  confidence: number | null;
  evidence_tag: string;
};

export type ClinicalFrame = {
  entities: ClinicalEntities;
  modalities: Partial<Record<Modality, FrameModalityEntry>>;
  assembled_at: string;
};

export type SessionRecord = {
  session_id: string;
  patient_id: string;
  created_at: string;
  status: SessionStatus;
  degradation: DegradationLevel;
  staging: string | null;
  transcript: string | null;
  clinical_frame: ClinicalFrame | null;
  updated_at: string;
};

export type EvidenceItem = {
  id: number;
  session_id: string;
  modality: Modality;
  model: string;
  status: EvidenceStatus;
  finding: string | null;
  confidence: number | null;
  nba: string | null;
  created_at: string;
};

export type DebateOutput = {
  id: number;
  session_id: string;
  pass_number: number;
  persona: string;
  output_text: string;
  created_at: string;
};

export type DrugInteraction = {
  severity: InteractionSeverity;
  drugs: string;
  detail: string;
};

/**
 * BLOCKED: too much of the workup is missing to check a regimen at all.
 * UNCHECKED: no checker ran (none configured, no memory, or it failed).
 */
export type DrugSafetyStatus = "CLEARED" | "FLAGGED" | "BLOCKED" | "UNCHECKED";

export type DrugSafetyCheck = {
  status: DrugSafetyStatus;
  model: string | null;
  interactions: DrugInteraction[];
  substitutions: string[];
  note: string | null;
};

export type TreatmentRecommendation = {
  summary: string;
  actions: Array<{ modality: Modality; priority: number; nba: string; patient_language: string; cost_hint: string }>;
  regimen: string;
  drugs: string[];
  safety: DrugSafetyCheck;
  /** Set when the regimen must not be read as a prescription. */
  override: string | null;
};

export type ComorbidityRisk = {
  tb_score: number;
  tb_level: "HIGH" | "MODERATE" | "LOW";
  hiv_score: number;
  overall: "RED" | "AMBER" | "GREEN";
};

export type EvidenceTraceReport = {
  schema_version: string;
  generated_at: string;
  known_tags: string[];
  total_references: number;
  unique_reference_ids: number;
  references: Array<{
    tag: string;
    evidence_id: number;
    modality: Modality;
    model: string;
    status: EvidenceStatus;
    occurrence_count: number;
    sources: string[];
    claims: string[];
  }>;
  unresolved_references: Array<{ tag: string; source: string; reason: string }>;
};

export type RiskAssessment = {
  score: number;
  stage: string;
  staging_confidence: StagingConfidence;
  evidence_signal: number;
  debate_corroboration: number;
  uncertainty_flags: string[];
};

export type OncoCasePayload = {
  session_id: string;
  patient_id: string;
  degradation: DegradationLevel;
  risk: RiskAssessment;
  comorbidity: ComorbidityRisk;
  escalation: { score: number; threshold: number; triggers: string[]; uncertainty: UncertaintyLevel };
  evidence: Array<{
    tag: string;
    modality: Modality;
    model: string;
    status: EvidenceStatus;
    finding: string | null;
    confidence: number | null;
  }>;
  debate: Array<{ pass_number: number; persona: string; output_text: string }>;
  treatment: TreatmentRecommendation;
  trace: EvidenceTraceReport;
  generated_at: string;
};

export type OncoCaseRow = {
  id: number;
  session_id: string;
  oncocase_payload: OncoCasePayload;
  degradation: DegradationLevel;
  staging: string;
  nba: string;
  created_at: string;
};

export type OverrideRow = {
  id: number;
  session_id: string;
  clinician_id: string;
  field: OverridableField;
  old_value: string | null;
  new_value: string;
  reason: string;
  created_at: string;
};

/** Delivery outcome for one override. An override with no row yet is PENDING. */
export type OverrideSyncRow = {
  id: number;
  session_id: string;
  override_id: number;
  status: SyncStatus;
  attempts: number;
  error: string | null;
  created_at: string;
};

export type VramLogRow = {
  id: number;
  session_id: string;
  timestamp: number;
  elapsed_s: number;
  phase: string;
  allocated_mb: number;
  reserved_mb: number;
  model_active: string | null;
};

export type NewEvidenceItem = Omit<EvidenceItem, "id" | "created_at">;
export type NewDebateOutput = Omit<DebateOutput, "id" | "created_at">;
export type NewOncoCase = Omit<OncoCaseRow, "id" | "created_at">;
export type NewOverride = Omit<OverrideRow, "id" | "created_at">;
export type NewOverrideSync = Omit<OverrideSyncRow, "id" | "created_at">;
export type NewVramLog = Omit<VramLogRow, "id">;

export function degradationRank(level: DegradationLevel): number {
  return DEGRADATION_LEVELS.indexOf(level);
}

export function worseDegradation(a: DegradationLevel, b: DegradationLevel): DegradationLevel {
  return degradationRank(a) >= degradationRank(b) ? a : b;
}
