import type { InputKind, Modality } from "./types.js";
import type { ModelTier } from "./workers.js";

export type NbaEntry = {
  priority: number;
  nba: string;
  patient_language: string;
  cost_hint: string;
};

// Low-cost next steps to recover a modality that could not be read.
export const NBA_CATALOG: Record<Modality, NbaEntry> = {
  histopathology: {
    priority: 1,
    nba: "Recommend fine-needle aspiration cytology of the most accessible suspicious node. Highest-yield next step for tissue diagnosis.",
    patient_language: "Get a small tissue sample taken with a thin needle",
    cost_hint: "low (district hospital)"
  },
  cxr: {
    priority: 2,
    nba: "Recommend portable chest X-ray to establish a cardiopulmonary baseline before any systemic therapy.",
    patient_language: "Get a chest X-ray",
    cost_hint: "low"
  },
  cough: {
    priority: 3,
    nba: "Recommend recording a 10-second forced cough on any smartphone and re-uploading. Refer for sputum smear if infection is suspected.",
    patient_language: "Record a short cough sound on your phone and bring it to your next visit",
    cost_hint: "none (smartphone)"
  },
  derm: {
    priority: 4,
    nba: "Recommend a clinical photograph of the skin lesion under good lighting; punch biopsy if the appearance is suspicious.",
    patient_language: "Take a clear photo of the skin spot in good light and show your doctor",
    cost_hint: "none (photo) / low (biopsy)"
  },
  audio: {
    priority: 5,
    nba: "Consultation audio unavailable. Recommend recording the next consultation with any device at 16 kHz.",
    patient_language: "Your doctor will record your next conversation",
    cost_hint: "none"
  }
};

export type StageDefinition = {
  modality: Modality;
  input: InputKind;
  label: string;
  tiers: readonly ModelTier[];
};

/** Default stage line-up, in execution order. Footprints are peak MB per model variant. */
export const STAGE_DEFINITIONS: readonly StageDefinition[] = [
  {
    modality: "audio",
    input: "audio",
    label: "consultation transcription",
    tiers: [
      { model: "medasr", estimatedMb: 800 },
      { model: "medasr-lite", estimatedMb: 400 }
    ]
  },
  {
    modality: "cough",
    input: "audio",
    label: "cough acoustics",
    tiers: [
      { model: "hear", estimatedMb: 600 },
      { model: "hear-lite", estimatedMb: 300 }
    ]
  },
  {
    modality: "histopathology",
    input: "histopathology",
    label: "histopathology patch encoder",
    tiers: [
      { model: "path-foundation", estimatedMb: 500 },
      { model: "path-foundation-int8", estimatedMb: 250 }
    ]
  },
  {
    modality: "cxr",
    input: "cxr",
    label: "chest X-ray encoder",
    tiers: [
      { model: "cxr-foundation", estimatedMb: 500 },
      { model: "cxr-foundation-int8", estimatedMb: 250 }
    ]
  },
  {
    modality: "derm",
    input: "derm",
    label: "skin lesion encoder",
    tiers: [
      { model: "derm-foundation", estimatedMb: 500 },
      { model: "derm-foundation-int8", estimatedMb: 250 }
    ]
  }
];

export const LANGUAGE_TIER: ModelTier = { model: "medgemma-4b-it-int4", estimatedMb: 2800 };
export const DRUG_INTERACTION_TIER: ModelTier = { model: "txgemma-9b-chat-int4", estimatedMb: 3000 };

/** Per-pass token ceilings for the persona debate. */
export const PASS_MAX_TOKENS: readonly number[] = [200, 200, 200, 600, 300];

export const ONCOLOGY_TRIGGER_TERMS: readonly string[] = [
  "lymphoma",
  "malignancy",
  "cancer",
  "tumor",
  "tumour",
  "metastasis",
  "metastatic",
  "carcinoma",
  "sarcoma",
  "kaposi",
  "mass",
  "neoplasm",
  "neoplastic",
  "oncology",
  "adenocarcinoma",
  "leukemia",
  "myeloma",
  "hodgkin",
  "non-hodgkin",
  "staging",
  "biopsy"
];

// Debate language that corroborates advanced disease when scoring risk.
export const ADVANCED_DISEASE_TERMS: readonly string[] = [
  "metastatic",
  "metastasis",
  "disseminated",
  "extranodal",
  "bulky",
  "stage iv",
  "bone marrow involvement",
  "b symptoms"
];
