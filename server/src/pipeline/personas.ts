import { PASS_MAX_TOKENS } from "./catalog.js";
import { evidenceTag } from "./evidence_trace.js";
import type { ClinicalFrame, DebateOutput, EvidenceItem } from "./types.js";

export type PersonaSpec = {
  name: string;
  focus: string;
  maxTokens: number;
};

export const PERSONAS: readonly PersonaSpec[] = [
  {
    name: "Pathologist",
    focus: "Interpret tissue and cytology findings. State what the histopathology supports, and what it cannot establish.",
    maxTokens: PASS_MAX_TOKENS[0]
  },
  {
    name: "Radiologist",
    focus: "Interpret chest imaging and any skin-lesion imaging. Describe extent of disease visible on imaging.",
    maxTokens: PASS_MAX_TOKENS[1]
  },
  {
    name: "Oncologist",
    focus: "Integrate pathology and imaging into a working diagnosis and a provisional stage.",
    maxTokens: PASS_MAX_TOKENS[2]
  },
  {
    name: "Treatment Planner",
    focus: "Synthesize the prior passes into a treatment plan and the next best actions for missing data.",
    maxTokens: PASS_MAX_TOKENS[3]
  },
  {
    name: "Patient Communicator",
    focus: "Explain the plan to the patient in plain language at a sixth-grade reading level.",
    maxTokens: PASS_MAX_TOKENS[4]
  }
];

export type PromptDetail = "full" | "reduced";

function evidenceLine(item: EvidenceItem): string {
  const conf = item.confidence === null ? "n/a" : item.confidence.toFixed(2);
  const finding = item.finding ?? (item.nba ? `no result; next step: ${item.nba}` : "no result");
  return `${evidenceTag(item.id)} ${item.modality} (${item.model}) ${item.status} confidence=${conf}: ${finding}`;
}

/**
 * Builds one pass's prompt. `reduced` drops the raw entities and the evidence
 * that produced no finding, but always keeps every earlier pass verbatim.
 */
export function buildPersonaPrompt(args: {
  persona: PersonaSpec;
  passNumber: number;
  frame: ClinicalFrame | null;
  evidence: readonly EvidenceItem[];
  prior: readonly DebateOutput[];
  detail: PromptDetail;
}): string {
  const { persona, passNumber, frame, prior, detail } = args;
  const evidence = detail === "full" ? args.evidence : args.evidence.filter((e) => e.status === "SUCCESS");

  const sections: string[] = [
    `You are the ${persona.name} (pass ${passNumber} of ${PERSONAS.length}) on a virtual tumour board.`,
    persona.focus,
    "",
    "Rules:",
    "- Every factual statement must cite the evidence it rests on using its tag, e.g. [EV-3].",
    "- Cite only tags listed under EVIDENCE. Never invent a tag.",
    "- Where evidence is missing, say so and cite the missing item's tag.",
    `- Keep the answer under ${persona.maxTokens} tokens.`
  ];

  if (detail === "full" && frame) {
    sections.push("", "CLINICAL ENTITIES:", JSON.stringify(frame.entities));
  }

  sections.push("", "EVIDENCE:", ...(evidence.length > 0 ? evidence.map(evidenceLine) : ["(none)"]));

  if (prior.length > 0) {
    sections.push("", "PRIOR PASSES:");
    for (const p of prior) sections.push(`Pass ${p.pass_number}, ${p.persona}:`, p.output_text, "");
  }

  return sections.join("\n").trimEnd();
}
