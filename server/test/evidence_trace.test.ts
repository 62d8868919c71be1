import { describe, expect, it } from "vitest";
import { EvidenceTrace, evidenceTag, extractTags } from "../src/pipeline/evidence_trace.js";
import type { EvidenceItem, Modality } from "../src/pipeline/types.js";

function item(id: number, sessionId: string, modality: Modality): EvidenceItem {
  return {
    id,
    session_id: sessionId,
    modality,
    model: `${modality}-model`,
    status: "SUCCESS",
    finding: "finding",
    confidence: 0.5,
    nba: null,
    created_at: "2026-01-01T00:00:00.000Z"
  };
}

const ITEMS = [item(1, "sess-a", "histopathology"), item(2, "sess-a", "cxr"), item(3, "sess-b", "derm")];

describe("extractTags", () => {
  it("returns unique tags in order of first appearance", () => {
    expect(extractTags("see [EV-4], then [EV-1] and [EV-4] again; [EV-x] is not a tag")).toEqual(["[EV-4]", "[EV-1]"]);
    expect(evidenceTag(12)).toBe("[EV-12]");
  });
});

describe("EvidenceTrace", () => {
  it("resolves only its own session's evidence", () => {
    const trace = new EvidenceTrace("sess-a", ITEMS);
    expect(trace.knownTags()).toEqual(["[EV-1]", "[EV-2]"]);

    const ok = trace.resolve("[EV-2]");
    expect(ok.ok && ok.item.modality).toBe("cxr");
    expect(trace.resolve("[EV-3]")).toEqual({ ok: false, tag: "[EV-3]", reason: "not_found" });
    expect(trace.resolve("EV-1")).toEqual({ ok: false, tag: "EV-1", reason: "malformed" });
  });

  it("treats text without tags as ungrounded", () => {
    const trace = new EvidenceTrace("sess-a", ITEMS);
    expect(trace.validate("No citations here.")).toEqual({ tags: [], unresolved: [], grounded: false });
    expect(trace.validate("Mass [EV-1] and lesion [EV-3].")).toEqual({
      tags: ["[EV-1]", "[EV-3]"],
      unresolved: ["[EV-3]"],
      grounded: false
    });
    expect(trace.validate("Mass [EV-1].").grounded).toBe(true);
  });

  it("builds a report of references and unresolved citations", () => {
    const trace = new EvidenceTrace("sess-a", ITEMS);
    const report = trace.buildReport([
      { source: "debate_pass_1", text: "Lymphoma suspected [EV-1]. Again [EV-1]." },
      { source: "treatment", text: "Chest film reviewed [EV-2]. Foreign item [EV-3]." }
    ]);

    expect(report.schema_version).toBe("1.0.0");
    expect(report.known_tags).toEqual(["[EV-1]", "[EV-2]"]);
    expect(report.total_references).toBe(4);
    expect(report.unique_reference_ids).toBe(3);
    expect(report.references).toEqual([
      {
        tag: "[EV-1]",
        evidence_id: 1,
        modality: "histopathology",
        model: "histopathology-model",
        status: "SUCCESS",
        occurrence_count: 2,
        sources: ["debate_pass_1"],
        claims: ["Again.", "Lymphoma suspected."]
      },
      {
        tag: "[EV-2]",
        evidence_id: 2,
        modality: "cxr",
        model: "cxr-model",
        status: "SUCCESS",
        occurrence_count: 1,
        sources: ["treatment"],
        claims: ["Chest film reviewed."]
      }
    ]);
    expect(report.unresolved_references).toEqual([
      { tag: "[EV-3]", source: "treatment", reason: "evidence not_found in session sess-a" }
    ]);
  });
});
