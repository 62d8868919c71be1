import type { EvidenceItem, EvidenceTraceReport } from "./types.js";
import { nowIso } from "./utils.js";

const TAG_PATTERN = /\[EV-(\d+)\]/g;

export function evidenceTag(id: number): string {
  return `[EV-${id}]`;
}

/** Unique tags in order of first appearance. */
export function extractTags(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(TAG_PATTERN)) seen.add(match[0]);
  return [...seen];
}

export type TraceResolution = { ok: true; item: EvidenceItem } | { ok: false; tag: string; reason: "malformed" | "not_found" };

export type TraceValidation = {
  tags: string[];
  unresolved: string[];
  /** At least one tag, and every tag resolves. */
  grounded: boolean;
};

export type TraceSource = { source: string; text: string };

type TagOccurrence = { tag: string; source: string; claim: string };

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values.filter((v) => v.trim().length > 0))].sort((a, b) => a.localeCompare(b));
}

function splitClaims(text: string): string[] {
  return text
    .split(/\n+|(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function stripTags(sentence: string): string {
  return sentence
    .replace(TAG_PATTERN, "")
    .replace(/\s{2,}/g, " ")
    .replace(/\s+([.,;:!?])/g, "$1")
    .trim();
}

function scanOccurrences(src: TraceSource): TagOccurrence[] {
  return splitClaims(src.text).flatMap((sentence) =>
    extractTags(sentence).map((tag) => ({ tag, source: src.source, claim: stripTags(sentence) }))
  );
}

/**
 * Citation index for one session. Items belonging to any other session are
 * invisible, so a tag can only ever resolve to this session's evidence.
 */
export class EvidenceTrace {
  private readonly byId = new Map<number, EvidenceItem>();

  constructor(
    readonly sessionId: string,
    items: readonly EvidenceItem[]
  ) {
    for (const item of items) {
      if (item.session_id === sessionId) this.byId.set(item.id, item);
    }
  }

  knownTags(): string[] {
    return [...this.byId.keys()].sort((a, b) => a - b).map(evidenceTag);
  }

  resolve(tag: string): TraceResolution {
    const m = /^\[EV-(\d+)\]$/.exec(tag.trim());
    if (!m) return { ok: false, tag, reason: "malformed" };
    const item = this.byId.get(Number(m[1]));
    if (!item) return { ok: false, tag, reason: "not_found" };
    return { ok: true, item };
  }

  validate(text: string): TraceValidation {
    const tags = extractTags(text);
    const unresolved = tags.filter((tag) => !this.resolve(tag).ok);
    return { tags, unresolved, grounded: tags.length > 0 && unresolved.length === 0 };
  }

  buildReport(sources: readonly TraceSource[]): EvidenceTraceReport {
    const occurrences = sources.flatMap(scanOccurrences);

    const byTag = new Map<string, TagOccurrence[]>();
    for (const occ of occurrences) {
      const list = byTag.get(occ.tag) ?? [];
      list.push(occ);
      byTag.set(occ.tag, list);
    }

    const references: EvidenceTraceReport["references"] = [];
    const unresolved: EvidenceTraceReport["unresolved_references"] = [];
    for (const [tag, refs] of [...byTag.entries()].sort((a, b) => a[0].localeCompare(b[0]))) {
      const resolved = this.resolve(tag);
      if (!resolved.ok) {
        for (const ref of refs) {
          unresolved.push({ tag, source: ref.source, reason: `evidence ${resolved.reason} in session ${this.sessionId}` });
        }
        continue;
      }
      references.push({
        tag,
        evidence_id: resolved.item.id,
        modality: resolved.item.modality,
        model: resolved.item.model,
        status: resolved.item.status,
        occurrence_count: refs.length,
        sources: uniqueSorted(refs.map((r) => r.source)),
        claims: uniqueSorted(refs.map((r) => r.claim))
      });
    }

    return {
      schema_version: "1.0.0",
      generated_at: nowIso(),
      known_tags: this.knownTags(),
      total_references: occurrences.length,
      unique_reference_ids: byTag.size,
      references,
      unresolved_references: unresolved
    };
  }
}
