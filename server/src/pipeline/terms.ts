function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// A cue up to two words before a term negates it: "no malignancy", "no evidence of lymphoma".
const NEGATION_CUE = /(?:^|[^a-z])(?:no|not|without|negative for|free of|absence of|ruled out)(?:\s+[a-z-]+){0,2}\s*$/;
const CLAUSE_BREAK = /[.;\n]/g;

function isNegated(lower: string, index: number): boolean {
  const before = lower.slice(0, index);
  let clauseStart = 0;
  for (const m of before.matchAll(CLAUSE_BREAK)) clauseStart = (m.index ?? 0) + 1;
  return NEGATION_CUE.test(before.slice(clauseStart));
}

/**
 * Builds a matcher returning the terms named in a text. Terms match on word
 * boundaries, and a term counts only when at least one mention is not negated.
 */
export function termMatcher(terms: readonly string[]): (text: string) => string[] {
  const patterns = terms.map((term) => ({
    term,
    re: new RegExp(`(^|[^a-z])(${escapeRegExp(term.toLowerCase())})(?=$|[^a-z])`, "g")
  }));
  return (text) => {
    const lower = text.toLowerCase();
    return patterns
      .filter((p) => {
        for (const m of lower.matchAll(p.re)) {
          const at = (m.index ?? 0) + m[1].length;
          if (!isNegated(lower, at)) return true;
        }
        return false;
      })
      .map((p) => p.term);
  };
}
