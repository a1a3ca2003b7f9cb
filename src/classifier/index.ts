/**
 * Layered first-match-wins classifier.
 * A rule chain is an ordered list of rules; the first rule that yields a
 * result decides the category and no later rule is evaluated.
 *   literal: a reference member is contained in the text
 *   pattern: a regex candidate, fuzzy-matched against the reference set
 */

export type ConfidenceTier = "literal" | "fuzzy" | "raw" | "none";

export interface LiteralRule {
  kind: "literal";
  label: string;
  /** Overrides the reference set for this rule (e.g. keyword lists). */
  terms?: readonly string[];
}

export interface PatternRule {
  kind: "pattern";
  label: string;
  pattern: RegExp;
}

export type ClassifierRule = LiteralRule | PatternRule;

export interface Classification {
  category: string;
  tier: ConfidenceTier;
  rule?: string;
}

export const UNKNOWN_CATEGORY = "unknown";

export function literalRule(
  label: string,
  terms?: readonly string[],
): LiteralRule {
  return terms ? { kind: "literal", label, terms } : { kind: "literal", label };
}

export function patternRule(label: string, pattern: RegExp): PatternRule {
  return { kind: "pattern", label, pattern: statelessPattern(pattern) };
}

/** Drops the `g` and `y` flags, whose `lastIndex` would leak between calls. */
function statelessPattern(pattern: RegExp): RegExp {
  return pattern.global || pattern.sticky
    ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""))
    : pattern;
}

export function classify(
  text: string,
  ruleChain: readonly ClassifierRule[],
  referenceSet: readonly string[] = [],
): Classification {
  for (const rule of ruleChain) {
    const result =
      rule.kind === "literal"
        ? applyLiteralRule(text, rule, referenceSet)
        : applyPatternRule(text, rule, referenceSet);

    if (result) {
      return result;
    }
  }

  return { category: UNKNOWN_CATEGORY, tier: "none" };
}

function applyLiteralRule(
  text: string,
  rule: LiteralRule,
  referenceSet: readonly string[],
): Classification | null {
  const lower = text.toLowerCase();
  const terms = rule.terms ?? referenceSet;

  for (const term of terms) {
    if (term.length > 0 && lower.includes(term.toLowerCase())) {
      return { category: term, tier: "literal", rule: rule.label };
    }
  }

  return null;
}

function applyPatternRule(
  text: string,
  rule: PatternRule,
  referenceSet: readonly string[],
): Classification | null {
  const candidate = extractCandidate(text, rule.pattern);
  if (!candidate) return null;

  if (referenceSet.length > 0) {
    const match = fuzzyMatch(candidate, referenceSet);
    if (match !== null) {
      return { category: match, tier: "fuzzy", rule: rule.label };
    }
  }

  return { category: candidate, tier: "raw", rule: rule.label };
}

export function extractCandidate(text: string, pattern: RegExp): string | null {
  const match = statelessPattern(pattern).exec(text);
  if (!match) return null;

  const candidate = match[1] ?? match[0];
  return candidate.length > 0 ? candidate : null;
}

/**
 * Returns the first reference member that contains the candidate, is
 * contained by it, or differs from it in length by at most two characters.
 * An exact (case-insensitive) member is preferred over that scan.
 */
export function fuzzyMatch(
  candidate: string,
  referenceSet: readonly string[],
): string | null {
  const needle = candidate.toLowerCase();

  const exact = referenceSet.find((ref) => ref.toLowerCase() === needle);
  if (exact !== undefined) return exact;

  for (const ref of referenceSet) {
    const lowerRef = ref.toLowerCase();
    if (lowerRef.length === 0) continue;

    if (
      lowerRef.includes(needle) ||
      needle.includes(lowerRef) ||
      Math.abs(needle.length - lowerRef.length) <= 2
    ) {
      return ref;
    }
  }

  return null;
}
