/**
 * Greedy first-match lookup of a referenced attribute name
 */

import type { MatchRule } from "./types.js";

const IDENTIFIER_SUFFIX = "id";

/**
 * Case-fold, drop underscores, then drop a trailing "id" when something remains.
 * "CustomerID" → "customer", "customer_id" → "customer", "id" → "id"
 */
export function normalizeReferenceName(name: string): string {
  const folded = name.toLowerCase().replace(/_/g, "");
  if (folded.length > IDENTIFIER_SUFFIX.length && folded.endsWith(IDENTIFIER_SUFFIX)) {
    return folded.slice(0, -IDENTIFIER_SUFFIX.length);
  }
  return folded;
}

/**
 * Pick the candidate a declared reference most likely meant.
 * Candidates are scanned in declared order: first a normalized exact match, then the
 * first candidate whose normalized form contains, or is contained in, the declared one.
 */
export function findReferenceCandidate(
  declared: string,
  candidates: readonly string[],
): { name: string; rule: MatchRule } | null {
  const target = normalizeReferenceName(declared);
  const normalized = candidates.map((name) => ({
    name,
    form: normalizeReferenceName(name),
  }));

  const exact = normalized.find((candidate) => candidate.form === target);
  if (exact) {
    return { name: exact.name, rule: "normalized-exact" };
  }

  if (target === "") {
    return null;
  }

  const partial = normalized.find(
    (candidate) =>
      candidate.form !== "" &&
      (candidate.form.includes(target) || target.includes(candidate.form)),
  );
  return partial ? { name: partial.name, rule: "substring" } : null;
}
