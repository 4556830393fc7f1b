/**
 * Reconciler module types
 */

import type { Schema } from "../../types/schema.js";

export type MatchRule = "normalized-exact" | "substring";

/**
 * One rewritten foreign-key reference
 */
export interface ReferenceCorrection {
  entity: string;
  attribute: string;
  referencesTable: string;
  from: string;
  to: string;
  rule: MatchRule;
}

/**
 * A foreign-key reference the reconciler could not repair.
 * Not an error by itself; the validator reports the dangling reference.
 */
export interface ReconciliationGap {
  entity: string;
  attribute: string;
  referencesTable: string;
  referencesColumn: string;
  reason: "unknown-entity" | "no-candidate";
}

export interface ReconcileResult {
  schema: Schema;
  corrections: ReferenceCorrection[];
  gaps: ReconciliationGap[];
}
