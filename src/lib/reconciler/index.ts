/**
 * Reconciler module - repairs foreign-key references that name an attribute inexactly
 *
 * Pure: works on a copy and reports every decision in the returned log.
 */

import type { Schema } from "../../types/schema.js";
import { findReferenceCandidate } from "./name-matching.js";
import type {
  ReconcileResult,
  ReconciliationGap,
  ReferenceCorrection,
} from "./types.js";

export * from "./types.js";
export * from "./name-matching.js";

export function reconcileReferences(input: Schema): ReconcileResult {
  const schema = structuredClone(input);
  const corrections: ReferenceCorrection[] = [];
  const gaps: ReconciliationGap[] = [];

  for (const entity of schema.entities) {
    for (const attribute of entity.attributes) {
      const { referencesTable, referencesColumn } = attribute;
      if (!attribute.isForeignKey || !referencesTable || !referencesColumn) {
        continue;
      }

      const target = schema.entities.find((candidate) => candidate.name === referencesTable);
      if (!target) {
        gaps.push({
          entity: entity.name,
          attribute: attribute.name,
          referencesTable,
          referencesColumn,
          reason: "unknown-entity",
        });
        continue;
      }

      const targetNames = target.attributes.map((candidate) => candidate.name);
      if (targetNames.includes(referencesColumn)) {
        continue;
      }

      const match = findReferenceCandidate(referencesColumn, targetNames);
      if (!match) {
        gaps.push({
          entity: entity.name,
          attribute: attribute.name,
          referencesTable,
          referencesColumn,
          reason: "no-candidate",
        });
        continue;
      }

      attribute.referencesColumn = match.name;
      corrections.push({
        entity: entity.name,
        attribute: attribute.name,
        referencesTable,
        from: referencesColumn,
        to: match.name,
        rule: match.rule,
      });
    }
  }

  return { schema, corrections, gaps };
}
