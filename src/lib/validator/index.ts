/**
 * Validator module - structural and semantic checks over the schema IR
 *
 * Failed validation is an expected outcome, so findings are returned as data and never thrown.
 */

import type { Schema } from "../../types/schema.js";
import { checkSemantics } from "./semantic.js";
import { checkStructure } from "./structural.js";
import type {
  Diagnostic,
  DiagnosticCollector,
  ValidationResult,
  ValidatorOptions,
} from "./types.js";

export * from "./types.js";
export { checkStructure } from "./structural.js";
export { checkSemantics } from "./semantic.js";
export { computeSchemaStatistics } from "./statistics.js";

function createCollector(
  phase: Diagnostic["phase"],
  errors: Diagnostic[],
  warnings: Diagnostic[],
): DiagnosticCollector {
  return {
    error: (diagnostic) => errors.push({ ...diagnostic, phase }),
    warn: (diagnostic) => warnings.push({ ...diagnostic, phase }),
  };
}

/**
 * Run both validation phases. The schema is never modified.
 */
export function validateSchema(
  schema: Schema,
  options: ValidatorOptions = {},
): ValidationResult {
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  checkStructure(schema, createCollector("structural", errors, warnings));
  checkSemantics(schema, createCollector("semantic", errors, warnings), options);

  return Object.freeze({
    errors: Object.freeze(errors.map((diagnostic) => Object.freeze(diagnostic))),
    warnings: Object.freeze(warnings.map((diagnostic) => Object.freeze(diagnostic))),
  });
}

export function hasBlockingErrors(result: ValidationResult): boolean {
  return result.errors.length > 0;
}
