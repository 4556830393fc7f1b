/**
 * Pipeline module types
 */

import type { CompilerConfig } from "../../types/config.js";
import type { RawDocument, Schema } from "../../types/schema.js";
import type { IntakeParseError, NormalizationError } from "../../utils/errors.js";
import type { Logger } from "../../utils/logger.js";
import type { RepairTransform } from "../intake/types.js";
import type { ReconciliationGap, ReferenceCorrection } from "../reconciler/types.js";
import type { SynthesisOutput } from "../synthesizer/types.js";
import type { ValidationResult } from "../validator/types.js";

/**
 * Everything one invocation needs; built once and passed explicitly
 */
export interface PipelineContext {
  config: CompilerConfig;
  logger: Logger;
  now: () => Date;
}

/**
 * Terminal failure before validation; exactly one error
 */
export type PipelineFailure =
  | { status: "failed"; phase: "intake"; error: IntakeParseError }
  | { status: "failed"; phase: "normalization"; error: NormalizationError };

export interface AnalysisReport {
  schema: Schema;
  repairs: RepairTransform[];
  corrections: ReferenceCorrection[];
  gaps: ReconciliationGap[];
  validation: ValidationResult;
}

export interface AnalyzedSchema extends AnalysisReport {
  status: "analyzed";
}

export interface InvalidSchema extends AnalysisReport {
  status: "invalid";
}

export interface CompiledProject extends AnalysisReport {
  status: "success";
  files: SynthesisOutput;
}

export type AnalysisOutcome = PipelineFailure | AnalyzedSchema;

export type CompileOutcome = PipelineFailure | InvalidSchema | CompiledProject;

export interface PipelineContextOptions {
  config?: CompilerConfig;
  logger?: Logger;
  now?: () => Date;
}

export type { RawDocument };
