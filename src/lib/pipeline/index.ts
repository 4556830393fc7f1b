/**
 * Pipeline - Parser → Normalizer → Reconciler → Validator → Synthesizer
 *
 * Stages are pure; this module owns sequencing and logging.
 */

import { DEFAULT_COMPILER_CONFIG } from "../../types/config.js";
import type { RawDocument } from "../../types/schema.js";
import { logger as defaultLogger } from "../../utils/logger.js";
import { buildAnalysisPrompt, parseResponse } from "../intake/index.js";
import type { DiagramAnalysisClient, RepairTransform } from "../intake/types.js";
import { normalizeDocument } from "../normalizer/index.js";
import { reconcileReferences } from "../reconciler/index.js";
import { synthesizeProject } from "../synthesizer/index.js";
import { hasBlockingErrors, validateSchema } from "../validator/index.js";
import type {
  AnalysisOutcome,
  AnalysisReport,
  CompileOutcome,
  PipelineContext,
  PipelineContextOptions,
} from "./types.js";

export * from "./types.js";

export function createPipelineContext(options: PipelineContextOptions = {}): PipelineContext {
  return {
    config: options.config ?? structuredClone(DEFAULT_COMPILER_CONFIG),
    logger: options.logger ?? defaultLogger,
    now: options.now ?? (() => new Date()),
  };
}

function analyze(
  document: RawDocument,
  repairs: RepairTransform[],
  ctx: PipelineContext,
): AnalysisOutcome {
  const { logger } = ctx;

  const normalized = normalizeDocument(document);
  if (!normalized.ok) {
    logger.error("Normalization failed", { message: normalized.error.message });
    return { status: "failed", phase: "normalization", error: normalized.error };
  }
  logger.debug("Document normalized", {
    entities: normalized.value.entities.length,
    relationships: normalized.value.relationships.length,
  });

  const { schema, corrections, gaps } = reconcileReferences(normalized.value);
  for (const correction of corrections) {
    logger.info("Corrected foreign-key reference", {
      entity: correction.entity,
      attribute: correction.attribute,
      from: `${correction.referencesTable}.${correction.from}`,
      to: `${correction.referencesTable}.${correction.to}`,
      rule: correction.rule,
    });
  }
  for (const gap of gaps) {
    logger.warn("Could not reconcile foreign-key reference", {
      entity: gap.entity,
      attribute: gap.attribute,
      target: `${gap.referencesTable}.${gap.referencesColumn}`,
      reason: gap.reason,
    });
  }

  const validation = validateSchema(schema, {
    allowSelfReferences: ctx.config.validation.allowSelfReferences,
  });
  logger.debug("Schema validated", {
    errors: validation.errors.length,
    warnings: validation.warnings.length,
  });

  return { status: "analyzed", schema, repairs, corrections, gaps, validation };
}

/**
 * Parse, normalize, reconcile and validate collaborator text
 */
export function analyzeResponse(text: string, ctx: PipelineContext): AnalysisOutcome {
  const parsed = parseResponse(text, { now: ctx.now });
  if (!parsed.ok) {
    ctx.logger.error("Intake failed", { message: parsed.error.message });
    return { status: "failed", phase: "intake", error: parsed.error };
  }
  if (parsed.value.repaired) {
    ctx.logger.info("Response repaired before parsing", {
      repairs: parsed.value.appliedRepairs,
    });
  }
  return analyze(parsed.value.document, parsed.value.appliedRepairs, ctx);
}

/**
 * Normalize, reconcile and validate an already-parsed IR document
 */
export function analyzeSchemaDocument(
  document: RawDocument,
  ctx: PipelineContext,
): AnalysisOutcome {
  return analyze(document, [], ctx);
}

/**
 * Synthesize an analyzed schema, unless it failed earlier or has blocking errors
 */
export function compileAnalysis(analysis: AnalysisOutcome, ctx: PipelineContext): CompileOutcome {
  if (analysis.status === "failed") {
    return analysis;
  }
  const report: AnalysisReport = {
    schema: analysis.schema,
    repairs: analysis.repairs,
    corrections: analysis.corrections,
    gaps: analysis.gaps,
    validation: analysis.validation,
  };
  if (hasBlockingErrors(analysis.validation)) {
    ctx.logger.warn("Validation failed; nothing synthesized", {
      errors: analysis.validation.errors.length,
    });
    return { ...report, status: "invalid" };
  }

  const files = synthesizeProject(analysis.schema, ctx.config.synthesis);
  ctx.logger.info("Project synthesized", {
    entities: analysis.schema.entities.length,
    files: files.size,
  });
  return { ...report, status: "success", files };
}

/**
 * Full pipeline from collaborator text to a file tree
 */
export function compileResponse(text: string, ctx: PipelineContext): CompileOutcome {
  return compileAnalysis(analyzeResponse(text, ctx), ctx);
}

/**
 * Full pipeline from an IR document (re-validation and regeneration)
 */
export function compileSchemaDocument(
  document: RawDocument,
  ctx: PipelineContext,
): CompileOutcome {
  return compileAnalysis(analyzeSchemaDocument(document, ctx), ctx);
}

/**
 * Ask the collaborator about a diagram once, then compile its answer
 */
export async function compileDiagram(
  client: DiagramAnalysisClient,
  image: Buffer,
  hint: string | undefined,
  ctx: PipelineContext,
): Promise<CompileOutcome> {
  ctx.logger.debug("Requesting diagram analysis", { bytes: image.length });
  const text = await client.analyze(image, buildAnalysisPrompt(hint));
  return compileResponse(text, ctx);
}
