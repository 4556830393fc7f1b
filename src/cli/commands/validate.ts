/**
 * Validate CLI command
 * Reports structural and semantic diagnostics for a response or an IR document
 */

import { Command } from "commander";
import type { AnalyzedSchema } from "../../lib/pipeline/types.js";
import { computeSchemaStatistics } from "../../lib/validator/index.js";
import {
  type InputFormat,
  analyzeInput,
  buildContext,
  exitWithError,
  parseInputFormat,
  readInput,
  writeOutput,
} from "../shared.js";

interface ValidateCommandOptions {
  input: string;
  format: InputFormat;
  outputPath?: string;
  config?: string;
  allowSelfReferences?: boolean;
}

/**
 * Create the report printed by `validate`
 */
export function createValidationReport(analysis: AnalyzedSchema) {
  const { validation, schema } = analysis;
  return {
    status: "success" as const,
    phase: "validation" as const,
    report: {
      valid: validation.errors.length === 0,
      errors: validation.errors,
      warnings: validation.warnings,
      corrections: analysis.corrections,
      statistics: computeSchemaStatistics(schema),
    },
  };
}

export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Validate a schema without generating code")
    .requiredOption("--input <path>", 'Input file (or "-" for stdin)')
    .option("--format <format>", "Input format: response or ir", parseInputFormat, "response")
    .option("--output-path <path>", "Path for the validation report JSON (default: stdout)")
    .option("--config <path>", "Config file (.json, .yaml, .yml)")
    .option("--allow-self-references", "Report self-referencing relationships as warnings")
    .action(async (options: ValidateCommandOptions, command: Command) => {
      try {
        const ctx = buildContext(
          command,
          { allowSelfReferences: options.allowSelfReferences },
          options.config,
        );
        const text = await readInput(options.input);
        const outcome = analyzeInput(text, options.format, ctx);

        if (outcome.status === "failed") {
          exitWithError(outcome.error, outcome.phase);
        }

        const response = createValidationReport(outcome);
        await writeOutput(JSON.stringify(response, null, 2), options.outputPath);

        process.exit(response.report.valid ? 0 : 1);
      } catch (error) {
        exitWithError(error, "validation");
      }
    });
}
