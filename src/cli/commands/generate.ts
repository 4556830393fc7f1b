/**
 * Generate CLI command
 * Runs the whole pipeline and writes the synthesized project
 */

import { Command } from "commander";
import { createScratchDirectory, writeFileTree } from "../../lib/emitter/index.js";
import { compileAnalysis } from "../../lib/pipeline/index.js";
import { buildRunReport, saveRunReport } from "../../lib/reporter/index.js";
import { ValidationFailedError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import {
  type InputFormat,
  analyzeInput,
  buildContext,
  exitWithError,
  parseInputFormat,
  parsePositiveInteger,
  readInput,
} from "../shared.js";

interface GenerateCommandOptions {
  input: string;
  format: InputFormat;
  outputDir?: string;
  config?: string;
  apiPrefix?: string;
  dialect?: string;
  packageName?: string;
  pageSize?: number;
  maxPageSize?: number;
  allowSelfReferences?: boolean;
  reportPath?: string;
}

export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate an Express + Sequelize project from a schema")
    .requiredOption("--input <path>", 'Input file (or "-" for stdin)')
    .option("--format <format>", "Input format: response or ir", parseInputFormat, "response")
    .option("--output-dir <path>", "Directory for generated files (default: fresh temp dir)")
    .option("--config <path>", "Config file (.json, .yaml, .yml)")
    .option("--api-prefix <prefix>", "Mount path for the generated routes")
    .option("--dialect <dialect>", "Database dialect: postgres, mysql, sqlite")
    .option("--package-name <name>", "Name of the generated package")
    .option("--page-size <n>", "Default page size", parsePositiveInteger)
    .option("--max-page-size <n>", "Largest page size a client may request", parsePositiveInteger)
    .option("--allow-self-references", "Report self-referencing relationships as warnings")
    .option("--report-path <path>", "Write a run report with file hashes to this path")
    .action(async (options: GenerateCommandOptions, command: Command) => {
      try {
        const ctx = buildContext(
          command,
          {
            allowSelfReferences: options.allowSelfReferences,
            apiPrefix: options.apiPrefix,
            dialect: options.dialect,
            packageName: options.packageName,
            pageSize: options.pageSize,
            maxPageSize: options.maxPageSize,
            outputDir: options.outputDir,
          },
          options.config,
        );

        const text = await readInput(options.input);
        const outcome = compileAnalysis(analyzeInput(text, options.format, ctx), ctx);

        if (outcome.status === "failed") {
          exitWithError(outcome.error, outcome.phase);
        }

        if (outcome.status === "invalid") {
          exitWithError(
            new ValidationFailedError("Schema has blocking validation errors", {
              errors: outcome.validation.errors,
              warnings: outcome.validation.warnings,
            }),
            "validation",
          );
        }

        const directory = ctx.config.output.dir ?? (await createScratchDirectory());
        const written = await writeFileTree(outcome.files, directory);
        const report = buildRunReport(outcome.schema, outcome.files, { now: ctx.now });

        if (options.reportPath) {
          await saveRunReport(report, options.reportPath);
        }

        logger.info("Project generated", {
          directory: written.directory,
          files: written.files.length,
        });

        console.log(
          JSON.stringify(
            {
              status: "success",
              phase: "synthesis",
              directory: written.directory,
              files: [...outcome.files.keys()],
              schemaHash: report.schema.schemaHash,
              warnings: outcome.validation.warnings,
              corrections: outcome.corrections,
            },
            null,
            2,
          ),
        );
      } catch (error) {
        exitWithError(error, "synthesis");
      }
    });
}
