/**
 * Parse CLI command
 * Turns a collaborator response into the reconciled IR wire document
 */

import { Command } from "commander";
import { toWireDocument } from "../../lib/normalizer/wire.js";
import { analyzeResponse } from "../../lib/pipeline/index.js";
import { buildContext, exitWithError, readInput, writeOutput } from "../shared.js";

interface ParseCommandOptions {
  input: string;
  outputPath?: string;
  config?: string;
}

export function createParseCommand(): Command {
  return new Command("parse")
    .description("Parse a diagram-analysis response into the schema IR")
    .requiredOption("--input <path>", 'Response text file (or "-" for stdin)')
    .option("--output-path <path>", "Path for the IR JSON (default: stdout)")
    .option("--config <path>", "Config file (.json, .yaml, .yml)")
    .action(async (options: ParseCommandOptions, command: Command) => {
      try {
        const ctx = buildContext(command, {}, options.config);
        const text = await readInput(options.input);
        const outcome = analyzeResponse(text, ctx);

        if (outcome.status === "failed") {
          exitWithError(outcome.error, outcome.phase);
        }

        const response = {
          status: "success",
          phase: "parse",
          schema: toWireDocument(outcome.schema),
          repairs: outcome.repairs,
          corrections: outcome.corrections,
          gaps: outcome.gaps,
        };
        await writeOutput(JSON.stringify(response, null, 2), options.outputPath);
      } catch (error) {
        exitWithError(error, "parse");
      }
    });
}
