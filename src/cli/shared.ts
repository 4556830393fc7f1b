/**
 * Helpers shared by CLI commands: input/output, config loading and error exits
 */

import { InvalidArgumentError, type Command } from "commander";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { analyzeResponse, analyzeSchemaDocument, createPipelineContext } from "../lib/pipeline/index.js";
import type { AnalysisOutcome, PipelineContext } from "../lib/pipeline/types.js";
import type { CompilerConfigFile } from "../types/config.js";
import { isPlainObject } from "../types/schema.js";
import { loadCompilerConfig, type CompilerCliOptions } from "../utils/config-loader.js";
import {
  ErrorCode,
  FileIOError,
  IntakeParseError,
  SchemawrightError,
  toSchemawrightError,
} from "../utils/errors.js";
import { isLogLevel, logger } from "../utils/logger.js";
import { parseConfigFile } from "./config/parser.js";

export const INPUT_FORMATS = ["response", "ir"] as const;
export type InputFormat = (typeof INPUT_FORMATS)[number];

export function isInputFormat(value: unknown): value is InputFormat {
  return typeof value === "string" && INPUT_FORMATS.some((format) => format === value);
}

/**
 * commander argument parser for positive integers
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function parseInputFormat(value: string): InputFormat {
  if (!isInputFormat(value)) {
    throw new InvalidArgumentError(`Must be one of: ${INPUT_FORMATS.join(", ")}.`);
  }
  return value;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Read command input from a file, or from stdin for "-" / "stdin"
 */
export async function readInput(inputPath: string): Promise<string> {
  if (inputPath === "-" || inputPath === "stdin") {
    return readStdin();
  }
  try {
    return await readFile(inputPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new FileIOError(`Input not found at: ${inputPath}`, undefined, { cause: error });
    }
    throw new FileIOError(`Failed to read input from ${inputPath}`, undefined, {
      cause: error,
    });
  }
}

/**
 * Write command output to a file, or to stdout when no path is given
 */
export async function writeOutput(content: string, outputPath?: string): Promise<void> {
  if (!outputPath || outputPath === "stdout") {
    console.log(content);
    return;
  }
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, "utf8");
  } catch (error) {
    throw new FileIOError(`Failed to write output to ${outputPath}`, undefined, {
      cause: error,
    });
  }
  logger.info("Output written", { path: outputPath });
}

/**
 * Build the per-invocation context from flags and an optional config file
 */
export function buildContext(
  command: Command,
  cliOptions: CompilerCliOptions,
  configPath?: string,
): PipelineContext {
  const fileConfig: CompilerConfigFile = configPath ? parseConfigFile(configPath) : {};

  // --log-level wins over the file's logLevel
  const levelSource = command.getOptionValueSourceWithGlobals("logLevel");
  if (fileConfig.logLevel && levelSource !== "cli" && isLogLevel(fileConfig.logLevel)) {
    logger.setLevel(fileConfig.logLevel);
  }

  return createPipelineContext({
    config: loadCompilerConfig(cliOptions, fileConfig),
    logger,
  });
}

/**
 * Run the pre-synthesis stages on command input in either input format
 */
export function analyzeInput(
  text: string,
  format: InputFormat,
  ctx: PipelineContext,
): AnalysisOutcome {
  if (format === "response") {
    return analyzeResponse(text, ctx);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      status: "failed",
      phase: "intake",
      error: new IntakeParseError("Input is not valid JSON", undefined, { cause: error }),
    };
  }
  if (!isPlainObject(parsed)) {
    return {
      status: "failed",
      phase: "intake",
      error: new IntakeParseError("Input JSON is not an object"),
    };
  }
  return analyzeSchemaDocument(parsed, ctx);
}

export function exitCodeFor(error: SchemawrightError): number {
  switch (error.code) {
    case ErrorCode.VALIDATION_FAILED:
      return 1;
    case ErrorCode.INTAKE_PARSE_ERROR:
    case ErrorCode.NORMALIZATION_ERROR:
      return 2;
    case ErrorCode.CONFIG_ERROR:
      return 3;
    case ErrorCode.FILE_IO_ERROR:
      return 4;
    default:
      return 1;
  }
}

/**
 * Print an error response and exit with the code for its category
 */
export function exitWithError(error: unknown, phase: string): never {
  const wrapped = toSchemawrightError(error);
  logger.debug("Command failed", { code: wrapped.code, message: wrapped.message });
  console.error(JSON.stringify(wrapped.toResponse(phase), null, 2));
  process.exit(exitCodeFor(wrapped));
}
