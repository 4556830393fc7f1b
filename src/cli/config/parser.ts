/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { Ajv, type ErrorObject } from "ajv";
import { parse as parseYaml } from "yaml";
import type { CompilerConfigFile } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { CONFIG_FILE_SCHEMA } from "./schema.js";

const ajv = new Ajv({ allErrors: true });
const validateConfigShape = ajv.compile<CompilerConfigFile>(CONFIG_FILE_SCHEMA);

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const path =
      error.keyword === "additionalProperties" && "additionalProperty" in error.params
        ? `${error.instancePath}/${String(error.params.additionalProperty)}`
        : error.instancePath || "/";
    return `${path}: ${error.message ?? error.keyword}`;
  });
}

/**
 * Check parsed config content against the config file schema
 */
export function validateConfigFile(content: unknown, source = "config"): CompilerConfigFile {
  // An empty YAML document parses to null
  const candidate = content ?? {};
  if (!validateConfigShape(candidate)) {
    throw new ConfigError(`Invalid config file: ${source}`, {
      errors: describeErrors(validateConfigShape.errors),
    });
  }
  return candidate;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): CompilerConfigFile {
  logger.debug("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = validateConfigFile(parsed, filePath);
  logger.debug("Configuration file parsed successfully", {
    hasValidationConfig: config.validation !== undefined,
    hasSynthesisConfig: config.synthesis !== undefined,
    hasOutputConfig: config.output !== undefined,
  });
  return config;
}
