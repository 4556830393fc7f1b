/**
 * Configuration loader: CLI flags > config file > defaults
 */

import {
  type CompilerConfig,
  type CompilerConfigFile,
  DEFAULT_COMPILER_CONFIG,
  isDatabaseDialect,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Flags the CLI can set; every one is optional
 */
export interface CompilerCliOptions {
  allowSelfReferences?: boolean;
  apiPrefix?: string;
  pageSize?: number;
  maxPageSize?: number;
  dialect?: string;
  packageName?: string;
  outputDir?: string;
}

/**
 * Load compiler configuration from CLI options and config file
 *
 * @example
 * const config = loadCompilerConfig({ pageSize: 50 }, { synthesis: { defaultPageSize: 25 } });
 * // config.synthesis.defaultPageSize === 50 (CLI takes precedence)
 */
export function loadCompilerConfig(
  cliOptions: CompilerCliOptions = {},
  configFile: CompilerConfigFile = {},
): CompilerConfig {
  const defaults = DEFAULT_COMPILER_CONFIG;
  const fileSynthesis = configFile.synthesis ?? {};

  const dialect = cliOptions.dialect ?? fileSynthesis.databaseDialect ?? defaults.synthesis.databaseDialect;
  if (!isDatabaseDialect(dialect)) {
    throw new ConfigError(`Unsupported database dialect: ${dialect}`, {
      dialect,
    });
  }

  const packageName = cliOptions.packageName ?? fileSynthesis.packageName;
  const outputDir = cliOptions.outputDir ?? configFile.output?.dir;

  const config: CompilerConfig = {
    validation: {
      allowSelfReferences:
        cliOptions.allowSelfReferences ??
        configFile.validation?.allowSelfReferences ??
        defaults.validation.allowSelfReferences,
    },
    synthesis: {
      apiPrefix: cliOptions.apiPrefix ?? fileSynthesis.apiPrefix ?? defaults.synthesis.apiPrefix,
      defaultPageSize:
        cliOptions.pageSize ?? fileSynthesis.defaultPageSize ?? defaults.synthesis.defaultPageSize,
      maxPageSize:
        cliOptions.maxPageSize ?? fileSynthesis.maxPageSize ?? defaults.synthesis.maxPageSize,
      databaseDialect: dialect,
      ...(packageName !== undefined ? { packageName } : {}),
    },
    output: outputDir !== undefined ? { dir: outputDir } : {},
  };

  validateCompilerConfig(config);

  logger.debug("Compiler config loaded", {
    allowSelfReferences: config.validation.allowSelfReferences,
    apiPrefix: config.synthesis.apiPrefix,
    databaseDialect: config.synthesis.databaseDialect,
  });

  return config;
}

/**
 * Validate a merged compiler configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateCompilerConfig(config: CompilerConfig): void {
  const { apiPrefix, defaultPageSize, maxPageSize, databaseDialect, packageName } =
    config.synthesis;

  if (!apiPrefix.startsWith("/")) {
    throw new ConfigError(`API prefix must start with "/", got ${apiPrefix}`);
  }

  for (const [name, value] of [
    ["defaultPageSize", defaultPageSize],
    ["maxPageSize", maxPageSize],
  ] as const) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${name} must be a positive integer, got ${value}`);
    }
  }

  if (defaultPageSize > maxPageSize) {
    throw new ConfigError(
      `defaultPageSize (${defaultPageSize}) must not exceed maxPageSize (${maxPageSize})`,
    );
  }

  if (!isDatabaseDialect(databaseDialect)) {
    throw new ConfigError(`Unsupported database dialect: ${String(databaseDialect)}`);
  }

  if (packageName !== undefined && !/^(@[a-z0-9-~][a-z0-9-._~]*\/)?[a-z0-9-~][a-z0-9-._~]*$/.test(packageName)) {
    throw new ConfigError(`Invalid package name: ${packageName}`);
  }
}
