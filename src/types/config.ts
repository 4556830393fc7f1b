/**
 * Configuration types for Schemawright
 */

import type { LogLevel } from "../utils/logger.js";

export const DATABASE_DIALECTS = ["postgres", "mysql", "sqlite"] as const;

export type DatabaseDialect = (typeof DATABASE_DIALECTS)[number];

/**
 * ValidationConfig - validator policy switches
 */
export interface ValidationConfig {
  allowSelfReferences: boolean; // downgrade self-referencing relationships to a warning
}

/**
 * SynthesisConfig - shape of the generated service project
 */
export interface SynthesisConfig {
  apiPrefix: string; // e.g. "/api"
  defaultPageSize: number;
  maxPageSize: number;
  databaseDialect: DatabaseDialect;
  packageName?: string; // overrides the name derived from the project name
}

/**
 * OutputConfig - where generated files are written
 */
export interface OutputConfig {
  dir?: string; // a fresh scratch directory is used when absent
}

export interface CompilerConfig {
  validation: ValidationConfig;
  synthesis: SynthesisConfig;
  output: OutputConfig;
}

/**
 * Config file shape (JSON or YAML); every section is optional
 */
export interface CompilerConfigFile {
  logLevel?: LogLevel;
  validation?: Partial<ValidationConfig>;
  synthesis?: Partial<SynthesisConfig>;
  output?: Partial<OutputConfig>;
}

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  validation: {
    allowSelfReferences: false,
  },
  synthesis: {
    apiPrefix: "/api",
    defaultPageSize: 20,
    maxPageSize: 100,
    databaseDialect: "postgres",
  },
  output: {},
};

export function isDatabaseDialect(value: unknown): value is DatabaseDialect {
  return (
    typeof value === "string" && DATABASE_DIALECTS.some((dialect) => dialect === value)
  );
}
