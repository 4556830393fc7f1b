/**
 * Reporter module - Run reports for auditability and reproducibility
 */

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import type { Schema } from "../../types/schema.js";
import type { SynthesisOutput } from "../synthesizer/types.js";
import { canonicalJson, toWireDocument } from "../normalizer/wire.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { ArtifactDigest, ReporterOptions, RunReport } from "./types.js";

export type { ArtifactDigest, ReporterOptions, RunReport } from "./types.js";

export const TOOL_NAME = "schemawright";
export const TOOL_VERSION = "0.1.0";

export function hashText(text: string): string {
  return crypto.createHash("sha256").update(text, "utf-8").digest("hex");
}

/**
 * SHA-256 of the canonical wire document, metadata excluded so the intake timestamp does not
 * change the hash
 */
export function computeSchemaHash(schema: Schema): string {
  const { projectName, entities, relationships } = toWireDocument(schema);
  return hashText(canonicalJson({ projectName, entities, relationships }));
}

export function buildRunReport(
  schema: Schema,
  output: SynthesisOutput,
  options: ReporterOptions = {},
): RunReport {
  const now = options.now ?? (() => new Date());
  const version = options.version ?? TOOL_VERSION;

  const artifacts: Record<string, ArtifactDigest> = {};
  for (const [filePath, content] of output) {
    artifacts[filePath] = {
      hash: hashText(content),
      size: Buffer.byteLength(content, "utf-8"),
    };
  }

  return {
    version,
    tool: {
      name: TOOL_NAME,
      version,
    },
    run: {
      id: options.runId ?? crypto.randomBytes(8).toString("hex"),
      timestamp: now().toISOString(),
      phase: "synthesis",
    },
    schema: {
      projectName: schema.projectName,
      schemaHash: computeSchemaHash(schema),
      entityCount: schema.entities.length,
      relationshipCount: schema.relationships.length,
    },
    artifacts,
  };
}

/**
 * Save a run report as JSON
 */
export async function saveRunReport(report: RunReport, filePath: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(report, null, 2));
  } catch (error) {
    throw new FileIOError(`Failed to save run report: ${filePath}`, { path: filePath }, {
      cause: error,
    });
  }
  logger.info("Run report saved", { path: filePath });
}
