/**
 * File tree writer - materializes a synthesis output under a directory
 */

import fs from "fs/promises";
import os from "os";
import path from "path";
import type { SynthesisOutput } from "../synthesizer/types.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { EmitterResult } from "./types.js";

export const SCRATCH_PREFIX = "schemawright-";

/**
 * Resolve a relative output path beneath `root`, refusing anything that would escape it
 */
export function resolveOutputPath(root: string, relativePath: string): string {
  if (
    relativePath.length === 0 ||
    path.isAbsolute(relativePath) ||
    relativePath.split(/[\\/]/).includes("..")
  ) {
    throw new FileIOError(`Refusing to write outside the output directory: ${relativePath}`, {
      path: relativePath,
    });
  }
  return path.join(root, relativePath);
}

/**
 * Allocate a fresh directory for one invocation's output
 */
export async function createScratchDirectory(): Promise<string> {
  try {
    return await fs.mkdtemp(path.join(os.tmpdir(), SCRATCH_PREFIX));
  } catch (error) {
    throw new FileIOError("Failed to create scratch directory", undefined, {
      cause: error,
    });
  }
}

export async function writeFileTree(
  output: SynthesisOutput,
  directory: string,
): Promise<EmitterResult> {
  const root = path.resolve(directory);
  // Resolve every path before touching the disk so a bad entry writes nothing
  const targets = [...output].map(
    ([relativePath, content]) => [resolveOutputPath(root, relativePath), content] as const,
  );

  const files: string[] = [];
  let bytes = 0;
  for (const [target, content] of targets) {
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, "utf-8");
    } catch (error) {
      throw new FileIOError(`Failed to write ${target}`, { path: target }, { cause: error });
    }
    files.push(target);
    bytes += Buffer.byteLength(content, "utf-8");
  }

  logger.debug("File tree written", { directory: root, files: files.length, bytes });
  return { directory: root, files, bytes };
}
