/**
 * Intake module types
 */

import type { RawDocument } from "../../types/schema.js";

export type RepairTransform = "trailing-commas" | "bare-keys" | "single-quotes";

export interface IntakeOptions {
  now?: () => Date; // clock used for the analysis timestamp
}

export interface IntakeResult {
  document: RawDocument;
  repaired: boolean;
  appliedRepairs: RepairTransform[]; // transforms that changed the candidate text
}

/**
 * External image-understanding collaborator: image and instruction in, free text out
 */
export interface DiagramAnalysisClient {
  analyze(image: Buffer, prompt: string): Promise<string>;
}
