/**
 * Intake module - turns a free-text collaborator response into a raw document
 */

import {
  ANALYSIS_TIMESTAMP_KEY,
  RawDocument,
  isPlainObject,
} from "../../types/schema.js";
import { Result, err, ok } from "../../types/result.js";
import { IntakeParseError } from "../../utils/errors.js";
import { applyRepairs } from "./repair.js";
import type { IntakeOptions, IntakeResult } from "./types.js";

export * from "./types.js";
export * from "./repair.js";
export * from "./prompt.js";

/**
 * Take the span from the first "{" to the last "}" as the JSON candidate
 */
export function extractJsonCandidate(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");

  if (start === -1 || end === -1 || end < start) {
    return null;
  }
  return text.slice(start, end + 1);
}

function tryParse(
  candidate: string,
): { parsed: true; value: unknown } | { parsed: false; error: unknown } {
  try {
    return { parsed: true, value: JSON.parse(candidate) };
  } catch (error) {
    return { parsed: false, error };
  }
}

function stampTimestamp(value: Record<string, unknown>, now: Date): RawDocument {
  const metadata = isPlainObject(value.metadata) ? value.metadata : {};
  return {
    ...value,
    metadata: { ...metadata, [ANALYSIS_TIMESTAMP_KEY]: now.toISOString() },
  };
}

/**
 * Parse collaborator text into a RawDocument.
 * One strict parse, then one repaired parse; never more.
 */
export function parseResponse(
  text: string,
  options: IntakeOptions = {},
): Result<IntakeResult, IntakeParseError> {
  const now = options.now ?? (() => new Date());

  const candidate = extractJsonCandidate(text);
  if (candidate === null) {
    return err(
      new IntakeParseError("No JSON object found in response", {
        length: text.length,
      }),
    );
  }

  let attempt = tryParse(candidate);
  let appliedRepairs: IntakeResult["appliedRepairs"] = [];

  if (!attempt.parsed) {
    const repaired = applyRepairs(candidate);
    appliedRepairs = repaired.applied;
    attempt = tryParse(repaired.text);

    if (!attempt.parsed) {
      const reason =
        attempt.error instanceof Error ? attempt.error.message : String(attempt.error);
      return err(
        new IntakeParseError(
          `Invalid JSON in response: ${reason}`,
          { appliedRepairs, excerpt: candidate.substring(0, 100) },
          { cause: attempt.error },
        ),
      );
    }
  }

  if (!isPlainObject(attempt.value)) {
    return err(new IntakeParseError("Response JSON is not an object"));
  }

  return ok({
    document: stampTimestamp(attempt.value, now()),
    repaired: appliedRepairs.length > 0,
    appliedRepairs,
  });
}
