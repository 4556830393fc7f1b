/**
 * Bounded JSON repair transforms
 *
 * Each transform runs once per intake call, in REPAIR_SEQUENCE order. None of them is
 * string-aware: single-quote normalization can corrupt prose containing apostrophes,
 * and such damage is left for validation to surface.
 */

import type { RepairTransform } from "./types.js";

const TRAILING_COMMA = /,(\s*[}\]])/g;
const BARE_KEY = /([{,]\s*)([A-Za-z_$][\w$]*)(\s*:)/g;
const SINGLE_QUOTED = /'((?:[^'\\]|\\.)*)'/g;

/**
 * Remove a comma that directly precedes a closing brace or bracket
 */
export function stripTrailingCommas(text: string): string {
  return text.replace(TRAILING_COMMA, "$1");
}

/**
 * Quote identifier-like object keys: {name: 1} → {"name": 1}
 */
export function quoteBareKeys(text: string): string {
  return text.replace(BARE_KEY, '$1"$2"$3');
}

/**
 * Rewrite 'literal' as "literal", escaping embedded double quotes
 */
export function normalizeSingleQuotes(text: string): string {
  return text.replace(SINGLE_QUOTED, (_match, body: string) => {
    let converted = "";
    for (let i = 0; i < body.length; i++) {
      const ch = body.charAt(i);
      if (ch === "\\" && i + 1 < body.length) {
        const next = body.charAt(i + 1);
        converted += next === "'" ? "'" : ch + next;
        i++;
      } else if (ch === '"') {
        converted += '\\"';
      } else {
        converted += ch;
      }
    }
    return `"${converted}"`;
  });
}

export const REPAIR_SEQUENCE: ReadonlyArray<{
  name: RepairTransform;
  apply: (text: string) => string;
}> = [
  { name: "trailing-commas", apply: stripTrailingCommas },
  { name: "bare-keys", apply: quoteBareKeys },
  { name: "single-quotes", apply: normalizeSingleQuotes },
];

/**
 * Apply every repair transform exactly once, in order
 */
export function applyRepairs(text: string): {
  text: string;
  applied: RepairTransform[];
} {
  let current = text;
  const applied: RepairTransform[] = [];

  for (const transform of REPAIR_SEQUENCE) {
    const next = transform.apply(current);
    if (next !== current) {
      applied.push(transform.name);
      current = next;
    }
  }

  return { text: current, applied };
}
