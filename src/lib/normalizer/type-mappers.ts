/**
 * Coercion of loosely-typed upstream values into closed IR tags and primitives
 */

import {
  BaseCardinality,
  DATA_TYPES,
  DEFAULT_DATA_TYPE,
  DEFAULT_RELATIONSHIP_KIND,
  DataType,
  DefaultValue,
  RELATIONSHIP_KINDS,
  RelationshipKind,
} from "../../types/schema.js";

const DATA_TYPE_LOOKUP = new Map<string, DataType>(
  DATA_TYPES.map((type) => [type, type]),
);

function kindKey(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, " ").replace(/\(\s+/g, "(").replace(/\s+\)/g, ")");
}

const RELATIONSHIP_KIND_LOOKUP = new Map<string, RelationshipKind>(
  RELATIONSHIP_KINDS.map((kind) => [kindKey(kind), kind]),
);

// "one to many", "One_To_Many" → "one-to-many"
const NATURAL_LANGUAGE_KIND = /^(one|many)[\s_-]+to[\s_-]+(one|many)$/;

/**
 * Match a declared type case-insensitively; anything unknown becomes "string"
 */
export function coerceDataType(value: unknown): DataType {
  if (typeof value !== "string") {
    return DEFAULT_DATA_TYPE;
  }
  return DATA_TYPE_LOOKUP.get(value.trim().toLowerCase()) ?? DEFAULT_DATA_TYPE;
}

/**
 * Match a declared relationship kind; anything unknown becomes "1:N"
 */
export function coerceRelationshipKind(value: unknown): RelationshipKind {
  if (typeof value !== "string") {
    return DEFAULT_RELATIONSHIP_KIND;
  }

  const key = kindKey(value);
  const direct = RELATIONSHIP_KIND_LOOKUP.get(key);
  if (direct) {
    return direct;
  }

  const natural = NATURAL_LANGUAGE_KIND.exec(key);
  if (natural) {
    return RELATIONSHIP_KIND_LOOKUP.get(`${natural[1]}-to-${natural[2]}`) ?? DEFAULT_RELATIONSHIP_KIND;
  }

  return DEFAULT_RELATIONSHIP_KIND;
}

/**
 * Fold every relationship kind onto its base cardinality
 */
export function baseCardinality(kind: RelationshipKind): BaseCardinality {
  switch (kind) {
    case "1:1":
    case "1:1 (Identifying)":
    case "1:1 (Non-Identifying)":
    case "one-to-one":
      return "1:1";
    case "1:N":
    case "1:N (Identifying)":
    case "1:N (Non-Identifying)":
    case "1:N (Optional)":
    case "1:N (Required)":
    case "1:M":
    case "one-to-many":
      return "1:N";
    case "N:1":
    case "N:1 (Identifying)":
    case "N:1 (Non-Identifying)":
    case "N:1 (Optional)":
    case "N:1 (Required)":
    case "M:1":
    case "many-to-one":
      return "N:1";
    case "M:N":
    case "M:N (Identifying)":
    case "M:N (Non-Identifying)":
    case "N:N":
    case "M:M":
    case "many-to-many":
      return "M:N";
  }
}

export function coerceString(value: unknown): string {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}

/**
 * Optional string: null, undefined and blank strings are absent
 */
export function coerceOptionalString(value: unknown): string | undefined {
  const coerced = coerceString(value);
  return coerced === "" ? undefined : coerced;
}

export function coerceBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (lowered === "true") return true;
    if (lowered === "false") return false;
  }
  return fallback;
}

/**
 * Numbers and numeric strings pass; anything else is absent.
 * Range checks belong to the validator.
 */
export function coerceOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function coerceDefaultValue(value: unknown): DefaultValue | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return JSON.stringify(value);
}
