/**
 * Normalizer module - maps a raw document onto the canonical schema IR
 *
 * Coercion only: unknown type tags and relationship kinds fall back to defaults,
 * and nothing is rejected for semantic reasons.
 */

import {
  Attribute,
  Entity,
  RawDocument,
  Relationship,
  Schema,
  isPlainObject,
} from "../../types/schema.js";
import { Result, err, ok } from "../../types/result.js";
import { NormalizationError } from "../../utils/errors.js";
import {
  coerceBoolean,
  coerceDataType,
  coerceDefaultValue,
  coerceOptionalNumber,
  coerceOptionalString,
  coerceRelationshipKind,
  coerceString,
} from "./type-mappers.js";

export * from "./types.js";
export * from "./type-mappers.js";
export * from "./wire.js";

/**
 * Read the first key present among snake_case / camelCase spellings
 */
function pick(source: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (key in source && source[key] !== undefined) {
      return source[key];
    }
  }
  return undefined;
}

function asRecord(value: unknown): Record<string, unknown> {
  return isPlainObject(value) ? value : {};
}

/**
 * Normalize a single attribute
 */
export function normalizeAttribute(raw: unknown): Attribute {
  const source = asRecord(raw);

  const attribute: Attribute = {
    name: coerceString(pick(source, "name")),
    dataType: coerceDataType(pick(source, "data_type", "dataType", "type")),
    isPrimaryKey: coerceBoolean(pick(source, "is_primary_key", "isPrimaryKey"), false),
    isForeignKey: coerceBoolean(pick(source, "is_foreign_key", "isForeignKey"), false),
    isNullable: coerceBoolean(pick(source, "is_nullable", "isNullable"), true),
    isUnique: coerceBoolean(pick(source, "is_unique", "isUnique"), false),
  };

  const maxLength = coerceOptionalNumber(pick(source, "max_length", "maxLength"));
  if (maxLength !== undefined) attribute.maxLength = maxLength;

  const defaultValue = coerceDefaultValue(pick(source, "default_value", "defaultValue"));
  if (defaultValue !== undefined) attribute.defaultValue = defaultValue;

  const referencesTable = coerceOptionalString(
    pick(source, "references_table", "referencesTable"),
  );
  if (referencesTable !== undefined) attribute.referencesTable = referencesTable;

  const referencesColumn = coerceOptionalString(
    pick(source, "references_column", "referencesColumn"),
  );
  if (referencesColumn !== undefined) attribute.referencesColumn = referencesColumn;

  return attribute;
}

/**
 * Normalize a single entity; a missing attribute list becomes empty
 */
export function normalizeEntity(raw: unknown): Entity {
  const source = asRecord(raw);
  const rawAttributes = pick(source, "attributes");

  const entity: Entity = {
    name: coerceString(pick(source, "name")),
    attributes: Array.isArray(rawAttributes)
      ? rawAttributes.map((attribute) => normalizeAttribute(attribute))
      : [],
  };

  const tableName = coerceOptionalString(pick(source, "table_name", "tableName"));
  if (tableName !== undefined) entity.tableName = tableName;

  return entity;
}

/**
 * Normalize a single relationship
 */
export function normalizeRelationship(raw: unknown): Relationship {
  const source = asRecord(raw);

  const relationship: Relationship = {
    sourceEntity: coerceString(pick(source, "source_entity", "sourceEntity")),
    targetEntity: coerceString(pick(source, "target_entity", "targetEntity")),
    relationshipType: coerceRelationshipKind(
      pick(source, "relationship_type", "relationshipType"),
    ),
  };

  const name = coerceOptionalString(pick(source, "name"));
  if (name !== undefined) relationship.name = name;

  const sourceCardinality = coerceOptionalString(
    pick(source, "source_cardinality", "sourceCardinality"),
  );
  if (sourceCardinality !== undefined) relationship.sourceCardinality = sourceCardinality;

  const targetCardinality = coerceOptionalString(
    pick(source, "target_cardinality", "targetCardinality"),
  );
  if (targetCardinality !== undefined) relationship.targetCardinality = targetCardinality;

  return relationship;
}

/**
 * Normalize a raw document into a Schema
 */
export function normalizeDocument(
  document: RawDocument,
): Result<Schema, NormalizationError> {
  const rawEntities = pick(document, "entities");
  if (rawEntities === undefined || rawEntities === null) {
    return err(new NormalizationError("Document has no entities array"));
  }
  if (!Array.isArray(rawEntities)) {
    return err(
      new NormalizationError("Document field 'entities' must be an array", {
        actualType: typeof rawEntities,
      }),
    );
  }

  const rawRelationships = pick(document, "relationships");
  if (
    rawRelationships !== undefined &&
    rawRelationships !== null &&
    !Array.isArray(rawRelationships)
  ) {
    return err(
      new NormalizationError("Document field 'relationships' must be an array", {
        actualType: typeof rawRelationships,
      }),
    );
  }

  const rawMetadata = pick(document, "metadata");

  return ok({
    projectName: coerceOptionalString(pick(document, "project_name", "projectName")) ?? null,
    entities: rawEntities.map((entity) => normalizeEntity(entity)),
    relationships: Array.isArray(rawRelationships)
      ? rawRelationships.map((relationship) => normalizeRelationship(relationship))
      : [],
    metadata: isPlainObject(rawMetadata) ? { ...rawMetadata } : {},
  });
}
