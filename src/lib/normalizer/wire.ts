/**
 * Serialization of the IR to the canonical wire document
 */

import type { Attribute, Entity, Relationship, Schema } from "../../types/schema.js";
import type {
  AttributeDocument,
  EntityDocument,
  RelationshipDocument,
  SchemaDocument,
} from "./types.js";

function attributeToWire(attribute: Attribute): AttributeDocument {
  return {
    name: attribute.name,
    dataType: attribute.dataType,
    isPrimaryKey: attribute.isPrimaryKey,
    isForeignKey: attribute.isForeignKey,
    isNullable: attribute.isNullable,
    isUnique: attribute.isUnique,
    ...(attribute.maxLength !== undefined ? { maxLength: attribute.maxLength } : {}),
    ...(attribute.defaultValue !== undefined
      ? { defaultValue: attribute.defaultValue }
      : {}),
    ...(attribute.referencesTable !== undefined
      ? { referencesTable: attribute.referencesTable }
      : {}),
    ...(attribute.referencesColumn !== undefined
      ? { referencesColumn: attribute.referencesColumn }
      : {}),
  };
}

function entityToWire(entity: Entity): EntityDocument {
  return {
    name: entity.name,
    attributes: entity.attributes.map(attributeToWire),
    ...(entity.tableName !== undefined ? { tableName: entity.tableName } : {}),
  };
}

function relationshipToWire(relationship: Relationship): RelationshipDocument {
  return {
    ...(relationship.name !== undefined ? { name: relationship.name } : {}),
    sourceEntity: relationship.sourceEntity,
    targetEntity: relationship.targetEntity,
    relationshipType: relationship.relationshipType,
    ...(relationship.sourceCardinality !== undefined
      ? { sourceCardinality: relationship.sourceCardinality }
      : {}),
    ...(relationship.targetCardinality !== undefined
      ? { targetCardinality: relationship.targetCardinality }
      : {}),
  };
}

/**
 * Convert a Schema into its JSON-serializable wire document
 */
export function toWireDocument(schema: Schema): SchemaDocument {
  return {
    projectName: schema.projectName,
    entities: schema.entities.map(entityToWire),
    relationships: schema.relationships.map(relationshipToWire),
    metadata: { ...schema.metadata },
  };
}

/**
 * Deterministic JSON text for hashing: object keys sorted at every depth
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`)
      .join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}
