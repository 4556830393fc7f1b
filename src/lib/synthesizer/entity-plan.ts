/**
 * Per-entity model planning: field order, identity, create-time requirements and search columns
 */

import type { Attribute, DefaultValue, Entity } from "../../types/schema.js";
import { SynthesisError } from "../../utils/errors.js";
import {
  entityStorageName,
  entityTypeName,
  entityVariableName,
} from "../naming/index.js";
import { quote } from "./render.js";
import { lookupTypeMapping } from "./type-mapping.js";
import type { EntityPlan, FieldPlan, TypeMapping } from "./types.js";

export const IMPLICIT_ID = "id";
export const AUDIT_FIELDS = ["createdAt", "updatedAt"] as const;

const NOW_DEFAULTS = /^(now|now\(\)|current_timestamp(\(\))?|current_date(\(\))?)$/i;
// SQL functions that mint a v4 uuid
const UUID_DEFAULTS = /^(uuid_generate_v4|gen_random_uuid|uuid|newid)\(\)$/i;
const TEMPORAL_TYPES = new Set(["DataTypes.DATE", "DataTypes.DATEONLY"]);
const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Render a declared default as a Sequelize defaultValue expression
 */
export function renderDefaultValue(value: DefaultValue, mapping: TypeMapping): string {
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (TEMPORAL_TYPES.has(mapping.sequelizeType) && NOW_DEFAULTS.test(trimmed)) {
      return "DataTypes.NOW";
    }
    if (mapping.sequelizeType === "DataTypes.UUID" && UUID_DEFAULTS.test(trimmed)) {
      return "DataTypes.UUIDV4";
    }
  }
  if (mapping.tsType === "boolean") {
    if (typeof value === "boolean") {
      return String(value);
    }
    const lowered = String(value).trim().toLowerCase();
    if (lowered === "true" || lowered === "1") return "true";
    if (lowered === "false" || lowered === "0") return "false";
  }
  if (mapping.tsType === "number") {
    if (typeof value === "number") {
      return String(value);
    }
    if (typeof value === "string" && NUMERIC.test(value.trim())) {
      return value.trim();
    }
  }
  return quote(String(value));
}

function resolvePrimaryKeys(entity: Entity): string[] {
  const declared = entity.attributes.filter((attr) => attr.isPrimaryKey).map((attr) => attr.name);
  if (declared.length > 0) {
    return declared;
  }
  return entity.attributes.some((attr) => attr.name === IMPLICIT_ID) ? [IMPLICIT_ID] : [];
}

function referenceOption(attr: Attribute, entities: readonly Entity[]): string | null {
  if (!attr.isForeignKey || !attr.referencesTable || !attr.referencesColumn) {
    return null;
  }
  const column = attr.referencesColumn;
  const target = entities.find((entity) => entity.name === attr.referencesTable);
  if (!target || !target.attributes.some((candidate) => candidate.name === column)) {
    return null;
  }
  return `references: { model: ${quote(entityStorageName(target))}, key: ${quote(column)} }`;
}

function declaredField(
  attr: Attribute,
  primaryKeys: readonly string[],
  entities: readonly Entity[],
): FieldPlan {
  const mapping = lookupTypeMapping(attr.dataType);
  const isKey = primaryKeys.includes(attr.name);
  const generation = isKey && primaryKeys.length === 1 ? mapping.keyGeneration : null;
  const hasDefault = attr.defaultValue !== undefined;
  const nullable = attr.isNullable && !isKey;

  const type =
    mapping.acceptsLength && attr.maxLength !== undefined
      ? `${mapping.sequelizeType}(${attr.maxLength})`
      : mapping.sequelizeType;

  const columnOptions = [`type: ${type}`];
  if (isKey) columnOptions.push("primaryKey: true");
  if (generation === "increment") columnOptions.push("autoIncrement: true");
  if (generation === "uuid" && !hasDefault) columnOptions.push("defaultValue: DataTypes.UUIDV4");
  columnOptions.push(`allowNull: ${nullable}`);
  if (attr.isUnique && !isKey) columnOptions.push("unique: true");
  if (attr.defaultValue !== undefined) {
    columnOptions.push(`defaultValue: ${renderDefaultValue(attr.defaultValue, mapping)}`);
  }
  const references = referenceOption(attr, entities);
  if (references) columnOptions.push(references);

  return {
    name: attr.name,
    tsType: nullable ? `${mapping.tsType} | null` : mapping.tsType,
    columnOptions,
    optionalOnCreate: generation !== null || hasDefault || nullable,
    implicit: false,
  };
}

function implicitIdField(): FieldPlan {
  return {
    name: IMPLICIT_ID,
    tsType: "number",
    columnOptions: [
      "type: DataTypes.INTEGER",
      "primaryKey: true",
      "autoIncrement: true",
      "allowNull: false",
    ],
    optionalOnCreate: true,
    implicit: true,
  };
}

function auditField(name: string): FieldPlan {
  return {
    name,
    tsType: "Date",
    columnOptions: ["type: DataTypes.DATE", "allowNull: false", "defaultValue: DataTypes.NOW"],
    optionalOnCreate: true,
    implicit: true,
  };
}

/**
 * Build the model plan for one validated entity. `entities` is the whole schema's entity list,
 * used to resolve foreign-key targets.
 */
export function planEntity(entity: Entity, entities: readonly Entity[] = [entity]): EntityPlan {
  const typeName = entityTypeName(entity);
  const variableName = entityVariableName(entity);
  if (typeName === null || variableName === null) {
    throw new SynthesisError(`Entity ${entity.name} has no usable type name`, {
      entity: entity.name,
    });
  }

  const declaredKeys = resolvePrimaryKeys(entity);
  const primaryKeys = declaredKeys.length > 0 ? declaredKeys : [IMPLICIT_ID];

  const declared = entity.attributes.map((attr) =>
    declaredField(attr, primaryKeys, entities),
  );
  const fields: FieldPlan[] = [
    ...(declaredKeys.length === 0 ? [implicitIdField()] : []),
    ...declared,
    ...AUDIT_FIELDS.filter((name) => !entity.attributes.some((attr) => attr.name === name)).map(
      auditField,
    ),
  ];

  return {
    entity,
    typeName,
    variableName,
    storageName: entityStorageName(entity),
    fields,
    primaryKeys,
    requiredFields: declared.filter((field) => !field.optionalOnCreate).map((field) => field.name),
    searchableFields: entity.attributes
      .filter((attr) => lookupTypeMapping(attr.dataType).textual)
      .map((attr) => attr.name),
    indexedFields: entity.attributes
      .filter((attr) => attr.isForeignKey && !attr.isUnique && !primaryKeys.includes(attr.name))
      .map((attr) => attr.name),
  };
}
