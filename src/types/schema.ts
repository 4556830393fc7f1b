/**
 * Core schema types for Schemawright
 * These structures flow through the pipeline: intake → normalization → reconciliation → validation → synthesis
 *
 * The interfaces double as the canonical wire contract: a Schema is plain JSON-serializable data.
 */

/**
 * Closed set of attribute type tags. `uuid` is the identifier type.
 */
export const DATA_TYPES = [
  "string",
  "integer",
  "float",
  "boolean",
  "date",
  "datetime",
  "text",
  "json",
  "uuid",
  "decimal",
  "enum",
  "array",
  "time",
  "blob",
  "binary",
  "char",
  "varchar",
  "longtext",
  "tinyint",
  "smallint",
  "bigint",
  "double",
  "real",
  "timestamp",
  "year",
  "set",
] as const;

export type DataType = (typeof DATA_TYPES)[number];

/**
 * Closed set of relationship kinds, including the variants the upstream service is known to emit
 */
export const RELATIONSHIP_KINDS = [
  "1:1",
  "1:N",
  "N:1",
  "M:N",
  "1:N (Identifying)",
  "1:N (Non-Identifying)",
  "N:1 (Identifying)",
  "N:1 (Non-Identifying)",
  "1:1 (Identifying)",
  "1:1 (Non-Identifying)",
  "M:N (Identifying)",
  "M:N (Non-Identifying)",
  "1:N (Optional)",
  "1:N (Required)",
  "N:1 (Optional)",
  "N:1 (Required)",
  "N:N",
  "M:1",
  "1:M",
  "M:M",
  "one-to-one",
  "one-to-many",
  "many-to-one",
  "many-to-many",
] as const;

export type RelationshipKind = (typeof RELATIONSHIP_KINDS)[number];

/** Cardinality every relationship kind folds onto */
export type BaseCardinality = "1:1" | "1:N" | "N:1" | "M:N";

export const DEFAULT_DATA_TYPE: DataType = "string";
export const DEFAULT_RELATIONSHIP_KIND: RelationshipKind = "1:N";

export type DefaultValue = string | number | boolean;

export interface Attribute {
  name: string;
  dataType: DataType;
  isPrimaryKey: boolean;
  isForeignKey: boolean;
  isNullable: boolean;
  isUnique: boolean;
  maxLength?: number;
  defaultValue?: DefaultValue;
  referencesTable?: string; // referenced entity name
  referencesColumn?: string; // referenced attribute name
}

export interface Entity {
  name: string;
  attributes: Attribute[];
  tableName?: string; // explicit storage name override
}

export interface Relationship {
  name?: string;
  sourceEntity: string;
  targetEntity: string;
  relationshipType: RelationshipKind;
  sourceCardinality?: string;
  targetCardinality?: string;
}

export type SchemaMetadata = Record<string, unknown>;

/**
 * Schema - the intermediate representation. Entity order is meaningful:
 * the first entity is treated as the primary one wherever a default is needed.
 */
export interface Schema {
  projectName: string | null;
  entities: Entity[];
  relationships: Relationship[];
  metadata: SchemaMetadata;
}

/**
 * RawDocument - untyped tree produced by best-effort parsing of upstream text
 */
export type RawDocument = Record<string, unknown>;

/** Metadata key the intake parser stamps */
export const ANALYSIS_TIMESTAMP_KEY = "analysisTimestamp";

export function isDataType(value: unknown): value is DataType {
  return typeof value === "string" && DATA_TYPES.some((type) => type === value);
}

export function isRelationshipKind(value: unknown): value is RelationshipKind {
  return (
    typeof value === "string" && RELATIONSHIP_KINDS.some((kind) => kind === value)
  );
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
