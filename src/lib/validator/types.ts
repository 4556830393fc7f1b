/**
 * Validator module types
 */

export type ValidationPhase = "structural" | "semantic";

export enum DiagnosticCode {
  NO_ENTITIES = "NO_ENTITIES",
  ENTITY_NAME_REQUIRED = "ENTITY_NAME_REQUIRED",
  ENTITY_WITHOUT_ATTRIBUTES = "ENTITY_WITHOUT_ATTRIBUTES",
  ATTRIBUTE_NAME_REQUIRED = "ATTRIBUTE_NAME_REQUIRED",
  INVALID_DATA_TYPE = "INVALID_DATA_TYPE",
  INVALID_MAX_LENGTH = "INVALID_MAX_LENGTH",
  RELATIONSHIP_SOURCE_REQUIRED = "RELATIONSHIP_SOURCE_REQUIRED",
  RELATIONSHIP_TARGET_REQUIRED = "RELATIONSHIP_TARGET_REQUIRED",
  INVALID_RELATIONSHIP_KIND = "INVALID_RELATIONSHIP_KIND",
  DUPLICATE_ENTITY = "DUPLICATE_ENTITY",
  DUPLICATE_ATTRIBUTE = "DUPLICATE_ATTRIBUTE",
  SELF_REFERENCE = "SELF_REFERENCE",
  DANGLING_REFERENCE = "DANGLING_REFERENCE",
  IDENTIFIER_COLLISION = "IDENTIFIER_COLLISION",
  UNUSABLE_IDENTIFIER = "UNUSABLE_IDENTIFIER",
  INVALID_TABLE_NAME = "INVALID_TABLE_NAME",
  MISSING_PRIMARY_KEY = "MISSING_PRIMARY_KEY",
  UNRELATED_ENTITY = "UNRELATED_ENTITY",
  UNKNOWN_RELATIONSHIP_ENTITY = "UNKNOWN_RELATIONSHIP_ENTITY",
  FOREIGN_KEY_WITHOUT_TARGET = "FOREIGN_KEY_WITHOUT_TARGET",
}

/**
 * One finding, with an optional locator into the schema
 */
export interface Diagnostic {
  code: DiagnosticCode;
  phase: ValidationPhase;
  message: string;
  entity?: string;
  attribute?: string;
  relationship?: number; // 1-based position in the relationships list
}

export interface ValidationResult {
  readonly errors: readonly Diagnostic[];
  readonly warnings: readonly Diagnostic[];
}

export interface ValidatorOptions {
  allowSelfReferences?: boolean;
}

export interface SchemaStatistics {
  entityCount: number;
  relationshipCount: number;
  totalAttributes: number;
  primaryKeyCount: number;
  foreignKeyCount: number;
  averageAttributesPerEntity: number;
}

/**
 * Sink the two validation phases write into
 */
export interface DiagnosticCollector {
  error(diagnostic: Omit<Diagnostic, "phase">): void;
  warn(diagnostic: Omit<Diagnostic, "phase">): void;
}
