/**
 * Normalizer module types
 */

import type { DefaultValue } from "../../types/schema.js";

/**
 * Wire form of an attribute (canonical IR contract)
 */
export interface AttributeDocument {
  name: string;
  dataType: string;
  isPrimaryKey: boolean;
  isForeignKey: boolean;
  isNullable: boolean;
  isUnique: boolean;
  maxLength?: number;
  defaultValue?: DefaultValue;
  referencesTable?: string;
  referencesColumn?: string;
}

export interface EntityDocument {
  name: string;
  attributes: AttributeDocument[];
  tableName?: string;
}

export interface RelationshipDocument {
  name?: string;
  sourceEntity: string;
  targetEntity: string;
  relationshipType: string;
  sourceCardinality?: string;
  targetCardinality?: string;
}

export interface SchemaDocument {
  projectName: string | null;
  entities: EntityDocument[];
  relationships: RelationshipDocument[];
  metadata: Record<string, unknown>;
}
