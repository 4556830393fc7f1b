/**
 * Synthesizer module types
 */

import type { Entity } from "../../types/schema.js";
import type { DatabaseDialect } from "../../types/config.js";

/**
 * Relative file path → file content, in emission order
 */
export type SynthesisOutput = Map<string, string>;

export interface SynthesizerOptions {
  apiPrefix?: string;
  defaultPageSize?: number;
  maxPageSize?: number;
  databaseDialect?: DatabaseDialect;
  packageName?: string;
}

export type ResolvedSynthesizerOptions = Required<Omit<SynthesizerOptions, "packageName">> & {
  packageName: string;
};

export type KeyGeneration = "increment" | "uuid" | null;

/**
 * How one data-type tag is rendered in the generated project
 */
export interface TypeMapping {
  tsType: string;
  sequelizeType: string;
  textual: boolean; // included in text search
  acceptsLength: boolean; // rendered as TYPE(maxLength) when a length is declared
  keyGeneration: KeyGeneration; // how a sole primary key of this type is generated
}

/**
 * One column of a generated model
 */
export interface FieldPlan {
  name: string;
  tsType: string;
  columnOptions: string[]; // "key: value" entries of the column definition
  optionalOnCreate: boolean;
  implicit: boolean;
}

/**
 * Everything the templates need to know about one entity
 */
export interface EntityPlan {
  entity: Entity;
  typeName: string;
  variableName: string;
  storageName: string;
  fields: FieldPlan[];
  primaryKeys: string[];
  requiredFields: string[];
  searchableFields: string[];
  indexedFields: string[]; // foreign-key columns not already covered by a key or unique index
}
