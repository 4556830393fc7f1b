/**
 * The single type-mapping table, keyed by every data-type tag
 */

import type { DataType } from "../../types/schema.js";
import { SynthesisError } from "../../utils/errors.js";
import type { TypeMapping } from "./types.js";

export const TYPE_MAPPINGS = {
  string: { tsType: "string", sequelizeType: "DataTypes.STRING", textual: true, acceptsLength: true, keyGeneration: null },
  integer: { tsType: "number", sequelizeType: "DataTypes.INTEGER", textual: false, acceptsLength: false, keyGeneration: "increment" },
  float: { tsType: "number", sequelizeType: "DataTypes.FLOAT", textual: false, acceptsLength: false, keyGeneration: null },
  boolean: { tsType: "boolean", sequelizeType: "DataTypes.BOOLEAN", textual: false, acceptsLength: false, keyGeneration: null },
  date: { tsType: "string", sequelizeType: "DataTypes.DATEONLY", textual: false, acceptsLength: false, keyGeneration: null },
  datetime: { tsType: "Date", sequelizeType: "DataTypes.DATE", textual: false, acceptsLength: false, keyGeneration: null },
  text: { tsType: "string", sequelizeType: "DataTypes.TEXT", textual: true, acceptsLength: false, keyGeneration: null },
  json: { tsType: "Record<string, unknown>", sequelizeType: "DataTypes.JSON", textual: false, acceptsLength: false, keyGeneration: null },
  uuid: { tsType: "string", sequelizeType: "DataTypes.UUID", textual: false, acceptsLength: false, keyGeneration: "uuid" },
  decimal: { tsType: "string", sequelizeType: "DataTypes.DECIMAL", textual: false, acceptsLength: false, keyGeneration: null },
  enum: { tsType: "string", sequelizeType: "DataTypes.STRING", textual: false, acceptsLength: true, keyGeneration: null },
  array: { tsType: "unknown[]", sequelizeType: "DataTypes.JSON", textual: false, acceptsLength: false, keyGeneration: null },
  time: { tsType: "string", sequelizeType: "DataTypes.TIME", textual: false, acceptsLength: false, keyGeneration: null },
  blob: { tsType: "Buffer", sequelizeType: "DataTypes.BLOB", textual: false, acceptsLength: false, keyGeneration: null },
  binary: { tsType: "Buffer", sequelizeType: "DataTypes.BLOB", textual: false, acceptsLength: false, keyGeneration: null },
  char: { tsType: "string", sequelizeType: "DataTypes.CHAR", textual: true, acceptsLength: true, keyGeneration: null },
  varchar: { tsType: "string", sequelizeType: "DataTypes.STRING", textual: true, acceptsLength: true, keyGeneration: null },
  longtext: { tsType: "string", sequelizeType: "DataTypes.TEXT('long')", textual: true, acceptsLength: false, keyGeneration: null },
  tinyint: { tsType: "number", sequelizeType: "DataTypes.TINYINT", textual: false, acceptsLength: false, keyGeneration: "increment" },
  smallint: { tsType: "number", sequelizeType: "DataTypes.SMALLINT", textual: false, acceptsLength: false, keyGeneration: "increment" },
  bigint: { tsType: "number", sequelizeType: "DataTypes.BIGINT", textual: false, acceptsLength: false, keyGeneration: "increment" },
  double: { tsType: "number", sequelizeType: "DataTypes.DOUBLE", textual: false, acceptsLength: false, keyGeneration: null },
  real: { tsType: "number", sequelizeType: "DataTypes.REAL", textual: false, acceptsLength: false, keyGeneration: null },
  timestamp: { tsType: "Date", sequelizeType: "DataTypes.DATE", textual: false, acceptsLength: false, keyGeneration: null },
  year: { tsType: "number", sequelizeType: "DataTypes.INTEGER", textual: false, acceptsLength: false, keyGeneration: null },
  set: { tsType: "string", sequelizeType: "DataTypes.STRING", textual: false, acceptsLength: true, keyGeneration: null },
} as const satisfies Record<DataType, TypeMapping>;

/**
 * Look up a tag's mapping. A miss means the table and the tag set disagree.
 */
export function lookupTypeMapping(dataType: DataType): TypeMapping {
  const mapping: TypeMapping | undefined = Object.prototype.hasOwnProperty.call(
    TYPE_MAPPINGS,
    dataType,
  )
    ? TYPE_MAPPINGS[dataType]
    : undefined;

  if (!mapping) {
    throw new SynthesisError(`No type mapping for data type: ${String(dataType)}`, {
      dataType,
    });
  }
  return mapping;
}
