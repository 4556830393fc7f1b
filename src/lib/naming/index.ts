/**
 * Naming conventions shared by validation and synthesis
 *
 * Code-facing names are PascalCase (types) or camelCase (values); storage-facing names are
 * snake_case. An entity's explicit tableName always wins over the derived storage name.
 */

import type { Entity } from "../../types/schema.js";

// Names the generated sources import or declare at module scope
const RESERVED_TYPE_NAMES = new Set([
  "Model",
  "DataTypes",
  "Optional",
  "Op",
  "WhereOptions",
  "Router",
  "Request",
  "Response",
  "NextFunction",
  "HttpError",
  "Page",
  "PageRequest",
  "Object",
  "Array",
  "String",
  "Number",
  "Boolean",
  "Date",
  "Error",
  "Promise",
]);

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Split a name into lower-case words on separators and case boundaries
 * "OrderLine" / "order_line" / "order line" → ["order", "line"]
 */
export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.toLowerCase());
}

export function toPascalCase(name: string): string {
  return splitWords(name)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}

export function toCamelCase(name: string): string {
  const pascal = toPascalCase(name);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

export function toSnakeCase(name: string): string {
  return splitWords(name).join("_");
}

export function toKebabCase(name: string): string {
  return splitWords(name).join("-");
}

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/**
 * Type (class) name used in generated code, or null when the name has no usable identifier
 */
export function entityTypeName(entity: Pick<Entity, "name">): string | null {
  const pascal = toPascalCase(entity.name);
  if (!isIdentifier(pascal)) {
    return null;
  }
  return RESERVED_TYPE_NAMES.has(pascal) ? `${pascal}Entity` : pascal;
}

/**
 * Value-level name (service/controller/route variables and file prefixes)
 */
export function entityVariableName(entity: Pick<Entity, "name">): string | null {
  const typeName = entityTypeName(entity);
  return typeName === null ? null : typeName.charAt(0).toLowerCase() + typeName.slice(1);
}

/**
 * Storage table name; also used as the resource path segment
 */
export function entityStorageName(entity: Pick<Entity, "name" | "tableName">): string {
  if (entity.tableName) {
    return entity.tableName;
  }
  return toSnakeCase(entity.name);
}

/**
 * Render a property key for generated object literals and interfaces
 */
export function propertyKey(name: string): string {
  return isIdentifier(name) ? name : `'${name.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}
