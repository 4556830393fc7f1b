/**
 * Summary counts reported alongside validation results
 */

import type { Schema } from "../../types/schema.js";
import type { SchemaStatistics } from "./types.js";

export function computeSchemaStatistics(schema: Schema): SchemaStatistics {
  let totalAttributes = 0;
  let primaryKeyCount = 0;
  let foreignKeyCount = 0;

  for (const entity of schema.entities) {
    totalAttributes += entity.attributes.length;
    for (const attribute of entity.attributes) {
      if (attribute.isPrimaryKey) primaryKeyCount++;
      if (attribute.isForeignKey) foreignKeyCount++;
    }
  }

  const entityCount = schema.entities.length;

  return {
    entityCount,
    relationshipCount: schema.relationships.length,
    totalAttributes,
    primaryKeyCount,
    foreignKeyCount,
    averageAttributesPerEntity: entityCount > 0 ? totalAttributes / entityCount : 0,
  };
}
