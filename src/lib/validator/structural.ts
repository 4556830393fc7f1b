/**
 * Structural phase: every element has the fields and closed-set tags it needs
 */

import {
  Schema,
  isDataType,
  isRelationshipKind,
} from "../../types/schema.js";
import { DiagnosticCode, type DiagnosticCollector } from "./types.js";

function entityLabel(name: string, index: number): string {
  return name ? `Entity ${name}` : `Entity #${index + 1}`;
}

export function checkStructure(schema: Schema, collector: DiagnosticCollector): void {
  if (schema.entities.length === 0) {
    collector.error({
      code: DiagnosticCode.NO_ENTITIES,
      message: "At least one entity is required",
    });
  }

  schema.entities.forEach((entity, entityIndex) => {
    const label = entityLabel(entity.name, entityIndex);
    const locator = entity.name ? { entity: entity.name } : {};

    if (!entity.name) {
      collector.error({
        code: DiagnosticCode.ENTITY_NAME_REQUIRED,
        message: `${label}: name is required`,
      });
    }

    if (entity.attributes.length === 0) {
      collector.error({
        code: DiagnosticCode.ENTITY_WITHOUT_ATTRIBUTES,
        message: `${label}: must have at least one attribute`,
        ...locator,
      });
    }

    entity.attributes.forEach((attribute, attributeIndex) => {
      if (!attribute.name) {
        collector.error({
          code: DiagnosticCode.ATTRIBUTE_NAME_REQUIRED,
          message: `${label}, attribute #${attributeIndex + 1}: name is required`,
          ...locator,
        });
      }

      const attributeLabel = `${label}, attribute ${attribute.name || `#${attributeIndex + 1}`}`;
      const attributeLocator = attribute.name
        ? { ...locator, attribute: attribute.name }
        : locator;

      if (!isDataType(attribute.dataType)) {
        collector.error({
          code: DiagnosticCode.INVALID_DATA_TYPE,
          message: `${attributeLabel}: invalid data type: ${String(attribute.dataType)}`,
          ...attributeLocator,
        });
      }

      if (
        attribute.maxLength !== undefined &&
        (!Number.isInteger(attribute.maxLength) || attribute.maxLength <= 0)
      ) {
        collector.error({
          code: DiagnosticCode.INVALID_MAX_LENGTH,
          message: `${attributeLabel}: maxLength must be a positive integer`,
          ...attributeLocator,
        });
      }
    });
  });

  schema.relationships.forEach((relationship, index) => {
    const position = index + 1;

    if (!relationship.sourceEntity) {
      collector.error({
        code: DiagnosticCode.RELATIONSHIP_SOURCE_REQUIRED,
        message: `Relationship ${position}: source entity is required`,
        relationship: position,
      });
    }

    if (!relationship.targetEntity) {
      collector.error({
        code: DiagnosticCode.RELATIONSHIP_TARGET_REQUIRED,
        message: `Relationship ${position}: target entity is required`,
        relationship: position,
      });
    }

    if (!isRelationshipKind(relationship.relationshipType)) {
      collector.error({
        code: DiagnosticCode.INVALID_RELATIONSHIP_KIND,
        message: `Relationship ${position}: invalid relationship type: ${String(relationship.relationshipType)}`,
        relationship: position,
      });
    }
  });
}
