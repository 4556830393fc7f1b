/**
 * Semantic phase: cross-entity invariants
 */

import type { Schema } from "../../types/schema.js";
import {
  entityStorageName,
  entityTypeName,
} from "../naming/index.js";
import {
  DiagnosticCode,
  type DiagnosticCollector,
  type ValidatorOptions,
} from "./types.js";

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function checkDuplicates(schema: Schema, collector: DiagnosticCollector): void {
  const seenEntities = new Set<string>();

  for (const entity of schema.entities) {
    if (entity.name) {
      if (seenEntities.has(entity.name)) {
        collector.error({
          code: DiagnosticCode.DUPLICATE_ENTITY,
          message: `Duplicate entity name: ${entity.name}`,
          entity: entity.name,
        });
      }
      seenEntities.add(entity.name);
    }

    const seenAttributes = new Set<string>();
    for (const attribute of entity.attributes) {
      if (!attribute.name) continue;
      if (seenAttributes.has(attribute.name)) {
        collector.error({
          code: DiagnosticCode.DUPLICATE_ATTRIBUTE,
          message: `Entity ${entity.name}: duplicate attribute name: ${attribute.name}`,
          entity: entity.name,
          attribute: attribute.name,
        });
      }
      seenAttributes.add(attribute.name);
    }
  }
}

/**
 * Distinct entity names must stay distinct once converted to code and storage names
 */
function checkIdentifiers(schema: Schema, collector: DiagnosticCollector): void {
  const typeNames = new Map<string, string>();
  const storageNames = new Map<string, string>();
  const checked = new Set<string>();

  for (const entity of schema.entities) {
    if (!entity.name || checked.has(entity.name)) continue;
    checked.add(entity.name);

    const typeName = entityTypeName(entity);
    if (typeName === null) {
      collector.error({
        code: DiagnosticCode.UNUSABLE_IDENTIFIER,
        message: `Entity ${entity.name}: name does not produce a usable identifier`,
        entity: entity.name,
      });
      continue;
    }

    if (entity.tableName !== undefined && !TABLE_NAME.test(entity.tableName)) {
      collector.error({
        code: DiagnosticCode.INVALID_TABLE_NAME,
        message: `Entity ${entity.name}: invalid table name: ${entity.tableName}`,
        entity: entity.name,
      });
    }

    const typeOwner = typeNames.get(typeName);
    if (typeOwner !== undefined) {
      collector.error({
        code: DiagnosticCode.IDENTIFIER_COLLISION,
        message: `Entity ${entity.name}: type name ${typeName} collides with entity ${typeOwner}`,
        entity: entity.name,
      });
    } else {
      typeNames.set(typeName, entity.name);
    }

    const storageName = entityStorageName(entity);
    const storageOwner = storageNames.get(storageName);
    if (storageOwner !== undefined) {
      collector.error({
        code: DiagnosticCode.IDENTIFIER_COLLISION,
        message: `Entity ${entity.name}: table name ${storageName} collides with entity ${storageOwner}`,
        entity: entity.name,
      });
    } else {
      storageNames.set(storageName, entity.name);
    }
  }
}

function checkRelationships(
  schema: Schema,
  collector: DiagnosticCollector,
  options: ValidatorOptions,
): void {
  const entityNames = new Set(schema.entities.map((entity) => entity.name));

  schema.relationships.forEach((relationship, index) => {
    const position = index + 1;
    const { sourceEntity, targetEntity } = relationship;

    if (sourceEntity && sourceEntity === targetEntity) {
      const diagnostic = {
        code: DiagnosticCode.SELF_REFERENCE,
        message: `Relationship ${position}: self-referencing relationship on ${sourceEntity}`,
        entity: sourceEntity,
        relationship: position,
      };
      if (options.allowSelfReferences) {
        collector.warn(diagnostic);
      } else {
        collector.error(diagnostic);
      }
    }

    const endpoints =
      sourceEntity === targetEntity ? [sourceEntity] : [sourceEntity, targetEntity];
    for (const endpoint of endpoints) {
      if (endpoint && !entityNames.has(endpoint)) {
        collector.warn({
          code: DiagnosticCode.UNKNOWN_RELATIONSHIP_ENTITY,
          message: `Relationship ${position}: entity ${endpoint} does not exist`,
          relationship: position,
        });
      }
    }
  });
}

/**
 * Foreign keys must resolve after reconciliation
 */
function checkReferences(schema: Schema, collector: DiagnosticCollector): void {
  for (const entity of schema.entities) {
    for (const attribute of entity.attributes) {
      if (!attribute.isForeignKey) continue;

      const { referencesTable, referencesColumn } = attribute;
      if (!referencesTable) {
        collector.warn({
          code: DiagnosticCode.FOREIGN_KEY_WITHOUT_TARGET,
          message: `Entity ${entity.name}, attribute ${attribute.name}: foreign key does not name a referenced entity`,
          entity: entity.name,
          attribute: attribute.name,
        });
        continue;
      }

      const target = schema.entities.find((candidate) => candidate.name === referencesTable);
      if (!target) {
        collector.error({
          code: DiagnosticCode.DANGLING_REFERENCE,
          message: `Entity ${entity.name}, attribute ${attribute.name}: referenced entity ${referencesTable} does not exist`,
          entity: entity.name,
          attribute: attribute.name,
        });
        continue;
      }

      if (
        referencesColumn &&
        !target.attributes.some((candidate) => candidate.name === referencesColumn)
      ) {
        collector.error({
          code: DiagnosticCode.DANGLING_REFERENCE,
          message: `Entity ${entity.name}, attribute ${attribute.name}: referenced attribute ${referencesTable}.${referencesColumn} does not exist`,
          entity: entity.name,
          attribute: attribute.name,
        });
      }
    }
  }
}

/**
 * Entities with attributes but no primary key, or outside every relationship.
 * Entities without attributes already carry a structural error and get no warnings.
 */
function checkCoverage(schema: Schema, collector: DiagnosticCollector): void {
  const related = new Set<string>();
  for (const relationship of schema.relationships) {
    related.add(relationship.sourceEntity);
    related.add(relationship.targetEntity);
  }

  for (const entity of schema.entities) {
    if (!entity.name || entity.attributes.length === 0) continue;

    if (!entity.attributes.some((attribute) => attribute.isPrimaryKey)) {
      collector.warn({
        code: DiagnosticCode.MISSING_PRIMARY_KEY,
        message: `Entity ${entity.name}: no primary key defined`,
        entity: entity.name,
      });
    }

    if (!related.has(entity.name)) {
      collector.warn({
        code: DiagnosticCode.UNRELATED_ENTITY,
        message: `Entity ${entity.name}: no relationships defined`,
        entity: entity.name,
      });
    }
  }
}

export function checkSemantics(
  schema: Schema,
  collector: DiagnosticCollector,
  options: ValidatorOptions = {},
): void {
  checkDuplicates(schema, collector);
  checkIdentifiers(schema, collector);
  checkRelationships(schema, collector, options);
  checkReferences(schema, collector);
  checkCoverage(schema, collector);
}
