/**
 * Cross-entity units: model associations and the route aggregator
 */

import type { BaseCardinality, Entity, Relationship } from "../../../types/schema.js";
import { baseCardinality } from "../../normalizer/type-mappers.js";
import { toSnakeCase } from "../../naming/index.js";
import { lines, quote } from "../render.js";
import type { EntityPlan } from "../types.js";

/**
 * Name of the foreign-key attribute on `holder` that points at `target`, if one is declared
 */
function foreignKeyTowards(holder: Entity, target: Entity): string | undefined {
  return holder.attributes.find(
    (attr) => attr.isForeignKey && attr.referencesTable === target.name,
  )?.name;
}

function fkOption(foreignKey: string | undefined): string {
  return foreignKey === undefined ? "" : `, { foreignKey: ${quote(foreignKey)} }`;
}

/**
 * Association statements for one relationship, or null when it repeats an earlier one.
 * `seen` holds the direction-independent keys of the pairs already emitted.
 */
function associate(
  relationship: Relationship,
  source: EntityPlan,
  target: EntityPlan,
  seen: Set<string>,
): string[] | null {
  const cardinality = baseCardinality(relationship.relationshipType);

  // N:1 is 1:N seen from the other end
  const flipped = cardinality === "N:1";
  const one = flipped ? target : source;
  const many = flipped ? source : target;
  const kind: BaseCardinality = flipped ? "1:N" : cardinality;
  const pair =
    kind === "1:N"
      ? `${one.entity.name}\u0000${many.entity.name}`
      : [one.entity.name, many.entity.name].sort().join("\u0000");
  const key = `${kind}\u0000${pair}`;
  if (seen.has(key)) {
    return null;
  }
  seen.add(key);

  switch (kind) {
    case "1:N": {
      const foreignKey = fkOption(foreignKeyTowards(many.entity, one.entity));
      return [
        `${one.typeName}.hasMany(${many.typeName}${foreignKey});`,
        `${many.typeName}.belongsTo(${one.typeName}${foreignKey});`,
      ];
    }
    case "1:1": {
      const onTarget = foreignKeyTowards(many.entity, one.entity);
      if (onTarget === undefined) {
        const onSource = foreignKeyTowards(one.entity, many.entity);
        if (onSource !== undefined) {
          return [
            `${many.typeName}.hasOne(${one.typeName}${fkOption(onSource)});`,
            `${one.typeName}.belongsTo(${many.typeName}${fkOption(onSource)});`,
          ];
        }
      }
      return [
        `${one.typeName}.hasOne(${many.typeName}${fkOption(onTarget)});`,
        `${many.typeName}.belongsTo(${one.typeName}${fkOption(onTarget)});`,
      ];
    }
    default: {
      const through = quote(`${toSnakeCase(one.storageName)}_${toSnakeCase(many.storageName)}`);
      if (one === many) {
        // Self join: one alias and two distinct keys on the through table
        const column = toSnakeCase(one.storageName);
        return [
          `${one.typeName}.belongsToMany(${one.typeName}, { through: ${through}, as: ${quote(
            `related${one.typeName}`,
          )}, foreignKey: ${quote(`${column}_id`)}, otherKey: ${quote(`related_${column}_id`)} });`,
        ];
      }
      return [
        `${one.typeName}.belongsToMany(${many.typeName}, { through: ${through} });`,
        `${many.typeName}.belongsToMany(${one.typeName}, { through: ${through} });`,
      ];
    }
  }
}

export function renderModelIndex(
  plans: readonly EntityPlan[],
  relationships: readonly Relationship[],
): string {
  const byName = new Map(plans.map((plan) => [plan.entity.name, plan]));
  const seen = new Set<string>();
  const associations: string[] = [];

  for (const relationship of relationships) {
    const source = byName.get(relationship.sourceEntity);
    const target = byName.get(relationship.targetEntity);
    if (!source || !target) {
      continue;
    }
    const statements = associate(relationship, source, target, seen);
    if (statements) {
      associations.push(...statements);
    }
  }

  const names = plans.map((plan) => plan.typeName);
  return lines(
    plans.map((plan) => `import { ${plan.typeName} } from './${plan.typeName}';`),
    associations.length > 0 && ["", ...associations],
    "",
    `export { ${names.join(", ")} };`,
  );
}

export function renderRouteIndex(plans: readonly EntityPlan[]): string {
  return lines(
    "import { Router } from 'express';",
    plans.map((plan) => `import ${plan.variableName}Routes from './${plan.variableName}Routes';`),
    "",
    "const router = Router();",
    "",
    plans.map((plan) => `router.use(${quote(`/${plan.storageName}`)}, ${plan.variableName}Routes);`),
    "",
    "export default router;",
  );
}
