/**
 * Per-entity units: model, service, controller and routes
 */

import { propertyKey } from "../../naming/index.js";
import { indent, lines, quote, quoteList } from "../render.js";
import type { EntityPlan, ResolvedSynthesizerOptions } from "../types.js";

export function modelPath(plan: EntityPlan): string {
  return `src/models/${plan.typeName}.ts`;
}

export function servicePath(plan: EntityPlan): string {
  return `src/services/${plan.variableName}Service.ts`;
}

export function controllerPath(plan: EntityPlan): string {
  return `src/controllers/${plan.variableName}Controller.ts`;
}

export function routesPath(plan: EntityPlan): string {
  return `src/routes/${plan.variableName}Routes.ts`;
}

export function renderModel(plan: EntityPlan): string {
  const { typeName } = plan;
  const optional = plan.fields.filter((field) => field.optionalOnCreate).map((field) => field.name);

  return lines(
    "import { DataTypes, Model, Optional } from 'sequelize';",
    "import { sequelize } from '../config/database';",
    "",
    `export interface ${typeName}Attributes {`,
    plan.fields.map((field) => indent(`${propertyKey(field.name)}: ${field.tsType};`)),
    "}",
    "",
    optional.length > 0
      ? `export type ${typeName}CreationAttributes = Optional<${typeName}Attributes, ${optional
          .map(quote)
          .join(" | ")}>;`
      : `export type ${typeName}CreationAttributes = ${typeName}Attributes;`,
    "",
    `export class ${typeName}`,
    `  extends Model<${typeName}Attributes, ${typeName}CreationAttributes>`,
    `  implements ${typeName}Attributes`,
    "{",
    plan.fields.map((field) => indent(`declare ${propertyKey(field.name)}: ${field.tsType};`)),
    "}",
    "",
    `${typeName}.init(`,
    "  {",
    plan.fields.map((field) => [
      indent(`${propertyKey(field.name)}: {`, 2),
      field.columnOptions.map((option) => indent(`${option},`, 3)),
      indent("},", 2),
    ]),
    "  },",
    "  {",
    "    sequelize,",
    `    modelName: ${quote(typeName)},`,
    `    tableName: ${quote(plan.storageName)},`,
    "    timestamps: true,",
    plan.indexedFields.length > 0 && [
      "    indexes: [",
      plan.indexedFields.map((field) => indent(`{ fields: [${quote(field)}] },`, 3)),
      "    ],",
    ],
    "  },",
    ");",
    "",
    `export default ${typeName};`,
  );
}

export function renderService(plan: EntityPlan, options: ResolvedSynthesizerOptions): string {
  const { typeName, variableName } = plan;
  const operator = options.databaseDialect === "postgres" ? "Op.iLike" : "Op.like";
  const className = `${typeName}Service`;
  const orderBy = plan.primaryKeys[0] ?? "id";

  return lines(
    "import { Op, WhereOptions } from 'sequelize';",
    `import { ${typeName}, ${typeName}Attributes, ${typeName}CreationAttributes } from '../models/${typeName}';`,
    "import { HttpError } from '../middleware/errorHandler';",
    "import { Page, PageRequest, toOffset, toPage } from '../utils/pagination';",
    "",
    `const SEARCHABLE_FIELDS: string[] = ${quoteList(plan.searchableFields)};`,
    "",
    `export class ${className} {`,
    `  async list(request: PageRequest): Promise<Page<${typeName}>> {`,
    `    const { rows, count } = await ${typeName}.findAndCountAll({`,
    "      limit: request.limit,",
    "      offset: toOffset(request),",
    `      order: [[${quote(orderBy)}, 'ASC']],`,
    "    });",
    "    return toPage(rows, count, request);",
    "  }",
    "",
    `  async search(term: string, request: PageRequest): Promise<Page<${typeName}>> {`,
    "    if (SEARCHABLE_FIELDS.length === 0) {",
    "      return toPage([], 0, request);",
    "    }",
    "    const pattern = `%${term}%`;",
    "    const where: WhereOptions = {",
    `      [Op.or]: SEARCHABLE_FIELDS.map((field) => ({ [field]: { [${operator}]: pattern } })),`,
    "    };",
    `    const { rows, count } = await ${typeName}.findAndCountAll({`,
    "      where,",
    "      limit: request.limit,",
    "      offset: toOffset(request),",
    `      order: [[${quote(orderBy)}, 'ASC']],`,
    "    });",
    "    return toPage(rows, count, request);",
    "  }",
    "",
    `  async findById(id: string): Promise<${typeName}> {`,
    `    const record = await ${typeName}.findByPk(id);`,
    "    if (!record) {",
    `      throw new HttpError(404, ${quote(`${plan.entity.name} not found`)});`,
    "    }",
    "    return record;",
    "  }",
    "",
    `  async create(input: ${typeName}CreationAttributes): Promise<${typeName}> {`,
    `    return ${typeName}.create(input);`,
    "  }",
    "",
    `  async update(id: string, changes: Partial<${typeName}Attributes>): Promise<${typeName}> {`,
    "    const record = await this.findById(id);",
    "    return record.update(changes);",
    "  }",
    "",
    "  async remove(id: string): Promise<void> {",
    "    const record = await this.findById(id);",
    "    await record.destroy();",
    "  }",
    "}",
    "",
    `export const ${variableName}Service = new ${className}();`,
  );
}

function handler(name: string, body: string[]): string[] {
  return [
    `  async ${name}(req: Request, res: Response, next: NextFunction): Promise<void> {`,
    "    try {",
    body.map((line) => indent(line, 3)),
    "    } catch (error) {",
    "      next(error);",
    "    }",
    "  },",
  ].flat();
}

export function renderController(plan: EntityPlan): string {
  const { variableName } = plan;
  const service = `${variableName}Service`;

  return lines(
    "import { NextFunction, Request, Response } from 'express';",
    "import { HttpError } from '../middleware/errorHandler';",
    `import { ${service} } from '../services/${service}';`,
    "import { parsePageRequest } from '../utils/pagination';",
    "",
    `export const ${variableName}Controller = {`,
    handler("list", [`res.json(await ${service}.list(parsePageRequest(req.query)));`]),
    "",
    handler("search", [
      "const term = typeof req.query.q === 'string' ? req.query.q.trim() : '';",
      "if (!term) {",
      "  next(new HttpError(400, \"Query parameter 'q' is required\"));",
      "  return;",
      "}",
      `res.json(await ${service}.search(term, parsePageRequest(req.query)));`,
    ]),
    "",
    handler("getById", [`res.json(await ${service}.findById(req.params.id));`]),
    "",
    handler("create", [`res.status(201).json(await ${service}.create(req.body));`]),
    "",
    handler("update", [`res.json(await ${service}.update(req.params.id, req.body));`]),
    "",
    handler("remove", [`await ${service}.remove(req.params.id);`, "res.status(204).send();"]),
    "};",
  );
}

export function renderRoutes(plan: EntityPlan): string {
  const controller = `${plan.variableName}Controller`;

  return lines(
    "import { Router } from 'express';",
    `import { ${controller} } from '../controllers/${controller}';`,
    "import { requireFields } from '../middleware/validateRequest';",
    "",
    `const REQUIRED_FIELDS = ${quoteList(plan.requiredFields)};`,
    "",
    "const router = Router();",
    "",
    `router.get('/', ${controller}.list);`,
    `router.get('/search', ${controller}.search);`,
    `router.get('/:id', ${controller}.getById);`,
    `router.post('/', requireFields(REQUIRED_FIELDS), ${controller}.create);`,
    `router.put('/:id', ${controller}.update);`,
    `router.delete('/:id', ${controller}.remove);`,
    "",
    "export default router;",
  );
}
