/**
 * Code Synthesizer
 * Maps a validated schema to the file tree of an Express + Sequelize service
 */

import { DEFAULT_COMPILER_CONFIG } from "../../types/config.js";
import type { Schema } from "../../types/schema.js";
import { toKebabCase } from "../naming/index.js";
import { planEntity } from "./entity-plan.js";
import { FileTreeBuilder } from "./file-tree.js";
import { renderModelIndex, renderRouteIndex } from "./templates/aggregate.js";
import {
  controllerPath,
  modelPath,
  renderController,
  renderModel,
  renderRoutes,
  renderService,
  routesPath,
  servicePath,
} from "./templates/entity.js";
import {
  renderApp,
  renderDatabaseConfig,
  renderEntryPoint,
  renderEnvExample,
  renderManifest,
  renderReadme,
  renderTsconfig,
} from "./templates/project.js";
import {
  renderErrorHandler,
  renderPagination,
  renderValidateRequest,
} from "./templates/shared.js";
import type {
  ResolvedSynthesizerOptions,
  SynthesisOutput,
  SynthesizerOptions,
} from "./types.js";

export const FALLBACK_PACKAGE_NAME = "generated-api";

export function resolveSynthesizerOptions(
  schema: Pick<Schema, "projectName">,
  options: SynthesizerOptions = {},
): ResolvedSynthesizerOptions {
  const defaults = DEFAULT_COMPILER_CONFIG.synthesis;
  const derivedName = schema.projectName ? toKebabCase(schema.projectName) : "";
  return {
    apiPrefix: options.apiPrefix ?? defaults.apiPrefix,
    defaultPageSize: options.defaultPageSize ?? defaults.defaultPageSize,
    maxPageSize: options.maxPageSize ?? defaults.maxPageSize,
    databaseDialect: options.databaseDialect ?? defaults.databaseDialect,
    packageName: options.packageName ?? (derivedName || FALLBACK_PACKAGE_NAME),
  };
}

/**
 * Synthesize the project for a schema that has passed validation.
 * Throws SynthesisError on a defect in the synthesizer's own tables or bookkeeping.
 */
export function synthesizeProject(
  schema: Schema,
  options: SynthesizerOptions = {},
): SynthesisOutput {
  const resolved = resolveSynthesizerOptions(schema, options);
  const plans = schema.entities.map((entity) => planEntity(entity, schema.entities));
  const tree = new FileTreeBuilder();

  tree
    .add("package.json", renderManifest(schema.projectName, resolved))
    .add("tsconfig.json", renderTsconfig())
    .add(".env.example", renderEnvExample(resolved))
    .add("README.md", renderReadme(schema.projectName, plans, resolved))
    .add("src/index.ts", renderEntryPoint())
    .add("src/app.ts", renderApp(resolved))
    .add("src/config/database.ts", renderDatabaseConfig(resolved))
    .add("src/middleware/errorHandler.ts", renderErrorHandler())
    .add("src/middleware/validateRequest.ts", renderValidateRequest())
    .add("src/utils/pagination.ts", renderPagination(resolved));

  for (const plan of plans) {
    tree
      .add(modelPath(plan), renderModel(plan))
      .add(servicePath(plan), renderService(plan, resolved))
      .add(controllerPath(plan), renderController(plan))
      .add(routesPath(plan), renderRoutes(plan));
  }

  tree
    .add("src/models/index.ts", renderModelIndex(plans, schema.relationships))
    .add("src/routes/index.ts", renderRouteIndex(plans));

  return tree.build();
}

export { TYPE_MAPPINGS, lookupTypeMapping } from "./type-mapping.js";
export { planEntity, renderDefaultValue, IMPLICIT_ID, AUDIT_FIELDS } from "./entity-plan.js";
export { FileTreeBuilder } from "./file-tree.js";
export * from "./types.js";
