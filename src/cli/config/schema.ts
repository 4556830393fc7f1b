/**
 * JSON Schema for config files
 */

import { DATABASE_DIALECTS } from "../../types/config.js";
import { LOG_LEVELS } from "../../utils/logger.js";

export const CONFIG_FILE_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  additionalProperties: false,
  properties: {
    logLevel: { type: "string", enum: [...LOG_LEVELS] },
    validation: {
      type: "object",
      additionalProperties: false,
      properties: {
        allowSelfReferences: { type: "boolean" },
      },
    },
    synthesis: {
      type: "object",
      additionalProperties: false,
      properties: {
        apiPrefix: { type: "string", pattern: "^/" },
        defaultPageSize: { type: "integer", minimum: 1 },
        maxPageSize: { type: "integer", minimum: 1 },
        databaseDialect: { type: "string", enum: [...DATABASE_DIALECTS] },
        packageName: { type: "string", minLength: 1 },
      },
    },
    output: {
      type: "object",
      additionalProperties: false,
      properties: {
        dir: { type: "string", minLength: 1 },
      },
    },
  },
} as const;
