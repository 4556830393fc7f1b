/**
 * Schemawright: compile entity-relationship diagram analyses into backend projects
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Stages
export * from "./lib/intake/index.js";
export * from "./lib/normalizer/index.js";
export * from "./lib/reconciler/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/naming/index.js";

// Orchestration and output
export * from "./lib/pipeline/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
