// Core re-exports for the Schemawright type system
// This file provides a single import point for all project types

export * from "./schema.js";
export * from "./result.js";
export * from "./config.js";
export * from "../lib/intake/types.js";
export * from "../lib/normalizer/types.js";
export * from "../lib/reconciler/types.js";
export * from "../lib/validator/types.js";
export * from "../lib/synthesizer/types.js";
export * from "../lib/emitter/types.js";
export * from "../lib/reporter/types.js";
