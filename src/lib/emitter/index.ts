/**
 * Emitter module - writes synthesized file trees to disk
 */
export * from "./types.js";
export * from "./file-tree-writer.js";
