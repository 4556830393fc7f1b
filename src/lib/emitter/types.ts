/**
 * Emitter module types
 */

export interface EmitterResult {
  directory: string;
  files: string[]; // absolute paths, in emission order
  bytes: number;
}
