/**
 * Ordered file tree under construction
 */

import { SynthesisError } from "../../utils/errors.js";
import type { SynthesisOutput } from "./types.js";

export class FileTreeBuilder {
  private readonly files: SynthesisOutput = new Map();

  add(path: string, content: string): this {
    if (this.files.has(path)) {
      throw new SynthesisError(`Duplicate output path: ${path}`, { path });
    }
    this.files.set(path, content);
    return this;
  }

  build(): SynthesisOutput {
    return new Map(this.files);
  }
}
