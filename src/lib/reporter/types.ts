/**
 * Reporter module types
 */

export interface ArtifactDigest {
  hash: string; // sha256, hex
  size: number; // bytes
}

/**
 * RunReport - what a synthesis run produced, for auditability
 */
export interface RunReport {
  version: string;
  tool: {
    name: string;
    version: string;
  };
  run: {
    id: string;
    timestamp: string;
    phase: "synthesis";
  };
  schema: {
    projectName: string | null;
    schemaHash: string;
    entityCount: number;
    relationshipCount: number;
  };
  artifacts: Record<string, ArtifactDigest>;
}

export interface ReporterOptions {
  now?: () => Date;
  runId?: string;
  version?: string;
}
