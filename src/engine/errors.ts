export type IngestStage = 'decode' | 'identifier' | 'connection' | 'provision' | 'load';

/**
 * Fatal failure of a run. The stage tells which step gave up; the driver or
 * parser error that caused it is kept as `cause`.
 */
export class IngestError extends Error {
  readonly stage: IngestStage;

  constructor(stage: IngestStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IngestError';
    this.stage = stage;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
