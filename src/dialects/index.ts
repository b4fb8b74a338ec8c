export type { SourceDialect, SourceConfig } from './source';
export type { ConnectionFactory, SqlExecutor, SqlResult, SqlValue, TargetConfig, TargetConnection } from './target';
export { createSource, registerSource } from './source-registry';
export { createTarget, registerTarget } from './target-registry';
