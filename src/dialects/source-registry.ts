import type { SourceDialect, SourceConfig } from './source';
import { createRegistry } from './registry';

const sources = createRegistry<SourceConfig, SourceDialect>('source');

export const registerSource = sources.register;

/**
 * Create a source dialect from configuration
 */
export const createSource = sources.create;
