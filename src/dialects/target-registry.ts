import type { ConnectionFactory, TargetConfig } from './target';
import { createRegistry } from './registry';

const targets = createRegistry<TargetConfig, ConnectionFactory>('target');

export const registerTarget = targets.register;

/**
 * Create a connection factory for the configured target server
 */
export const createTarget = targets.create;
