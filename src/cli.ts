#!/usr/bin/env node
import { loadConfig } from './config';
import { createSource, createTarget } from './dialects';
import { ConfigError } from './engine/errors';
import { log, formatDbError } from './engine/logger';
import { run } from './engine/runner';

// Import dialects to register them
import './dialects/source/s3';
import './dialects/target/postgresql';

import 'dotenv/config';

const main = async (): Promise<void> => {
  const config = loadConfig(process.env);

  const source = createSource(config.source);
  const connect = createTarget(config.target);

  await run({ source, connect }, config.runner);
};

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.error(err.message);
  } else {
    log.error(`Load failed: ${formatDbError(err)}`);
  }
  process.exit(1);
});
