import type { SourceDialect } from '../dialects/source';
import type { ConnectionFactory } from '../dialects/target';
import { ConnectionManager } from './connections';
import { mergeGroup } from './csv-merge';
import { loadImages, loadRows } from './load';
import { log, formatDbError } from './logger';
import { indexObjects } from './path-index';
import { ensureImageTable, ensureTable } from './provision';
import { inferSchema } from './schema-inference';
import type { GroupResult, ImageGroup, LoadOptions, RunResult, TabularGroup } from './types';

export type RunnerConfig = LoadOptions & {
  /** Database used to check for and create target databases */
  readonly adminDatabase: string;
};

export type RunnerDeps = {
  readonly source: SourceDialect;
  readonly connect: ConnectionFactory;
};

const loadTabularGroup = async (
  deps: RunnerDeps,
  connections: ConnectionManager,
  group: TabularGroup,
  config: RunnerConfig
): Promise<GroupResult> => {
  const connection = await connections.acquire(group.key.database);

  log.group('tabular', group.key, `merging ${group.paths.length} shard(s)`);
  const dataset = await mergeGroup(deps.source, group.paths);
  const columns = inferSchema(dataset);

  await ensureTable(connection, group.key, columns);
  const inserted = await loadRows(connection, group.key, columns, dataset, config);

  log.group('tabular', group.key, `data inserted (${dataset.rows.length} rows)`);
  return {
    kind: 'tabular',
    key: group.key,
    objects: group.paths.length,
    rowsSubmitted: dataset.rows.length,
    rowsInserted: inserted,
  };
};

const loadImageGroup = async (
  connections: ConnectionManager,
  group: ImageGroup,
  config: RunnerConfig
): Promise<GroupResult> => {
  const connection = await connections.acquire(group.key.database);

  await ensureImageTable(connection, group.key);
  const inserted = await loadImages(connection, group.key, group.records, config);

  log.group('image', group.key, `image metadata inserted (${group.records.length} images)`);
  return {
    kind: 'image',
    key: group.key,
    objects: group.records.length,
    rowsSubmitted: group.records.length,
    rowsInserted: inserted,
  };
};

/**
 * Discover every object in the source, then load each tabular group followed
 * by each image group, one at a time. The first failure ends the run; groups
 * loaded before it stay committed. Connections are always closed.
 */
export const run = async (deps: RunnerDeps, config: RunnerConfig): Promise<RunResult> => {
  const startTime = Date.now();
  const connections = new ConnectionManager(deps.connect, config.adminDatabase);
  let failed = false;

  try {
    log.info(`Listing objects in ${deps.source.location} via ${deps.source.name}`);
    const keys = await deps.source.listObjects();
    const index = indexObjects(keys, (key) => deps.source.publicUrl(key));

    for (const skipped of index.skipped) {
      log.skip(skipped.key, skipped.reason);
    }

    log.run.start({
      location: deps.source.location,
      objects: keys.length,
      tabularGroups: index.tabular.size,
      imageGroups: index.images.size,
      skipped: index.skipped.length,
    });

    const groups: GroupResult[] = [];
    for (const group of index.tabular.values()) {
      groups.push(await loadTabularGroup(deps, connections, group, config));
    }
    for (const group of index.images.values()) {
      groups.push(await loadImageGroup(connections, group, config));
    }

    const elapsedMs = Date.now() - startTime;
    log.run.summary({
      groups: groups.length,
      submitted: groups.reduce((sum, g) => sum + g.rowsSubmitted, 0),
      inserted: groups.reduce((sum, g) => sum + g.rowsInserted, 0),
      skipped: index.skipped.length,
      elapsed: elapsedMs,
    });

    return { objectsListed: keys.length, groups, skipped: index.skipped, elapsedMs };
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    const closeErrors: unknown[] = [];
    const release = async (close: () => Promise<void>): Promise<void> => {
      try {
        await close();
      } catch (closeErr) {
        closeErrors.push(closeErr);
      }
    };

    await release(() => connections.closeAll());
    await release(async () => {
      await deps.source.close?.();
    });
    log.info('Connections closed');

    // an error that ended the run wins; close failures are only logged then
    const [firstCloseErr, ...otherCloseErrs] = closeErrors;
    for (const closeErr of failed ? closeErrors : otherCloseErrs) {
      log.error(formatDbError(closeErr));
    }
    if (!failed && closeErrors.length > 0) {
      throw firstCloseErr;
    }
  }
};
