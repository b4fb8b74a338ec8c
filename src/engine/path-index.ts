import { validateIdentifier } from './identifiers';
import type { GroupKey, ObjectIndex, ObjectKind, ObjectRef, SkippedObject } from './types';

export const TABULAR_EXTENSIONS: ReadonlySet<string> = new Set(['csv']);

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  'jpeg',
  'jpg',
  'png',
  'gif',
  'bmp',
  'tiff',
  'webp',
  'svg',
  'heic',
]);

// prefix / database / schema / table / file
const MIN_SEGMENTS = 5;

const extensionOf = (key: string): string => {
  const dot = key.lastIndexOf('.');
  return dot === -1 ? '' : key.slice(dot + 1).toLowerCase();
};

const kindOf = (extension: string): ObjectKind | undefined => {
  if (TABULAR_EXTENSIONS.has(extension)) return 'tabular';
  if (IMAGE_EXTENSIONS.has(extension)) return 'image';
  return undefined;
};

export const groupKeyId = (key: GroupKey): string => `${key.database}/${key.schema}/${key.table}`;

export const isSkipped = (entry: ObjectRef | SkippedObject): entry is SkippedObject => 'reason' in entry;

/**
 * Parse a storage key into its target location.
 * Segment 0 is a bucket-level prefix and is ignored, as is anything past the file name.
 */
export const classifyObject = (key: string): ObjectRef | SkippedObject => {
  const parts = key.split('/');
  if (parts.length < MIN_SEGMENTS) {
    return { key, reason: 'too-few-segments' };
  }

  const kind = kindOf(extensionOf(key));
  if (!kind) {
    return { key, reason: 'unsupported-extension' };
  }

  const [, database, schema, table, fileName] = parts;
  for (const segment of [database, schema, table]) {
    const problem = validateIdentifier(segment);
    if (problem) {
      return { key, reason: 'invalid-identifier', detail: problem };
    }
  }

  return { key, kind, database, schema, table, fileName };
};

/**
 * Group every listed object by (database, schema, table) and kind.
 * Groups and their members keep listing order.
 */
export const indexObjects = (keys: Iterable<string>, urlFor: (key: string) => string): ObjectIndex => {
  const index: ObjectIndex = { tabular: new Map(), images: new Map(), skipped: [] };

  for (const key of keys) {
    const entry = classifyObject(key);
    if (isSkipped(entry)) {
      index.skipped.push(entry);
      continue;
    }

    const groupKey: GroupKey = { database: entry.database, schema: entry.schema, table: entry.table };
    const id = groupKeyId(groupKey);

    if (entry.kind === 'tabular') {
      const group = index.tabular.get(id) ?? { key: groupKey, paths: [] };
      group.paths.push(entry.key);
      index.tabular.set(id, group);
      continue;
    }

    const group = index.images.get(id) ?? { key: groupKey, records: [] };
    group.records.push({ fileName: entry.fileName, url: urlFor(entry.key) });
    index.images.set(id, group);
  }

  return index;
};
