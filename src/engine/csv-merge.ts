import { parse } from 'csv-parse/sync';
import type { SourceDialect } from '../dialects/source';
import { IngestError } from './errors';
import { MAX_IDENTIFIER_BYTES, truncateIdentifier } from './identifiers';
import type { CellValue, MergedDataset } from './types';

export type ParsedShard = {
  readonly header: string[];
  readonly records: CellValue[][];
};

/** Field values read as missing, besides the empty field */
export const MISSING_MARKERS: ReadonlySet<string> = new Set([
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode shard bytes as UTF-8, falling back to ISO-8859-1 when the bytes are
 * not valid UTF-8. A leading byte-order mark is dropped.
 */
export const decodeShard = (bytes: Uint8Array): { text: string; encoding: 'utf-8' | 'latin1' } => {
  try {
    return { text: utf8.decode(bytes), encoding: 'utf-8' };
  } catch {
    return { text: Buffer.from(bytes).toString('latin1'), encoding: 'latin1' };
  }
};

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));

/**
 * Blank header cells become `Unnamed: <index>`; repeated names get `.1`, `.2`, ...
 * Names are cut to the server's identifier length first, and a suffix replaces
 * the tail of a cut name, so every column stays distinct once created.
 */
export const normalizeHeader = (raw: string[]): string[] => {
  const seen = new Set<string>();
  return raw.map((cell, index) => {
    const base = cell.trim() === '' ? `Unnamed: ${index}` : cell;
    let name = truncateIdentifier(base);
    for (let n = 1; seen.has(name); n++) {
      const suffix = `.${n}`;
      name = truncateIdentifier(base, MAX_IDENTIFIER_BYTES - suffix.length) + suffix;
    }
    seen.add(name);
    return name;
  });
};

/**
 * Parse decoded CSV text. The first record is the header; empty fields and
 * missing markers (`NA`, `NULL`, `NaN`, ...) are null, and rows shorter than
 * the header are padded with null.
 */
export const parseShard = (text: string, label = 'shard'): ParsedShard => {
  let parsed: unknown;
  try {
    parsed = parse(text, { skip_empty_lines: true, relax_column_count: true });
  } catch (err) {
    throw new IngestError('decode', `Cannot parse ${label} as CSV`, { cause: err });
  }

  if (!isStringMatrix(parsed)) {
    throw new IngestError('decode', `Unexpected CSV parser output for ${label}`);
  }

  const [rawHeader = [], ...body] = parsed;
  const header = normalizeHeader(rawHeader);

  const records = body.map((fields, rowIndex) => {
    if (fields.length > header.length) {
      throw new IngestError(
        'decode',
        `${label}: row ${rowIndex + 2} has ${fields.length} fields, header has ${header.length}`
      );
    }
    return header.map((_, i): CellValue => {
      const field = fields[i];
      return field === undefined || field === '' || MISSING_MARKERS.has(field) ? null : field;
    });
  });

  return { header, records };
};

/**
 * Concatenate shards in order. Columns are the union of all headers in
 * first-seen order; a shard missing a column contributes null there.
 */
export const mergeShards = (shards: readonly ParsedShard[]): MergedDataset => {
  const columns: string[] = [];
  const position = new Map<string, number>();

  for (const shard of shards) {
    for (const name of shard.header) {
      if (!position.has(name)) {
        position.set(name, columns.length);
        columns.push(name);
      }
    }
  }

  const rows: CellValue[][] = [];
  for (const shard of shards) {
    const targets = shard.header.map((name) => position.get(name));
    for (const record of shard.records) {
      const row: CellValue[] = new Array<CellValue>(columns.length).fill(null);
      record.forEach((value, i) => {
        const target = targets[i];
        if (target !== undefined) {
          row[target] = value;
        }
      });
      rows.push(row);
    }
  }

  return { columns, rows };
};

/**
 * Fetch, decode and parse every shard of a group, one at a time, then merge them.
 */
export const mergeGroup = async (source: SourceDialect, paths: readonly string[]): Promise<MergedDataset> => {
  const shards: ParsedShard[] = [];
  for (const path of paths) {
    const bytes = await source.fetchObject(path);
    const { text } = decodeShard(bytes);
    shards.push(parseShard(text, path));
  }
  return mergeShards(shards);
};
