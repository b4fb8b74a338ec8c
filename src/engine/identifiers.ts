import { IngestError } from './errors';
import type { GroupKey } from './types';

/** PostgreSQL truncates identifiers longer than NAMEDATALEN - 1 bytes */
export const MAX_IDENTIFIER_BYTES = 63;

/**
 * Names come from storage paths and CSV headers. Returns why a name cannot be
 * used as an identifier, or null when it can.
 *
 * A `?` is written as `\?` so the query builder does not read it as a binding
 * placeholder. The builder drops every backslash in front of an escaped `?`,
 * so a name with a backslash right before `?` cannot be sent.
 */
export const validateIdentifier = (name: string): string | null => {
  if (name.length === 0) return 'empty identifier';
  if (name.includes('\0')) return 'identifier contains a NUL character';
  if (name.includes('\\?')) return 'identifier contains a backslash before "?"';
  if (Buffer.byteLength(name, 'utf8') > MAX_IDENTIFIER_BYTES) {
    return `identifier longer than ${MAX_IDENTIFIER_BYTES} bytes`;
  }
  return null;
};

/**
 * Cut a name to at most `maxBytes` UTF-8 bytes without splitting a character,
 * the way the server shortens long identifiers.
 */
export const truncateIdentifier = (name: string, maxBytes = MAX_IDENTIFIER_BYTES): string => {
  if (Buffer.byteLength(name, 'utf8') <= maxBytes) return name;
  let result = '';
  let bytes = 0;
  for (const char of name) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) break;
    result += char;
    bytes += size;
  }
  return result;
};

export const quoteIdentifier = (name: string): string => {
  const problem = validateIdentifier(name);
  if (problem) {
    throw new IngestError('identifier', `Invalid identifier "${name}": ${problem}`);
  }
  return `"${name.replace(/"/g, '""').replace(/\?/g, '\\?')}"`;
};

export const qualifiedTable = (key: GroupKey): string =>
  `${quoteIdentifier(key.schema)}.${quoteIdentifier(key.table)}`;
