import type { GroupKey, ObjectKind, SkipReason } from './types';

type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const KIND_COLORS: Record<ObjectKind, string> = {
  tabular: COLORS.cyan,
  image: COLORS.magenta,
};

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

const formatNumber = (n: number): string => n.toLocaleString('en-US');

const formatElapsed = (ms: number): string => {
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const formatGroupKey = (key: GroupKey): string => `${key.database}.${key.schema}.${key.table}`;

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  skip: (key: string, reason: SkipReason) => {
    log.warn(`Skipping ${key} ${COLORS.dim}(${reason})${COLORS.reset}`);
  },

  group: (kind: ObjectKind, key: GroupKey, message: string) => {
    const tag = `${KIND_COLORS[kind]}${kind === 'tabular' ? 'csv' : 'img'}${COLORS.reset}`;
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}  ${formatGroupKey(key)}  ${message}`);
  },

  run: {
    start: (config: { location: string; objects: number; tabularGroups: number; imageGroups: number; skipped: number }) => {
      const lines = [
        '',
        `${COLORS.bold}Load started${COLORS.reset}`,
        `  source:         ${config.location}`,
        `  objects:        ${formatNumber(config.objects)}`,
        `  tabular groups: ${formatNumber(config.tabularGroups)}`,
        `  image groups:   ${formatNumber(config.imageGroups)}`,
        `  skipped:        ${config.skipped > 0 ? `${COLORS.yellow}${formatNumber(config.skipped)}${COLORS.reset}` : '0'}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (stats: { groups: number; submitted: number; inserted: number; skipped: number; elapsed: number }) => {
      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}  ${COLORS.dim}(${formatElapsed(stats.elapsed)})${COLORS.reset}`,
        '',
        `  groups:    ${COLORS.bold}${formatNumber(stats.groups)}${COLORS.reset}`,
        `  submitted: ${COLORS.bold}${formatNumber(stats.submitted)}${COLORS.reset}`,
        `  inserted:  ${COLORS.green}${formatNumber(stats.inserted)}${COLORS.reset}`,
        `  skipped:   ${COLORS.yellow}${formatNumber(stats.skipped)}${COLORS.reset}`,
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      console.info(lines.join('\n'));
    },
  },

  db: (action: string, count: number, elapsed: number) => {
    const tag = `${COLORS.dim}db${COLORS.reset}`;
    const time = (() => {
      if (elapsed > 1000) {
        return `${COLORS.yellow}${elapsed}ms${COLORS.reset}`;
      }
      return `${COLORS.dim}${elapsed}ms${COLORS.reset}`;
    })();
    console.info(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}   ${action} ${COLORS.bold}${formatNumber(count)}${
        COLORS.reset
      } rows  ${time}`
    );
  },

  knex: {
    warn: (message: string) => {
      log.warn(`[knex] ${message}`);
    },
    error: (message: string) => {
      log.error(`[knex] ${message}`);
    },
    deprecate: (message: string) => {
      log.warn(`[knex deprecate] ${message}`);
    },
  },
};

interface PgError {
  severity?: string;
  code?: string;
  detail?: string;
  constraint?: string;
  table?: string;
  hint?: string;
  message?: string;
}

const isPgError = (err: unknown): err is PgError =>
  err !== null && typeof err === 'object' && 'severity' in err && 'code' in err;

/**
 * Render an error for the terminal. PostgreSQL errors (directly or as the cause
 * of an IngestError) get their diagnostic fields listed below the message.
 */
export const formatDbError = (err: unknown): string => {
  const headline = (err instanceof Error ? err.message : String(err)).split('\n')[0].slice(0, 200);
  const pgError = isPgError(err) ? err : err instanceof Error && isPgError(err.cause) ? err.cause : undefined;

  if (!pgError) {
    return headline;
  }

  const fields: Array<[string, string | undefined]> = [
    ['code', pgError.code],
    ['severity', pgError.severity],
    ['detail', pgError.detail],
    ['constraint', pgError.constraint],
    ['table', pgError.table],
    ['hint', pgError.hint],
  ];

  const padding = '                      ';
  const details = fields
    .filter(([, v]) => v)
    .map(([k, v]) => `${padding}${COLORS.dim}${k.padEnd(12)}${COLORS.reset}${v}`);

  return [headline, ...details].join('\n');
};
