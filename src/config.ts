import { z } from 'zod';
import type { SourceConfig } from './dialects/source';
import type { TargetConfig } from './dialects/target';
import { ConfigError } from './engine/errors';
import type { RunnerConfig } from './engine/runner';

const requiredString = z.string({ required_error: 'required' }).min(1, 'required');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? String(fallback) : value))
    .pipe(z.coerce.number().int().positive());

const EnvSchema = z.object({
  DB_HOST: requiredString,
  DB_PORT: positiveInt(5432).pipe(z.number().max(65535)),
  DB_USER: requiredString,
  DB_PASSWORD: requiredString,
  DB_SSL: booleanFlag,
  DB_ADMIN_DATABASE: optionalString.transform((value) => value ?? 'postgres'),
  BUCKET_NAME: requiredString,
  S3_PREFIX: optionalString.transform((value) => value ?? ''),
  AWS_REGION: optionalString.transform((value) => value ?? 'eu-west-1'),
  S3_ENDPOINT: optionalString,
  CRED_PATH: optionalString,
  PUBLIC_URL_BASE: optionalString,
  BATCH_SIZE: positiveInt(500),
});

export type AppConfig = Readonly<{
  source: Readonly<Extract<SourceConfig, { type: 's3' }>>;
  target: Readonly<Extract<TargetConfig, { type: 'postgresql' }>>;
  runner: RunnerConfig;
}>;

/**
 * Build the immutable run configuration from environment variables.
 * Every problem is reported at once in a ConfigError.
 */
export const loadConfig = (env: Record<string, string | undefined>): AppConfig => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = result.data;
  return Object.freeze({
    source: Object.freeze({
      type: 's3' as const,
      bucket: values.BUCKET_NAME,
      prefix: values.S3_PREFIX,
      region: values.AWS_REGION,
      endpoint: values.S3_ENDPOINT,
      credentialsFile: values.CRED_PATH,
      publicUrlBase: values.PUBLIC_URL_BASE,
    }),
    target: Object.freeze({
      type: 'postgresql' as const,
      host: values.DB_HOST,
      port: values.DB_PORT,
      user: values.DB_USER,
      password: values.DB_PASSWORD,
      ssl: values.DB_SSL,
      adminDatabase: values.DB_ADMIN_DATABASE,
    }),
    runner: Object.freeze({
      adminDatabase: values.DB_ADMIN_DATABASE,
      batchSize: values.BATCH_SIZE,
    }),
  });
};
