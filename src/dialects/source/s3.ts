import { S3Client, ListObjectsV2Command, GetObjectCommand, type S3ClientConfig } from '@aws-sdk/client-s3';
import { fromIni } from '@aws-sdk/credential-providers';
import type { SourceDialect, SourceConfig } from '../source';
import { registerSource } from '../source-registry';

type S3SourceConfig = Extract<SourceConfig, { type: 's3' }>;

const encodeKey = (key: string): string => key.split('/').map(encodeURIComponent).join('/');

const trimTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

/**
 * Reference URL of an object:
 * explicit base, else path-style on a custom endpoint, else virtual-hosted AWS.
 */
export const buildPublicUrl = (
  config: Pick<S3SourceConfig, 'bucket' | 'region' | 'endpoint' | 'publicUrlBase'>,
  key: string
): string => {
  const encoded = encodeKey(key);
  if (config.publicUrlBase) {
    return `${trimTrailingSlash(config.publicUrlBase)}/${encoded}`;
  }
  if (config.endpoint) {
    return `${trimTrailingSlash(config.endpoint)}/${config.bucket}/${encoded}`;
  }
  return `https://${config.bucket}.s3.${config.region}.amazonaws.com/${encoded}`;
};

/**
 * S3 source dialect.
 * Lists every key under the prefix and downloads objects whole.
 */
export class S3Source implements SourceDialect {
  readonly name = 's3';

  private readonly client: S3Client;
  private readonly config: S3SourceConfig;

  constructor(config: SourceConfig, client?: S3Client) {
    if (config.type !== 's3') {
      throw new Error('Invalid config type for S3 source');
    }
    this.config = config;
    this.client = client ?? new S3Client(S3Source.clientConfig(config));
  }

  private static clientConfig(config: S3SourceConfig): S3ClientConfig {
    return {
      region: config.region,
      ...(config.endpoint ? { endpoint: config.endpoint, forcePathStyle: true } : {}),
      ...(config.credentialsFile ? { credentials: fromIni({ filepath: config.credentialsFile }) } : {}),
    };
  }

  get location(): string {
    return this.config.prefix ? `s3://${this.config.bucket}/${this.config.prefix}` : `s3://${this.config.bucket}`;
  }

  async listObjects(): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.config.bucket,
          Prefix: this.config.prefix || undefined,
          ContinuationToken: continuationToken,
        })
      );

      for (const object of response.Contents ?? []) {
        if (object.Key) {
          keys.push(object.Key);
        }
      }

      continuationToken = response.NextContinuationToken;
    } while (continuationToken);

    return keys;
  }

  async fetchObject(key: string): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: this.config.bucket, Key: key }));

    if (!response.Body) {
      return Buffer.alloc(0);
    }

    return Buffer.from(await response.Body.transformToByteArray());
  }

  publicUrl(key: string): string {
    return buildPublicUrl(this.config, key);
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}

// Register the dialect
registerSource('s3', (config: SourceConfig) => new S3Source(config));
