/**
 * Source dialect interface.
 * Implement this to read objects from any object store (S3, GCS, local fixtures, etc.)
 */
export interface SourceDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Bucket or container being read, for logging */
  readonly location: string;

  /** List every object key, in the order the store returns them */
  listObjects(): Promise<string[]>;

  /** Fetch the full content of one object */
  fetchObject(key: string): Promise<Buffer>;

  /** Reference URL recorded for image objects */
  publicUrl(key: string): string;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/**
 * Configuration for source dialects
 */
export type SourceConfig =
  | {
      type: 's3';
      bucket: string;
      prefix: string;
      region: string;
      endpoint?: string;
      credentialsFile?: string;
      publicUrlBase?: string;
    }
  | { type: 'custom'; [key: string]: unknown };
