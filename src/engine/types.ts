/**
 * Target location encoded in a storage path: `<prefix>/<database>/<schema>/<table>/<file>`.
 */
export type GroupKey = {
  readonly database: string;
  readonly schema: string;
  readonly table: string;
};

export type ObjectKind = 'tabular' | 'image';

/** An accepted storage object with its parsed path components */
export type ObjectRef = GroupKey & {
  readonly key: string;
  readonly kind: ObjectKind;
  readonly fileName: string;
};

export type SkipReason = 'too-few-segments' | 'unsupported-extension' | 'invalid-identifier';

export type SkippedObject = {
  readonly key: string;
  readonly reason: SkipReason;
  readonly detail?: string;
};

export type ImageRecord = {
  readonly fileName: string;
  readonly url: string;
};

export type TabularGroup = {
  readonly key: GroupKey;
  readonly paths: string[];
};

export type ImageGroup = {
  readonly key: GroupKey;
  readonly records: ImageRecord[];
};

/** Result of one discovery pass. Maps keep insertion (listing) order. */
export type ObjectIndex = {
  readonly tabular: Map<string, TabularGroup>;
  readonly images: Map<string, ImageGroup>;
  readonly skipped: SkippedObject[];
};

/** A CSV cell. Empty fields are null. */
export type CellValue = string | null;

export type MergedDataset = {
  readonly columns: string[];
  readonly rows: CellValue[][];
};

export type ColumnType = 'integer' | 'real' | 'text';

export type InferredColumn = {
  readonly name: string;
  readonly type: ColumnType;
};

export type GroupResult = {
  readonly kind: ObjectKind;
  readonly key: GroupKey;
  /** Number of source objects in the group (shards or images) */
  readonly objects: number;
  readonly rowsSubmitted: number;
  readonly rowsInserted: number;
};

export type RunResult = {
  readonly objectsListed: number;
  readonly groups: GroupResult[];
  readonly skipped: SkippedObject[];
  readonly elapsedMs: number;
};

export type LoadOptions = {
  /** Rows per INSERT statement inside the group's transaction */
  readonly batchSize: number;
};
