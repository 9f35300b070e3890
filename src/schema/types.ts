export const COLUMN_TYPES = [
  'uuid',
  'string',
  'text',
  'integer',
  'bigint',
  'float',
  'decimal',
  'boolean',
  'datetime',
  'date',
  'time',
  'json',
  'binary',
] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export type ReferentialAction = 'cascade' | 'set-null' | 'restrict' | 'no-action';

/**
 * `'uuid'` and `'now'` are rendered per dialect; `{ sql }` is emitted as written.
 */
export type ColumnDefault = 'uuid' | 'now' | { sql: string };

export interface ForeignKey {
  table: string;
  column: string;
  onDelete?: ReferentialAction;
  onUpdate?: ReferentialAction;
}

export interface ColumnDefinition {
  type: ColumnType;
  primaryKey?: boolean;
  /** Columns are NOT NULL unless marked nullable. */
  nullable?: boolean;
  unique?: boolean;
  default?: ColumnDefault;
  references?: ForeignKey;
}

export interface IndexDefinition {
  /** Defaults to `idx_<table>_<columns>`. */
  name?: string;
  columns: readonly string[];
  unique?: boolean;
  /** Predicate of a partial index. */
  where?: string;
}

export interface TableDefinition {
  columns: Record<string, ColumnDefinition>;
  indexes?: readonly IndexDefinition[];
  /** Composite primary key; use `primaryKey` on the column for a single one. */
  primaryKey?: readonly string[];
}

/** The tables a logical database must contain. */
export interface SchemaDefinition {
  tables: Record<string, TableDefinition>;
}
