export { COLUMN_TYPES } from '../schema/types.js';
export type {
  ColumnDefault,
  ColumnDefinition,
  ColumnType,
  ForeignKey,
  IndexDefinition,
  ReferentialAction,
  SchemaDefinition,
  TableDefinition,
} from '../schema/types.js';

export type DialectName = 'postgresql' | 'mysql' | 'sqlite';

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

export type MaybePromise<T> = T | Promise<T>;
