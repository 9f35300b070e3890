export {
  DeclarativeSchemaMaterializer,
  SyncDeclarativeSchemaMaterializer,
  orderTables,
  planSchema,
  resolveSchema,
} from './materializer.js';
export type {
  MaterializerOptions,
  SchemaMaterializer,
  SchemaSource,
  SyncSchemaMaterializer,
} from './materializer.js';

export {
  createIndexStatement,
  createSchemaStatement,
  createTableStatement,
  indexName,
  qualify,
} from './ddl.js';
export type { DdlTarget } from './ddl.js';
export { getDialectProfile, mysqlProfile, postgresProfile, sqliteProfile } from './dialects.js';
export type { DialectProfile, ListTablesQuery } from './dialects.js';
