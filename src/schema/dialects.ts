import { ConfigurationError } from '../errors.js';
import type { DialectName } from '../types/index.js';
import type { ColumnType } from './types.js';

export interface ListTablesQuery {
  sql: string;
  params: unknown[];
}

/**
 * What the DDL builder needs to know about a dialect. Everything that differs
 * between servers lives here so that statements are assembled in one place.
 */
export interface DialectProfile {
  name: DialectName;
  /** DDL can run inside a transaction and roll back with it. */
  transactionalDdl: boolean;
  /** Tables live in a named schema inside the database. */
  namespaced: boolean;
  columnTypes: Readonly<Record<ColumnType, string>>;
  defaults: { uuid: string; now: string };
  /** `inline` puts REFERENCES on the column, `constraint` adds a named FOREIGN KEY clause. */
  foreignKeys: 'inline' | 'constraint';
  /** CREATE INDEX accepts IF NOT EXISTS. */
  indexGuard: boolean;
  partialIndexes: boolean;
  tableOptions?: string;
  /** Rows carry the table name in a `table_name` column. */
  listTables(schemaName?: string): ListTablesQuery;
}

const SQLITE_UUID =
  "(lower(hex(randomblob(4))) || '-' || lower(hex(randomblob(2))) || '-4' || " +
  "substr(lower(hex(randomblob(2))), 2) || '-' || substr('89ab', abs(random()) % 4 + 1, 1) || " +
  "substr(lower(hex(randomblob(2))), 2) || '-' || lower(hex(randomblob(6))))";

export const postgresProfile: DialectProfile = {
  name: 'postgresql',
  transactionalDdl: true,
  namespaced: true,
  columnTypes: {
    uuid: 'UUID',
    string: 'TEXT',
    text: 'TEXT',
    integer: 'INTEGER',
    bigint: 'BIGINT',
    float: 'DOUBLE PRECISION',
    decimal: 'NUMERIC',
    boolean: 'BOOLEAN',
    datetime: 'TIMESTAMPTZ',
    date: 'DATE',
    time: 'TIME',
    json: 'JSONB',
    binary: 'BYTEA',
  },
  defaults: { uuid: 'gen_random_uuid()', now: 'now()' },
  foreignKeys: 'inline',
  indexGuard: true,
  partialIndexes: true,
  listTables(schemaName) {
    const filter = schemaName === undefined ? 'current_schema()' : '$1';
    return {
      sql:
        'SELECT table_name FROM information_schema.tables ' +
        `WHERE table_schema = ${filter} AND table_type = 'BASE TABLE'`,
      params: schemaName === undefined ? [] : [schemaName],
    };
  },
};

export const mysqlProfile: DialectProfile = {
  name: 'mysql',
  transactionalDdl: false,
  namespaced: false,
  columnTypes: {
    uuid: 'CHAR(36)',
    string: 'VARCHAR(255)',
    text: 'TEXT',
    integer: 'INT',
    bigint: 'BIGINT',
    float: 'DOUBLE',
    decimal: 'DECIMAL(10,2)',
    boolean: 'TINYINT(1)',
    datetime: 'DATETIME',
    date: 'DATE',
    time: 'TIME',
    json: 'JSON',
    binary: 'BLOB',
  },
  defaults: { uuid: '(UUID())', now: 'CURRENT_TIMESTAMP' },
  foreignKeys: 'constraint',
  indexGuard: false,
  partialIndexes: false,
  tableOptions: 'ENGINE=InnoDB DEFAULT CHARSET=utf8mb4',
  listTables() {
    return {
      sql:
        'SELECT table_name AS table_name FROM information_schema.tables ' +
        "WHERE table_schema = DATABASE() AND table_type = 'BASE TABLE'",
      params: [],
    };
  },
};

export const sqliteProfile: DialectProfile = {
  name: 'sqlite',
  transactionalDdl: true,
  namespaced: false,
  columnTypes: {
    uuid: 'TEXT',
    string: 'TEXT',
    text: 'TEXT',
    integer: 'INTEGER',
    bigint: 'INTEGER',
    float: 'REAL',
    decimal: 'REAL',
    boolean: 'INTEGER',
    datetime: 'TEXT',
    date: 'TEXT',
    time: 'TEXT',
    json: 'TEXT',
    binary: 'BLOB',
  },
  defaults: { uuid: SQLITE_UUID, now: 'CURRENT_TIMESTAMP' },
  foreignKeys: 'inline',
  indexGuard: true,
  partialIndexes: true,
  listTables() {
    return {
      sql: "SELECT name AS table_name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'",
      params: [],
    };
  },
};

const PROFILES: Readonly<Record<DialectName, DialectProfile>> = {
  postgresql: postgresProfile,
  mysql: mysqlProfile,
  sqlite: sqliteProfile,
};

export function getDialectProfile(name: DialectName): DialectProfile {
  const profile: DialectProfile | undefined = PROFILES[name];
  if (!profile) {
    throw new ConfigurationError(`Unsupported dialect: ${String(name)}`);
  }
  return profile;
}
