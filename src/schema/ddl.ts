import { quoteIdentifier } from '../driver/dialect.js';
import type { DialectProfile } from './dialects.js';
import type {
  ColumnDefault,
  ColumnDefinition,
  ForeignKey,
  IndexDefinition,
  ReferentialAction,
  TableDefinition,
} from './types.js';

/** The dialect a statement is built for, and the schema its tables live in. */
export interface DdlTarget {
  profile: DialectProfile;
  /** Ignored by dialects without schemas inside a database. */
  schemaName?: string;
}

const REFERENTIAL_ACTIONS: Record<ReferentialAction, string> = {
  cascade: 'CASCADE',
  'set-null': 'SET NULL',
  restrict: 'RESTRICT',
  'no-action': 'NO ACTION',
};

// Always present; CREATE SCHEMA on it still requires the CREATE privilege.
const BUILT_IN_SCHEMA = 'public';

function quote(target: DdlTarget, identifier: string): string {
  return quoteIdentifier(target.profile.name, identifier);
}

function namespace(target: DdlTarget): string | undefined {
  return target.profile.namespaced ? target.schemaName : undefined;
}

export function qualify(target: DdlTarget, table: string): string {
  const schemaName = namespace(target);
  return schemaName === undefined
    ? quote(target, table)
    : `${quote(target, schemaName)}.${quote(target, table)}`;
}

export function indexName(table: string, index: IndexDefinition): string {
  return index.name || `idx_${table}_${index.columns.join('_')}`;
}

function renderDefault(target: DdlTarget, value: ColumnDefault): string {
  if (value === 'uuid') return target.profile.defaults.uuid;
  if (value === 'now') return target.profile.defaults.now;
  return value.sql;
}

function renderReference(target: DdlTarget, reference: ForeignKey): string {
  let clause = `REFERENCES ${qualify(target, reference.table)} (${quote(target, reference.column)})`;
  if (reference.onDelete) clause += ` ON DELETE ${REFERENTIAL_ACTIONS[reference.onDelete]}`;
  if (reference.onUpdate) clause += ` ON UPDATE ${REFERENTIAL_ACTIONS[reference.onUpdate]}`;
  return clause;
}

function renderColumn(target: DdlTarget, name: string, column: ColumnDefinition): string {
  const parts = [quote(target, name), target.profile.columnTypes[column.type]];

  if (column.primaryKey) {
    parts.push('PRIMARY KEY');
  } else {
    if (!column.nullable) parts.push('NOT NULL');
    if (column.unique) parts.push('UNIQUE');
  }
  if (column.default !== undefined) {
    parts.push(`DEFAULT ${renderDefault(target, column.default)}`);
  }
  if (column.references && target.profile.foreignKeys === 'inline') {
    parts.push(renderReference(target, column.references));
  }

  return parts.join(' ');
}

export function createTableStatement(target: DdlTarget, table: string, def: TableDefinition): string {
  const columns = Object.entries(def.columns);
  const clauses = columns.map(([name, column]) => renderColumn(target, name, column));

  if (def.primaryKey && def.primaryKey.length > 0) {
    if (columns.some(([, column]) => column.primaryKey)) {
      throw new Error(`Table "${table}" declares both a column and a composite primary key`);
    }
    clauses.push(`PRIMARY KEY (${def.primaryKey.map((column) => quote(target, column)).join(', ')})`);
  }

  if (target.profile.foreignKeys === 'constraint') {
    for (const [name, column] of columns) {
      if (!column.references) continue;
      clauses.push(
        `CONSTRAINT ${quote(target, `fk_${table}_${name}`)} FOREIGN KEY (${quote(target, name)}) ` +
          renderReference(target, column.references)
      );
    }
  }

  const options = target.profile.tableOptions ? ` ${target.profile.tableOptions}` : '';
  return `CREATE TABLE IF NOT EXISTS ${qualify(target, table)} (${clauses.join(', ')})${options}`;
}

/**
 * Dialects without `IF NOT EXISTS` on indexes rely on the index only being
 * created together with its table.
 */
export function createIndexStatement(target: DdlTarget, table: string, index: IndexDefinition): string {
  const { profile } = target;
  if (index.where && !profile.partialIndexes) {
    throw new Error(`Partial index on "${table}" is not supported by ${profile.name}`);
  }

  const unique = index.unique ? 'UNIQUE ' : '';
  const guard = profile.indexGuard ? 'IF NOT EXISTS ' : '';
  const columns = index.columns.map((column) => quote(target, column)).join(', ');
  const where = index.where ? ` WHERE ${index.where}` : '';

  return `CREATE ${unique}INDEX ${guard}${quote(target, indexName(table, index))} ON ${qualify(target, table)} (${columns})${where}`;
}

/** `undefined` when the tables need no schema created first. */
export function createSchemaStatement(target: DdlTarget): string | undefined {
  const schemaName = namespace(target);
  if (schemaName === undefined || schemaName === BUILT_IN_SCHEMA) {
    return undefined;
  }
  return `CREATE SCHEMA IF NOT EXISTS ${quote(target, schemaName)}`;
}
