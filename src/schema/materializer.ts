import type { Engine, SyncEngine } from '../driver/types.js';
import { SchemaError, describeCause } from '../errors.js';
import { type Logger, consoleLogger } from '../logger.js';
import {
  type DdlTarget,
  createIndexStatement,
  createSchemaStatement,
  createTableStatement,
} from './ddl.js';
import { getDialectProfile } from './dialects.js';
import type { SchemaDefinition, TableDefinition } from './types.js';

/**
 * Creates the declared tables of a logical database on the given engine.
 * Must be idempotent: tables that already exist are left untouched.
 */
export interface SchemaMaterializer {
  materialize(engine: Engine, database: string): Promise<void>;
}

export interface SyncSchemaMaterializer {
  materialize(engine: SyncEngine, database: string): void;
}

export type SchemaSource =
  | SchemaDefinition
  | Record<string, SchemaDefinition>
  | ((database: string) => SchemaDefinition | undefined);

export interface MaterializerOptions {
  logger?: Logger;
  /** Schema the tables are created in, for dialects that have one inside a database. */
  schemaName?: string;
}

function isSchemaDefinition(value: unknown): value is SchemaDefinition {
  return (
    typeof value === 'object' &&
    value !== null &&
    'tables' in value &&
    typeof value.tables === 'object' &&
    value.tables !== null
  );
}

/**
 * A single definition applies to every database; a record is keyed by logical
 * database name.
 */
export function resolveSchema(source: SchemaSource, database: string): SchemaDefinition | undefined {
  if (typeof source === 'function') {
    return source(database);
  }
  if (isSchemaDefinition(source)) {
    return source;
  }
  return source[database];
}

/**
 * Orders tables so that referenced tables are created first. Tables caught in
 * a reference cycle keep their declaration order.
 */
export function orderTables(schema: SchemaDefinition): [string, TableDefinition][] {
  const entries = Object.entries(schema.tables);
  const ordered: [string, TableDefinition][] = [];
  const placed = new Set<string>();
  let remaining = entries;

  while (remaining.length > 0) {
    const ready = remaining.filter(([name, def]) =>
      Object.values(def.columns).every(
        (column) =>
          !column.references ||
          column.references.table === name ||
          placed.has(column.references.table) ||
          !(column.references.table in schema.tables)
      )
    );
    const batch = ready.length > 0 ? ready : remaining;

    for (const entry of batch) {
      ordered.push(entry);
      placed.add(entry[0]);
    }
    remaining = remaining.filter(([name]) => !placed.has(name));
  }

  return ordered;
}

/**
 * Statements creating the tables missing from `existingTables`, each followed
 * by its indexes. The schema itself is created first when any table is missing.
 */
export function planSchema(
  target: DdlTarget,
  schema: SchemaDefinition,
  existingTables: ReadonlySet<string>
): string[] {
  const statements: string[] = [];

  for (const [name, def] of orderTables(schema)) {
    if (existingTables.has(name)) continue;

    statements.push(createTableStatement(target, name, def));
    for (const index of def.indexes ?? []) {
      statements.push(createIndexStatement(target, name, index));
    }
  }

  const createSchema = createSchemaStatement(target);
  if (statements.length > 0 && createSchema !== undefined) {
    statements.unshift(createSchema);
  }
  return statements;
}

export class DeclarativeSchemaMaterializer implements SchemaMaterializer {
  private logger: Logger;
  private schemaName?: string;

  constructor(
    private source: SchemaSource,
    options: MaterializerOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.schemaName = options.schemaName;
  }

  async materialize(engine: Engine, database: string): Promise<void> {
    const schema = resolveSchema(this.source, database);
    if (!schema) return;

    const target: DdlTarget = { profile: getDialectProfile(engine.dialect), schemaName: this.schemaName };
    const listing = target.profile.listTables(this.schemaName);

    try {
      const existing = await engine.query<{ table_name: string }>(listing.sql, listing.params);
      const statements = planSchema(
        target,
        schema,
        new Set(existing.rows.map((row) => row.table_name))
      );

      if (statements.length === 0) {
        this.logger.debug(`Schema for "${engine.database}" is up to date`);
        return;
      }

      if (target.profile.transactionalDdl) {
        await engine.transaction(async (trx) => {
          for (const statement of statements) {
            await trx.execute(statement);
          }
        });
      } else {
        for (const statement of statements) {
          await engine.execute(statement);
        }
      }

      this.logger.info(`Applied ${statements.length} schema statement(s) to "${engine.database}"`);
    } catch (error) {
      throw new SchemaError(
        `Failed to materialize schema for "${engine.database}": ${describeCause(error)}`,
        database,
        error
      );
    }
  }
}

export class SyncDeclarativeSchemaMaterializer implements SyncSchemaMaterializer {
  private logger: Logger;
  private schemaName?: string;

  constructor(
    private source: SchemaSource,
    options: MaterializerOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.schemaName = options.schemaName;
  }

  materialize(engine: SyncEngine, database: string): void {
    const schema = resolveSchema(this.source, database);
    if (!schema) return;

    const target: DdlTarget = { profile: getDialectProfile(engine.dialect), schemaName: this.schemaName };
    const listing = target.profile.listTables(this.schemaName);

    try {
      const existing = engine.query<{ table_name: string }>(listing.sql, listing.params);
      const statements = planSchema(
        target,
        schema,
        new Set(existing.rows.map((row) => row.table_name))
      );

      if (statements.length === 0) {
        this.logger.debug(`Schema for "${engine.database}" is up to date`);
        return;
      }

      if (target.profile.transactionalDdl) {
        engine.transaction((trx) => {
          for (const statement of statements) {
            trx.execute(statement);
          }
        });
      } else {
        for (const statement of statements) {
          engine.execute(statement);
        }
      }

      this.logger.info(`Applied ${statements.length} schema statement(s) to "${engine.database}"`);
    } catch (error) {
      throw new SchemaError(
        `Failed to materialize schema for "${engine.database}": ${describeCause(error)}`,
        database,
        error
      );
    }
  }
}
