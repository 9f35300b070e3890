import { describe, expect, it, vi } from 'vitest';
import type { Engine, TransactionClient } from '../driver/types.js';
import { SchemaError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { DialectName } from '../types/index.js';
import { mysqlProfile, postgresProfile } from './dialects.js';
import {
  DeclarativeSchemaMaterializer,
  orderTables,
  planSchema,
  resolveSchema,
} from './materializer.js';
import type { SchemaDefinition } from './types.js';

const schema: SchemaDefinition = {
  tables: {
    orders: {
      columns: {
        id: { type: 'integer', primaryKey: true },
        customer_id: { type: 'integer', references: { table: 'customers', column: 'id' } },
      },
      indexes: [{ columns: ['customer_id'] }],
    },
    customers: {
      columns: {
        id: { type: 'integer', primaryKey: true },
      },
    },
  },
};

function createStubEngine(dialect: DialectName, existingTables: string[]) {
  const executed: string[] = [];
  const transactions: string[][] = [];
  const queries: { sql: string; params: unknown[] | undefined }[] = [];

  const engine: Engine = {
    dialect,
    database: 't1__orders',
    ping: vi.fn(async () => {}),
    query: async <T>(sql: string, params?: unknown[]) => {
      queries.push({ sql, params });
      return {
        rows: existingTables.map((table_name) => ({ table_name })) as T[],
        rowCount: existingTables.length,
      };
    },
    execute: async (sql: string) => {
      executed.push(sql);
      return { rowCount: 0 };
    },
    transaction: async <T>(fn: (trx: TransactionClient) => Promise<T>) => {
      const batch: string[] = [];
      const result = await fn({
        query: async <R>() => ({ rows: [] as R[], rowCount: 0 }),
        execute: async (sql: string) => {
          batch.push(sql);
          return { rowCount: 0 };
        },
      });
      transactions.push(batch);
      return result;
    },
    openSession: () => {
      throw new Error('not used');
    },
    dispose: async () => {},
  };

  return { engine, executed, transactions, queries };
}

describe('orderTables', () => {
  it('should place referenced tables first', () => {
    expect(orderTables(schema).map(([name]) => name)).toEqual(['customers', 'orders']);
  });

  it('should keep declaration order for reference cycles', () => {
    const cyclic: SchemaDefinition = {
      tables: {
        a: { columns: { b_id: { type: 'integer', references: { table: 'b', column: 'id' } } } },
        b: { columns: { a_id: { type: 'integer', references: { table: 'a', column: 'id' } } } },
      },
    };

    expect(orderTables(cyclic).map(([name]) => name)).toEqual(['a', 'b']);
  });
});

describe('planSchema', () => {
  const mysql = { profile: mysqlProfile };
  const billing = { profile: postgresProfile, schemaName: 'billing' };

  it('should skip tables that already exist', () => {
    expect(planSchema(mysql, schema, new Set(['customers']))).toEqual([
      'CREATE TABLE IF NOT EXISTS `orders` (`id` INT PRIMARY KEY, `customer_id` INT NOT NULL, ' +
        'CONSTRAINT `fk_orders_customer_id` FOREIGN KEY (`customer_id`) REFERENCES `customers` (`id`)' +
        ') ENGINE=InnoDB DEFAULT CHARSET=utf8mb4',
      'CREATE INDEX `idx_orders_customer_id` ON `orders` (`customer_id`)',
    ]);
  });

  it('should plan nothing when every table exists', () => {
    expect(planSchema(mysql, schema, new Set(['customers', 'orders']))).toEqual([]);
  });

  it('should create the schema before the tables that live in it', () => {
    expect(planSchema(billing, schema, new Set())).toEqual([
      'CREATE SCHEMA IF NOT EXISTS "billing"',
      'CREATE TABLE IF NOT EXISTS "billing"."customers" ("id" INTEGER PRIMARY KEY)',
      'CREATE TABLE IF NOT EXISTS "billing"."orders" ("id" INTEGER PRIMARY KEY, ' +
        '"customer_id" INTEGER NOT NULL REFERENCES "billing"."customers" ("id"))',
      'CREATE INDEX IF NOT EXISTS "idx_orders_customer_id" ON "billing"."orders" ("customer_id")',
    ]);
  });

  it('should not create the schema when no table is missing', () => {
    expect(planSchema(billing, schema, new Set(['customers', 'orders']))).toEqual([]);
  });
});

describe('resolveSchema', () => {
  it('should apply a single definition to every database', () => {
    expect(resolveSchema(schema, 'anything')).toBe(schema);
  });

  it('should look up records by logical database name', () => {
    expect(resolveSchema({ orders: schema }, 'orders')).toBe(schema);
    expect(resolveSchema({ orders: schema }, 'billing')).toBeUndefined();
  });

  it('should call resolver functions', () => {
    const resolver = vi.fn(() => schema);
    expect(resolveSchema(resolver, 'orders')).toBe(schema);
    expect(resolver).toHaveBeenCalledWith('orders');
  });
});

describe('DeclarativeSchemaMaterializer', () => {
  it('should create missing tables in one transaction when DDL is transactional', async () => {
    const { engine, executed, transactions } = createStubEngine('postgresql', []);
    const materializer = new DeclarativeSchemaMaterializer(schema, { logger: silentLogger });

    await materializer.materialize(engine, 'orders');

    expect(executed).toEqual([]);
    expect(transactions).toHaveLength(1);
    expect(transactions[0]).toHaveLength(3);
    expect(transactions[0][0]).toBe('CREATE TABLE IF NOT EXISTS "customers" ("id" INTEGER PRIMARY KEY)');
  });

  it('should list and create tables in the configured schema', async () => {
    const { engine, transactions, queries } = createStubEngine('postgresql', []);
    const materializer = new DeclarativeSchemaMaterializer(schema, {
      logger: silentLogger,
      schemaName: 'billing',
    });

    await materializer.materialize(engine, 'orders');

    expect(queries).toHaveLength(1);
    expect(queries[0]?.params).toEqual(['billing']);
    expect(transactions[0]?.[0]).toBe('CREATE SCHEMA IF NOT EXISTS "billing"');
    expect(transactions[0]?.[1]).toBe('CREATE TABLE IF NOT EXISTS "billing"."customers" ("id" INTEGER PRIMARY KEY)');
  });

  it('should ignore the schema name for dialects without schemas', async () => {
    const { engine, executed, queries } = createStubEngine('mysql', []);
    const materializer = new DeclarativeSchemaMaterializer(schema, {
      logger: silentLogger,
      schemaName: 'billing',
    });

    await materializer.materialize(engine, 'orders');

    expect(queries[0]?.params).toEqual([]);
    expect(executed[0]).toBe(
      'CREATE TABLE IF NOT EXISTS `customers` (`id` INT PRIMARY KEY) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4'
    );
  });

  it('should run statements one by one without transactional DDL', async () => {
    const { engine, executed, transactions } = createStubEngine('mysql', []);
    const materializer = new DeclarativeSchemaMaterializer(schema, { logger: silentLogger });

    await materializer.materialize(engine, 'orders');

    expect(transactions).toEqual([]);
    expect(executed).toHaveLength(3);
  });

  it('should be a no-op when tables already exist', async () => {
    const { engine, executed, transactions } = createStubEngine('postgresql', ['customers', 'orders']);
    const materializer = new DeclarativeSchemaMaterializer(schema, { logger: silentLogger });

    await materializer.materialize(engine, 'orders');

    expect(executed).toEqual([]);
    expect(transactions).toEqual([]);
  });

  it('should do nothing for databases without a declared schema', async () => {
    const { engine, executed } = createStubEngine('postgresql', []);
    const materializer = new DeclarativeSchemaMaterializer({ billing: schema }, { logger: silentLogger });

    await materializer.materialize(engine, 'orders');

    expect(executed).toEqual([]);
  });

  it('should wrap DDL failures in SchemaError', async () => {
    const { engine } = createStubEngine('mysql', []);
    engine.execute = async () => {
      throw new Error('permission denied for schema public');
    };
    const materializer = new DeclarativeSchemaMaterializer(schema, { logger: silentLogger });

    const error = await materializer.materialize(engine, 'orders').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({
      database: 'orders',
      state: 'SchemaReady',
      message: 'Failed to materialize schema for "t1__orders": permission denied for schema public',
    });
  });
});
