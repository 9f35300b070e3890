import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { validateDatabaseName, validateTenantId } from '../utils/tenant-validation.js';

const exponentialBackoffSchema = z.object({
  kind: z.literal('exponential'),
  baseDelayMs: z.number().int().min(0).default(100),
  maxDelayMs: z.number().int().min(0).default(5000),
  jitter: z.number().min(0).max(1).default(0.1),
});

const fixedBackoffSchema = z.object({
  kind: z.literal('fixed'),
  delayMs: z.number().int().min(0).default(1000),
});

const securitySchema = z.object({
  mode: z.enum(['disable', 'prefer', 'require', 'verify-full']).default('disable'),
  options: z
    .object({
      ca: z.string().optional(),
      cert: z.string().optional(),
      key: z.string().optional(),
      servername: z.string().optional(),
      rejectUnauthorized: z.boolean().optional(),
    })
    .default({}),
});

export const connectionDescriptorSchema = z
  .object({
    dialect: z.enum(['postgresql', 'mysql', 'sqlite']).default('postgresql'),
    host: z.string().min(1).optional(),
    port: z.number().int().positive().max(65535).optional(),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
    directory: z.string().min(1).optional(),
    maintenanceDatabase: z.string().min(1).optional(),
    tenantDatabaseTemplate: z.string().default('{tenant}__{database}'),
    applicationName: z.string().min(1).default('db-session'),
    defaultSchema: z.string().min(1).default('public'),
    connectTimeoutMs: z.number().int().positive().default(30000),
    pool: z
      .object({
        enabled: z.boolean().default(false),
        min: z.number().int().min(0).default(1),
        max: z.number().int().min(1).default(10),
        idleTimeoutMs: z.number().int().min(0).default(30000),
        recycleMs: z.number().int().min(0).default(300000),
      })
      .default({}),
    retry: z
      .object({
        maxRetries: z.number().int().min(0, 'maxRetries must not be negative').default(5),
        backoff: z
          .discriminatedUnion('kind', [exponentialBackoffSchema, fixedBackoffSchema])
          .default({ kind: 'exponential' }),
        retryableErrors: z.array(z.string()).default([]),
      })
      .default({}),
    autoCreateDatabase: z.boolean().default(true),
    cacheEngines: z.boolean().default(true),
    security: securitySchema.default({}),
  })
  .superRefine((value, ctx) => {
    if (value.dialect === 'sqlite') {
      if (!value.directory) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['directory'],
          message: 'directory is required for sqlite',
        });
      }
    } else {
      if (!value.host) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['host'],
          message: `host is required for ${value.dialect}`,
        });
      }
      if (!value.username) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['username'],
          message: `username is required for ${value.dialect}`,
        });
      }
    }

    if (value.pool.min > value.pool.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pool', 'min'],
        message: `pool.min (${value.pool.min}) must not exceed pool.max (${value.pool.max})`,
      });
    }

    const backoff = value.retry.backoff;
    if (backoff.kind === 'exponential' && backoff.baseDelayMs > backoff.maxDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'backoff', 'baseDelayMs'],
        message: 'baseDelayMs must not exceed maxDelayMs',
      });
    }

    for (const placeholder of ['{tenant}', '{database}']) {
      if (!value.tenantDatabaseTemplate.includes(placeholder)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tenantDatabaseTemplate'],
          message: `tenantDatabaseTemplate must contain ${placeholder}`,
        });
      }
    }
  });

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ConnectionDescriptorInput = z.input<typeof connectionDescriptorSchema>;
export type ConnectionDescriptor = DeepReadonly<z.output<typeof connectionDescriptorSchema>>;
export type BackoffSettings = ConnectionDescriptor['retry']['backoff'];
export type SecurityMode = ConnectionDescriptor['security']['mode'];

const DEFAULT_PORTS: Record<ConnectionDescriptor['dialect'], number | undefined> = {
  postgresql: 5432,
  mysql: 3306,
  sqlite: undefined,
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function createConnectionDescriptor(input: ConnectionDescriptorInput): ConnectionDescriptor {
  const parsed = connectionDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid connection descriptor: ${issues.join('; ')}`, issues);
  }

  const descriptor = parsed.data;
  return deepFreeze({
    ...descriptor,
    port: descriptor.port ?? DEFAULT_PORTS[descriptor.dialect],
    maintenanceDatabase:
      descriptor.maintenanceDatabase ?? (descriptor.dialect === 'postgresql' ? 'postgres' : undefined),
  });
}

export function resolveDatabaseName(
  descriptor: ConnectionDescriptor,
  database: string,
  tenantId?: string
): string {
  validateDatabaseName(database);
  validateTenantId(tenantId, database);

  if (tenantId === undefined) {
    return database;
  }

  const resolved = descriptor.tenantDatabaseTemplate
    .replaceAll('{tenant}', tenantId)
    .replaceAll('{database}', database);
  validateDatabaseName(resolved);
  return resolved;
}

export function engineCacheKey(descriptor: ConnectionDescriptor, resolvedName: string): string {
  if (descriptor.dialect === 'sqlite') {
    return `sqlite://${descriptor.directory}/${resolvedName}`;
  }
  return `${descriptor.dialect}://${descriptor.host}:${descriptor.port}/${resolvedName}`;
}

/**
 * Log-safe rendering of a connection target. Never includes the password.
 */
export function describeTarget(descriptor: ConnectionDescriptor, resolvedName: string): string {
  if (descriptor.dialect === 'sqlite') {
    return engineCacheKey(descriptor, resolvedName);
  }
  return `${descriptor.dialect}://${descriptor.username}@${descriptor.host}:${descriptor.port}/${resolvedName}`;
}
