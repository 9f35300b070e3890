import { z } from 'zod';
import { detectDialect } from '../driver/dialect.js';
import { ConfigurationError } from '../errors.js';
import {
  type ConnectionDescriptor,
  type ConnectionDescriptorInput,
  createConnectionDescriptor,
  formatIssues,
} from './descriptor.js';

const envBoolean = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'TRUE', 'FALSE', 'True', 'False'])
  .transform((value) => ['true', '1', 'yes'].includes(value.toLowerCase()));

const envInteger = z
  .string()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform((value) => Number.parseInt(value, 10));

const envSchema = z.object({
  DB_URI: z.string().min(1).optional(),
  DB_DIALECT: z.enum(['postgresql', 'mysql', 'sqlite']).optional(),
  DB_HOST: z.string().min(1).optional(),
  DB_PORT: envInteger.optional(),
  DB_USER: z.string().min(1).optional(),
  DB_PASSWORD: z.string().optional(),
  DB_DIRECTORY: z.string().min(1).optional(),
  DB_MAINTENANCE_DATABASE: z.string().min(1).optional(),
  DB_TENANT_TEMPLATE: z.string().min(1).optional(),
  DB_APPLICATION_NAME: z.string().min(1).optional(),
  MODULE_NAME: z.string().min(1).optional(),
  DB_DEFAULT_SCHEMA: z.string().min(1).optional(),
  DB_CONNECTION_TIMEOUT: envInteger.optional(),
  DB_ENABLE_POOLING: envBoolean.optional(),
  DB_MIN_CONNECTION: envInteger.optional(),
  DB_MAX_CONNECTION: envInteger.optional(),
  DB_POOL_IDLE_TIMEOUT: envInteger.optional(),
  DB_POOL_RECYCLE: envInteger.optional(),
  DB_MAX_RETRY: envInteger.optional(),
  DB_RETRY_BACKOFF: z.enum(['exponential', 'fixed']).optional(),
  DB_RETRY_DELAY_MS: envInteger.optional(),
  DB_RETRY_MAX_DELAY_MS: envInteger.optional(),
  DB_AUTO_CREATE: envBoolean.optional(),
  DB_ANTI_PERSISTENT: envBoolean.optional(),
  DB_SSL_MODE: z.enum(['disable', 'prefer', 'require', 'verify-full']).optional(),
});

type EnvValues = z.output<typeof envSchema>;

interface UriParts {
  dialect: ConnectionDescriptorInput['dialect'];
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  directory?: string;
}

export function parseConnectionUri(uri: string): UriParts {
  const dialect = detectDialect(uri);

  if (dialect === 'sqlite') {
    return { dialect, directory: uri.replace(/^sqlite:\/\//, '').replace(/^file:\/\//, '') };
  }

  let url: URL;
  try {
    url = new URL(uri);
  } catch (error) {
    throw new ConfigurationError(`Invalid DB_URI: ${uri.replace(/:[^:@/]*@/, ':***@')}`, [
      `DB_URI: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  return {
    dialect,
    host: url.hostname || undefined,
    port: url.port ? Number.parseInt(url.port, 10) : undefined,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
  };
}

function buildBackoff(env: EnvValues): NonNullable<ConnectionDescriptorInput['retry']>['backoff'] {
  if (env.DB_RETRY_BACKOFF === 'fixed') {
    return { kind: 'fixed', delayMs: env.DB_RETRY_DELAY_MS };
  }
  return {
    kind: 'exponential',
    baseDelayMs: env.DB_RETRY_DELAY_MS,
    maxDelayMs: env.DB_RETRY_MAX_DELAY_MS,
  };
}

const seconds = (value: number | undefined) => (value === undefined ? undefined : value * 1000);

/**
 * Builds a connection descriptor from `DB_*` environment variables. Explicit
 * variables override the parts parsed from `DB_URI`.
 */
export function loadDescriptorFromEnv(
  env: Record<string, string | undefined> = process.env
): ConnectionDescriptor {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  const uri: Partial<UriParts> = values.DB_URI ? parseConnectionUri(values.DB_URI) : {};

  return createConnectionDescriptor({
    dialect: values.DB_DIALECT ?? uri.dialect,
    host: values.DB_HOST ?? uri.host,
    port: values.DB_PORT ?? uri.port,
    username: values.DB_USER ?? uri.username,
    password: values.DB_PASSWORD ?? uri.password,
    directory: values.DB_DIRECTORY ?? uri.directory,
    maintenanceDatabase: values.DB_MAINTENANCE_DATABASE,
    tenantDatabaseTemplate: values.DB_TENANT_TEMPLATE,
    applicationName: values.DB_APPLICATION_NAME ?? values.MODULE_NAME,
    defaultSchema: values.DB_DEFAULT_SCHEMA,
    connectTimeoutMs: seconds(values.DB_CONNECTION_TIMEOUT),
    pool: {
      enabled: values.DB_ENABLE_POOLING,
      min: values.DB_MIN_CONNECTION,
      max: values.DB_MAX_CONNECTION,
      idleTimeoutMs: seconds(values.DB_POOL_IDLE_TIMEOUT),
      recycleMs: seconds(values.DB_POOL_RECYCLE),
    },
    retry: {
      maxRetries: values.DB_MAX_RETRY,
      backoff: buildBackoff(values),
    },
    autoCreateDatabase: values.DB_AUTO_CREATE,
    cacheEngines: values.DB_ANTI_PERSISTENT === undefined ? undefined : !values.DB_ANTI_PERSISTENT,
    security: {
      mode: values.DB_SSL_MODE,
    },
  });
}
