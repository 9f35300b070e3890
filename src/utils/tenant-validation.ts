import { DbSessionError } from '../errors.js';

const TENANT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export class TenantContextError extends DbSessionError {
  constructor(message: string) {
    super(message);
    this.name = 'TenantContextError';
  }
}

/**
 * Tenant ids end up inside database identifiers, so only letters, digits,
 * underscores and hyphens are accepted.
 */
export function validateTenantId(tenantId: string | undefined, database: string): void {
  if (tenantId === undefined) {
    return;
  }

  if (typeof tenantId !== 'string' || tenantId.trim() === '') {
    throw new TenantContextError(
      `Invalid tenant id for database "${database}": tenant id must be a non-empty string.`
    );
  }

  if (!TENANT_ID_PATTERN.test(tenantId)) {
    throw new TenantContextError(
      `Invalid tenant id "${tenantId}" for database "${database}": ` +
        'only letters, digits, "_" and "-" are allowed.'
    );
  }
}

export function validateDatabaseName(database: string): void {
  if (typeof database !== 'string' || database.trim() === '') {
    throw new TenantContextError('Database name must be a non-empty string.');
  }

  if (!TENANT_ID_PATTERN.test(database)) {
    throw new TenantContextError(
      `Invalid database name "${database}": only letters, digits, "_" and "-" are allowed.`
    );
  }
}
