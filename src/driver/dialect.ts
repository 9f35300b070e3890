import { ConfigurationError } from '../errors.js';
import type { DialectName } from '../types/index.js';

export function detectDialect(connectionString: string): DialectName {
  if (connectionString.startsWith('postgres://') || connectionString.startsWith('postgresql://')) {
    return 'postgresql';
  }
  if (connectionString.startsWith('mysql://') || connectionString.startsWith('mariadb://')) {
    return 'mysql';
  }
  if (connectionString.startsWith('sqlite://') || connectionString.startsWith('file://')) {
    return 'sqlite';
  }
  throw new ConfigurationError(
    `Unable to detect database dialect from connection string: ${connectionString.split('://')[0]}://...`
  );
}

export function quoteIdentifier(dialect: DialectName, identifier: string): string {
  if (dialect === 'mysql') {
    return `\`${identifier.replaceAll('`', '``')}\``;
  }
  return `"${identifier.replaceAll('"', '""')}"`;
}
