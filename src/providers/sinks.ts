/**
 * Credential sinks.
 *
 * A sink registers a finished record somewhere and reports what it did.
 * Registration is "create or replace" keyed by the derived secret name.
 */

import { describeCredential, type CredentialRecord } from '../core/credential';
import type { CredentialSink } from './types';

/**
 * Quote a SQL string literal.
 */
export function quoteSqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Quote a SQL identifier. The derived secret name embeds the database name
 * verbatim, so it is always emitted quoted.
 */
export function quoteSqlIdentifier(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * The statement that registers `record` as a named secret:
 *   CREATE OR REPLACE SECRET "duck_rage_db" (TYPE postgres, HOST '...', ...)
 */
export function renderCreateSecretSql(record: CredentialRecord): string {
  return [
    `CREATE OR REPLACE SECRET ${quoteSqlIdentifier(record.secretName)} (`,
    `TYPE ${record.databaseKind}, `,
    `HOST ${quoteSqlString(record.host)}, `,
    `PORT ${record.port}, `,
    `DATABASE ${quoteSqlString(record.databaseName)}, `,
    `USER ${quoteSqlString(record.connectionUser)}, `,
    `PASSWORD ${quoteSqlString(record.secretValue.reveal())}`,
    ')',
  ].join('');
}

export type SqlExecutor = (sql: string) => Promise<void>;

/**
 * Registers records by executing CREATE OR REPLACE SECRET through a caller
 * supplied executor (e.g. an in-process database connection).
 */
export class SqlCredentialSink implements CredentialSink {
  private execute: SqlExecutor;

  constructor(execute: SqlExecutor) {
    this.execute = execute;
  }

  async register(record: CredentialRecord): Promise<string> {
    await this.execute(renderCreateSecretSql(record));
    return describeCredential(record);
  }
}

/**
 * Keeps registered records in memory, replacing by secret name.
 */
export class MemoryCredentialSink implements CredentialSink {
  private records = new Map<string, CredentialRecord>();

  async register(record: CredentialRecord): Promise<string> {
    this.records.set(record.secretName, record);
    return describeCredential(record);
  }

  get(secretName: string): CredentialRecord | undefined {
    return this.records.get(secretName);
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }
}
