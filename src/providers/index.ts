/**
 * Decryptors and credential sinks.
 *
 * Built-in decryptors:
 *   - rage: the rage CLI (default)
 *   - age:  the reference age CLI
 *
 * Usage:
 *   import { createDecryptor, SqlCredentialSink } from './providers';
 *
 *   const decryptor = createDecryptor('rage', { timeoutMs: 10000 });
 *   const sink = new SqlCredentialSink(async (sql) => db.run(sql));
 */

export {
  createDecryptor,
  listDecryptorTypes,
  registerDecryptorType,
} from './registry';

export type { DecryptorFactory, DecryptorOptions } from './registry';

export type {
  CredentialSink,
  Decryptor,
  HealthCheckResult,
} from './types';

export { AgeCliDecryptor, DEFAULT_DECRYPT_TIMEOUT_MS } from './age';
export type { AgeCliDecryptorOptions } from './age';

export {
  MemoryCredentialSink,
  SqlCredentialSink,
  quoteSqlIdentifier,
  quoteSqlString,
  renderCreateSecretSql,
} from './sinks';
export type { SqlExecutor } from './sinks';
