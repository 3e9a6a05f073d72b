/**
 * Credential Assembler
 */

import { validateResolutionRequest, type DatabaseKind, type ResolutionRequest } from './request';
import { REDACTED, SecretValue } from './secret';

export const SECRET_NAME_PREFIX = 'duck_rage_';

/**
 * Finished connection descriptor handed to a sink. `secretValue` only
 * renders as a placeholder when printed or serialized.
 */
export interface CredentialRecord {
  readonly secretName: string;
  readonly databaseKind: DatabaseKind;
  readonly host: string;
  readonly port: number;
  readonly databaseName: string;
  readonly connectionUser: string;
  readonly secretValue: SecretValue;
}

/**
 * Name under which the credential is registered. Depends on the database
 * name only, so re-resolving the same database targets the same entry.
 * The database name is not sanitized here.
 */
export function deriveSecretName(databaseName: string): string {
  return (SECRET_NAME_PREFIX + databaseName).toLowerCase();
}

/**
 * @throws AssemblyError if the request's connection parameters are invalid
 */
export function assembleCredential(
  request: ResolutionRequest,
  secretValue: SecretValue
): CredentialRecord {
  validateResolutionRequest(request);

  return Object.freeze({
    secretName: deriveSecretName(request.databaseName),
    databaseKind: request.databaseKind,
    host: request.host,
    port: request.port,
    databaseName: request.databaseName,
    connectionUser: request.connectionUser,
    secretValue,
  });
}

/**
 * Status line reported after registration.
 */
export function describeCredential(record: CredentialRecord): string {
  return `Secret '${record.secretName}' created for ` +
    `${record.connectionUser}@${record.host}:${record.port}/${record.databaseName}`;
}

export interface RedactedCredential {
  secretName: string;
  databaseKind: DatabaseKind;
  host: string;
  port: number;
  databaseName: string;
  connectionUser: string;
  secretValue: typeof REDACTED;
}

/**
 * Plain copy of a record for display, with the value masked.
 */
export function redactCredential(record: CredentialRecord): RedactedCredential {
  return {
    secretName: record.secretName,
    databaseKind: record.databaseKind,
    host: record.host,
    port: record.port,
    databaseName: record.databaseName,
    connectionUser: record.connectionUser,
    secretValue: REDACTED,
  };
}
