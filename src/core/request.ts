/**
 * Resolution request model and its validation.
 */

import { AssemblyError } from './errors';

export const DATABASE_KINDS = ['postgres', 'mysql'] as const;

export type DatabaseKind = (typeof DATABASE_KINDS)[number];

/**
 * The caller's intent for one resolution. Frozen once created.
 */
export interface ResolutionRequest {
  readonly databaseKind: DatabaseKind;
  readonly host: string;
  readonly port: number;
  readonly databaseName: string;
  readonly connectionUser: string;
  /** Name of the value to extract from the secrets store */
  readonly secretKey: string;
  /** Explicit path to the encrypted container; beats env and default */
  readonly secretsFile?: string;
  /** Explicit path to the identity file; beats env and default */
  readonly identityFile?: string;
}

export interface ResolutionRequestInput {
  databaseKind: string;
  host: string;
  port: number | string;
  databaseName: string;
  connectionUser: string;
  secretKey: string;
  secretsFile?: string;
  identityFile?: string;
}

const KIND_ALIASES: Record<string, DatabaseKind> = {
  postgres: 'postgres',
  postgresql: 'postgres',
  mysql: 'mysql',
};

/**
 * Parse a database kind, case-insensitively. `postgresql` is accepted.
 */
export function parseDatabaseKind(input: string): DatabaseKind {
  const kind = KIND_ALIASES[input.trim().toLowerCase()];
  if (!kind) {
    throw new AssemblyError(
      `Unknown database kind '${input}'. Supported: ${DATABASE_KINDS.join(', ')}`,
      { field: 'databaseKind' }
    );
  }
  return kind;
}

/**
 * Parse a TCP port. Strings must be plain decimal integers.
 */
export function parsePort(input: number | string): number {
  const port = typeof input === 'number'
    ? input
    : /^\s*\d+\s*$/.test(input) ? Number(input) : NaN;

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new AssemblyError(
      `Invalid port '${input}': must be an integer between 1 and 65535`,
      { field: 'port' }
    );
  }
  return port;
}

function requireNonEmpty(value: string, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new AssemblyError(`${field} must be a non-empty string`, { field });
  }
  return value;
}

function optionalPath(value: string | undefined, field: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return requireNonEmpty(value, field);
}

/**
 * Validate raw input and build an immutable request.
 *
 * @throws AssemblyError on the first invalid field
 */
export function createResolutionRequest(input: ResolutionRequestInput): ResolutionRequest {
  const request: ResolutionRequest = {
    databaseKind: parseDatabaseKind(input.databaseKind),
    host: requireNonEmpty(input.host, 'host'),
    port: parsePort(input.port),
    databaseName: requireNonEmpty(input.databaseName, 'databaseName'),
    connectionUser: requireNonEmpty(input.connectionUser, 'connectionUser'),
    secretKey: requireNonEmpty(input.secretKey, 'secretKey'),
    secretsFile: optionalPath(input.secretsFile, 'secretsFile'),
    identityFile: optionalPath(input.identityFile, 'identityFile'),
  };
  return Object.freeze(request);
}

/**
 * Re-check an already-built request. Requests assembled by hand (not through
 * createResolutionRequest) get the same guarantees before they reach a sink.
 */
export function validateResolutionRequest(request: ResolutionRequest): void {
  parseDatabaseKind(request.databaseKind);
  requireNonEmpty(request.host, 'host');
  parsePort(request.port);
  requireNonEmpty(request.databaseName, 'databaseName');
  requireNonEmpty(request.connectionUser, 'connectionUser');
}
