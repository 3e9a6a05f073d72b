/**
 * duck-rage
 *
 * Resolves one named credential from an age-encrypted JSON store and
 * assembles a database connection credential from it, in memory only.
 */

export { resolveCredential, registerCredential } from './core/resolver';
export type { ResolverDependencies } from './core/resolver';

export {
  createResolutionRequest,
  parseDatabaseKind,
  parsePort,
  DATABASE_KINDS,
} from './core/request';
export type { DatabaseKind, ResolutionRequest, ResolutionRequestInput } from './core/request';

export {
  resolveLocations,
  planLocations,
  defaultLocations,
  userConfigDir,
  SECRETS_FILE_ENV,
  IDENTITY_FILE_ENV,
} from './core/locations';
export type {
  Environment,
  LocationSource,
  PlatformInfo,
  ResolvedLocation,
  ResolvedLocations,
} from './core/locations';

export { parseSecretStore, lookupSecret, SecretStore } from './core/store';

export {
  assembleCredential,
  deriveSecretName,
  describeCredential,
  redactCredential,
} from './core/credential';
export type { CredentialRecord, RedactedCredential } from './core/credential';

export { SecretBuffer, SecretValue, REDACTED } from './core/secret';

export {
  ResolutionError,
  ResolutionErrorCode,
  LocationError,
  DecryptionError,
  MalformedStoreError,
  SecretNotFoundError,
  AssemblyError,
  isResolutionError,
} from './core/errors';
export type { ResolutionStage } from './core/errors';

export * from './providers';
