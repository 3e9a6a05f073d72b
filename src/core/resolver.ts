/**
 * Resolution Orchestrator
 *
 * locate -> read container -> decrypt -> parse -> lookup -> assemble.
 * Stages run in order and the first failure ends the resolution. Nothing is
 * retried, cached or written. Cleartext is wiped on every exit path.
 */

import fs from 'fs';
import { assembleCredential, type CredentialRecord } from './credential';
import { DecryptionError, LocationError, toError } from './errors';
import {
  currentPlatform,
  resolveLocations,
  snapshotEnvironment,
  type Environment,
  type PlatformInfo,
} from './locations';
import type { ResolutionRequest } from './request';
import { SecretBuffer, type SecretValue } from './secret';
import { parseSecretStore } from './store';
import type { CredentialSink, Decryptor } from '../providers/types';

export interface ResolverDependencies {
  decryptor: Decryptor;
  /** Environment to read RAGE_* variables from (default: process.env) */
  env?: Environment;
  /** Platform facts for default paths (default: the running host) */
  platform?: PlatformInfo;
}

function readContainer(path: string): Buffer {
  try {
    return fs.readFileSync(path);
  } catch (err) {
    throw new LocationError(`Cannot read secrets file '${path}': ${toError(err).message}`, {
      path,
      cause: toError(err),
    });
  }
}

async function decryptContainer(
  decryptor: Decryptor,
  container: Buffer,
  identityPath: string
): Promise<Buffer> {
  try {
    return await decryptor.decrypt(container, identityPath);
  } catch (err) {
    if (err instanceof DecryptionError) {
      throw err;
    }
    const cause = toError(err);
    throw new DecryptionError(
      `Decryptor '${decryptor.name}' failed: ${cause.message}`,
      { cause }
    );
  } finally {
    container.fill(0);
  }
}

/**
 * Extract one value from the decrypted store. The cleartext and the parsed
 * map are cleared before this returns or throws.
 */
function extractSecret(cleartext: SecretBuffer, secretKey: string): SecretValue {
  try {
    const store = parseSecretStore(cleartext.bytes());
    try {
      return store.lookup(secretKey);
    } finally {
      store.dispose();
    }
  } finally {
    cleartext.dispose();
  }
}

/**
 * Resolve one credential.
 *
 * @throws LocationError | DecryptionError | MalformedStoreError |
 *         SecretNotFoundError | AssemblyError
 */
export async function resolveCredential(
  request: ResolutionRequest,
  deps: ResolverDependencies
): Promise<CredentialRecord> {
  const env = snapshotEnvironment(deps.env ?? process.env);
  const locations = resolveLocations(request, env, deps.platform ?? currentPlatform());

  const container = readContainer(locations.secretsFile.path);
  const cleartext = new SecretBuffer(
    await decryptContainer(deps.decryptor, container, locations.identityFile.path)
  );

  const secretValue = extractSecret(cleartext, request.secretKey);
  return assembleCredential(request, secretValue);
}

/**
 * Resolve a credential and hand it to a sink.
 *
 * @returns the sink's status line
 */
export async function registerCredential(
  request: ResolutionRequest,
  sink: CredentialSink,
  deps: ResolverDependencies
): Promise<string> {
  const record = await resolveCredential(request, deps);
  return sink.register(record);
}
