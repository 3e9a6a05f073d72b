/**
 * Argument handling shared by the resolve and sql commands.
 */

import { AssemblyError, isResolutionError } from '../../core/errors';
import { createResolutionRequest, type ResolutionRequest } from '../../core/request';
import { createDecryptor } from '../../providers/registry';
import type { Decryptor } from '../../providers/types';
import { getProfile, loadConfig, type DuckRageConfig, type ProfileConfig } from '../config-yaml';

export const DEFAULT_DECRYPTOR = 'rage';

/** Positional connection arguments, all optional when a profile supplies them */
export interface ConnectionArgs {
  kind?: string;
  host?: string;
  port?: string;
  database?: string;
  user?: string;
  secretKey?: string;
}

export interface ResolveOptions {
  secretsFile?: string;
  identityFile?: string;
  profile?: string;
  decryptor?: string;
  config?: string;
  json?: boolean;
}

function pick(field: string, fromArgs: string | undefined, fromProfile: string | number | undefined): string {
  const value = fromArgs ?? fromProfile;
  if (value === undefined) {
    throw new AssemblyError(
      `Missing ${field}: pass it as an argument or set it in a profile`,
      { field }
    );
  }
  return String(value);
}

/**
 * Merge positional arguments, flags and an optional profile into a request.
 * Arguments and flags win over profile fields.
 */
export function buildRequest(
  args: ConnectionArgs,
  options: ResolveOptions,
  config: DuckRageConfig
): ResolutionRequest {
  const profile: ProfileConfig = options.profile ? getProfile(config, options.profile) : {};

  return createResolutionRequest({
    databaseKind: pick('kind', args.kind, profile.kind),
    host: pick('host', args.host, profile.host),
    port: pick('port', args.port, profile.port),
    databaseName: pick('database', args.database, profile.database),
    connectionUser: pick('user', args.user, profile.user),
    secretKey: pick('secretKey', args.secretKey, profile.secretKey),
    secretsFile: options.secretsFile ?? profile.secretsFile,
    identityFile: options.identityFile ?? profile.identityFile,
  });
}

/**
 * Decryptor from --decryptor, then config, then the default.
 */
export function buildDecryptor(options: ResolveOptions, config: DuckRageConfig): Decryptor {
  return createDecryptor(options.decryptor ?? config.decryptor ?? DEFAULT_DECRYPTOR, {
    timeoutMs: config.timeoutMs,
  });
}

export function loadCliConfig(options: { config?: string }): DuckRageConfig {
  return options.config ? loadConfig(options.config) : loadConfig();
}

/**
 * Print an error the way every command does and exit 1.
 */
export function failWith(error: unknown, json?: boolean): never {
  const message = error instanceof Error ? error.message : 'Unknown error occurred';
  if (json) {
    const code = isResolutionError(error) ? error.code : undefined;
    console.log(JSON.stringify({ error: message, code }, null, 2));
  } else {
    console.error('❌ Error:', message);
  }
  process.exit(1);
}
