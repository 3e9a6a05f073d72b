/**
 * Location Resolver
 *
 * Picks the encrypted secrets container and the identity file. Each path is
 * resolved on its own: explicit override, then environment variable, then a
 * default under the user's configuration directory. The first populated
 * source wins outright; an unreadable winner is an error, never a reason to
 * try the next tier.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { LocationError, toError } from './errors';
import type { ResolutionRequest } from './request';

export const SECRETS_FILE_ENV = 'RAGE_SECRETS_FILE';
export const IDENTITY_FILE_ENV = 'RAGE_IDENTITY_FILE';

export const APP_DIR_NAME = 'duck-rage';
export const DEFAULT_SECRETS_FILE_NAME = 'secrets.age';
export const DEFAULT_IDENTITY_FILE_NAME = 'identity.txt';

/**
 * Read-only view of environment variables, captured once per resolution.
 */
export type Environment = Readonly<Record<string, string | undefined>>;

export type LocationSource = 'override' | 'env' | 'default';

export interface ResolvedLocation {
  path: string;
  source: LocationSource;
}

export interface ResolvedLocations {
  secretsFile: ResolvedLocation;
  identityFile: ResolvedLocation;
}

/**
 * Host facts the default paths depend on. Injected so tests never depend on
 * the machine they run on.
 */
export interface PlatformInfo {
  platform: NodeJS.Platform;
  homedir: string;
}

export function currentPlatform(): PlatformInfo {
  return { platform: process.platform, homedir: os.homedir() };
}

/**
 * Snapshot an environment so later mutation of the source cannot change an
 * in-flight resolution.
 */
export function snapshotEnvironment(env: Environment = process.env): Environment {
  return Object.freeze({ ...env });
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

/**
 * The user's configuration directory:
 *   Linux/BSD: $XDG_CONFIG_HOME (when absolute) or ~/.config
 *   macOS:     ~/Library/Application Support
 *   Windows:   %APPDATA%
 *
 * @throws LocationError if no home directory is known
 */
export function userConfigDir(env: Environment, info: PlatformInfo = currentPlatform()): string {
  if (info.platform === 'win32') {
    const appData = nonEmpty(env.APPDATA);
    if (appData) {
      return appData;
    }
  }

  if (info.platform !== 'win32' && info.platform !== 'darwin') {
    const xdg = nonEmpty(env.XDG_CONFIG_HOME);
    if (xdg && path.isAbsolute(xdg)) {
      return xdg;
    }
  }

  if (!info.homedir) {
    throw new LocationError(
      'Cannot determine the user configuration directory: no home directory'
    );
  }

  if (info.platform === 'darwin') {
    return path.join(info.homedir, 'Library', 'Application Support');
  }
  if (info.platform === 'win32') {
    return path.join(info.homedir, 'AppData', 'Roaming');
  }
  return path.join(info.homedir, '.config');
}

/**
 * Default locations under `<config-dir>/duck-rage/`.
 */
export function defaultLocations(
  env: Environment,
  info: PlatformInfo = currentPlatform()
): { secretsFile: string; identityFile: string } {
  const dir = path.join(userConfigDir(env, info), APP_DIR_NAME);
  return {
    secretsFile: path.join(dir, DEFAULT_SECRETS_FILE_NAME),
    identityFile: path.join(dir, DEFAULT_IDENTITY_FILE_NAME),
  };
}

/**
 * Apply the precedence chain for one path without touching the filesystem.
 * The default is computed lazily so an override or env value works on hosts
 * with no home directory.
 */
export function selectLocation(
  override: string | undefined,
  envValue: string | undefined,
  fallback: () => string
): ResolvedLocation {
  const explicit = nonEmpty(override);
  if (explicit) {
    return { path: path.resolve(explicit), source: 'override' };
  }
  const fromEnv = nonEmpty(envValue);
  if (fromEnv) {
    return { path: path.resolve(fromEnv), source: 'env' };
  }
  return { path: path.resolve(fallback()), source: 'default' };
}

/**
 * Resolve both paths without checking that they exist.
 */
export function planLocations(
  request: Pick<ResolutionRequest, 'secretsFile' | 'identityFile'>,
  env: Environment,
  info: PlatformInfo = currentPlatform()
): ResolvedLocations {
  let defaults: { secretsFile: string; identityFile: string } | undefined;
  const getDefaults = () => (defaults ??= defaultLocations(env, info));

  return {
    secretsFile: selectLocation(
      request.secretsFile,
      env[SECRETS_FILE_ENV],
      () => getDefaults().secretsFile
    ),
    identityFile: selectLocation(
      request.identityFile,
      env[IDENTITY_FILE_ENV],
      () => getDefaults().identityFile
    ),
  };
}

/**
 * Check that a resolved location is a readable regular file.
 *
 * @throws LocationError naming the file role, path and source
 */
export function assertReadable(location: ResolvedLocation, label: string): void {
  const where = `${label} '${location.path}' (from ${location.source})`;

  let stat: fs.Stats;
  try {
    stat = fs.statSync(location.path);
  } catch (err) {
    throw new LocationError(`Cannot read ${where}: file does not exist`, {
      path: location.path,
      cause: toError(err),
    });
  }

  if (!stat.isFile()) {
    throw new LocationError(`Cannot read ${where}: not a regular file`, {
      path: location.path,
    });
  }

  try {
    fs.accessSync(location.path, fs.constants.R_OK);
  } catch (err) {
    throw new LocationError(`Cannot read ${where}: permission denied`, {
      path: location.path,
      cause: toError(err),
    });
  }
}

/**
 * Resolve and verify both locations.
 *
 * @throws LocationError if either path is missing or unreadable
 */
export function resolveLocations(
  request: Pick<ResolutionRequest, 'secretsFile' | 'identityFile'>,
  env: Environment,
  info: PlatformInfo = currentPlatform()
): ResolvedLocations {
  const locations = planLocations(request, env, info);
  assertReadable(locations.secretsFile, 'secrets file');
  assertReadable(locations.identityFile, 'identity file');
  return locations;
}
