/**
 * YAML configuration for the duck-rage CLI
 * Stored at <config-dir>/duck-rage/config.yaml. Holds connection profiles
 * and decryptor settings, never secret values.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { toError } from '../core/errors';
import {
  APP_DIR_NAME,
  currentPlatform,
  userConfigDir,
  type Environment,
  type PlatformInfo,
} from '../core/locations';

export interface ProfileConfig {
  kind?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  secretKey?: string;
  secretsFile?: string;
  identityFile?: string;
}

export interface DuckRageConfig {
  decryptor?: string;
  timeoutMs?: number;
  profiles: Record<string, ProfileConfig>;
}

const STRING_PROFILE_FIELDS = [
  'kind',
  'host',
  'database',
  'user',
  'secretKey',
  'secretsFile',
  'identityFile',
] as const;

/**
 * Get config directory path (computed on each call for testability)
 */
export function getConfigDir(
  env: Environment = process.env,
  info: PlatformInfo = currentPlatform()
): string {
  return path.join(userConfigDir(env, info), APP_DIR_NAME);
}

/**
 * Get YAML config file path
 */
export function getConfigFile(
  env: Environment = process.env,
  info: PlatformInfo = currentPlatform()
): string {
  return path.join(getConfigDir(env, info), 'config.yaml');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseProfile(name: string, raw: unknown, file: string): ProfileConfig {
  if (!isRecord(raw)) {
    throw new Error(`Invalid config ${file}: profiles.${name} must be a mapping`);
  }

  const profile: ProfileConfig = {};
  for (const field of STRING_PROFILE_FIELDS) {
    const value = raw[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') {
      throw new Error(`Invalid config ${file}: profiles.${name}.${field} must be a string`);
    }
    profile[field] = value;
  }

  const port = raw.port;
  if (port !== undefined && port !== null) {
    if (typeof port !== 'number' || !Number.isInteger(port)) {
      throw new Error(`Invalid config ${file}: profiles.${name}.port must be an integer`);
    }
    profile.port = port;
  }

  return profile;
}

/**
 * Parse YAML text into a validated config.
 */
export function parseConfig(content: string, file: string): DuckRageConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new Error(`Invalid YAML in ${file}: ${toError(error).message}`);
  }

  // An empty file parses as undefined
  if (raw === undefined || raw === null) {
    return { profiles: {} };
  }
  if (!isRecord(raw)) {
    throw new Error(`Invalid config ${file}: top level must be a mapping`);
  }

  const config: DuckRageConfig = { profiles: {} };

  const decryptor = raw.decryptor;
  if (decryptor !== undefined && decryptor !== null) {
    if (typeof decryptor !== 'string') {
      throw new Error(`Invalid config ${file}: decryptor must be a string`);
    }
    config.decryptor = decryptor;
  }

  const timeoutMs = raw.timeoutMs;
  if (timeoutMs !== undefined && timeoutMs !== null) {
    if (typeof timeoutMs !== 'number' || !Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new Error(`Invalid config ${file}: timeoutMs must be a positive integer`);
    }
    config.timeoutMs = timeoutMs;
  }

  // YAML parses an empty section as null
  const profiles = raw.profiles ?? {};
  if (!isRecord(profiles)) {
    throw new Error(`Invalid config ${file}: profiles must be a mapping`);
  }
  for (const [name, profile] of Object.entries(profiles)) {
    config.profiles[name] = parseProfile(name, profile, file);
  }

  return config;
}

/**
 * Load configuration. A missing file is an empty configuration.
 */
export function loadConfig(file: string = getConfigFile()): DuckRageConfig {
  if (!fs.existsSync(file)) {
    return { profiles: {} };
  }
  return parseConfig(fs.readFileSync(file, 'utf8'), file);
}

/**
 * Look up a named profile.
 */
export function getProfile(config: DuckRageConfig, name: string): ProfileConfig {
  const profile = Object.hasOwn(config.profiles, name) ? config.profiles[name] : undefined;
  if (!profile) {
    const available = Object.keys(config.profiles);
    throw new Error(
      `Profile "${name}" not found` +
        (available.length > 0 ? `. Available: ${available.join(', ')}` : ' (no profiles configured)')
    );
  }
  return profile;
}
