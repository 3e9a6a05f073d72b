import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  IDENTITY_FILE_ENV,
  SECRETS_FILE_ENV,
  defaultLocations,
  planLocations,
  resolveLocations,
  snapshotEnvironment,
  userConfigDir,
  type PlatformInfo,
} from './locations';
import { LocationError } from './errors';

const LINUX: PlatformInfo = { platform: 'linux', homedir: '/home/alice' };

describe('userConfigDir', () => {
  it('uses ~/.config on Linux', () => {
    expect(userConfigDir({}, LINUX)).toBe('/home/alice/.config');
  });

  it('prefers an absolute XDG_CONFIG_HOME', () => {
    expect(userConfigDir({ XDG_CONFIG_HOME: '/xdg' }, LINUX)).toBe('/xdg');
  });

  it('ignores a relative XDG_CONFIG_HOME', () => {
    expect(userConfigDir({ XDG_CONFIG_HOME: 'rel/xdg' }, LINUX)).toBe('/home/alice/.config');
  });

  it('uses Application Support on macOS', () => {
    expect(userConfigDir({ XDG_CONFIG_HOME: '/xdg' }, { platform: 'darwin', homedir: '/Users/alice' }))
      .toBe('/Users/alice/Library/Application Support');
  });

  it('uses APPDATA on Windows', () => {
    expect(userConfigDir({ APPDATA: 'C:\\Users\\alice\\AppData\\Roaming' }, { platform: 'win32', homedir: 'C:\\Users\\alice' }))
      .toBe('C:\\Users\\alice\\AppData\\Roaming');
  });

  it('fails with LocationError when there is no home directory', () => {
    expect(() => userConfigDir({}, { platform: 'linux', homedir: '' })).toThrow(LocationError);
  });
});

describe('defaultLocations', () => {
  it('places both files under duck-rage/', () => {
    expect(defaultLocations({}, LINUX)).toEqual({
      secretsFile: '/home/alice/.config/duck-rage/secrets.age',
      identityFile: '/home/alice/.config/duck-rage/identity.txt',
    });
  });
});

describe('planLocations', () => {
  const env = {
    [SECRETS_FILE_ENV]: '/env/secrets.age',
    [IDENTITY_FILE_ENV]: '/env/identity.txt',
  };

  it('selects the explicit override over env and default', () => {
    const planned = planLocations({ secretsFile: '/override/secrets.age' }, env, LINUX);
    expect(planned.secretsFile).toEqual({ path: '/override/secrets.age', source: 'override' });
    expect(planned.identityFile).toEqual({ path: '/env/identity.txt', source: 'env' });
  });

  it('uses the environment variable when there is no override', () => {
    const planned = planLocations({}, env, LINUX);
    expect(planned.secretsFile).toEqual({ path: '/env/secrets.age', source: 'env' });
  });

  it('falls back to the defaults', () => {
    const planned = planLocations({}, {}, LINUX);
    expect(planned.secretsFile).toEqual({
      path: '/home/alice/.config/duck-rage/secrets.age',
      source: 'default',
    });
    expect(planned.identityFile).toEqual({
      path: '/home/alice/.config/duck-rage/identity.txt',
      source: 'default',
    });
  });

  it('treats an empty environment variable as unset', () => {
    const planned = planLocations({}, { [SECRETS_FILE_ENV]: '' }, LINUX);
    expect(planned.secretsFile.source).toBe('default');
  });

  it('resolves relative paths to absolute ones', () => {
    const planned = planLocations({ secretsFile: 'rel/secrets.age' }, {}, LINUX);
    expect(planned.secretsFile.path).toBe(path.resolve('rel/secrets.age'));
  });

  it('does not need a home directory when both paths are given', () => {
    const planned = planLocations({}, env, { platform: 'linux', homedir: '' });
    expect(planned.secretsFile.source).toBe('env');
    expect(planned.identityFile.source).toBe('env');
  });
});

describe('resolveLocations', () => {
  let dir: string;
  let secretsFile: string;
  let identityFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'duck-rage-loc-'));
    secretsFile = path.join(dir, 'secrets.age');
    identityFile = path.join(dir, 'identity.txt');
    fs.writeFileSync(secretsFile, 'ciphertext');
    fs.writeFileSync(identityFile, 'AGE-SECRET-KEY-TEST');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns both paths when they are readable files', () => {
    const resolved = resolveLocations({ secretsFile, identityFile }, {}, LINUX);
    expect(resolved.secretsFile.path).toBe(secretsFile);
    expect(resolved.identityFile.path).toBe(identityFile);
  });

  it('keeps the override even when env and default files exist and differ', () => {
    const envSecrets = path.join(dir, 'env-secrets.age');
    fs.writeFileSync(envSecrets, 'other');
    const resolved = resolveLocations(
      { secretsFile, identityFile },
      { [SECRETS_FILE_ENV]: envSecrets },
      { platform: 'linux', homedir: dir }
    );
    expect(resolved.secretsFile).toEqual({ path: secretsFile, source: 'override' });
  });

  it('does not fall through when the winning source is missing', () => {
    const missing = path.join(dir, 'missing.age');
    try {
      resolveLocations({ identityFile }, { [SECRETS_FILE_ENV]: missing }, LINUX);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(LocationError);
      expect((err as LocationError).path).toBe(missing);
      expect((err as LocationError).message).toBe(
        `Cannot read secrets file '${missing}' (from env): file does not exist`
      );
    }
  });

  it('rejects a directory', () => {
    expect(() => resolveLocations({ secretsFile: dir, identityFile }, {}, LINUX)).toThrow(
      `Cannot read secrets file '${dir}' (from override): not a regular file`
    );
  });

  it('reports a missing identity file', () => {
    const missing = path.join(dir, 'nope.txt');
    expect(() => resolveLocations({ secretsFile, identityFile: missing }, {}, LINUX)).toThrow(
      `Cannot read identity file '${missing}' (from override): file does not exist`
    );
  });
});

describe('snapshotEnvironment', () => {
  it('copies and freezes the source', () => {
    const source: Record<string, string | undefined> = { A: '1' };
    const snapshot = snapshotEnvironment(source);
    source.A = '2';
    expect(snapshot.A).toBe('1');
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});
