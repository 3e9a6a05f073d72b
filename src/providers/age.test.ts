/**
 * Tests for the age/rage CLI decryptor. child_process is mocked; no binary
 * is run.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import type { ChildProcess } from 'child_process';

vi.mock('child_process', () => ({
  spawn: vi.fn(),
}));

import { spawn } from 'child_process';
import { AgeCliDecryptor } from './age';
import { DecryptionError } from '../core/errors';

const mockSpawn = vi.mocked(spawn);

class FakeStdin extends EventEmitter {
  written: Buffer | undefined;

  end(chunk?: Buffer): void {
    this.written = chunk;
  }
}

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  stdin = new FakeStdin();
}

interface Behaviour {
  stdout?: string;
  stderr?: string;
  code?: number | null;
  signal?: NodeJS.Signals | null;
  error?: Error;
  stdinError?: Error;
}

function scriptChild(behaviour: Behaviour): FakeChild {
  const child = new FakeChild();
  mockSpawn.mockImplementationOnce(() => child as unknown as ChildProcess);

  setImmediate(() => {
    if (behaviour.error) {
      child.emit('error', behaviour.error);
      return;
    }
    if (behaviour.stdinError) {
      child.stdin.emit('error', behaviour.stdinError);
    }
    if (behaviour.stdout !== undefined) {
      child.stdout.emit('data', Buffer.from(behaviour.stdout));
    }
    if (behaviour.stderr !== undefined) {
      child.stderr.emit('data', Buffer.from(behaviour.stderr));
    }
    child.emit('close', behaviour.code === undefined ? 0 : behaviour.code, behaviour.signal ?? null);
  });

  return child;
}

describe('AgeCliDecryptor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('defaults to rage with a 30s timeout and no shell', async () => {
    scriptChild({ stdout: '{"a":"b"}' });
    const decryptor = new AgeCliDecryptor();
    await decryptor.decrypt(Buffer.from('container'), '/keys/identity.txt');

    expect(decryptor.name).toBe('rage');
    expect(mockSpawn).toHaveBeenCalledWith(
      'rage',
      ['--decrypt', '--identity', '/keys/identity.txt'],
      { stdio: ['pipe', 'pipe', 'pipe'], timeout: 30000, shell: false }
    );
  });

  it('writes the container to stdin and returns stdout', async () => {
    const child = scriptChild({ stdout: '{"appuser":"s3cr3t"}' });
    const decryptor = new AgeCliDecryptor({ binary: 'age', timeoutMs: 5000 });

    const cleartext = await decryptor.decrypt(Buffer.from('container'), '/keys/identity.txt');

    expect(cleartext.toString('utf8')).toBe('{"appuser":"s3cr3t"}');
    expect(child.stdin.written?.toString('utf8')).toBe('container');
    expect(mockSpawn.mock.calls[0][0]).toBe('age');
    expect(mockSpawn.mock.calls[0][2]).toEqual({
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout: 5000,
      shell: false,
    });
  });

  it('returns identical cleartext for repeated decryption', async () => {
    const decryptor = new AgeCliDecryptor();
    scriptChild({ stdout: '{"k":"v"}' });
    const first = await decryptor.decrypt(Buffer.from('container'), '/id');
    scriptChild({ stdout: '{"k":"v"}' });
    const second = await decryptor.decrypt(Buffer.from('container'), '/id');
    expect(first.equals(second)).toBe(true);
  });

  it('fails with the tool stderr on a non-zero exit', async () => {
    scriptChild({ stderr: 'error: No matching keys found\n', code: 1 });
    const decryptor = new AgeCliDecryptor();

    const promise = decryptor.decrypt(Buffer.from('container'), '/keys/identity.txt');
    await expect(promise).rejects.toBeInstanceOf(DecryptionError);
    await expect(promise).rejects.toThrow(
      "Failed to decrypt with identity '/keys/identity.txt': rage exited with code 1: error: No matching keys found"
    );
  });

  it('reports termination by signal', async () => {
    scriptChild({ code: null, signal: 'SIGTERM' });
    const decryptor = new AgeCliDecryptor();

    await expect(decryptor.decrypt(Buffer.from('container'), '/id')).rejects.toThrow(
      "Failed to decrypt with identity '/id': rage terminated by SIGTERM"
    );
  });

  it('wraps spawn failures with the cause', async () => {
    const cause = new Error('spawn rage ENOENT');
    scriptChild({ error: cause });
    const decryptor = new AgeCliDecryptor();

    try {
      await decryptor.decrypt(Buffer.from('container'), '/id');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(DecryptionError);
      expect((err as Error).message).toBe("Failed to run 'rage': spawn rage ENOENT");
      expect((err as Error).cause).toBe(cause);
    }
  });

  it('fails when stdin broke even though the tool exited cleanly', async () => {
    scriptChild({ stdinError: new Error('write EPIPE'), stdout: '{}' });
    const decryptor = new AgeCliDecryptor();

    await expect(decryptor.decrypt(Buffer.from('container'), '/id')).rejects.toThrow(
      "Failed to run 'rage': write EPIPE"
    );
  });

  describe('healthCheck', () => {
    it('reports the version when the binary runs', async () => {
      scriptChild({ stdout: 'rage 0.10.0\n' });
      const result = await new AgeCliDecryptor().healthCheck();

      expect(result).toEqual({ healthy: true, version: 'rage 0.10.0', latencyMs: expect.any(Number) });
      expect(mockSpawn.mock.calls[0][1]).toEqual(['--version']);
    });

    it('is unhealthy when the binary is missing', async () => {
      scriptChild({ error: new Error('spawn age ENOENT') });
      const result = await new AgeCliDecryptor({ binary: 'age' }).healthCheck();

      expect(result.healthy).toBe(false);
      expect(result.error).toBe('Cannot run age: spawn age ENOENT');
    });

    it('is unhealthy on a non-zero exit', async () => {
      scriptChild({ code: 2 });
      const result = await new AgeCliDecryptor().healthCheck();

      expect(result.healthy).toBe(false);
      expect(result.error).toBe('rage --version exited with code 2');
    });
  });
});
