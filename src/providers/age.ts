/**
 * age / rage command-line decryptor.
 *
 * Runs `<binary> --decrypt --identity <file>` with the container on stdin
 * and collects cleartext from stdout. No shell is involved.
 */

import { spawn } from 'child_process';
import { DecryptionError, toError } from '../core/errors';
import type { Decryptor, HealthCheckResult } from './types';

export const DEFAULT_DECRYPT_TIMEOUT_MS = 30000;

export interface AgeCliDecryptorOptions {
  /** Executable to run (default: "rage") */
  binary?: string;
  /** Kill the process after this many ms (default: 30000) */
  timeoutMs?: number;
}

interface RunResult {
  stdout: Buffer;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export class AgeCliDecryptor implements Decryptor {
  readonly name: string;

  private binary: string;
  private timeoutMs: number;

  constructor(options: AgeCliDecryptorOptions = {}) {
    this.binary = options.binary || 'rage';
    this.name = this.binary;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DECRYPT_TIMEOUT_MS;
  }

  async decrypt(container: Buffer, identityPath: string): Promise<Buffer> {
    let result: RunResult;
    try {
      result = await this.run(['--decrypt', '--identity', identityPath], container);
    } catch (err) {
      const cause = toError(err);
      throw new DecryptionError(`Failed to run '${this.binary}': ${cause.message}`, { cause });
    }

    if (result.exitCode !== 0) {
      result.stdout.fill(0);
      const reason = result.signal
        ? `terminated by ${result.signal}`
        : `exited with code ${result.exitCode}`;
      const detail = result.stderr.trim();
      throw new DecryptionError(
        `Failed to decrypt with identity '${identityPath}': ${this.binary} ${reason}` +
          (detail ? `: ${detail}` : '')
      );
    }

    return result.stdout;
  }

  async healthCheck(): Promise<HealthCheckResult> {
    const start = Date.now();
    try {
      const result = await this.run(['--version']);
      const latencyMs = Date.now() - start;
      if (result.exitCode !== 0) {
        return {
          healthy: false,
          error: `${this.binary} --version exited with code ${result.exitCode}`,
          latencyMs,
        };
      }
      return { healthy: true, version: result.stdout.toString('utf8').trim(), latencyMs };
    } catch (err) {
      return {
        healthy: false,
        error: `Cannot run ${this.binary}: ${toError(err).message}`,
        latencyMs: Date.now() - start,
      };
    }
  }

  private run(args: string[], stdin?: Buffer): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.binary, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        timeout: this.timeoutMs,
        shell: false,
      });

      const stdout: Buffer[] = [];
      let stderr = '';
      let stdinError: Error | undefined;

      proc.stdout.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (error) => {
        for (const chunk of stdout) chunk.fill(0);
        reject(error);
      });

      proc.on('close', (code, signal) => {
        const combined = Buffer.concat(stdout);
        for (const chunk of stdout) chunk.fill(0);
        if (code === 0 && stdinError) {
          combined.fill(0);
          reject(stdinError);
          return;
        }
        resolve({ stdout: combined, stderr, exitCode: code, signal });
      });

      // EPIPE when the binary exits before reading; a non-zero exit reports it
      proc.stdin.on('error', (error) => {
        stdinError = error;
      });
      proc.stdin.end(stdin);
    });
  }
}
