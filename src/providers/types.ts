/**
 * Boundary interfaces for the resolution pipeline.
 *
 * The core never interprets the encryption format. It hands container bytes
 * and an identity path to a Decryptor, and hands finished records to a
 * CredentialSink.
 */

import type { CredentialRecord } from '../core/credential';

export interface HealthCheckResult {
  healthy: boolean;
  error?: string;
  /** Optional version string reported by the backend */
  version?: string;
  latencyMs?: number;
}

/**
 * Opaque decryption capability.
 */
export interface Decryptor {
  /** Human-readable name (e.g. "rage") */
  readonly name: string;

  /**
   * Decrypt a container with the identity stored at `identityPath`.
   * Implementations should throw DecryptionError; anything else thrown is
   * wrapped into one by the caller.
   */
  decrypt(container: Buffer, identityPath: string): Promise<Buffer>;

  /**
   * Is the capability available at all?
   */
  healthCheck?(): Promise<HealthCheckResult>;
}

/**
 * Receives a finished credential and registers it with "create or replace"
 * semantics keyed by `secretName`.
 */
export interface CredentialSink {
  /**
   * @returns human-readable status line
   */
  register(record: CredentialRecord): Promise<string>;
}
