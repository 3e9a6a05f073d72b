/**
 * Containers for decrypted material.
 *
 * JavaScript gives no scope-based zeroing, so cleartext buffers are wrapped
 * and wiped explicitly, and secret strings are wrapped so that logging or
 * serializing them prints a placeholder instead of the value.
 */

import { inspect } from 'util';

export const REDACTED = '[REDACTED]';

/**
 * Owns a cleartext buffer until `dispose()` zero-fills it.
 */
export class SecretBuffer {
  private buffer: Buffer | null;

  constructor(buffer: Buffer) {
    this.buffer = buffer;
  }

  get disposed(): boolean {
    return this.buffer === null;
  }

  bytes(): Buffer {
    if (!this.buffer) {
      throw new Error('SecretBuffer has been disposed');
    }
    return this.buffer;
  }

  dispose(): void {
    if (this.buffer) {
      this.buffer.fill(0);
      this.buffer = null;
    }
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return `SecretBuffer(${REDACTED})`;
  }
}

/**
 * A single secret string. Only `reveal()` hands out the value.
 */
export class SecretValue {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  reveal(): string {
    return this.value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return `SecretValue(${REDACTED})`;
  }
}

