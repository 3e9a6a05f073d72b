/**
 * Decryptor Registry
 *
 * Maps decryptor names (as used in config and on the command line) to
 * factories.
 */

import { DecryptionError } from '../core/errors';
import { AgeCliDecryptor } from './age';
import type { Decryptor } from './types';

export interface DecryptorOptions {
  timeoutMs?: number;
}

export type DecryptorFactory = (options: DecryptorOptions) => Decryptor;

const factories = new Map<string, DecryptorFactory>();

/**
 * Register a decryptor factory under a name.
 */
export function registerDecryptorType(name: string, factory: DecryptorFactory): void {
  if (factories.has(name)) {
    throw new DecryptionError(`Decryptor type "${name}" is already registered`);
  }
  factories.set(name, factory);
}

/**
 * Names of all registered decryptors.
 */
export function listDecryptorTypes(): string[] {
  return Array.from(factories.keys());
}

/**
 * Create a decryptor by name.
 *
 * @throws DecryptionError for unknown names
 */
export function createDecryptor(name: string, options: DecryptorOptions = {}): Decryptor {
  const factory = factories.get(name);
  if (!factory) {
    throw new DecryptionError(
      `Unknown decryptor "${name}". Available: ${listDecryptorTypes().join(', ')}`
    );
  }
  return factory(options);
}

// Built-in decryptors: both CLIs take the same arguments
registerDecryptorType('rage', (options) => new AgeCliDecryptor({ binary: 'rage', ...options }));
registerDecryptorType('age', (options) => new AgeCliDecryptor({ binary: 'age', ...options }));
