/**
 * Secret Store Parser
 *
 * Decrypted content must be a JSON object whose values are all strings,
 * one level deep. Anything else is rejected rather than coerced.
 */

import { TextDecoder } from 'util';
import { MalformedStoreError, SecretNotFoundError } from './errors';
import { SecretValue } from './secret';

function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * In-memory name -> value map built from one decryption. Serves one lookup
 * and is then disposed.
 */
export class SecretStore {
  private entries: Map<string, string>;

  constructor(entries: Map<string, string>) {
    this.entries = entries;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Exact, case-sensitive lookup.
   *
   * @throws SecretNotFoundError if the key is absent
   */
  lookup(key: string): SecretValue {
    const value = this.entries.get(key);
    if (value === undefined) {
      throw new SecretNotFoundError(key);
    }
    return new SecretValue(value);
  }

  dispose(): void {
    this.entries.clear();
  }
}

/**
 * Parse decrypted bytes into a store.
 *
 * The JSON parser's own message is not surfaced: it can quote the input.
 *
 * @throws MalformedStoreError if the content is not UTF-8 or not a flat
 *         string map
 */
export function parseSecretStore(cleartext: Buffer): SecretStore {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(cleartext);
  } catch {
    throw new MalformedStoreError('Secrets file is not valid UTF-8');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.trim());
  } catch {
    throw new MalformedStoreError('Secrets file is not valid JSON');
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new MalformedStoreError(
      `Secrets file must contain a JSON object, got ${describeJsonType(parsed)}`
    );
  }

  const entries = new Map<string, string>();
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      entries.clear();
      throw new MalformedStoreError(
        `Key '${key}' in secrets file is not a JSON string (got ${describeJsonType(value)})`
      );
    }
    entries.set(key, value);
  }

  return new SecretStore(entries);
}

/**
 * Standalone lookup over a parsed store.
 */
export function lookupSecret(store: SecretStore, key: string): SecretValue {
  return store.lookup(key);
}
