/**
 * Error taxonomy for credential resolution.
 *
 * Every failure surfaces as exactly one of these classes. Messages name the
 * failing stage and the file or key involved, never a decrypted value.
 */

// --- Codes -----------------------------------------------

/**
 * Error codes for categorizing resolution failures.
 * Lets callers branch on `err.code` without message matching.
 */
export enum ResolutionErrorCode {
  /** A secrets or identity path is missing, unreadable, or cannot be determined */
  LOCATION = 'LOCATION',
  /** The decryption capability rejected the container or identity */
  DECRYPTION = 'DECRYPTION',
  /** Decrypted content is not a flat string-to-string mapping */
  MALFORMED_STORE = 'MALFORMED_STORE',
  /** The requested key is absent from the store */
  SECRET_NOT_FOUND = 'SECRET_NOT_FOUND',
  /** Connection parameters are invalid */
  ASSEMBLY = 'ASSEMBLY',
}

/** Pipeline stage that raised the error */
export type ResolutionStage = 'locate' | 'decrypt' | 'parse' | 'lookup' | 'assemble';

const STAGE_BY_CODE: Record<ResolutionErrorCode, ResolutionStage> = {
  [ResolutionErrorCode.LOCATION]: 'locate',
  [ResolutionErrorCode.DECRYPTION]: 'decrypt',
  [ResolutionErrorCode.MALFORMED_STORE]: 'parse',
  [ResolutionErrorCode.SECRET_NOT_FOUND]: 'lookup',
  [ResolutionErrorCode.ASSEMBLY]: 'assemble',
};

// --- Base class ------------------------------------------

export class ResolutionError extends Error {
  readonly code: ResolutionErrorCode;
  readonly stage: ResolutionStage;

  constructor(code: ResolutionErrorCode, message: string, options?: { cause?: Error }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ResolutionError';
    this.code = code;
    this.stage = STAGE_BY_CODE[code];
  }
}

// --- Kinds -----------------------------------------------

export class LocationError extends ResolutionError {
  /** Path that failed, when one was resolved at all */
  readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: Error }) {
    super(ResolutionErrorCode.LOCATION, message, options);
    this.name = 'LocationError';
    this.path = options?.path;
  }
}

export class DecryptionError extends ResolutionError {
  constructor(message: string, options?: { cause?: Error }) {
    super(ResolutionErrorCode.DECRYPTION, message, options);
    this.name = 'DecryptionError';
  }
}

export class MalformedStoreError extends ResolutionError {
  constructor(message: string) {
    super(ResolutionErrorCode.MALFORMED_STORE, message);
    this.name = 'MalformedStoreError';
  }
}

export class SecretNotFoundError extends ResolutionError {
  readonly secretKey: string;

  constructor(secretKey: string) {
    super(ResolutionErrorCode.SECRET_NOT_FOUND, `Key '${secretKey}' not found in secrets file`);
    this.name = 'SecretNotFoundError';
    this.secretKey = secretKey;
  }
}

export class AssemblyError extends ResolutionError {
  /** Request field that failed validation */
  readonly field?: string;

  constructor(message: string, options?: { field?: string }) {
    super(ResolutionErrorCode.ASSEMBLY, message);
    this.name = 'AssemblyError';
    this.field = options?.field;
  }
}

export function isResolutionError(value: unknown): value is ResolutionError {
  return value instanceof ResolutionError;
}

/**
 * Normalize anything thrown into an Error for use as a `cause`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
