/**
 * Custom error hierarchy
 */

export class ConceptPathError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ConceptPathError';
  }
}

// --- Config ---

export class ConfigError extends ConceptPathError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

// --- Remote ---

/** Network unreachable, timeout, or non-success HTTP status. */
export class TransportError extends ConceptPathError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    cause?: Error,
  ) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
  }
}

/** Response body could not be decoded or has an unexpected shape. */
export class ProtocolError extends ConceptPathError {
  constructor(message: string, cause?: Error) {
    super(message, 'PROTOCOL_ERROR', cause);
    this.name = 'ProtocolError';
  }
}

// --- Storage ---

export class StorageCorruptError extends ConceptPathError {
  constructor(
    public readonly filepath: string,
    cause?: Error,
  ) {
    super(`Cache file is unreadable: ${filepath}`, 'STORAGE_CORRUPT', cause);
    this.name = 'StorageCorruptError';
  }
}

export class StorageWriteError extends ConceptPathError {
  constructor(
    public readonly filepath: string,
    cause?: Error,
  ) {
    super(`Cache file could not be written: ${filepath}`, 'STORAGE_WRITE_ERROR', cause);
    this.name = 'StorageWriteError';
  }
}

// --- Batch ---

export class InvalidPairsFileError extends ConceptPathError {
  constructor(
    message: string,
    public readonly filepath: string,
    cause?: Error,
  ) {
    super(`Invalid pairs file ${filepath}: ${message}`, 'PAIRS_FILE_ERROR', cause);
    this.name = 'InvalidPairsFileError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
