export type ErrorCode =
  | 'MISSING_INPUT'
  | 'MALFORMED_MAPPING'
  | 'STORAGE_FAULT'
  | 'INVALID_CONFIG';

/** Base class for fatal run errors. The CLI prints `message` and exits 1. */
export class IrDivergeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingInputError extends IrDivergeError {
  readonly path: string;

  constructor(label: string, path: string, cause?: unknown) {
    super('MISSING_INPUT', `${label} file not found: ${path}`, { cause });
    this.path = path;
  }
}

export class MalformedMappingError extends IrDivergeError {
  constructor(path: string, detail: string, cause?: unknown) {
    super('MALFORMED_MAPPING', `Invalid pass mapping in ${path}: ${detail}`, { cause });
  }
}

export class StorageFaultError extends IrDivergeError {
  readonly artifact: string;

  constructor(artifact: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('STORAGE_FAULT', `Failed to store artifact ${artifact}: ${reason}`, { cause });
    this.artifact = artifact;
  }
}

export class ConfigError extends IrDivergeError {
  constructor(source: string, detail: string) {
    super('INVALID_CONFIG', `Invalid configuration in ${source}: ${detail}`);
  }
}
