export type PipelineErrorKind =
  | "input"
  | "transport"
  | "extraction"
  | "persistence"
  | "merge_integrity"
  | "merge_locked"
  | "state_transition";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Malformed target or criteria. No attempt is recorded for it. */
export class InputError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("input", message, options);
  }
}

export class TransportError extends PipelineError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super("transport", message, options);
    this.statusCode = statusCode;
  }
}

export class ExtractionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction", message, options);
  }
}

/** Store or master dataset I/O failure. Fatal to the run. */
export class PersistenceError extends PipelineError {
  readonly path?: string;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super("persistence", message, options);
    this.path = path;
  }
}

export class LoadError extends PersistenceError {}

export class SaveError extends PersistenceError {}

export class MergeIntegrityError extends PipelineError {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super("merge_integrity", message, options);
    this.file = file;
  }
}

export class MergeLockedError extends PipelineError {
  readonly lockPath: string;

  constructor(lockPath: string) {
    super("merge_locked", `Another merge holds the lock at ${lockPath}`);
    this.lockPath = lockPath;
  }
}

export class StateTransitionError extends PipelineError {
  constructor(message: string) {
    super("state_transition", message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
