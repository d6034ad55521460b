export type ErrorCode =
  | 'schema_violation'
  | 'detector_failure'
  | 'apply_conflict'
  | 'verify_fail'
  | 'verify_timeout'
  | 'registry_error'
  | 'config_error';

export interface ErrorRecord {
  code: ErrorCode;
  tf_id: string | null;
  file: string | null;
  reason: string;
}

/**
 * Base of every error the pipeline reports. Carries the offending TF and file so that a failure can be
 * printed as a single line: `<TF> <file>: <reason>`.
 */
export abstract class FixpointError extends Error {
  abstract readonly code: ErrorCode;
  readonly tfId: string | null;
  readonly file: string | null;
  readonly reason: string;

  constructor(reason: string, opts: { tfId?: string | null; file?: string | null; cause?: unknown } = {}) {
    super(reason, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.reason = reason;
    this.tfId = opts.tfId ?? null;
    this.file = opts.file ?? null;
  }

  toLine(): string {
    const who = [this.tfId, this.file].filter((x): x is string => !!x).join(' ');
    return who ? `${who}: ${this.reason}` : this.reason;
  }

  toJSON(): ErrorRecord {
    return { code: this.code, tf_id: this.tfId, file: this.file, reason: this.reason };
  }
}

/** A TF document failed structural or cross-field validation. `field` is a dotted path. */
export class SchemaViolation extends FixpointError {
  readonly code = 'schema_violation' as const;
  readonly field: string;

  constructor(reason: string, opts: { tfId?: string | null; file?: string | null; field: string }) {
    super(reason, opts);
    this.field = opts.field;
  }

  override toLine(): string {
    const who = this.tfId ?? this.file ?? '?';
    return `${who} ${this.field || '<root>'}: ${this.reason}`;
  }
}

export class DetectorFailure extends FixpointError {
  readonly code = 'detector_failure' as const;
}

export class ApplyConflict extends FixpointError {
  readonly code = 'apply_conflict' as const;
  readonly patchId: string;
  /** Patch that won an overlap, when the conflict came from one. */
  readonly winner: string | null;

  constructor(reason: string, opts: { tfId: string; file: string; patchId: string; winner?: string | null }) {
    super(reason, opts);
    this.patchId = opts.patchId;
    this.winner = opts.winner ?? null;
  }
}

export class VerifyFail extends FixpointError {
  readonly code = 'verify_fail' as const;
}

export class VerifyTimeout extends FixpointError {
  readonly code = 'verify_timeout' as const;
}

/** Fatal: the TF set cannot be trusted, so no stage may run. */
export class RegistryError extends FixpointError {
  readonly code = 'registry_error' as const;
  readonly violations: SchemaViolation[];

  constructor(reason: string, violations: SchemaViolation[] = []) {
    super(reason);
    this.violations = violations;
  }
}

export class ConfigError extends FixpointError {
  readonly code = 'config_error' as const;
}

export function describeError(err: unknown): string {
  if (err instanceof FixpointError) return err.toLine();
  if (err instanceof Error) return err.message;
  return String(err);
}
