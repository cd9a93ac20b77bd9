export type AuditErrorCode =
  | 'SETUP'
  | 'INTEGRITY'
  | 'THROTTLED'
  | 'AUTH'
  | 'TRANSPORT'
  | 'STORE'
  | 'REDACTION_DEGRADED';

export class AuditError extends Error {
  constructor(
    readonly code: AuditErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Missing keys or configuration. Fatal, never retried. */
export class SetupError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super('SETUP', message, cause);
  }
}

/** Chain state is inconsistent; record creation halts until resolved. */
export class IntegrityError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super('INTEGRITY', message, cause);
  }
}

export class ThrottlingError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super('THROTTLED', message, cause);
  }
}

/** Credentials or permissions rejected by the sink; ends the whole delivery run. */
export class AuthError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super('AUTH', message, cause);
  }
}

export class TransportError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT', message, cause);
  }
}

export class RecordStoreError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super('STORE', message, cause);
  }
}

export type DegradationReason = 'unsupported_language' | 'timeout' | 'unavailable';

// Raised by the remote tier only; the redactor always recovers from it.
export class RedactionDegradedError extends AuditError {
  constructor(
    readonly reason: DegradationReason,
    message: string,
    cause?: unknown,
  ) {
    super('REDACTION_DEGRADED', message, cause);
  }
}

export function errorName(err: unknown): string {
  if (err instanceof Error) return err.name || 'Error';
  return typeof err;
}
