/**
 * Error taxonomy for field modification runs.
 *
 * Every error carries a stable `code` so commands and the applier can map it
 * to an outcome without string matching.
 */

export type ErrorCode =
  | 'CONFIGURATION'
  | 'REQUEST_VALIDATION'
  | 'SAFETY_VIOLATION'
  | 'USER_CANCELLED'
  | 'SNAPSHOT'
  | 'APPLY_FAILURE'
  | 'RESTORE_FAILURE';

export class LayerforgeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or invalid configuration, or a project root that does not exist */
export class ConfigurationError extends LayerforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
  }
}

/** Malformed operations request or field operation payload */
export class RequestValidationError extends LayerforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REQUEST_VALIDATION', message, options);
  }
}

export class SafetyViolation extends LayerforgeError {
  readonly violations: readonly string[];

  constructor(violations: string[]) {
    super('SAFETY_VIOLATION', `Safety validation failed: ${violations.join('; ')}`);
    this.violations = Object.freeze([...violations]);
  }
}

export class UserCancelled extends LayerforgeError {
  constructor(message = 'Operation cancelled by user') {
    super('USER_CANCELLED', message);
  }
}

export class SnapshotError extends LayerforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SNAPSHOT', message, options);
  }
}

export class ApplyFailure extends LayerforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('APPLY_FAILURE', message, options);
  }
}

/** The live tree may be left half-applied */
export class RestoreFailure extends LayerforgeError {
  readonly backupId: string;

  constructor(backupId: string, message: string, options?: { cause?: unknown }) {
    super('RESTORE_FAILURE', message, options);
    this.backupId = backupId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
