/**
 * Result and failure types returned at the engine boundary.
 */

export type FailureKind =
  | 'not_found'
  | 'already_exists'
  | 'invalid_state'
  | 'invalid_argument';

/**
 * A structured failure. Queries and mutations return these instead of
 * throwing, and never leave a partial change behind.
 */
export interface GraphFailure {
  kind: FailureKind;
  message: string;
  context: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: GraphFailure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(
  kind: FailureKind,
  message: string,
  context: Record<string, unknown> = {}
): Result<T> {
  return { ok: false, error: { kind, message, context } };
}

export function notFound<T>(what: string, id: string): Result<T> {
  return fail('not_found', `${what} not found: ${id}`, { id });
}

/**
 * Raised when the config file exists but cannot be parsed or validated.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly filePath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when an ingestion record file is unreadable or malformed.
 */
export class RecordFileError extends Error {
  constructor(
    message: string,
    readonly filePath: string
  ) {
    super(message);
    this.name = 'RecordFileError';
  }
}
