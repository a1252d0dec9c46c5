/**
 * Error classes for the Redmine tool server.
 *
 * All errors extend {@link TrackerError} which provides:
 * - A machine-readable `code` for programmatic handling
 * - An HTTP-compatible `statusCode` for transport responses
 *
 * The resolution and validation layer only ever raises the six kinds collected
 * in {@link ResolutionError}. Callers branch on `code` (or `instanceof`) and
 * read the structured fields; message text is for humans.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * try {
 *   await resolver.resolveTracker('e');
 * } catch (err) {
 *   if (err instanceof AmbiguousError) {
 *     console.log(err.candidates); // [{ id: 1, name: 'Bug' }, { id: 2, name: 'Feature' }]
 *   }
 * }
 * ```
 */
import type { IdName } from './types.js';

/** Directory kinds the resolver can look names up in. */
export type EntityKind = 'project' | 'tracker' | 'status' | 'priority' | 'activity' | 'user' | 'custom field';

export type ErrorCode =
  | 'NOT_FOUND'
  | 'AMBIGUOUS'
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'TRANSITION_ERROR'
  | 'UPSTREAM_ERROR'
  | 'FORBIDDEN';

/**
 * Base error class for all tool server errors.
 *
 * @example
 * ```typescript
 * try {
 *   throw new TrackerError('Something went wrong', 'UPSTREAM_ERROR', 502);
 * } catch (err) {
 *   if (err instanceof TrackerError) {
 *     console.log(err.code);       // 'UPSTREAM_ERROR'
 *     console.log(err.statusCode); // 502
 *   }
 * }
 * ```
 */
export class TrackerError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code for programmatic handling
   * @param statusCode - HTTP status code (default: 500)
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TrackerError';
  }

  /** Structured fields for tool results. Subclasses add their own. */
  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message };
  }
}

/**
 * Zero candidates for a name lookup.
 *
 * @statusCode 404
 *
 * @example
 * ```typescript
 * throw new NotFoundError('tracker', 'Task');
 * // message: "tracker not found: Task"
 * ```
 */
export class NotFoundError extends TrackerError {
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly entity: EntityKind,
    public readonly query: string
  ) {
    super(`${entity} not found: ${query}`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), entity: this.entity, query: this.query };
  }
}

/**
 * More than one candidate for a name lookup. The resolver never picks a best
 * match; the caller re-prompts with one of the candidates.
 *
 * @statusCode 409
 */
export class AmbiguousError extends TrackerError {
  readonly code = 'AMBIGUOUS';

  constructor(
    public readonly entity: EntityKind,
    public readonly query: string,
    public readonly candidates: readonly IdName[]
  ) {
    const names = candidates.map((c) => `${c.name} (ID: ${c.id})`).join(', ');
    super(`multiple ${entity} entries match '${query}': ${names}`, 'AMBIGUOUS', 409);
    this.name = 'AmbiguousError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), entity: this.entity, query: this.query, candidates: this.candidates };
  }
}

/**
 * Operation attempted without the context it needs, such as a user lookup by
 * name with no project scope, or a rule file that cannot be parsed.
 *
 * @statusCode 400
 */
export class ConfigurationError extends TrackerError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', 400, options);
    this.name = 'ConfigurationError';
  }
}

export interface RequiredField {
  fieldId: number;
  name: string;
  allowedValues: string[];
}

export type ValidationIssue =
  | { reason: 'invalid_value'; fieldId: number; fieldName: string; value: string; allowedValues: string[] }
  | { reason: 'required_missing'; missing: RequiredField[] }
  | { reason: 'unknown_field'; unknown: string[]; available: string[] }
  | { reason: 'duplicate_field'; fieldId: number; keys: string[] }
  | { reason: 'invalid_input' };

/**
 * Custom-field value outside its allowed set, required fields missing, or
 * malformed tool input.
 *
 * @statusCode 400
 *
 * @example
 * ```typescript
 * if (err instanceof ValidationError && err.issue.reason === 'invalid_value') {
 *   console.log(err.issue.allowedValues); // ['SW Tool', 'HW']
 * }
 * ```
 */
export class ValidationError extends TrackerError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly issue: ValidationIssue = { reason: 'invalid_input' }
  ) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...this.issue };
  }
}

/**
 * Disallowed status change for a tracker.
 *
 * @statusCode 422
 */
export class TransitionError extends TrackerError {
  readonly code = 'TRANSITION_ERROR';

  constructor(
    message: string,
    public readonly trackerId: number,
    public readonly from: IdName,
    public readonly to: IdName,
    public readonly allowed: readonly IdName[]
  ) {
    super(message, 'TRANSITION_ERROR', 422);
    this.name = 'TransitionError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), trackerId: this.trackerId, from: this.from, to: this.to, allowed: this.allowed };
  }
}

/**
 * Wrapped failure from the Redmine server or the network. `status` is the HTTP
 * status when the server answered.
 *
 * @statusCode 502
 */
export class UpstreamError extends TrackerError {
  readonly code = 'UPSTREAM_ERROR';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'UPSTREAM_ERROR', 502, options);
    this.name = 'UpstreamError';
  }

  override toJSON(): Record<string, unknown> {
    return this.status === undefined ? super.toJSON() : { ...super.toJSON(), status: this.status };
  }
}

/**
 * Operation refused by server policy (read-only mode). Raised by the session
 * layer, never by the resolver or the rule engines.
 *
 * @statusCode 403
 */
export class ForbiddenError extends TrackerError {
  readonly code = 'FORBIDDEN';

  constructor(message: string = 'Forbidden') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'ForbiddenError';
  }
}

/** The closed set of errors raised by the resolution and validation layer. */
export type ResolutionError =
  | NotFoundError
  | AmbiguousError
  | ConfigurationError
  | ValidationError
  | TransitionError
  | UpstreamError;

/**
 * Wrap an arbitrary failure from the data source. An existing UpstreamError
 * keeps its status and gets the context prepended.
 */
export function toUpstreamError(err: unknown, context: string): UpstreamError {
  if (err instanceof UpstreamError) {
    return new UpstreamError(`${context}: ${err.message}`, err.status, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new UpstreamError(`${context}: ${message}`, undefined, { cause: err });
}
