/**
 * @fileoverview Tagged error taxonomy for session operations.
 *
 * Remote error text is inspected exactly once, in `classifyRemoteError`, at the
 * network boundary. Everything past that point switches on `SessionError.kind`.
 */

/**
 * Error categories:
 * - transient: network-class failure, retried automatically
 * - conflict: local and remote membership disagree, recovered by a strategy
 * - invalid: rejected locally before any remote call
 * - fatal: anything unrecognized, propagated without retry or recovery
 */
export type SessionErrorKind = 'transient' | 'conflict' | 'invalid' | 'fatal';

/**
 * Which membership disagreement a conflict describes.
 */
export type ConflictReason = 'already_member' | 'not_member';

export interface SessionErrorOptions {
  /** Attempts made before giving up (transient errors) */
  attempts?: number;
  /** Conflict flavor (conflict errors) */
  reason?: ConflictReason;
  /** Violated rule identifier (invalid errors) */
  rule?: string;
  cause?: unknown;
}

export class SessionError extends Error {
  readonly kind: SessionErrorKind;
  readonly attempts: number | undefined;
  readonly reason: ConflictReason | undefined;
  readonly rule: string | undefined;

  constructor(kind: SessionErrorKind, message: string, options: SessionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SessionError';
    this.kind = kind;
    this.attempts = options.attempts;
    this.reason = options.reason;
    this.rule = options.rule;
  }

  static invalid(rule: string, message: string): SessionError {
    return new SessionError('invalid', message, { rule });
  }
}

/**
 * Error raised by an HTTP call that reached the server but got a non-2xx answer.
 */
export class RemoteRequestError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly endpoint: string
  ) {
    super(`Erreur ${status}: ${body}`);
    this.name = 'RemoteRequestError';
  }
}

/**
 * Result of classifying a raw remote error.
 */
export type ErrorClassification =
  | { kind: 'transient' }
  | { kind: 'conflict'; reason: ConflictReason }
  | { kind: 'fatal' };

const TRANSIENT_MARKERS = [
  'connection closed',
  'connection reset',
  'timeout',
  'socket',
  'network',
  'other side closed',
  'econnrefused',
  'econnreset',
  'etimedout',
  'enotfound',
  'eai_again',
];

/** Depth of `cause` links followed when classifying */
const MAX_CAUSE_DEPTH = 5;

const ALREADY_MEMBER_MARKERS = ['already in game session', 'player already in', 'already in room'];

const NOT_MEMBER_MARKERS = ['not in game session', 'player not in'];

/**
 * Text of any thrown value, for classification and diagnostics.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function errorCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return '';
}

/**
 * Class name, message and code of `error` and of each error in its `cause`
 * chain. `fetch` reports socket failures only on the cause.
 */
function classificationText(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth <= MAX_CAUSE_DEPTH && current !== undefined && current !== null; depth++) {
    const name = current instanceof Error ? current.name : '';
    parts.push(name, errorMessage(current), errorCode(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(' ').toLowerCase();
}

/**
 * Map a raw error to its category by inspecting its text and class name,
 * following `cause` links. Membership conflicts are checked before network
 * markers.
 */
export function classifyRemoteError(error: unknown): ErrorClassification {
  if (error instanceof SessionError) {
    if (error.kind === 'conflict' && error.reason) {
      return { kind: 'conflict', reason: error.reason };
    }
    return error.kind === 'transient' ? { kind: 'transient' } : { kind: 'fatal' };
  }

  const text = classificationText(error);

  if (ALREADY_MEMBER_MARKERS.some((marker) => text.includes(marker))) {
    return { kind: 'conflict', reason: 'already_member' };
  }
  if (NOT_MEMBER_MARKERS.some((marker) => text.includes(marker))) {
    return { kind: 'conflict', reason: 'not_member' };
  }
  if (TRANSIENT_MARKERS.some((marker) => text.includes(marker))) {
    return { kind: 'transient' };
  }
  return { kind: 'fatal' };
}

/**
 * Convert any thrown value into a SessionError, keeping the original as cause.
 * SessionErrors pass through untouched.
 */
export function toSessionError(error: unknown): SessionError {
  if (error instanceof SessionError) {
    return error;
  }
  const classification = classifyRemoteError(error);
  const message = errorMessage(error);
  if (classification.kind === 'conflict') {
    return new SessionError('conflict', message, { reason: classification.reason, cause: error });
  }
  return new SessionError(classification.kind, message, { cause: error });
}
