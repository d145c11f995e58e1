import { EngineError, EngineErrorKind, ImageIdentity } from '../shared/types';
import { describeError } from './logging';

/**
 * Thrown inside task bodies to name the failure kind explicitly.
 * Converted to an EngineError value at the scheduler boundary.
 */
export class TaskFailure extends Error {
  constructor(
    public readonly kind: EngineErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TaskFailure';
  }
}

export function engineError(
  kind: EngineErrorKind,
  message: string,
  identity?: ImageIdentity,
  cause?: unknown
): EngineError {
  const error: EngineError = { kind, message };
  if (identity !== undefined) error.identity = identity;
  if (cause !== undefined) error.cause = cause;
  return error;
}

/**
 * Structural: fs errors can come from another realm, where `instanceof Error` is false.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

/**
 * toEngineError(error, fallbackKind, identity)
 *
 * CONTRACT:
 *   Inputs:
 *     - error: anything thrown by a task body
 *     - fallbackKind: kind used when the error carries no better information
 *     - identity: image the task was working on
 *
 *   Outputs:
 *     - EngineError value
 *
 *   Invariants:
 *     - TaskFailure keeps its own kind
 *     - ENOENT maps to 'not-found' regardless of fallbackKind
 *     - Everything else maps to fallbackKind
 *     - Never throws
 */
export function toEngineError(
  error: unknown,
  fallbackKind: EngineErrorKind,
  identity?: ImageIdentity
): EngineError {
  if (error instanceof TaskFailure) {
    return engineError(error.kind, error.message, identity, error.cause);
  }
  if (isErrnoException(error) && error.code === 'ENOENT') {
    return engineError('not-found', describeError(error), identity, error);
  }
  return engineError(fallbackKind, describeError(error), identity, error);
}
