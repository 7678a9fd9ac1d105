/**
 * Error taxonomy shared by services, controllers and the realtime gateway.
 *
 * Every error carries a machine-readable `kind` and the HTTP status it maps
 * to. Services throw these; controllers turn them into `ApiResponse`
 * envelopes via `sendError`.
 */

export type ErrorKind =
  | 'validation_failed'
  | 'invalid_key'
  | 'invalid_signature'
  | 'invalid_participants'
  | 'authentication_failed'
  | 'expired_challenge'
  | 'forbidden'
  | 'user_not_found'
  | 'device_not_found'
  | 'channel_not_found'
  | 'username_taken'
  | 'keys_already_set'
  | 'message_exists'
  | 'no_keys_available'
  | 'rate_limited'
  | 'storage_unavailable'
  | 'internal_error';

export abstract class AppError extends Error {
  abstract readonly status: number;

  constructor(
    readonly kind: ErrorKind,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input: bad key lengths, bad signatures, bad ids. */
export class ValidationError extends AppError {
  readonly status: number = 400;

  constructor(message: string, kind: ErrorKind = 'validation_failed') {
    super(kind, message);
  }
}

/** Invalid or expired challenge or session. */
export class AuthError extends AppError {
  readonly status: number = 401;

  constructor(message: string, kind: ErrorKind = 'authentication_failed') {
    super(kind, message);
  }
}

/** Authenticated, but acting on a device or channel the caller does not own. */
export class ForbiddenError extends AuthError {
  readonly status: number = 403;

  constructor(message: string) {
    super(message, 'forbidden');
  }
}

export class NotFoundError extends AppError {
  readonly status: number = 404;

  constructor(kind: 'user_not_found' | 'device_not_found' | 'channel_not_found', message: string) {
    super(kind, message);
  }
}

/** Uniqueness violations: the resource already exists or was already set. */
export class ConflictError extends AppError {
  readonly status: number = 409;

  constructor(
    kind: 'username_taken' | 'keys_already_set' | 'message_exists',
    message: string
  ) {
    super(kind, message);
  }
}

/** The device's pre-key pool is empty. */
export class CapacityError extends AppError {
  readonly status: number = 409;

  constructor(message = 'No one-time pre-keys available for this device') {
    super('no_keys_available', message);
  }
}

/** Storage failure that survived the transaction-level retry. */
export class StorageError extends AppError {
  readonly status: number = 503;

  constructor(message: string, cause?: unknown) {
    super('storage_unavailable', message);
    this.cause = cause;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
