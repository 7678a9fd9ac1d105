import { validate as isUuid, version as uuidVersion } from 'uuid';
import { ValidationError } from '../errors';

/** Narrow an untrusted value to a UUID string. */
export function requireUuid(value: unknown, field: string): string {
  if (typeof value !== 'string' || !isUuid(value)) {
    throw new ValidationError(`${field} must be a UUID`);
  }
  return value.toLowerCase();
}

/** Message ids are time-ordered UUIDv7s minted by the sender. */
export function requireUuidV7(value: unknown, field: string): string {
  const id = requireUuid(value, field);
  if (uuidVersion(id) !== 7) {
    throw new ValidationError(`${field} must be a version 7 UUID`);
  }
  return id;
}
