import nacl from 'tweetnacl';
import { decodeBase64 } from 'tweetnacl-util';
import crypto from 'crypto';
import { ValidationError } from '../errors';

/** Ed25519 verification keys and X25519 agreement keys are both 32 bytes. */
export const PUBLIC_KEY_BYTES = 32;
export const ED25519_SIGNATURE_BYTES = 64;

const BASE64_REGEX = /^[A-Za-z0-9+/]+={0,2}$/;

/** Accept standard base64 with or without padding. */
function decodeLenient(value: string): Uint8Array | null {
  if (!BASE64_REGEX.test(value)) return null;
  const stripped = value.replace(/=+$/, '');
  const padded = stripped + '='.repeat((4 - (stripped.length % 4)) % 4);
  try {
    return decodeBase64(padded);
  } catch {
    return null;
  }
}

/**
 * Decode a base64 field that must hold exactly `length` bytes.
 *
 * @throws ValidationError when the value is not base64 or has the wrong length.
 */
export function decodeFixedLength(
  value: unknown,
  length: number,
  field: string,
  kind: 'invalid_key' | 'invalid_signature' = 'invalid_key'
): Buffer {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${field} must be a base64 string`, kind);
  }
  const bytes = decodeLenient(value);
  if (!bytes || bytes.length !== length) {
    throw new ValidationError(`${field} must be ${length} bytes, base64-encoded`, kind);
  }
  return Buffer.from(bytes);
}

export function decodeKey(value: unknown, field: string): Buffer {
  return decodeFixedLength(value, PUBLIC_KEY_BYTES, field, 'invalid_key');
}

export function decodeSignature(value: unknown, field = 'signature'): Buffer {
  return decodeFixedLength(value, ED25519_SIGNATURE_BYTES, field, 'invalid_signature');
}

/** Decode an arbitrary-length base64 value, or `null` if malformed. */
export function decodeCiphertext(value: string): Buffer | null {
  const bytes = decodeLenient(value);
  return bytes ? Buffer.from(bytes) : null;
}

/**
 * Verify an Ed25519 detached signature.
 *
 * @param publicKey - 32-byte Ed25519 verification key
 * @param message - The exact bytes that were signed
 * @param signature - 64-byte signature
 * @returns true if the signature is valid
 */
export function verifySignature(
  publicKey: Uint8Array,
  message: Uint8Array,
  signature: Uint8Array
): boolean {
  if (publicKey.length !== PUBLIC_KEY_BYTES || signature.length !== ED25519_SIGNATURE_BYTES) {
    return false;
  }
  return nacl.sign.detached.verify(message, signature, publicKey);
}

/**
 * Generate a cryptographically secure random nonce.
 *
 * Always produces a 32-byte (64-character hex) nonce that fits the
 * auth_challenges.nonce VARCHAR(64) column.
 */
/** Hex SHA-256 of a one-time key, kept after the key itself has left the pool. */
export function keyDigest(key: Uint8Array): string {
  return crypto.createHash('sha256').update(key).digest('hex');
}

export function generateNonce(): string {
  return crypto.randomBytes(32).toString('hex');
}

/**
 * The bytes a client signs to complete a login challenge:
 * `relay-auth-v1\n<challenge_id>\n<nonce>\n<expires_at ISO-8601>` as UTF-8.
 */
export function challengeSigningBytes(challengeId: string, nonce: string, expiresAt: Date): Uint8Array {
  return new TextEncoder().encode(
    ['relay-auth-v1', challengeId, nonce, expiresAt.toISOString()].join('\n')
  );
}

/** Concatenate raw key bytes in order; this is what batch signatures cover. */
export function concatKeys(keys: readonly Uint8Array[]): Uint8Array {
  return Buffer.concat(keys);
}
