import { createSecretKey, KeyObject } from 'crypto';

// HMAC-SHA keys shorter than the SHA-256 output size are refused
export const MIN_SECRET_BYTES = 32;

export class WeakSigningKeyError extends Error {
  constructor(actualBytes: number) {
    super(
      `JWT secret is ${actualBytes * 8} bits; at least ${MIN_SECRET_BYTES * 8} bits are required`
    );
    this.name = 'WeakSigningKeyError';
  }
}

/**
 * Symmetric key used to verify every bearer token for the life of the process.
 * Built once from the configured secret and shared read-only across requests.
 */
export interface SigningKey {
  readonly key: KeyObject;
  readonly sizeBits: number;
}

export function createSigningKey(secret: string): SigningKey {
  const bytes = Buffer.from(secret, 'utf8');
  if (bytes.length < MIN_SECRET_BYTES) {
    throw new WeakSigningKeyError(bytes.length);
  }

  return Object.freeze({
    key: createSecretKey(bytes),
    sizeBits: bytes.length * 8,
  });
}
