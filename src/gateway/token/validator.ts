import * as jose from 'jose';
import { getNow } from '../../shared/clock';
import { InvalidTokenReason, TokenValidation } from '../../shared/types';
import { SigningKey } from './signingKey';

export const ACCEPTED_ALGORITHMS = ['HS256', 'HS384', 'HS512'];

export interface ValidateOptions {
  // Defaults to the gateway clock
  now?: Date;
}

function invalid(reason: InvalidTokenReason): TokenValidation {
  return { valid: false, reason };
}

/**
 * String form of whatever the roles claim carries. Role semantics belong to
 * downstream services, so nothing is checked here.
 */
export function materializeRoles(claim: unknown): string {
  if (claim === undefined || claim === null) {
    return '';
  }
  if (typeof claim === 'string') {
    return claim;
  }
  if (Array.isArray(claim)) {
    return claim.map((role) => (typeof role === 'string' ? role : JSON.stringify(role))).join(',');
  }
  return JSON.stringify(claim);
}

function classifyVerificationError(error: unknown): InvalidTokenReason {
  if (error instanceof jose.errors.JWTExpired) {
    return 'expired';
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    return error.claim === 'exp' && error.reason === 'missing' ? 'missing-expiry' : 'invalid-claims';
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return 'bad-signature';
  }
  if (error instanceof jose.errors.JOSEAlgNotAllowed) {
    return 'unsupported-algorithm';
  }
  return 'malformed';
}

/**
 * Verifies a compact bearer token under the gateway's signing key.
 *
 * Checks signature, then expiry, then a non-empty `sub`. Every failure
 * resolves to `{ valid: false }`; the reason is meant for logs only.
 * The promise settles without any I/O.
 */
export async function validateToken(
  token: string,
  signingKey: SigningKey,
  options: ValidateOptions = {}
): Promise<TokenValidation> {
  // Refuse alg=none and asymmetric algorithms before touching the signature
  let header: jose.ProtectedHeaderParameters;
  try {
    header = jose.decodeProtectedHeader(token);
  } catch {
    return invalid('malformed');
  }
  if (!header.alg || !ACCEPTED_ALGORITHMS.includes(header.alg)) {
    return invalid('unsupported-algorithm');
  }

  let payload: jose.JWTPayload;
  try {
    ({ payload } = await jose.jwtVerify(token, signingKey.key, {
      algorithms: ACCEPTED_ALGORITHMS,
      currentDate: options.now ?? getNow(),
      requiredClaims: ['exp'],
    }));
  } catch (error) {
    return invalid(classifyVerificationError(error));
  }

  if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
    return invalid('empty-subject');
  }

  return {
    valid: true,
    identity: {
      subject: payload.sub,
      roles: materializeRoles(payload['roles']),
    },
  };
}
