import * as jose from 'jose';
import { config } from '../shared/config';

// Same secret the gateway is configured with under NODE_ENV=test
export const TEST_SECRET = config.gateway.jwtSecret;

const encoder = new TextEncoder();

export interface TokenOptions {
  sub?: string | null;
  roles?: unknown;
  // Absolute expiry in epoch seconds; null leaves the claim out
  exp?: number | null;
  secret?: string;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export async function createTestToken(options: TokenOptions = {}): Promise<string> {
  const payload: jose.JWTPayload = {};
  const sub = options.sub === undefined ? 'alice' : options.sub;
  if (sub !== null) {
    payload.sub = sub;
  }
  if (options.roles !== null) {
    payload['roles'] = options.roles === undefined ? 'ROLE_USER' : options.roles;
  }

  const jwt = new jose.SignJWT(payload).setProtectedHeader({ alg: 'HS256' }).setIssuedAt();

  const exp = options.exp === undefined ? nowSeconds() + 3600 : options.exp;
  if (exp !== null) {
    jwt.setExpirationTime(exp);
  }

  return jwt.sign(encoder.encode(options.secret ?? TEST_SECRET));
}

export async function createTokenWithWrongSignature(options: TokenOptions = {}): Promise<string> {
  return createTestToken({ ...options, secret: 'wrong-secret-key-fedcba9876543210' });
}

export async function createExpiredToken(options: TokenOptions = {}): Promise<string> {
  return createTestToken({ ...options, exp: nowSeconds() - 3600 });
}

export function createAlgNoneToken(options: TokenOptions = {}): string {
  const header = { alg: 'none', typ: 'JWT' };
  const payload = {
    sub: options.sub ?? 'alice',
    roles: options.roles ?? 'ROLE_ADMIN',
    exp: options.exp ?? nowSeconds() + 3600,
  };

  const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');

  return `${encodedHeader}.${encodedPayload}.`;
}

// Keeps the original header and signature but swaps in a different claim set
export function tamperWithClaims(token: string, claims: Record<string, unknown>): string {
  const [header, , signature] = token.split('.');
  const forged = Buffer.from(JSON.stringify(claims)).toString('base64url');
  return `${header}.${forged}.${signature}`;
}
