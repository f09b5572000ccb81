export type HeaderValue = string | string[] | undefined;

// Header names are lower-case, as Node delivers them
export type RequestHeaders = Readonly<Record<string, HeaderValue>>;

export interface GatewayRequest {
  method: string;
  path: string;
  headers: RequestHeaders;
  // Aborted when the client goes away before a decision is made
  signal?: AbortSignal;
}

export interface GatewayResponse {
  status: number;
  headers: Readonly<Record<string, string>>;
  body?: unknown;
}

export type NextStage = (request: GatewayRequest) => Promise<GatewayResponse>;

export interface TokenIdentity {
  subject: string;
  roles: string;
}

export type InvalidTokenReason =
  | 'malformed'
  | 'unsupported-algorithm'
  | 'bad-signature'
  | 'expired'
  | 'missing-expiry'
  | 'empty-subject'
  | 'invalid-claims';

export type TokenValidation =
  | { valid: true; identity: TokenIdentity }
  | { valid: false; reason: InvalidTokenReason };

export type SessionLookupResult = 'present' | 'absent';

export type RejectionKind = 'MissingCredential' | 'RevokedOrUnknownSession' | 'InvalidToken';

export type AdmissionDecision =
  | {
      outcome: 'forwarded';
      request: GatewayRequest;
      identity: TokenIdentity;
      sessionId: string;
    }
  | {
      outcome: 'rejected';
      kind: RejectionKind;
      reason: string;
      status: 401;
      detail?: string;
    }
  | { outcome: 'abandoned' };
