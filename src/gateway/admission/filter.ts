import { RevocationFailurePolicy } from '../../shared/config';
import { componentLogger, Logger } from '../../shared/logger';
import {
  AdmissionDecision,
  GatewayRequest,
  GatewayResponse,
  HeaderValue,
  NextStage,
  RejectionKind,
  SessionLookupResult,
  TokenIdentity,
} from '../../shared/types';
import { RevocationStore } from '../store/revocationStore';
import { RequestAbandonedError } from '../store/timeout';
import { SigningKey } from '../token/signingKey';
import { validateToken } from '../token/validator';

export const AUTH_ID_HEADER = 'auth-id';
export const AUTH_ROLES_HEADER = 'auth-roles';
export const BEARER_PREFIX = 'Bearer ';

export const REJECTION_REASONS = {
  noAuthorization: 'No authorization header',
  noSession: 'No session identifier header',
  loggedOut: 'Already logged out',
  storeUnavailable: 'Session store unavailable',
  invalidToken: 'JWT token is not valid',
} as const;

// Clients only ever see this body, whichever check failed
export const UNAUTHORIZED_BODY = Object.freeze({ error: 'Unauthorized' });

export interface AdmissionFilterOptions {
  signingKey: SigningKey;
  revocationStore: RevocationStore;
  sessionHeader: string;
  lookupTimeoutMs: number;
  failurePolicy: RevocationFailurePolicy;
  logger?: Logger;
}

function firstHeader(value: HeaderValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function reject(
  kind: RejectionKind,
  reason: string,
  detail?: string
): Extract<AdmissionDecision, { outcome: 'rejected' }> {
  return { outcome: 'rejected', kind, reason, status: 401, detail };
}

/**
 * Admission stage of the gateway's filter chain.
 *
 * A request passes only when it carries an authorization header, its session
 * identifier still has a live record in the revocation store, and its bearer
 * token verifies. Rejections happen before any header is derived, so a
 * rejected request is never partially enriched.
 */
export class AdmissionFilter {
  private readonly signingKey: SigningKey;
  private readonly store: RevocationStore;
  private readonly sessionHeader: string;
  private readonly lookupTimeoutMs: number;
  private readonly failurePolicy: RevocationFailurePolicy;
  private readonly log: Logger;

  constructor(options: AdmissionFilterOptions) {
    this.signingKey = options.signingKey;
    this.store = options.revocationStore;
    this.sessionHeader = options.sessionHeader.toLowerCase();
    this.lookupTimeoutMs = options.lookupTimeoutMs;
    this.failurePolicy = options.failurePolicy;
    this.log = options.logger ?? componentLogger('admission');
  }

  async handle(request: GatewayRequest, next: NextStage): Promise<GatewayResponse> {
    const decision = await this.evaluate(request);

    switch (decision.outcome) {
      case 'forwarded':
        return next(decision.request);
      case 'rejected':
        return { status: decision.status, headers: {}, body: UNAUTHORIZED_BODY };
      case 'abandoned':
        throw new RequestAbandonedError();
    }
  }

  async evaluate(request: GatewayRequest): Promise<AdmissionDecision> {
    const authorization = firstHeader(request.headers['authorization']);
    if (!authorization) {
      return this.rejected(reject('MissingCredential', REJECTION_REASONS.noAuthorization));
    }

    const sessionId = firstHeader(request.headers[this.sessionHeader]);
    if (!sessionId) {
      return this.rejected(reject('MissingCredential', REJECTION_REASONS.noSession));
    }

    const log = this.log.child({ sessionId });
    log.debug('Checking session liveness');

    const liveness = await this.checkSession(sessionId, request.signal, log);
    if (liveness !== 'live') {
      return liveness;
    }

    if (!authorization.startsWith(BEARER_PREFIX)) {
      return this.rejected(
        reject('InvalidToken', REJECTION_REASONS.invalidToken, 'missing-bearer-scheme'),
        log
      );
    }
    const token = authorization.slice(BEARER_PREFIX.length);

    const validation = await validateToken(token, this.signingKey);
    if (!validation.valid) {
      return this.rejected(
        reject('InvalidToken', REJECTION_REASONS.invalidToken, validation.reason),
        log
      );
    }

    if (request.signal?.aborted) {
      log.debug('Client went away before admission completed');
      return { outcome: 'abandoned' };
    }

    const { identity } = validation;
    log.info({ subject: identity.subject, roles: identity.roles }, 'Request admitted');

    return {
      outcome: 'forwarded',
      request: withIdentityHeaders(request, identity),
      identity,
      sessionId,
    };
  }

  private async checkSession(
    sessionId: string,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<'live' | AdmissionDecision> {
    let result: SessionLookupResult;
    try {
      result = await this.store.lookup(sessionId, { timeoutMs: this.lookupTimeoutMs, signal });
    } catch (error) {
      if (error instanceof RequestAbandonedError) {
        log.debug('Client went away during session lookup');
        return { outcome: 'abandoned' };
      }

      if (this.failurePolicy === 'fail-open') {
        log.warn({ err: error }, 'Revocation store unavailable, admitting on token alone');
        return 'live';
      }
      return this.rejected(
        reject(
          'RevokedOrUnknownSession',
          REJECTION_REASONS.storeUnavailable,
          error instanceof Error ? error.name : 'unknown'
        ),
        log
      );
    }

    if (result === 'absent') {
      return this.rejected(reject('RevokedOrUnknownSession', REJECTION_REASONS.loggedOut), log);
    }
    return 'live';
  }

  private rejected(
    decision: Extract<AdmissionDecision, { outcome: 'rejected' }>,
    log: Logger = this.log
  ): AdmissionDecision {
    log.warn({ kind: decision.kind, detail: decision.detail }, decision.reason);
    return decision;
  }
}

/**
 * Copy of the request with the derived identity headers set. Any values the
 * client supplied under those names are replaced; nothing else changes.
 */
export function withIdentityHeaders(request: GatewayRequest, identity: TokenIdentity): GatewayRequest {
  return {
    ...request,
    headers: {
      ...request.headers,
      [AUTH_ID_HEADER]: identity.subject,
      [AUTH_ROLES_HEADER]: identity.roles,
    },
  };
}
