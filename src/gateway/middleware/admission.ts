import { Request, Response, NextFunction } from 'express';
import {
  AdmissionFilter,
  AUTH_ID_HEADER,
  AUTH_ROLES_HEADER,
  UNAUTHORIZED_BODY,
} from '../admission/filter';
import { TokenIdentity } from '../../shared/types';

// Extend Express Request to carry the admitted identity
declare global {
  namespace Express {
    interface Request {
      identity?: TokenIdentity;
      sessionId?: string;
    }
  }
}

/**
 * Mounts the admission filter in an Express chain. Rejections end the
 * request with 401; admitted requests continue with the identity headers set.
 */
export function createAdmissionMiddleware(filter: AdmissionFilter) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const abort = new AbortController();
    const onClose = (): void => {
      if (!res.writableEnded) {
        abort.abort();
      }
    };
    res.once('close', onClose);

    try {
      const decision = await filter.evaluate({
        method: req.method,
        path: req.path,
        headers: req.headers,
        signal: abort.signal,
      });

      switch (decision.outcome) {
        case 'abandoned':
          // Nobody is listening any more; write nothing
          return;
        case 'rejected':
          res.status(decision.status).json(UNAUTHORIZED_BODY);
          return;
        case 'forwarded':
          // Only admitted requests are enriched; headers stay untouched until now
          req.headers[AUTH_ID_HEADER] = decision.identity.subject;
          req.headers[AUTH_ROLES_HEADER] = decision.identity.roles;
          req.identity = decision.identity;
          req.sessionId = decision.sessionId;
          next();
          return;
      }
    } catch (error) {
      next(error);
    } finally {
      res.off('close', onClose);
    }
  };
}
