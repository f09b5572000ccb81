import express, { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../shared/config';
import { logger } from '../shared/logger';
import { AdmissionFilter } from './admission/filter';
import { createAdmissionMiddleware } from './middleware/admission';
import { createUpstreamForwarder } from './proxy/forwarder';
import { createRevocationStore, RevocationStore } from './store/revocationStore';
import { createSigningKey } from './token/signingKey';

const REQUEST_ID_HEADER = 'x-request-id';

export interface GatewayDependencies {
  filter: AdmissionFilter;
  upstreamUrl: string;
  upstreamTimeoutMs: number;
}

function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.get(REQUEST_ID_HEADER) ?? uuidv4();
  const startedAt = process.hrtime.bigint();
  res.setHeader('X-Request-Id', requestId);

  res.once('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.info(
      { requestId, method: req.method, path: req.path, status: res.statusCode, durationMs },
      'Request completed'
    );
  });
  next();
}

export function createGatewayApp(deps: GatewayDependencies): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogging);

  // Public routes
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'gateway' });
  });

  // Everything else must pass admission before it reaches the upstream
  app.use(
    createAdmissionMiddleware(deps.filter),
    express.raw({ type: () => true, limit: '10mb' }),
    createUpstreamForwarder({ upstreamUrl: deps.upstreamUrl, timeoutMs: deps.upstreamTimeoutMs })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err: error }, 'Unhandled gateway error');
    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal gateway error' });
    }
  });

  return app;
}

const revocationStore: RevocationStore = createRevocationStore();

const admissionFilter = new AdmissionFilter({
  signingKey: createSigningKey(config.gateway.jwtSecret),
  revocationStore,
  sessionHeader: config.gateway.sessionHeader,
  lookupTimeoutMs: config.revocation.lookupTimeoutMs,
  failurePolicy: config.revocation.failurePolicy,
});

const app = createGatewayApp({
  filter: admissionFilter,
  upstreamUrl: config.gateway.upstreamUrl,
  upstreamTimeoutMs: config.gateway.upstreamTimeoutMs,
});

// Initialize and start
async function start() {
  await revocationStore.connect();

  const port = config.gateway.port;
  app.listen(port, () => {
    logger.info(
      {
        port,
        upstream: config.gateway.upstreamUrl,
        failurePolicy: config.revocation.failurePolicy,
      },
      'Gateway service listening'
    );
  });
}

if (require.main === module) {
  start().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Gateway failed to start');
    process.exit(1);
  });
}

export { app, revocationStore, admissionFilter };
