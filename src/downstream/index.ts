import express from 'express';
import { config } from '../shared/config';
import { logger } from '../shared/logger';
import { identityRecorder } from './identityRecorder';

const log = logger.child({ service: 'downstream' });

const app = express();
app.use(express.json());

// Test-only endpoints to inspect what reached this service
if (config.isTest) {
  app.get('/__received', (_req, res) => {
    res.json({ count: identityRecorder.count(), last: identityRecorder.last() });
  });

  app.post('/__received/reset', (_req, res) => {
    identityRecorder.reset();
    res.json({ reset: true });
  });
}

// Health check
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'downstream' });
});

// Trusts the identity headers: only the gateway can reach this service
app.all('/api/*', (req, res) => {
  const identity = {
    authId: req.get('auth-id') ?? null,
    authRoles: req.get('auth-roles') ?? null,
    path: req.path,
  };
  identityRecorder.record(identity);
  log.debug(identity, 'Request received from gateway');

  res.json({ ...identity, method: req.method, body: req.body ?? null });
});

// Start server if run directly
if (require.main === module) {
  const port = config.downstream.port;
  app.listen(port, () => {
    log.info({ port }, 'Downstream service listening');
  });
}

export { app };
