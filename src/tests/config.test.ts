import { ConfigurationError, loadConfig } from '../shared/config';

describe('loadConfig', () => {
  test('test runs get defaults for everything', () => {
    const config = loadConfig({ NODE_ENV: 'test' });

    expect(config.gateway).toEqual({
      port: 3000,
      jwtSecret: 'test-secret-key-0123456789abcdef',
      sessionHeader: 'uuid',
      upstreamUrl: 'http://localhost:3001',
      upstreamTimeoutMs: 10000,
    });
    expect(config.revocation).toEqual({
      redisUrl: 'redis://localhost:6379',
      recordField: 'temp',
      lookupTimeoutMs: 250,
      failurePolicy: 'fail-closed',
    });
    expect(config.logLevel).toBe('silent');
    expect(config.isTest).toBe(true);
  });

  test('outside tests a JWT secret is required', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(/JWT_SECRET/);
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      JWT_SECRET: 'prod-placeholder-secret-0123456789',
      SESSION_HEADER: 'X-Session-Id',
      REVOCATION_LOOKUP_TIMEOUT_MS: '75',
      REVOCATION_FAILURE_POLICY: 'fail-open',
    });

    expect(config.gateway.port).toBe(8080);
    expect(config.gateway.sessionHeader).toBe('x-session-id');
    expect(config.revocation.lookupTimeoutMs).toBe(75);
    expect(config.revocation.failurePolicy).toBe('fail-open');
    expect(config.logLevel).toBe('info');
    expect(config.isTest).toBe(false);
  });

  test('unknown failure policy is refused', () => {
    expect(() =>
      loadConfig({ NODE_ENV: 'test', REVOCATION_FAILURE_POLICY: 'fail-sideways' })
    ).toThrow(/REVOCATION_FAILURE_POLICY/);
  });

  test('non-numeric timeout is refused', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', REVOCATION_LOOKUP_TIMEOUT_MS: 'soon' })).toThrow(
      ConfigurationError
    );
  });

  test('configuration is frozen', () => {
    const config = loadConfig({ NODE_ENV: 'test' });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.revocation)).toBe(true);
  });
});
