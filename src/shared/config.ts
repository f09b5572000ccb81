import { z } from 'zod';

export const FAILURE_POLICIES = ['fail-closed', 'fail-open'] as const;
export type RevocationFailurePolicy = (typeof FAILURE_POLICIES)[number];

// Only the test run gets a built-in secret; everything else must configure one
const TEST_JWT_SECRET = 'test-secret-key-0123456789abcdef';

const envSchema = (isTest: boolean) =>
  z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    JWT_SECRET: isTest ? z.string().min(1).default(TEST_JWT_SECRET) : z.string().min(1),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    SESSION_HEADER: z
      .string()
      .min(1)
      .default('uuid')
      .transform((name) => name.toLowerCase()),
    SESSION_RECORD_FIELD: z.string().min(1).default('temp'),
    REVOCATION_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(250),
    REVOCATION_FAILURE_POLICY: z.enum(FAILURE_POLICIES).default('fail-closed'),
    UPSTREAM_URL: z.string().url().default('http://localhost:3001'),
    UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    DOWNSTREAM_PORT: z.coerce.number().int().positive().default(3001),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default(isTest ? 'silent' : 'info'),
  });

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type ParsedEnv = z.infer<ReturnType<typeof envSchema>>;

function parseEnv(env: NodeJS.ProcessEnv): ParsedEnv {
  const result = envSchema(env.NODE_ENV === 'test').safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = parseEnv(env);

  return Object.freeze({
    gateway: Object.freeze({
      port: parsed.PORT,
      jwtSecret: parsed.JWT_SECRET,
      sessionHeader: parsed.SESSION_HEADER,
      upstreamUrl: parsed.UPSTREAM_URL,
      upstreamTimeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
    }),
    revocation: Object.freeze({
      redisUrl: parsed.REDIS_URL,
      recordField: parsed.SESSION_RECORD_FIELD,
      lookupTimeoutMs: parsed.REVOCATION_LOOKUP_TIMEOUT_MS,
      failurePolicy: parsed.REVOCATION_FAILURE_POLICY,
    }),
    downstream: Object.freeze({
      port: parsed.DOWNSTREAM_PORT,
    }),
    logLevel: parsed.LOG_LEVEL,
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',
  });
}

export type GatewayConfig = ReturnType<typeof loadConfig>;

export const config: GatewayConfig = loadConfig();
