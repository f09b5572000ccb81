import Redis from 'ioredis';
import { config } from '../../shared/config';
import { componentLogger } from '../../shared/logger';
import { SessionLookupResult } from '../../shared/types';
import { withTimeout } from './timeout';

export interface LookupOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Read-only view of the session records the authentication service writes
 * at login and deletes at logout. A present record means the session is live.
 */
export interface RevocationStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  lookup(sessionId: string, options: LookupOptions): Promise<SessionLookupResult>;
}

export class RevocationStoreError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'RevocationStoreError';
  }
}

/**
 * Subset of the ioredis client this store relies on.
 */
export interface RedisClient {
  hget(key: string, field: string): Promise<string | null>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

const log = componentLogger('revocation-store');

/**
 * Bounds every backend read by the caller's deadline and cancellation signal,
 * so a slow backend cannot hold a request past `timeoutMs`.
 */
export abstract class BoundedRevocationStore implements RevocationStore {
  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;

  protected abstract read(sessionId: string): Promise<SessionLookupResult>;

  lookup(sessionId: string, options: LookupOptions): Promise<SessionLookupResult> {
    return withTimeout(() => this.read(sessionId), options.timeoutMs, options.signal);
  }
}

export class InMemoryRevocationStore extends BoundedRevocationStore {
  private sessions: Set<string> = new Set();

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.sessions.clear();
  }

  protected async read(sessionId: string): Promise<SessionLookupResult> {
    return this.sessions.has(sessionId) ? 'present' : 'absent';
  }

  // What the authentication service does at login
  activate(sessionId: string): void {
    this.sessions.add(sessionId);
  }

  // What the authentication service does at logout
  revoke(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  reset(): void {
    this.sessions.clear();
  }
}

export interface RedisRevocationStoreOptions {
  url?: string;
  recordField?: string;
  // Supply a ready client instead of connecting to `url`
  client?: RedisClient;
}

export class RedisRevocationStore extends BoundedRevocationStore {
  private client: RedisClient | null;
  private readonly ownsClient: boolean;
  private readonly url: string;
  private readonly recordField: string;

  constructor(options: RedisRevocationStoreOptions = {}) {
    super();
    this.client = options.client ?? null;
    this.ownsClient = !options.client;
    this.url = options.url ?? config.revocation.redisUrl;
    this.recordField = options.recordField ?? config.revocation.recordField;
  }

  async connect(): Promise<void> {
    if (!this.client) {
      this.client = new Redis(this.url, {
        maxRetriesPerRequest: 1,
        // Fail lookups fast while disconnected instead of queueing them
        enableOfflineQueue: false,
        retryStrategy: (times) => Math.min(times * 100, 2000),
      });
    }

    await this.client.ping();
    log.info({ recordField: this.recordField }, 'Revocation store connected');
  }

  async disconnect(): Promise<void> {
    if (this.client && this.ownsClient) {
      await this.client.quit();
      this.client = null;
    }
  }

  protected async read(sessionId: string): Promise<SessionLookupResult> {
    if (!this.client) throw new RevocationStoreError('Redis not connected');

    let value: string | null;
    try {
      value = await this.client.hget(sessionId, this.recordField);
    } catch (error) {
      throw new RevocationStoreError('Revocation lookup failed', error);
    }

    return value === null ? 'absent' : 'present';
  }
}

// Create the appropriate store based on environment
export function createRevocationStore(): RevocationStore {
  // Always use in-memory for tests to avoid Redis dependency
  if (config.isTest) {
    return new InMemoryRevocationStore();
  }
  return new RedisRevocationStore();
}
