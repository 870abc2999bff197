import { createClient } from 'redis';
import type { Content } from '@google/genai';
import type { Clock } from '../utils/time.js';
import { systemClock } from '../utils/time.js';

/**
 * Conversation state for one chat session. Everything here is plain JSON so
 * it can live in Redis between requests.
 */
export interface AgentSession {
  sessionId: string;
  engineerId: string;
  activeAgent: string;
  history: Content[];
  state: Record<string, string>;
  createdAt: string;
  updatedAt: string;
}

/**
 * Session store contract. Sessions and cached token owners both expire.
 */
export interface ISessionStore {
  getSession(sessionId: string): Promise<AgentSession | null>;
  saveSession(session: AgentSession, ttlSeconds: number): Promise<void>;
  removeSession(sessionId: string): Promise<boolean>;

  setTokenOwner(tokenKey: string, engineerId: string, ttlSeconds: number): Promise<void>;
  getTokenOwner(tokenKey: string): Promise<string | null>;

  getStats(): Promise<Record<string, number>>;
  close(): Promise<void>;
}

interface Expiring<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-memory store (dev/local use)
 */
export class InMemorySessionStore implements ISessionStore {
  private sessions = new Map<string, Expiring<AgentSession>>();
  private tokenOwners = new Map<string, Expiring<string>>();

  constructor(private readonly clock: Clock = systemClock) {}

  private read<T>(map: Map<string, Expiring<T>>, key: string): T | null {
    const entry = map.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.clock.now().getTime()) {
      map.delete(key);
      return null;
    }
    return entry.value;
  }

  private expiry(ttlSeconds: number): number {
    return this.clock.now().getTime() + ttlSeconds * 1000;
  }

  async getSession(sessionId: string) {
    const session = this.read(this.sessions, sessionId);
    return session ? structuredClone(session) : null;
  }
  async saveSession(session: AgentSession, ttlSeconds: number) {
    this.sessions.set(session.sessionId, { value: structuredClone(session), expiresAt: this.expiry(ttlSeconds) });
  }
  async removeSession(sessionId: string) {
    return this.sessions.delete(sessionId);
  }

  async setTokenOwner(tokenKey: string, engineerId: string, ttlSeconds: number) {
    this.tokenOwners.set(tokenKey, { value: engineerId, expiresAt: this.expiry(ttlSeconds) });
  }
  async getTokenOwner(tokenKey: string) {
    return this.read(this.tokenOwners, tokenKey);
  }

  async getStats() {
    return {
      sessions: this.sessions.size,
      tokenOwners: this.tokenOwners.size,
    };
  }

  async close() {
    this.sessions.clear();
    this.tokenOwners.clear();
  }
}

/**
 * Redis-backed store (production use)
 */
export class RedisSessionStore implements ISessionStore {
  private readonly client: ReturnType<typeof createClient>;

  constructor(redisUrl: string, private readonly prefix = 'logiq') {
    this.client = createClient({ url: redisUrl });
    this.client.on('error', (error: Error) => {
      console.error('Redis client error:', error.message);
    });
  }

  async connect(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect();
    }
  }

  private key(kind: string, id: string): string {
    return `${this.prefix}:${kind}:${id}`;
  }

  private async setJson(key: string, value: unknown, ttlSeconds: number) {
    await this.client.set(key, JSON.stringify(value), { EX: ttlSeconds });
  }

  async getSession(sessionId: string) {
    const data = await this.client.get(this.key('session', sessionId));
    return data ? parseSession(data) : null;
  }
  async saveSession(session: AgentSession, ttlSeconds: number) {
    await this.setJson(this.key('session', session.sessionId), session, ttlSeconds);
  }
  async removeSession(sessionId: string) {
    return (await this.client.del(this.key('session', sessionId))) > 0;
  }

  async setTokenOwner(tokenKey: string, engineerId: string, ttlSeconds: number) {
    await this.client.set(this.key('token', tokenKey), engineerId, { EX: ttlSeconds });
  }
  async getTokenOwner(tokenKey: string) {
    return this.client.get(this.key('token', tokenKey));
  }

  async getStats() {
    const size = await this.client.dbSize();
    return { totalKeys: size };
  }

  async close() {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}

function parseSession(data: string): AgentSession | null {
  const parsed: unknown = JSON.parse(data);
  if (!isAgentSession(parsed)) {
    console.warn('Discarding malformed session record');
    return null;
  }
  return parsed;
}

function isAgentSession(value: unknown): value is AgentSession {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'sessionId' in value &&
    typeof value.sessionId === 'string' &&
    'engineerId' in value &&
    typeof value.engineerId === 'string' &&
    'activeAgent' in value &&
    typeof value.activeAgent === 'string' &&
    'history' in value &&
    Array.isArray(value.history) &&
    'state' in value &&
    typeof value.state === 'object'
  );
}

/**
 * Redis when a URL is configured, memory otherwise.
 */
export async function createSessionStore(redisUrl?: string): Promise<ISessionStore> {
  if (redisUrl) {
    const store = new RedisSessionStore(redisUrl);
    await store.connect();
    console.log('✅ Using Redis session store');
    return store;
  }
  console.log('⚡ Using in-memory session store');
  return new InMemorySessionStore();
}
