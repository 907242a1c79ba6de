/**
 * @file src/session/session-store.ts
 * @description The session store: application sessions (tenant scoped) and transport
 * existence records, both kept in the shared key-value backend with sliding TTLs.
 *
 * Every mutating call refreshes the TTL to the configured default, except
 * deactivation, which leaves the record readable for the grace period only.
 * Backend failures surface as `BackendUnavailableError`; absence never throws.
 */

import { logger } from '../logger.js';
import {
  APP_SESSION_PREFIX,
  TRANSPORT_SESSION_PREFIX,
  applicationSessionSchema,
  systemClock,
  transportSessionSchema,
} from '../types.js';
import type {
  ApplicationSession,
  Clock,
  CreateSessionResult,
  KeyValueBackend,
  MutationStatus,
  SessionOwner,
  TransportSession,
  UpdateSessionResult,
} from '../types.js';
import { RecordStore } from './record-store.js';

export interface SessionTtlPolicy {
  /** TTL applied on create and on every refresh */
  ttlSeconds: number;
  /** Residual TTL of a deactivated session */
  graceSeconds: number;
}

/**
 * Application sessions for every tenant. Callers work through `forTenant()`, which
 * pins all operations to one identity hash.
 */
export class ApplicationSessionStore {
  private readonly records: RecordStore<ApplicationSession>;

  constructor(
    backend: KeyValueBackend,
    private readonly policy: SessionTtlPolicy,
    private readonly clock: Clock = systemClock,
  ) {
    this.records = new RecordStore(backend, APP_SESSION_PREFIX, applicationSessionSchema, 'application session');
  }

  get ttlSeconds(): number {
    return this.policy.ttlSeconds;
  }

  forTenant(identityHash: string): TenantSessionStore {
    return new TenantSessionStore(this.records, identityHash, this.policy, this.clock);
  }

  /** Every readable application session across tenants, for diagnostics. */
  async scan(): Promise<ApplicationSession[]> {
    const sessions: ApplicationSession[] = [];
    for (const scopedId of await this.records.ids()) {
      const session = await this.records.read(scopedId);
      if (session) {
        sessions.push(session);
      }
    }
    return sessions;
  }
}

/**
 * Application sessions of a single identity. Keys are
 * `mcp_session:<identityHash>:<sessionId>`, so one tenant can never read or
 * overwrite another tenant's session even when both present the same session id.
 */
export class TenantSessionStore {
  constructor(
    private readonly records: RecordStore<ApplicationSession>,
    readonly identityHash: string,
    private readonly policy: SessionTtlPolicy,
    private readonly clock: Clock,
  ) {}

  /**
   * Creates a session unless an active one already exists for the id. A deactivated
   * record still in its grace period is replaced.
   */
  async create(
    sessionId: string,
    clientId: string,
    payload: Record<string, unknown> = {},
    owner?: SessionOwner,
  ): Promise<CreateSessionResult> {
    const existing = await this.records.read(this.scoped(sessionId));
    if (existing?.isActive) {
      return { status: 'already-handled', session: existing };
    }

    const now = this.clock();
    const session: ApplicationSession = {
      sessionId,
      identityHash: this.identityHash,
      clientId,
      createdAt: now,
      lastAccessed: now,
      payload: { ...payload },
      isActive: true,
      owner,
    };
    await this.records.write(this.scoped(sessionId), session, this.policy.ttlSeconds);
    logger.debug(`Created application session ${sessionId} for client ${clientId}`);
    return { status: 'created', session };
  }

  async get(sessionId: string): Promise<ApplicationSession | null> {
    return this.records.read(this.scoped(sessionId));
  }

  /**
   * Shallow-merges `partialPayload` into the stored payload and refreshes
   * `lastAccessed` and the TTL. A deactivated session keeps its grace TTL.
   */
  async update(sessionId: string, partialPayload: Record<string, unknown> = {}): Promise<UpdateSessionResult> {
    const existing = await this.records.read(this.scoped(sessionId));
    if (!existing) {
      return { status: 'absent' };
    }

    const session: ApplicationSession = {
      ...existing,
      payload: { ...existing.payload, ...partialPayload },
      lastAccessed: this.clock(),
    };
    const ttl = session.isActive ? this.policy.ttlSeconds : this.policy.graceSeconds;
    await this.records.write(this.scoped(sessionId), session, ttl);
    return { status: 'ok', session };
  }

  /** Soft delete: marks the session inactive and lets it expire after the grace period. */
  async deactivate(sessionId: string): Promise<MutationStatus> {
    const existing = await this.records.read(this.scoped(sessionId));
    if (!existing) {
      return 'absent';
    }

    await this.records.write(
      this.scoped(sessionId),
      { ...existing, isActive: false, lastAccessed: this.clock() },
      this.policy.graceSeconds,
    );
    logger.debug(`Deactivated application session ${sessionId}`);
    return 'ok';
  }

  async delete(sessionId: string): Promise<MutationStatus> {
    return this.records.remove(this.scoped(sessionId));
  }

  async extend(sessionId: string, ttlSeconds: number = this.policy.ttlSeconds): Promise<MutationStatus> {
    return this.records.expire(this.scoped(sessionId), ttlSeconds);
  }

  /** Session ids stored for this tenant. */
  async list(): Promise<string[]> {
    return this.records.ids(`${this.identityHash}:`);
  }

  private scoped(sessionId: string): string {
    return `${this.identityHash}:${sessionId}`;
  }
}

/**
 * Durable transport existence records at `mcp_transport:<sessionId>`.
 */
export class TransportSessionStore {
  private readonly records: RecordStore<TransportSession>;

  constructor(
    backend: KeyValueBackend,
    private readonly ttlSeconds: number,
    private readonly clock: Clock = systemClock,
  ) {
    this.records = new RecordStore(backend, TRANSPORT_SESSION_PREFIX, transportSessionSchema, 'transport session');
  }

  async put(sessionId: string, transportKind: string, serverName: string): Promise<TransportSession> {
    const now = this.clock();
    const record: TransportSession = {
      sessionId,
      transportKind,
      serverName,
      createdAt: now,
      lastAccessed: now,
      isActive: true,
    };
    await this.records.write(sessionId, record, this.ttlSeconds);
    return record;
  }

  async get(sessionId: string): Promise<TransportSession | null> {
    return this.records.read(sessionId);
  }

  /** Refreshes `lastAccessed` and the TTL of an existing record. */
  async touch(sessionId: string): Promise<MutationStatus> {
    const existing = await this.records.read(sessionId);
    if (!existing) {
      return 'absent';
    }
    await this.records.write(sessionId, { ...existing, lastAccessed: this.clock() }, this.ttlSeconds);
    return 'ok';
  }

  async delete(sessionId: string): Promise<MutationStatus> {
    return this.records.remove(sessionId);
  }

  async list(): Promise<string[]> {
    return this.records.ids();
  }
}
