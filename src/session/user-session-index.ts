/**
 * @file src/session/user-session-index.ts
 * @description Maps an identity hash to the session ids it owns and decides, per
 * request, whether to continue a session, reuse a recent one, or create a new one.
 *
 * The session record and its index entry are written separately; the backend has no
 * multi-key transactions. Records are always written before their index entry, and
 * readers treat an index id without a record as absent (and prune it).
 */

import { logger } from '../logger.js';
import { USER_INDEX_PREFIX, systemClock } from '../types.js';
import type {
  ApplicationSession,
  Clock,
  CreateSessionResult,
  KeyValueBackend,
  MutationStatus,
  UserIdentity,
} from '../types.js';
import { identityHash, sessionOwner } from './identity.js';
import type { ApplicationSessionStore, TenantSessionStore } from './session-store.js';

export type FindOrCreateOutcome = 'existing' | 'reused' | 'created';

export interface FindOrCreateResult {
  session: ApplicationSession;
  outcome: FindOrCreateOutcome;
}

export interface UserSessionIndexOptions {
  /** TTL of the per-identity index set, refreshed whenever one of its sessions is touched */
  ttlSeconds: number;
  /** A session accessed less than this long ago is handed to a new request from its owner */
  reuseWindowSeconds: number;
}

/**
 * Picks the most recently accessed session; equal timestamps go to the
 * lexicographically smaller session id.
 */
export function mostRecent(sessions: ApplicationSession[]): ApplicationSession | undefined {
  let best: ApplicationSession | undefined;
  for (const session of sessions) {
    if (
      !best ||
      session.lastAccessed > best.lastAccessed ||
      (session.lastAccessed === best.lastAccessed && session.sessionId < best.sessionId)
    ) {
      best = session;
    }
  }
  return best;
}

export class UserSessionIndex {
  constructor(
    private readonly backend: KeyValueBackend,
    private readonly sessions: ApplicationSessionStore,
    private readonly options: UserSessionIndexOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * @summary Returns the application session a request should use.
   * @remarks
   * 1. The session stored under `(sessionId, identity)`, if active.
   * 2. Otherwise the identity's most recently accessed active session, if it was
   *    accessed within the reuse window. Its id may differ from `sessionId`.
   * 3. Otherwise a new session under `sessionId`.
   *
   * The chosen session's payload is merged with `requestPayload`, its access time and
   * TTL refreshed, and the identity's index TTL refreshed.
   * @throws {BackendUnavailableError} If the backend cannot be reached.
   */
  async findOrCreate(
    sessionId: string,
    identity: UserIdentity,
    requestPayload: Record<string, unknown> = {},
  ): Promise<FindOrCreateResult> {
    const hash = identityHash(identity);
    const tenant = this.sessions.forTenant(hash);

    const direct = await tenant.get(sessionId);
    if (direct?.isActive) {
      const refreshed = await tenant.update(sessionId, requestPayload);
      if (refreshed.status === 'ok') {
        await this.touch(hash);
        return { session: refreshed.session, outcome: 'existing' };
      }
    }

    const recent = await this.recentSession(tenant, hash);
    if (recent) {
      const refreshed = await tenant.update(recent.sessionId, requestPayload);
      if (refreshed.status === 'ok') {
        await this.touch(hash);
        logger.info(`Reusing recent session ${recent.sessionId} for user ${identity.userId} (requested ${sessionId})`);
        return { session: refreshed.session, outcome: 'reused' };
      }
    }

    const created = await this.create(sessionId, identity, requestPayload);
    if (created.status === 'created') {
      logger.info(`Created session ${sessionId} for user ${identity.userId} (${identity.userType})`);
      return { session: created.session, outcome: 'created' };
    }
    // Another request created it between our read and write.
    return { session: created.session, outcome: 'existing' };
  }

  /**
   * Creates a session for `identity` and registers it in the identity's index.
   * `clientId` defaults to one derived from the identity.
   */
  async create(
    sessionId: string,
    identity: UserIdentity,
    payload: Record<string, unknown> = {},
    clientId?: string,
  ): Promise<CreateSessionResult> {
    const hash = identityHash(identity);
    const result = await this.sessions
      .forTenant(hash)
      .create(sessionId, clientId ?? `mcp_client_${identity.userType}_${hash.slice(0, 8)}`, payload, sessionOwner(identity));

    await this.backend.sadd(this.indexKey(hash), sessionId);
    await this.touch(hash);
    return result;
  }

  /**
   * All active sessions of an identity, most recently accessed first.
   * Index ids whose record has expired are pruned.
   */
  async activeSessions(identity: UserIdentity): Promise<ApplicationSession[]> {
    const hash = identityHash(identity);
    const sessions = await this.indexedSessions(this.sessions.forTenant(hash), hash);
    return sessions
      .filter((session) => session.isActive)
      .sort((a, b) => b.lastAccessed - a.lastAccessed || a.sessionId.localeCompare(b.sessionId));
  }

  /** Soft-deletes a session and removes it from its identity's index. */
  async deactivate(sessionId: string, identity: UserIdentity): Promise<MutationStatus> {
    const hash = identityHash(identity);
    const status = await this.sessions.forTenant(hash).deactivate(sessionId);
    await this.backend.srem(this.indexKey(hash), sessionId);
    return status;
  }

  /** Session ids currently indexed for an identity, dangling ones included. */
  async indexedIds(identity: UserIdentity): Promise<string[]> {
    return this.backend.smembers(this.indexKey(identityHash(identity)));
  }

  private async recentSession(tenant: TenantSessionStore, hash: string): Promise<ApplicationSession | undefined> {
    const cutoff = this.clock() - this.options.reuseWindowSeconds * 1000;
    const sessions = await this.indexedSessions(tenant, hash);
    return mostRecent(sessions.filter((session) => session.isActive && session.lastAccessed > cutoff));
  }

  private async indexedSessions(tenant: TenantSessionStore, hash: string): Promise<ApplicationSession[]> {
    const key = this.indexKey(hash);
    const sessions: ApplicationSession[] = [];
    for (const id of await this.backend.smembers(key)) {
      const session = await tenant.get(id);
      if (session) {
        sessions.push(session);
      } else {
        await this.backend.srem(key, id);
      }
    }
    return sessions;
  }

  private async touch(hash: string): Promise<void> {
    await this.backend.expire(this.indexKey(hash), this.options.ttlSeconds);
  }

  private indexKey(hash: string): string {
    return `${USER_INDEX_PREFIX}${hash}`;
  }
}
