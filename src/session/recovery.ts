/**
 * @file src/session/recovery.ts
 * @description Re-establishes a transport for a session id this process cannot serve,
 * typically after a restart dropped the in-memory handle.
 *
 * One call walks the stages once, in order, and stops at the first that succeeds:
 * 1. existing  - the registry already has a live handle (a concurrent request won)
 * 2. reattached - the application session exists; build and bind a new transport
 * 3. rebuilt   - no application session either; create one marked as recovered,
 *                then do stage 2
 *
 * Calls are admitted through a per-session attempt budget. An attempt is counted
 * before any work starts, so an aborted recovery still uses up budget. Counters are
 * process-local: a client bounced between N processes gets N budgets.
 */

import { logger } from '../logger.js';
import {
  BackendUnavailableError,
  EXISTENCE_ONLY_KIND,
  RecoveryExhaustedError,
  SessionServerError,
  TransportConstructionFailedError,
  systemClock,
  toError,
} from '../types.js';
import type { Clock, TransportFactory, TransportHandle, UserIdentity } from '../types.js';
import { identityHash } from './identity.js';
import type { ApplicationSessionStore } from './session-store.js';
import type { TransportRegistry } from './transport-registry.js';
import type { UserSessionIndex } from './user-session-index.js';

export type RecoveryStage = 'existing' | 'reattached' | 'rebuilt';

export type RecoveryFailure =
  | RecoveryExhaustedError
  | TransportConstructionFailedError
  | BackendUnavailableError
  | SessionServerError;

export type RecoveryResult =
  | { ok: true; stage: RecoveryStage; handle: TransportHandle }
  | { ok: false; error: RecoveryFailure };

export interface RecoveryAttempt {
  count: number;
  /** Epoch ms of the most recent admitted attempt */
  lastAttemptAt: number;
}

export interface RecoveryOptions {
  maxAttempts: number;
  cooldownSeconds: number;
}

export interface RecoveryStats {
  trackedSessions: number;
  maxAttempts: number;
  cooldownSeconds: number;
  attempts: Record<string, { count: number; lastAttemptAt: string }>;
}

export interface RecoveryDependencies {
  registry: TransportRegistry;
  sessions: ApplicationSessionStore;
  index: UserSessionIndex;
  transports: TransportFactory;
}

type Admission = { admitted: true } | { admitted: false; attempt: RecoveryAttempt; retryAfterMs: number };

export class RecoveryOrchestrator {
  private readonly attempts = new Map<string, RecoveryAttempt>();

  constructor(
    private readonly deps: RecoveryDependencies,
    private readonly options: RecoveryOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  private get cooldownMs(): number {
    return this.options.cooldownSeconds * 1000;
  }

  /**
   * @summary Attempts to give `sessionId` a usable transport in this process.
   * @returns The handle and the stage that produced it, or the failure. Failures are
   * never retried here; the next call from the client is the retry, and the
   * admission gate bounds those.
   */
  async recover(sessionId: string, identity: UserIdentity): Promise<RecoveryResult> {
    const admission = this.admit(sessionId);
    if (!admission.admitted) {
      logger.error(`Skipping recovery for session ${sessionId} - too many attempts`);
      return {
        ok: false,
        error: new RecoveryExhaustedError(
          sessionId,
          admission.attempt.count,
          Math.ceil(admission.retryAfterMs / 1000),
        ),
      };
    }

    logger.warn(`Attempting to recover session ${sessionId}`);
    try {
      const resolution = await this.deps.registry.resolve(sessionId);
      if (resolution.status === 'live') {
        return { ok: true, stage: 'existing', handle: resolution.handle };
      }

      const serverName =
        resolution.status === 'orphaned' && resolution.record.transportKind !== EXISTENCE_ONLY_KIND
          ? resolution.record.serverName
          : this.deps.transports.serverName;

      const tenant = this.deps.sessions.forTenant(identityHash(identity));
      const session = await tenant.get(sessionId);
      if (session?.isActive) {
        const handle = await this.reattach(sessionId, serverName);
        logger.info(`Successfully created new transport for session ${sessionId}`);
        return { ok: true, stage: 'reattached', handle };
      }

      logger.info(`Creating new unified session for ${sessionId}`);
      await this.deps.index.create(
        sessionId,
        identity,
        { recovered: true, recovery_time: new Date(this.clock()).toISOString() },
        `recovered_client_${sessionId.slice(0, 8)}`,
      );
      const handle = await this.reattach(sessionId, serverName);
      logger.info(`Successfully created unified session for ${sessionId}`);
      return { ok: true, stage: 'rebuilt', handle };
    } catch (error) {
      logger.error(`Failed to recover session ${sessionId}:`, error);
      return {
        ok: false,
        error:
          error instanceof SessionServerError
            ? error
            : new TransportConstructionFailedError(sessionId, toError(error)),
      };
    }
  }

  /**
   * Drops counters idle for two cooldown windows.
   * @returns How many counters were removed.
   */
  sweepAttempts(): number {
    const cutoff = this.clock() - 2 * this.cooldownMs;
    let removed = 0;
    for (const [sessionId, attempt] of [...this.attempts]) {
      if (attempt.lastAttemptAt < cutoff) {
        this.attempts.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  attemptFor(sessionId: string): RecoveryAttempt | undefined {
    const attempt = this.attempts.get(sessionId);
    return attempt ? { ...attempt } : undefined;
  }

  stats(): RecoveryStats {
    const attempts: RecoveryStats['attempts'] = {};
    for (const [sessionId, attempt] of this.attempts) {
      attempts[sessionId] = {
        count: attempt.count,
        lastAttemptAt: new Date(attempt.lastAttemptAt).toISOString(),
      };
    }
    return {
      trackedSessions: this.attempts.size,
      maxAttempts: this.options.maxAttempts,
      cooldownSeconds: this.options.cooldownSeconds,
      attempts,
    };
  }

  private admit(sessionId: string): Admission {
    const now = this.clock();
    const previous = this.attempts.get(sessionId);
    let count = 0;

    if (previous) {
      const elapsed = now - previous.lastAttemptAt;
      if (elapsed < this.cooldownMs) {
        if (previous.count >= this.options.maxAttempts) {
          return { admitted: false, attempt: { ...previous }, retryAfterMs: this.cooldownMs - elapsed };
        }
        count = previous.count;
      }
    }

    this.attempts.set(sessionId, { count: count + 1, lastAttemptAt: now });
    return { admitted: true };
  }

  private async reattach(sessionId: string, serverName: string): Promise<TransportHandle> {
    let handle: TransportHandle;
    try {
      handle = await this.deps.transports.recreate(sessionId, serverName);
    } catch (error) {
      throw new TransportConstructionFailedError(sessionId, toError(error));
    }

    try {
      await this.deps.registry.bind(sessionId, handle, serverName);
    } catch (error) {
      await handle.close().catch((closeError: unknown) => {
        logger.error(`Failed to close unbound transport for session ${sessionId}:`, closeError);
      });
      throw error;
    }
    return handle;
  }
}
