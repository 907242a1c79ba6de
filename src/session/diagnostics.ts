/**
 * @file src/session/diagnostics.ts
 * @description Read-only health snapshot of the session subsystem for operational
 * tooling. Never used by recovery decisions.
 */

import { logger } from '../logger.js';
import { systemClock, toError } from '../types.js';
import type { Clock, KeyValueBackend } from '../types.js';
import type { DiscoveryStats, SessionDiscovery } from './discovery.js';
import type { RecoveryOrchestrator, RecoveryStats } from './recovery.js';
import type { ApplicationSessionStore, TransportSessionStore } from './session-store.js';
import type { TransportRegistry } from './transport-registry.js';

export interface SessionHealthSnapshot {
  backend: 'ok' | 'unreachable';
  error?: string;
  checkedAt: string;
  applicationSessions: {
    total: number;
    active: number;
  };
  transportSessions: {
    /** Existence records in the backend */
    durable: number;
    /** Handles bound in this process */
    local: number;
  };
  /** Active application sessions per owner user type */
  userTypeDistribution: Record<string, number>;
  recovery: RecoveryStats;
  discovery: DiscoveryStats | null;
}

export interface DiagnosticsDependencies {
  backend: KeyValueBackend;
  sessions: ApplicationSessionStore;
  transportSessions: TransportSessionStore;
  registry: TransportRegistry;
  recovery: RecoveryOrchestrator;
  discovery: SessionDiscovery | null;
}

export class SessionDiagnostics {
  constructor(
    private readonly deps: DiagnosticsDependencies,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Collects counts from the backend. If the backend cannot be reached the snapshot
   * reports it as unreachable with zero backend-derived counts.
   */
  async snapshot(): Promise<SessionHealthSnapshot> {
    const base = {
      checkedAt: new Date(this.clock()).toISOString(),
      recovery: this.deps.recovery.stats(),
      discovery: this.deps.discovery?.stats() ?? null,
    };
    const local = this.deps.registry.localSessionIds().length;

    try {
      await this.deps.backend.ping();
      const sessions = await this.deps.sessions.scan();
      const durable = await this.deps.transportSessions.list();

      const userTypeDistribution: Record<string, number> = {};
      let active = 0;
      for (const session of sessions) {
        if (!session.isActive) {
          continue;
        }
        active++;
        const userType = session.owner?.userType ?? 'unknown';
        userTypeDistribution[userType] = (userTypeDistribution[userType] ?? 0) + 1;
      }

      return {
        ...base,
        backend: 'ok',
        applicationSessions: { total: sessions.length, active },
        transportSessions: { durable: durable.length, local },
        userTypeDistribution,
      };
    } catch (error) {
      logger.error('Session health check failed:', error);
      return {
        ...base,
        backend: 'unreachable',
        error: toError(error).message,
        applicationSessions: { total: 0, active: 0 },
        transportSessions: { durable: 0, local },
        userTypeDistribution: {},
      };
    }
  }
}
