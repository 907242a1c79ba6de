/**
 * @file src/session/index.ts
 * @description Wires the session components together. Everything is constructed
 * explicitly and handed to the HTTP layer; there is no module-level session state.
 */

import { systemClock } from '../types.js';
import type { Clock, KeyValueBackend, ServerConfig, TransportFactory } from '../types.js';
import { SessionDiagnostics } from './diagnostics.js';
import { SessionDiscovery } from './discovery.js';
import { RecoveryOrchestrator } from './recovery.js';
import { ApplicationSessionStore, TransportSessionStore } from './session-store.js';
import { TransportRegistry } from './transport-registry.js';
import { UserSessionIndex } from './user-session-index.js';

export interface SessionServices {
  backend: KeyValueBackend;
  sessions: ApplicationSessionStore;
  transportSessions: TransportSessionStore;
  index: UserSessionIndex;
  registry: TransportRegistry;
  recovery: RecoveryOrchestrator;
  discovery: SessionDiscovery | null;
  diagnostics: SessionDiagnostics;
  transports: TransportFactory;
}

export interface SessionServicesOptions {
  config: Pick<ServerConfig, 'sessions' | 'recovery' | 'discovery'>;
  backend: KeyValueBackend;
  transports: TransportFactory;
  clock?: Clock;
}

export function createSessionServices(options: SessionServicesOptions): SessionServices {
  const { config, backend, transports } = options;
  const clock = options.clock ?? systemClock;

  const sessions = new ApplicationSessionStore(
    backend,
    { ttlSeconds: config.sessions.ttlSeconds, graceSeconds: config.sessions.graceSeconds },
    clock,
  );
  const transportSessions = new TransportSessionStore(backend, config.sessions.ttlSeconds, clock);
  const index = new UserSessionIndex(
    backend,
    sessions,
    { ttlSeconds: config.sessions.ttlSeconds, reuseWindowSeconds: config.sessions.reuseWindowSeconds },
    clock,
  );
  const registry = new TransportRegistry(transportSessions);
  const recovery = new RecoveryOrchestrator(
    { registry, sessions, index, transports },
    { maxAttempts: config.recovery.maxAttempts, cooldownSeconds: config.recovery.cooldownSeconds },
    clock,
  );
  const discovery = config.discovery.enabled
    ? new SessionDiscovery(index, registry, config.discovery.maxTracked)
    : null;
  const diagnostics = new SessionDiagnostics(
    { backend, sessions, transportSessions, registry, recovery, discovery },
    clock,
  );

  return { backend, sessions, transportSessions, index, registry, recovery, discovery, diagnostics, transports };
}

export { identityHash, resolveIdentity, requestMetadataFromHeaders } from './identity.js';
export type { FindOrCreateResult, FindOrCreateOutcome } from './user-session-index.js';
export type { RecoveryResult, RecoveryStage } from './recovery.js';
export type { SessionHealthSnapshot } from './diagnostics.js';
