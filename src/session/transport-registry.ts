/**
 * @file src/session/transport-registry.ts
 * @description Tracks which transport serves a session id.
 *
 * Two tiers:
 * - a process-local map of live handles, authoritative for liveness in this process
 *   and never shared;
 * - a durable existence record in the backend, which lets any process learn that a
 *   transport existed even though it cannot rebuild it from the record.
 */

import { logger } from '../logger.js';
import { EXISTENCE_ONLY_KIND } from '../types.js';
import type { MutationStatus, TransportHandle, TransportResolution, TransportSession } from '../types.js';
import type { TransportSessionStore } from './session-store.js';

interface LocalBinding {
  handle: TransportHandle;
  serverName: string;
}

export class TransportRegistry {
  private readonly local = new Map<string, LocalBinding>();

  constructor(private readonly records: TransportSessionStore) {}

  /**
   * Records that a transport exists for `sessionId`, then binds `handle` locally.
   * Passing `null` records existence only (e.g. a session learned from logs).
   * @throws {BackendUnavailableError} If the existence record cannot be written; the
   * handle is not bound in that case.
   */
  async bind(sessionId: string, handle: TransportHandle | null, serverName: string): Promise<TransportSession> {
    const existing = this.local.get(sessionId);
    if (!handle && existing) {
      // A live handle outranks an existence-only record.
      return this.records.put(sessionId, existing.handle.kind, existing.serverName);
    }

    const record = await this.records.put(sessionId, handle?.kind ?? EXISTENCE_ONLY_KIND, serverName);
    if (handle) {
      this.local.set(sessionId, { handle, serverName });
    }
    logger.debug(`Bound transport session ${sessionId} (${record.transportKind}) for ${serverName}`);
    return record;
  }

  /**
   * @summary Looks up the transport for a session id.
   * @remarks A local hit also refreshes the existence record, rewriting it if it
   * expired while the handle stayed alive.
   * @throws {BackendUnavailableError} On a local miss when the backend cannot be reached.
   */
  async resolve(sessionId: string): Promise<TransportResolution> {
    const binding = this.local.get(sessionId);
    if (binding) {
      try {
        if ((await this.records.touch(sessionId)) === 'absent') {
          await this.records.put(sessionId, binding.handle.kind, binding.serverName);
        }
      } catch (error) {
        logger.warn(`Could not refresh existence record for live transport ${sessionId}:`, error);
      }
      return { status: 'live', handle: binding.handle };
    }

    const record = await this.records.get(sessionId);
    if (record?.isActive) {
      logger.debug(`Transport session ${sessionId} exists in the backend but not in this process`);
      return { status: 'orphaned', record };
    }
    return { status: 'unknown' };
  }

  /**
   * Drops the local handle (without closing it) and the existence record.
   * @returns `'absent'` when neither existed.
   */
  async unbind(sessionId: string): Promise<MutationStatus> {
    const hadLocal = this.local.delete(sessionId);
    const durable = await this.records.delete(sessionId);
    return hadLocal || durable === 'ok' ? 'ok' : 'absent';
  }

  /** Refreshes the existence record's access time and TTL. */
  async touch(sessionId: string): Promise<MutationStatus> {
    return this.records.touch(sessionId);
  }

  localSessionIds(): string[] {
    return [...this.local.keys()];
  }

  /** Closes and forgets every local handle. Existence records are left to expire. */
  async closeAll(): Promise<void> {
    const bindings = [...this.local.entries()];
    this.local.clear();
    const results = await Promise.allSettled(bindings.map(([, binding]) => binding.handle.close()));
    results.forEach((result, position) => {
      if (result.status === 'rejected') {
        logger.error(`Failed to close transport for session ${bindings[position]?.[0]}:`, result.reason);
      }
    });
  }
}
