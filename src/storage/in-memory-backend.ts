/**
 * @file src/storage/in-memory-backend.ts
 * @description Process-local `KeyValueBackend` for single-node deployments and tests.
 * Mirrors the Redis semantics the session components rely on: per-key TTLs, sets that
 * disappear when emptied, and `SADD` creating a set without an expiry.
 */

import { BackendUnavailableError, systemClock } from '../types.js';
import type { Clock, KeyValueBackend } from '../types.js';

interface Entry {
  value: string | Set<string>;
  /** Epoch ms; `null` means no expiry */
  expiresAt: number | null;
}

export class InMemoryBackend implements KeyValueBackend {
  private readonly entries = new Map<string, Entry>();
  private reachable = true;

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Simulates losing (or regaining) the backend. While unreachable every command
   * rejects with `BackendUnavailableError`, as the Redis backend does.
   */
  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
    this.guard('SETEX');
    this.entries.set(key, { value, expiresAt: this.clock() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<string | null> {
    this.guard('GET');
    const entry = this.live(key);
    if (!entry) {
      return null;
    }
    if (typeof entry.value !== 'string') {
      throw new Error(`WRONGTYPE Operation against a key holding a set: ${key}`);
    }
    return entry.value;
  }

  async del(key: string): Promise<number> {
    this.guard('DEL');
    const existed = this.live(key) !== undefined;
    this.entries.delete(key);
    return existed ? 1 : 0;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    this.guard('EXPIRE');
    const entry = this.live(key);
    if (!entry) {
      return false;
    }
    entry.expiresAt = this.clock() + ttlSeconds * 1000;
    return true;
  }

  async sadd(key: string, member: string): Promise<number> {
    this.guard('SADD');
    const entry = this.live(key);
    if (!entry) {
      this.entries.set(key, { value: new Set([member]), expiresAt: null });
      return 1;
    }
    const members = this.asSet(key, entry);
    if (members.has(member)) {
      return 0;
    }
    members.add(member);
    return 1;
  }

  async srem(key: string, member: string): Promise<number> {
    this.guard('SREM');
    const entry = this.live(key);
    if (!entry) {
      return 0;
    }
    const members = this.asSet(key, entry);
    const removed = members.delete(member);
    if (members.size === 0) {
      this.entries.delete(key);
    }
    return removed ? 1 : 0;
  }

  async smembers(key: string): Promise<string[]> {
    this.guard('SMEMBERS');
    const entry = this.live(key);
    return entry ? [...this.asSet(key, entry)] : [];
  }

  async keys(prefix: string): Promise<string[]> {
    this.guard('KEYS');
    const matches: string[] = [];
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix) && this.live(key)) {
        matches.push(key);
      }
    }
    return matches;
  }

  async ping(): Promise<void> {
    this.guard('PING');
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Drops every expired entry. Expiry is also checked lazily on access; this only
   * bounds memory for keys nobody reads again.
   */
  cleanup(): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (!this.live(key)) {
        removed++;
      }
    }
    return removed;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private asSet(key: string, entry: Entry): Set<string> {
    if (typeof entry.value === 'string') {
      throw new Error(`WRONGTYPE Operation against a key holding a string: ${key}`);
    }
    return entry.value;
  }

  private guard(operation: string): void {
    if (!this.reachable) {
      throw new BackendUnavailableError(operation, new Error('in-memory backend marked unreachable'));
    }
  }
}
