/**
 * @file src/session/record-store.ts
 * @description Generic JSON record CRUD with TTLs over one key prefix of the backend.
 * Both session kinds are built on it.
 */

import type { z } from 'zod';
import { logger } from '../logger.js';
import type { KeyValueBackend, MutationStatus } from '../types.js';

export class RecordStore<T> {
  constructor(
    private readonly backend: KeyValueBackend,
    private readonly prefix: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly label: string,
  ) {}

  key(id: string): string {
    return `${this.prefix}${id}`;
  }

  /**
   * Reads and validates a record. A value that is not valid JSON or does not match
   * the schema is reported and treated as absent.
   */
  async read(id: string): Promise<T | null> {
    const raw = await this.backend.get(this.key(id));
    if (raw === null) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Discarding undecodable ${this.label} record ${id}:`, error);
      return null;
    }

    const parsed = this.schema.safeParse(decoded);
    if (!parsed.success) {
      logger.warn(`Discarding malformed ${this.label} record ${id}: ${parsed.error.message}`);
      return null;
    }
    return parsed.data;
  }

  async write(id: string, record: T, ttlSeconds: number): Promise<void> {
    await this.backend.setex(this.key(id), ttlSeconds, JSON.stringify(record));
  }

  async remove(id: string): Promise<MutationStatus> {
    const removed = await this.backend.del(this.key(id));
    return removed > 0 ? 'ok' : 'absent';
  }

  async expire(id: string, ttlSeconds: number): Promise<MutationStatus> {
    return (await this.backend.expire(this.key(id), ttlSeconds)) ? 'ok' : 'absent';
  }

  /**
   * Lists record ids under `prefix + scope`, with that whole prefix stripped.
   * Best-effort: records may expire between listing and reading.
   */
  async ids(scope = ''): Promise<string[]> {
    const fullPrefix = `${this.prefix}${scope}`;
    const keys = await this.backend.keys(fullPrefix);
    return keys.map((key) => key.slice(fullPrefix.length));
  }
}
