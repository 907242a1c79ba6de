/**
 * @file src/session/discovery.ts
 * @description Passive session discovery: scans free-text diagnostic lines for session
 * ids and credentials, and registers what it finds through the same index and
 * registry the request path uses. Best-effort only; nothing depends on it and it never
 * rejects into its caller.
 */

import { logger } from '../logger.js';
import { toError } from '../types.js';
import type { RequestMetadata } from '../types.js';
import { resolveIdentity } from './identity.js';
import type { TransportRegistry } from './transport-registry.js';
import type { UserSessionIndex } from './user-session-index.js';

/** Server name recorded on existence records created from discovered sessions. */
export const DISCOVERED_SERVER_NAME = 'LOG_DISCOVERED';

const SESSION_ID_PATTERNS: RegExp[] = [
  /session_id=([a-f0-9]{32})/,
  /session_id=([a-f0-9-]{36})/,
  /"session_id":\s*"([a-f0-9]{32})"/,
  /"session_id":\s*"([a-f0-9-]{36})"/,
  /session_id:\s*([a-f0-9]{32})/,
  /Session-ID:\s*([a-f0-9]{32})/,
  /mcp-session-id:\s*([a-f0-9]{32})/i,
  /mcp-session-id:\s*([a-f0-9-]{36})/i,
];

const CREDENTIAL_PATTERNS: Array<{ pattern: RegExp; scheme: 'Bearer' | 'ApiKey' }> = [
  { pattern: /authorization:\s*bearer\s+([a-zA-Z0-9._-]+)/i, scheme: 'Bearer' },
  { pattern: /"authorization":\s*"bearer\s+([a-zA-Z0-9._-]+)"/i, scheme: 'Bearer' },
  { pattern: /apikey\s+([a-zA-Z0-9._-]+)/i, scheme: 'ApiKey' },
];

const CLIENT_IP_PATTERN = /client_ip=(\S+)/;
const IPV4_PATTERN = /(\d{1,3}(?:\.\d{1,3}){3})/;
const USER_AGENT_PATTERN = /user-agent['"]?:\s*['"]([^'"]+)['"]/i;

export function extractSessionId(line: string): string | undefined {
  for (const pattern of SESSION_ID_PATTERNS) {
    const match = pattern.exec(line);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

export function extractRequestMetadata(line: string): RequestMetadata {
  const metadata: RequestMetadata = {
    // The access log writes the address verbatim, so it hashes like the request did.
    clientIp: CLIENT_IP_PATTERN.exec(line)?.[1] ?? IPV4_PATTERN.exec(line)?.[1],
    userAgent: USER_AGENT_PATTERN.exec(line)?.[1],
  };

  for (const { pattern, scheme } of CREDENTIAL_PATTERNS) {
    const match = pattern.exec(line);
    if (match?.[1]) {
      metadata.authorization = `${scheme} ${match[1]}`;
      break;
    }
  }
  return metadata;
}

/**
 * Insertion-ordered set that forgets its oldest entry past `capacity`.
 * A lookup hit counts as use.
 */
export class BoundedIdSet {
  private readonly ids = new Map<string, true>();

  constructor(private readonly capacity: number) {}

  has(id: string): boolean {
    if (!this.ids.has(id)) {
      return false;
    }
    this.ids.delete(id);
    this.ids.set(id, true);
    return true;
  }

  add(id: string): void {
    this.ids.delete(id);
    this.ids.set(id, true);
    while (this.ids.size > this.capacity) {
      const oldest = this.ids.keys().next();
      if (oldest.done) {
        break;
      }
      this.ids.delete(oldest.value);
    }
  }

  delete(id: string): void {
    this.ids.delete(id);
  }

  get size(): number {
    return this.ids.size;
  }
}

export interface DiscoveryStats {
  observed: number;
  discovered: number;
  failures: number;
  tracked: number;
}

export class SessionDiscovery {
  private readonly processed: BoundedIdSet;
  private observed = 0;
  private discovered = 0;
  private failures = 0;

  constructor(
    private readonly index: UserSessionIndex,
    private readonly registry: TransportRegistry,
    maxTracked: number,
  ) {
    this.processed = new BoundedIdSet(maxTracked);
  }

  /**
   * Scans one line. Registers the session id it carries, once per id, under the
   * identity the line implies. Ids the registry already knows are left to the
   * request path that bound them. Never rejects.
   */
  async observe(line: string): Promise<void> {
    this.observed++;
    const sessionId = extractSessionId(line);
    if (!sessionId || this.processed.has(sessionId)) {
      return;
    }
    this.processed.add(sessionId);

    try {
      if ((await this.registry.resolve(sessionId)).status !== 'unknown') {
        logger.debug(`Session ${sessionId} is already tracked; discovery skipped`);
        return;
      }

      const identity = resolveIdentity(extractRequestMetadata(line));
      await this.index.findOrCreate(sessionId, identity, {
        source: 'log_discovery',
        detected_from: 'request_log',
        log_excerpt: line.slice(0, 200),
        original_session_id: sessionId,
      });
      await this.registry.bind(sessionId, null, DISCOVERED_SERVER_NAME);
      this.discovered++;
      logger.debug(`Discovered session ${sessionId} for user ${identity.userId}`);
    } catch (error) {
      // Forget the id so a later line can try again.
      this.processed.delete(sessionId);
      this.failures++;
      logger.debug(`Passive discovery failed for session ${sessionId}: ${toError(error).message}`);
    }
  }

  stats(): DiscoveryStats {
    return {
      observed: this.observed,
      discovered: this.discovered,
      failures: this.failures,
      tracked: this.processed.size,
    };
  }
}
