/**
 * @file src/types.ts
 * @description Core data structures, interfaces, Zod schemas and error types for the
 * MCP session gateway. Records that cross the key-value backend are described by Zod
 * schemas first and their TypeScript types are inferred from them, so a record read
 * back from storage is validated against the same shape the writer used.
 *
 * Key Error Handling Ideas:
 * - All custom errors extend `SessionServerError`, itself an `McpError`, so the HTTP
 *   layer can turn any of them into a JSON-RPC error body.
 * - Storage failures are always reported as `BackendUnavailableError`; absence of a
 *   record is never an error and is modelled as `null` or an `'absent'` status.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { z } from 'zod';
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

// =================================================================
// KEY NAMESPACES
// =================================================================

/** Application session records, scoped by identity hash: `mcp_session:<hash>:<sessionId>` */
export const APP_SESSION_PREFIX = 'mcp_session:';

/** Transport existence records: `mcp_transport:<sessionId>` */
export const TRANSPORT_SESSION_PREFIX = 'mcp_transport:';

/** Per-identity session id sets: `mcp_user_index:<hash>` */
export const USER_INDEX_PREFIX = 'mcp_user_index:';

/** Transport kind recorded when only the existence of a transport is known. */
export const EXISTENCE_ONLY_KIND = 'EXISTENCE_ONLY';

// =================================================================
// CLOCK
// =================================================================

/** Returns the current time in epoch milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

// =================================================================
// KEY-VALUE BACKEND
// =================================================================

/**
 * @interface KeyValueBackend
 * @description The shared store every session component talks to. It offers per-key
 * atomicity only; nothing here spans more than one key. Implementations are the
 * ioredis-backed `RedisBackend` and the process-local `InMemoryBackend`.
 *
 * Every method rejects with `BackendUnavailableError` when the store cannot be reached.
 */
export interface KeyValueBackend {
  /** Store a string value with a TTL in seconds (`SETEX`). */
  setex(key: string, ttlSeconds: number, value: string): Promise<void>;

  /** Read a string value (`GET`); `null` when the key is absent or expired. */
  get(key: string): Promise<string | null>;

  /** Remove a key (`DEL`); resolves to the number of keys removed. */
  del(key: string): Promise<number>;

  /** Reset the TTL of a key (`EXPIRE`); `false` when the key does not exist. */
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  /** Add a member to a set (`SADD`); resolves to the number of members added. */
  sadd(key: string, member: string): Promise<number>;

  /** Remove a member from a set (`SREM`); resolves to the number of members removed. */
  srem(key: string, member: string): Promise<number>;

  /** List the members of a set (`SMEMBERS`). */
  smembers(key: string): Promise<string[]>;

  /** Enumerate keys starting with `prefix` (`KEYS <prefix>*`). */
  keys(prefix: string): Promise<string[]>;

  /** Round-trip check used by diagnostics. */
  ping(): Promise<void>;

  close(): Promise<void>;
}

// =================================================================
// IDENTITY
// =================================================================

export const userTypeSchema = z.enum([
  'individual',
  'organization',
  'service_account',
  'anonymous',
  'authenticated_user',
]);

export const authMethodSchema = z.enum(['jwt', 'api_key', 'anonymous']);

export type UserType = z.infer<typeof userTypeSchema>;
export type AuthMethod = z.infer<typeof authMethodSchema>;

/**
 * @interface UserIdentity
 * @description The caller as seen by the session subsystem. Derived from request
 * metadata on every request and never persisted on its own; sessions carry only its
 * hash plus the denormalized `SessionOwner` fields.
 */
export interface UserIdentity {
  userId: string;
  userType: UserType;
  metadata: Record<string, string>;
  authMethod: AuthMethod;
}

/**
 * @interface RequestMetadata
 * @description Raw identity input. Every field is optional; an empty object resolves
 * to an anonymous identity.
 */
export interface RequestMetadata {
  /** Value of the `authorization` header, e.g. `Bearer <jwt>` or `ApiKey <key>`. */
  authorization?: string;

  /** Value of the `user-agent` header. */
  userAgent?: string;

  /** Remote address of the caller. */
  clientIp?: string;
}

// =================================================================
// SESSION RECORDS
// =================================================================

export const sessionOwnerSchema = z.object({
  userId: z.string(),
  userType: userTypeSchema,
  authMethod: authMethodSchema,
});

/** Denormalized identity fields stored alongside an application session. */
export type SessionOwner = z.infer<typeof sessionOwnerSchema>;

export const applicationSessionSchema = z.object({
  sessionId: z.string(),
  identityHash: z.string(),
  clientId: z.string(),
  createdAt: z.number(),
  lastAccessed: z.number(),
  payload: z.record(z.unknown()),
  isActive: z.boolean(),
  owner: sessionOwnerSchema.optional(),
});

/**
 * The logical session: who owns it, what it carries, when it was last used.
 * Lives at `mcp_session:<identityHash>:<sessionId>` with a sliding TTL.
 */
export type ApplicationSession = z.infer<typeof applicationSessionSchema>;

export const transportSessionSchema = z.object({
  sessionId: z.string(),
  transportKind: z.string(),
  serverName: z.string(),
  createdAt: z.number(),
  lastAccessed: z.number(),
  isActive: z.boolean(),
});

/**
 * Durable proof that a transport exists (or existed) for a session id. The transport
 * object itself is process-local and never serialized.
 */
export type TransportSession = z.infer<typeof transportSessionSchema>;

/** Outcome of a single-key mutation on a record that may not exist. */
export type MutationStatus = 'ok' | 'absent';

export type CreateSessionResult =
  | { status: 'created'; session: ApplicationSession }
  | { status: 'already-handled'; session: ApplicationSession };

export type UpdateSessionResult =
  | { status: 'ok'; session: ApplicationSession }
  | { status: 'absent' };

// =================================================================
// TRANSPORTS
// =================================================================

/**
 * @interface TransportHandle
 * @description A live, process-local connection able to serve MCP requests for one
 * session. Wraps the SDK's `StreamableHTTPServerTransport` together with the
 * `McpServer` connected to it.
 */
export interface TransportHandle {
  /** Recorded as `transportKind` in the existence record. */
  readonly kind: string;

  handleRequest(req: IncomingMessage, res: ServerResponse, body?: unknown): Promise<void>;

  close(): Promise<void>;
}

/**
 * @interface TransportFactory
 * @description Builds transport handles. The HTTP layer uses `createInitial` for
 * sessions negotiated through `initialize`; the recovery orchestrator uses `recreate`
 * for sessions whose handle was lost.
 */
export interface TransportFactory {
  /** Server identity recorded for transports this factory builds. */
  readonly serverName: string;

  createInitial(sessionId: string): Promise<TransportHandle>;

  recreate(sessionId: string, serverName: string): Promise<TransportHandle>;
}

/**
 * Result of looking a session id up in the transport registry.
 * - `live`: a handle is bound in this process.
 * - `orphaned`: an existence record says a transport was bound somewhere, but there is
 *   no handle here; it must be recreated.
 * - `unknown`: no transport was ever registered (or its record expired).
 */
export type TransportResolution =
  | { status: 'live'; handle: TransportHandle }
  | { status: 'orphaned'; record: TransportSession }
  | { status: 'unknown' };

// =================================================================
// CONFIGURATION TYPES
// =================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * @interface ServerConfig
 * @description Configuration object for the entire application, produced by
 * `loadConfig()` from environment variables.
 */
export interface ServerConfig {
  /** HTTP server port */
  port: number;

  /** CORS allowed origin */
  corsOrigin: string;

  /** Hosts accepted by DNS rebinding protection; empty disables the check */
  allowedHosts: string[];

  /** Whether to use Redis for distributed storage */
  useRedis: boolean;

  /** Redis connection URL */
  redisUrl: string;

  /** Logging level */
  logLevel: LogLevel;

  /** Rate limiting configuration */
  rateLimit: {
    windowMs: number;
    max: number;
  };

  /** Server identity recorded on transport sessions */
  serverName: string;

  sessions: {
    /** Sliding TTL applied on every successful access */
    ttlSeconds: number;
    /** Residual TTL of a deactivated session */
    graceSeconds: number;
    /** Window within which a new request from the same identity reuses a session */
    reuseWindowSeconds: number;
  };

  recovery: {
    maxAttempts: number;
    cooldownSeconds: number;
    /** How often idle attempt counters are swept */
    sweepIntervalMs: number;
  };

  discovery: {
    enabled: boolean;
    /** Upper bound on remembered session ids */
    maxTracked: number;
  };

  tools: {
    virustotalApiKey?: string;
    databaseUrl?: string;
  };
}

// =================================================================
// CUSTOM APPLICATION-SPECIFIC ERRORS
// =================================================================

/**
 * @summary Base class for all custom errors within this application.
 * @remarks Extending McpError keeps these errors compatible with the MCP protocol's
 * error handling, and lets the HTTP layer pick an HTTP status per subclass.
 */
export class SessionServerError extends McpError {
  constructor(
    code: number,
    message: string,
    public readonly context?: unknown,
  ) {
    super(code, message, context);
    this.name = this.constructor.name;
  }
}

/**
 * @summary The key-value backend could not be reached or rejected a command.
 * @remarks Wraps the driver error so the caller never sees Redis specifics.
 */
export class BackendUnavailableError extends SessionServerError {
  constructor(
    public readonly operation: string,
    public readonly originalError: Error,
  ) {
    super(ErrorCode.InternalError, `Session backend unavailable during ${operation}`, {
      operation,
    });
  }
}

/**
 * @summary Thrown when a requested session does not exist, has expired, or is invalid.
 */
export class SessionNotFoundError extends SessionServerError {
  constructor(message: string, context?: { sessionId?: string }) {
    super(ErrorCode.InvalidRequest, message, context);
  }
}

/**
 * @summary The recovery attempt budget for a session id is spent.
 * @remarks Terminal for the presented session id: the client has to start a new session.
 */
export class RecoveryExhaustedError extends SessionServerError {
  constructor(
    public readonly sessionId: string,
    public readonly attempts: number,
    public readonly retryAfterSeconds: number,
  ) {
    super(
      ErrorCode.InvalidRequest,
      'Session recovery exhausted; start a new session with an initialize request.',
      { sessionId, attempts, retryAfterSeconds },
    );
  }
}

/**
 * @summary Raw identity input could not be interpreted.
 * @remarks Internal to the identity resolver, which always degrades to another
 * identity instead of letting this escape.
 */
export class MalformedIdentityInputError extends SessionServerError {
  constructor(message: string) {
    super(ErrorCode.InvalidParams, message);
  }
}

/**
 * @summary Building a replacement transport failed during recovery.
 */
export class TransportConstructionFailedError extends SessionServerError {
  constructor(
    public readonly sessionId: string,
    public readonly originalError: Error,
  ) {
    super(ErrorCode.InternalError, 'Failed to construct a transport for the session.', {
      sessionId,
    });
  }
}

/**
 * @summary Environment configuration failed validation at startup.
 */
export class ConfigurationError extends SessionServerError {
  constructor(public readonly issues: string[]) {
    super(ErrorCode.InternalError, `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
}

/**
 * @summary A tool could not complete (missing credentials, upstream failure, rejected query).
 * @remarks The MCP server reports these to the client as a tool result with `isError: true`.
 */
export class ToolInvocationError extends SessionServerError {
  constructor(tool: string, message: string) {
    super(ErrorCode.InternalError, message, { tool });
  }
}

/** Normalizes an unknown thrown value into an `Error`. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
