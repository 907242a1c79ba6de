/**
 * @file src/server.ts
 * @description Express front door of the MCP session gateway: the `/mcp` endpoints,
 * health, session listing and metrics, wired to explicitly constructed session
 * services.
 *
 * Key Error Handling Ideas:
 * - **Boundary Control:** A global Express error handler is the final catch-all. It
 *   logs the real error and answers with a JSON-RPC error body, never a stack trace.
 * - **Status Mapping:** Session errors choose the HTTP status: unknown or unrecoverable
 *   sessions are 404, an unreachable backend is 503, malformed requests are 400.
 * - **Recovery Is Bounded:** A request for a session this process cannot serve goes
 *   through the recovery orchestrator once; its failure is reported, not retried.
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { createServer } from 'http';
import type { Server } from 'http';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { isInitializeRequest, McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { createToolServer } from './mcp/tool-server.js';
import { McpTransportFactory, STATEFUL_TRANSPORT_KIND } from './mcp/transport-factory.js';
import { localTransportsGauge, metricsRegister, recoveryCounter, sessionResolutionCounter } from './metrics.js';
import { createSessionServices, identityHash, requestMetadataFromHeaders, resolveIdentity } from './session/index.js';
import type { SessionServices } from './session/index.js';
import { InMemoryBackend } from './storage/in-memory-backend.js';
import { RedisBackend } from './storage/redis-backend.js';
import { EmployeeDirectory } from './tools/employees.js';
import { VirusTotalClient } from './tools/virustotal.js';
import {
  BackendUnavailableError,
  RecoveryExhaustedError,
  SessionNotFoundError,
  SessionServerError,
  systemClock,
} from './types.js';
import type { Clock, KeyValueBackend, ServerConfig, TransportFactory, TransportHandle, UserIdentity } from './types.js';

const IN_MEMORY_CLEANUP_INTERVAL_MS = 60_000;

/** The parts of a JSON-RPC message the HTTP layer looks at. */
const rpcEnvelopeSchema = z.object({
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().optional(),
});

export interface CreateAppOptions {
  /** Defaults to `loadConfig()` over `process.env`. */
  config?: ServerConfig;
  /** Injected backends are left open on shutdown; the caller owns them. */
  backend?: KeyValueBackend;
  transports?: TransportFactory;
  clock?: Clock;
}

export interface AppContext {
  app: express.Application;
  services: SessionServices;
  /** Stops background jobs and closes every local transport. Safe to call twice. */
  shutdown: () => Promise<void>;
}

/**
 * Chooses the key-value backend from configuration.
 * @remarks Redis commands issued while Redis is down reject after a bounded number of
 * retries, so a dead Redis surfaces as `BackendUnavailableError` instead of a hang.
 */
export function initializeBackend(config: ServerConfig, clock: Clock = systemClock): KeyValueBackend {
  if (config.useRedis) {
    logger.info(`Using Redis session backend at ${config.redisUrl}`);
    return RedisBackend.connect(config.redisUrl);
  }
  logger.info('Using in-memory session backend');
  return new InMemoryBackend(clock);
}

function sessionIdFrom(req: Request): string | undefined {
  const value = req.headers['mcp-session-id'];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function identityOf(req: Request): UserIdentity {
  return resolveIdentity(requestMetadataFromHeaders(req.headers, req.ip));
}

function rpcEnvelope(body: unknown): z.infer<typeof rpcEnvelopeSchema> {
  const parsed = rpcEnvelopeSchema.safeParse(body);
  return parsed.success ? parsed.data : {};
}

function httpStatusFor(err: Error): number {
  if (err instanceof SessionNotFoundError || err instanceof RecoveryExhaustedError) {
    return 404;
  }
  if (err instanceof BackendUnavailableError) {
    return 503;
  }
  if (err instanceof McpError && (err.code === ErrorCode.InvalidRequest || err.code === ErrorCode.ParseError)) {
    return 400;
  }
  return 500;
}

/**
 * Creates and configures the Express application.
 * Everything session-related is constructed here and returned, so tests can run
 * several apps against one shared backend to model several processes.
 */
export async function createApp(options: CreateAppOptions = {}): Promise<AppContext> {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? systemClock;
  const ownsBackend = options.backend === undefined;
  const backend = options.backend ?? initializeBackend(config, clock);

  const employees = new EmployeeDirectory(config.tools.databaseUrl);
  const virustotal = new VirusTotalClient(config.tools.virustotalApiKey);
  const transports =
    options.transports ??
    new McpTransportFactory({
      serverName: config.serverName,
      allowedHosts: config.allowedHosts,
      createServer: (serverName) => createToolServer(serverName, { virustotal, employees }),
    });

  const services = createSessionServices({ config, backend, transports, clock });
  const app = express();

  // --- PROTOCOL ERROR FLOW ---
  // 1. Middleware (CORS, rate limiter, JSON parser). Rate limit exceeded: 429 with a JSON-RPC error.
  // 2. /mcp handlers resolve identity, application session and transport.
  //    - No session id and not initialize: McpError(InvalidRequest), 400.
  //    - Backend down: BackendUnavailableError, 503.
  //    - Recovery budget spent: RecoveryExhaustedError, 404 with Retry-After.
  // 3. The SDK transport handles the JSON-RPC exchange; tool failures come back as
  //    tool results with `isError: true`.
  // 4. The global error handler turns anything thrown into a JSON-RPC error body.

  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: true,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'mcp-session-id', 'mcp-protocol-version'],
      exposedHeaders: ['Mcp-Session-Id'],
    }),
  );

  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      res.status(429).json({
        jsonrpc: '2.0',
        error: {
          code: -32000,
          message: 'Too many requests, please retry later',
        },
        id: null,
      });
    },
  });
  app.use('/mcp', limiter);

  app.use(express.json({ limit: '10mb' }));

  // Access log. Passive discovery reads session ids back out of these lines.
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      `${req.method} ${req.path} mcp-session-id: ${sessionIdFrom(req) ?? '-'} client_ip=${req.ip ?? 'unknown'} user-agent: "${req.headers['user-agent'] ?? 'unknown'}"`,
    );
    next();
  });

  // --- BACKGROUND JOBS ---
  const timers: NodeJS.Timeout[] = [];

  const sweep = setInterval(() => {
    const removed = services.recovery.sweepAttempts();
    if (removed > 0) {
      logger.debug(`Swept ${removed} idle recovery counters`);
    }
  }, config.recovery.sweepIntervalMs);
  sweep.unref();
  timers.push(sweep);

  if (backend instanceof InMemoryBackend) {
    const cleanup = setInterval(() => {
      const removed = backend.cleanup();
      if (removed > 0) {
        logger.debug(`Removed ${removed} expired in-memory entries`);
      }
    }, IN_MEMORY_CLEANUP_INTERVAL_MS);
    cleanup.unref();
    timers.push(cleanup);
  }

  const { discovery } = services;
  const detachDiscovery = discovery
    ? logger.onLine((line) => {
        // observe() never rejects.
        void discovery.observe(line);
      })
    : undefined;

  // ==========================================
  // SESSION RESOLUTION
  // ==========================================

  /**
   * @summary Starts a session for an initialize request.
   * @remarks Find-or-create runs with a fresh id; if the caller's recent session is
   * reused, the new transport is bound under the reused id and any stale local
   * transport for it is closed first.
   * @throws {BackendUnavailableError} If the backend cannot be reached.
   */
  async function openSession(identity: UserIdentity, method: string | undefined): Promise<TransportHandle> {
    const { session, outcome } = await services.index.findOrCreate(randomUUID(), identity, {
      transport: STATEFUL_TRANSPORT_KIND,
      last_method: method ?? 'initialize',
    });
    sessionResolutionCounter.inc({ outcome });

    const previous = await services.registry.resolve(session.sessionId);
    if (previous.status === 'live') {
      logger.info(`Replacing stale transport for reused session ${session.sessionId}`);
      await previous.handle.close().catch((error: unknown) => {
        logger.error(`Failed to close stale transport for session ${session.sessionId}:`, error);
      });
    }

    const handle = await services.transports.createInitial(session.sessionId);
    try {
      await services.registry.bind(session.sessionId, handle, services.transports.serverName);
    } catch (error) {
      await handle.close().catch((closeError: unknown) => {
        logger.error(`Failed to close unbound transport for session ${session.sessionId}:`, closeError);
      });
      throw error;
    }
    return handle;
  }

  /**
   * @summary Returns the transport for a presented session id, recovering it when
   * this process has none.
   * @throws {RecoveryExhaustedError} If the session's recovery budget is spent.
   * @throws {TransportConstructionFailedError} If a replacement transport could not be built.
   * @throws {BackendUnavailableError} If the backend cannot be reached.
   */
  async function transportFor(
    sessionId: string,
    identity: UserIdentity,
    payload: Record<string, unknown>,
  ): Promise<TransportHandle> {
    const { outcome } = await services.index.findOrCreate(sessionId, identity, payload);
    sessionResolutionCounter.inc({ outcome });

    const resolution = await services.registry.resolve(sessionId);
    if (resolution.status === 'live') {
      return resolution.handle;
    }

    const result = await services.recovery.recover(sessionId, identity);
    if (!result.ok) {
      recoveryCounter.inc({ result: result.error instanceof RecoveryExhaustedError ? 'exhausted' : 'failed' });
      throw result.error;
    }
    recoveryCounter.inc({ result: result.stage });
    return result.handle;
  }

  // ==========================================
  // MCP ENDPOINTS
  // ==========================================

  /**
   * POST /mcp - Command Channel
   * Opens a session for an initialize request without a session id, and otherwise
   * routes the request to the session's transport.
   */
  app.post('/mcp', async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdFrom(req);
    const identity = identityOf(req);
    const { method } = rpcEnvelope(req.body);

    let handle: TransportHandle;
    if (sessionId) {
      handle = await transportFor(sessionId, identity, method ? { last_method: method } : {});
    } else if (isInitializeRequest(req.body)) {
      handle = await openSession(identity, method);
    } else {
      throw new McpError(
        ErrorCode.InvalidRequest,
        'Request must be an initialize request if no session ID is provided.',
      );
    }

    await handle.handleRequest(req, res, req.body);
  });

  /**
   * GET /mcp - Announcement Channel (SSE)
   */
  app.get('/mcp', async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdFrom(req);
    if (!sessionId) {
      throw new McpError(ErrorCode.InvalidRequest, 'Mcp-Session-Id header is required');
    }

    const handle = await transportFor(sessionId, identityOf(req), {});
    await handle.handleRequest(req, res);
  });

  /**
   * DELETE /mcp - Session Termination
   * Only the caller's own active session can be ended. A local transport answers
   * the request itself; otherwise the session is torn down directly and 204 is returned.
   */
  app.delete('/mcp', async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdFrom(req);
    if (!sessionId) {
      throw new McpError(ErrorCode.InvalidRequest, 'Mcp-Session-Id header is required');
    }

    const identity = identityOf(req);
    const owned = await services.sessions.forTenant(identityHash(identity)).get(sessionId);
    if (!owned?.isActive) {
      throw new SessionNotFoundError(`Session ${sessionId} not found`, { sessionId });
    }

    const resolution = await services.registry.resolve(sessionId);
    if (resolution.status === 'live') {
      await resolution.handle.handleRequest(req, res, req.body);
    }

    await services.registry.unbind(sessionId);
    await services.index.deactivate(sessionId, identity);
    logger.info(`Session closed: ${sessionId}`);

    if (!res.headersSent) {
      res.status(204).end();
    }
    if (resolution.status === 'live') {
      await resolution.handle.close().catch((error: unknown) => {
        logger.error(`Failed to close transport for session ${sessionId}:`, error);
      });
    }
  });

  // ==========================================
  // OPERATIONAL ENDPOINTS
  // ==========================================

  app.get('/health', async (_req: Request, res: Response) => {
    const snapshot = await services.diagnostics.snapshot();
    const healthy = snapshot.backend === 'ok';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date(clock()).toISOString(),
      uptime: process.uptime(),
      storageMode: backend instanceof RedisBackend ? 'redis' : 'in-memory',
      ...(backend instanceof RedisBackend && { redis: backend.status }),
      sessions: snapshot,
    });
  });

  /** The caller's active application sessions, most recent first. */
  app.get('/sessions', async (req: Request, res: Response) => {
    const identity = identityOf(req);
    const sessions = await services.index.activeSessions(identity);

    res.json({
      userId: identity.userId,
      userType: identity.userType,
      sessions: sessions.map((session) => ({
        sessionId: session.sessionId,
        clientId: session.clientId,
        createdAt: new Date(session.createdAt).toISOString(),
        lastAccessed: new Date(session.lastAccessed).toISOString(),
      })),
    });
  });

  app.get('/metrics', async (_req: Request, res: Response) => {
    localTransportsGauge.set(services.registry.localSessionIds().length);
    res.set('Content-Type', metricsRegister.contentType);
    res.end(await metricsRegister.metrics());
  });

  /**
   * --- GLOBAL ERROR HANDLING MIDDLEWARE ---
   * @summary The final safety net for all requests.
   * @remarks Logs the real error and sends a protocol-compliant JSON-RPC error. Only
   * errors this application raised on purpose expose their message.
   */
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    logger.error('[GLOBAL ERROR HANDLER] Unhandled error caught:', err);

    let status = httpStatusFor(err);
    let code: number = ErrorCode.InternalError;
    let message = 'An internal server error occurred.';
    let data: unknown = undefined;

    if (err instanceof SessionServerError) {
      code = err.code;
      message = err.message;
      data = err.context;
    } else if (err instanceof McpError) {
      code = err.code;
      message = err.message;
      data = err.data;
    } else if ('type' in err && err.type === 'entity.parse.failed') {
      // Raised by express.json() for a body that is not JSON.
      status = 400;
      code = ErrorCode.ParseError;
      message = 'Parse error: request body is not valid JSON.';
    }

    if (err instanceof RecoveryExhaustedError) {
      res.set('Retry-After', String(err.retryAfterSeconds));
    }

    res.status(status).json({
      jsonrpc: '2.0',
      id: rpcEnvelope(req.body).id ?? null,
      error: { code, message, data },
    });
  });

  let closed = false;
  async function shutdown(): Promise<void> {
    if (closed) {
      return;
    }
    closed = true;

    timers.forEach((timer) => clearInterval(timer));
    detachDiscovery?.();
    await services.registry.closeAll();
    await employees.close();
    if (ownsBackend) {
      await backend.close();
    }
  }

  return { app, services, shutdown };
}

// =================================================================
// APPLICATION ENTRY POINT
// =================================================================

/**
 * Starts the HTTP server and installs the SIGTERM handler.
 * @throws {ConfigurationError} If `config` is omitted and the environment is invalid.
 */
export async function startServer(config: ServerConfig = loadConfig()): Promise<Server> {
  const { app, shutdown } = await createApp({ config });
  const server: Server = createServer(app);

  server.listen(config.port, () => {
    logger.info(`${config.serverName} - Streamable HTTP running on port ${config.port}`);
    logger.info(`POST http://localhost:${config.port}/mcp - Command channel`);
    logger.info(`GET  http://localhost:${config.port}/mcp - Announcement channel`);
  });

  process.on('SIGTERM', () => {
    logger.info('Shutting down gracefully...');
    server.close(() => {
      shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed:', error);
          process.exit(1);
        },
      );
    });
  });

  return server;
}
