/**
 * @file src/mcp/transport-factory.ts
 * @description `TransportFactory` over the SDK's `StreamableHTTPServerTransport`.
 *
 * Sessions negotiated through `initialize` get a stateful transport that owns the
 * session id. A recovered session cannot replay its handshake, so its handle serves
 * each request through a fresh stateless transport and server pair; the session id
 * is still tracked by the registry and the application session store.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { StreamableHTTPServerTransportOptions } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '../logger.js';
import type { TransportFactory, TransportHandle } from '../types.js';

export const STATEFUL_TRANSPORT_KIND = 'streamable-http';
export const PER_REQUEST_TRANSPORT_KIND = 'streamable-http-per-request';

export type ServerBuilder = (serverName: string) => McpServer;

export interface McpTransportFactoryOptions {
  serverName: string;
  /** Hosts accepted by DNS rebinding protection; empty disables it. */
  allowedHosts: string[];
  createServer: ServerBuilder;
}

type TransportProtection = Pick<
  StreamableHTTPServerTransportOptions,
  'enableJsonResponse' | 'enableDnsRebindingProtection' | 'allowedHosts'
>;

/** One transport bound to one server for the whole session. */
export class StatefulTransportHandle implements TransportHandle {
  readonly kind = STATEFUL_TRANSPORT_KIND;

  constructor(
    private readonly transport: StreamableHTTPServerTransport,
    private readonly server: McpServer,
  ) {}

  async handleRequest(req: IncomingMessage, res: ServerResponse, body?: unknown): Promise<void> {
    await this.transport.handleRequest(req, res, body);
  }

  async close(): Promise<void> {
    // Closing the server closes the connected transport.
    await this.server.close();
  }
}

/** Builds a stateless transport and server for every request and drops them when the response closes. */
export class PerRequestTransportHandle implements TransportHandle {
  readonly kind = PER_REQUEST_TRANSPORT_KIND;
  private readonly inFlight = new Set<McpServer>();

  constructor(
    private readonly sessionId: string,
    private readonly serverName: string,
    private readonly createServer: ServerBuilder,
    private readonly protection: TransportProtection,
  ) {}

  async handleRequest(req: IncomingMessage, res: ServerResponse, body?: unknown): Promise<void> {
    const server = this.createServer(this.serverName);
    const transport = new StreamableHTTPServerTransport({
      ...this.protection,
      sessionIdGenerator: undefined,
    });

    this.inFlight.add(server);
    res.on('close', () => {
      this.inFlight.delete(server);
      server.close().catch((error: unknown) => {
        logger.error(`Failed to close per-request server for session ${this.sessionId}:`, error);
      });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  async close(): Promise<void> {
    const servers = [...this.inFlight];
    this.inFlight.clear();
    await Promise.all(servers.map((server) => server.close()));
  }
}

export class McpTransportFactory implements TransportFactory {
  readonly serverName: string;

  constructor(private readonly options: McpTransportFactoryOptions) {
    this.serverName = options.serverName;
  }

  async createInitial(sessionId: string): Promise<TransportHandle> {
    const transport = new StreamableHTTPServerTransport({
      ...this.protection(),
      sessionIdGenerator: () => sessionId,
      onsessioninitialized: (initialized) => {
        logger.info(`Session initialized: ${initialized}`);
      },
    });
    const server = this.options.createServer(this.serverName);
    await server.connect(transport);
    return new StatefulTransportHandle(transport, server);
  }

  async recreate(sessionId: string, serverName: string): Promise<TransportHandle> {
    logger.info(`Reconstructing transport for session ${sessionId} (${serverName})`);
    return new PerRequestTransportHandle(sessionId, serverName, this.options.createServer, this.protection());
  }

  private protection(): TransportProtection {
    const { allowedHosts } = this.options;
    return {
      enableJsonResponse: true,
      enableDnsRebindingProtection: allowedHosts.length > 0,
      allowedHosts: allowedHosts.length > 0 ? allowedHosts : undefined,
    };
  }
}
