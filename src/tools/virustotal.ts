/**
 * @file src/tools/virustotal.ts
 * @description Threat-intel lookups against the VirusTotal v3 API.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toolCallCounter } from '../metrics.js';
import { ToolInvocationError, toError } from '../types.js';

const BASE_URL = 'https://www.virustotal.com/api/v3';

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: { headers: Record<string, string> }) => Promise<FetchResponseLike>;

export const ipReportArgsSchema = z.object({
  ip_address: z.string().ip().describe('IPv4 or IPv6 address to look up'),
});

export const domainReportArgsSchema = z.object({
  domain: z.string().min(1).describe('Domain name to look up'),
});

export type IpReportArgs = z.infer<typeof ipReportArgsSchema>;
export type DomainReportArgs = z.infer<typeof domainReportArgsSchema>;

const apiErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

export class VirusTotalClient {
  constructor(
    private readonly apiKey: string | undefined,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async ipReport(ipAddress: string): Promise<unknown> {
    return this.get('virustotal_get_ip_report', `/ip_addresses/${encodeURIComponent(ipAddress)}`);
  }

  async domainReport(domain: string): Promise<unknown> {
    return this.get('virustotal_get_domain_report', `/domains/${encodeURIComponent(domain)}`);
  }

  /**
   * @throws {ToolInvocationError} If no API key is configured, the request fails, or
   * VirusTotal answers with an error status.
   */
  private async get(tool: string, path: string): Promise<unknown> {
    if (!this.apiKey) {
      throw new ToolInvocationError(tool, 'VIRUSTOTAL_API_KEY environment variable is not set.');
    }

    let response: FetchResponseLike;
    try {
      response = await this.fetchImpl(`${BASE_URL}${path}`, { headers: { 'x-apikey': this.apiKey } });
    } catch (error) {
      throw new ToolInvocationError(tool, `Request failed: ${toError(error).message}`);
    }

    if (!response.ok) {
      const body = await response.text();
      let message = body;
      try {
        const parsed = apiErrorSchema.safeParse(JSON.parse(body));
        if (parsed.success) {
          message = parsed.data.error.message;
        }
      } catch {
        // Non-JSON error body: report it verbatim.
      }
      throw new ToolInvocationError(tool, `API Error: ${message} (Status code: ${response.status})`);
    }

    return response.json();
  }
}

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function registerVirusTotalTools(server: McpServer, client: VirusTotalClient): void {
  server.tool(
    'virustotal_get_ip_report',
    'Fetches the VirusTotal report for a given IP address',
    ipReportArgsSchema.shape,
    async ({ ip_address }: IpReportArgs): Promise<CallToolResult> => {
      toolCallCounter.inc({ tool: 'virustotal_get_ip_report' });
      return jsonResult(await client.ipReport(ip_address));
    },
  );

  server.tool(
    'virustotal_get_domain_report',
    'Fetches the VirusTotal report for a given domain',
    domainReportArgsSchema.shape,
    async ({ domain }: DomainReportArgs): Promise<CallToolResult> => {
      toolCallCounter.inc({ tool: 'virustotal_get_domain_report' });
      return jsonResult(await client.domainReport(domain));
    },
  );
}
