/**
 * @file src/mcp/tool-server.ts
 * @description Builds the `McpServer` every transport is connected to. Tools hold no
 * per-session state, so one factory serves both new and recovered sessions.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerCalculatorTools } from '../tools/calculator.js';
import { registerEmployeeTools } from '../tools/employees.js';
import type { EmployeeDirectory } from '../tools/employees.js';
import { registerVirusTotalTools } from '../tools/virustotal.js';
import type { VirusTotalClient } from '../tools/virustotal.js';

export const SERVER_VERSION = '1.0.0';

export interface ToolServerDependencies {
  virustotal: VirusTotalClient;
  employees: EmployeeDirectory;
}

export function createToolServer(serverName: string, deps: ToolServerDependencies): McpServer {
  const server = new McpServer(
    { name: serverName, version: SERVER_VERSION },
    { capabilities: { tools: {}, logging: {} } },
  );

  registerCalculatorTools(server);
  registerVirusTotalTools(server, deps.virustotal);
  registerEmployeeTools(server, deps.employees);

  return server;
}
