/**
 * @file src/tools/employees.ts
 * @description Read-only access to the `employees` table.
 */

import { z } from 'zod';
import { Pool } from 'pg';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toolCallCounter } from '../metrics.js';
import { ToolInvocationError, toError } from '../types.js';

export const employeeQueryArgsSchema = z.object({
  query: z
    .string()
    .min(1)
    .describe("SELECT statement over the employees table, e.g. SELECT name FROM employees WHERE department = 'IT'"),
});

export type EmployeeQueryArgs = z.infer<typeof employeeQueryArgsSchema>;

export interface QueryRunner {
  query(sql: string): Promise<{ rows: Array<Record<string, unknown>> }>;
  end(): Promise<void>;
}

const SCHEMA_QUERY = `
  SELECT column_name, data_type
  FROM information_schema.columns
  WHERE table_name = 'employees'
  ORDER BY ordinal_position
`;

/**
 * Accepts a single SELECT whose first FROM names the `employees` table.
 * @throws {ToolInvocationError} Otherwise.
 */
export function assertEmployeeSelect(sql: string): void {
  const statement = sql.trim().replace(/;\s*$/, '');
  const normalized = statement.toUpperCase();

  if (!normalized.startsWith('SELECT')) {
    throw new ToolInvocationError('postgres_query_employees', 'Only SELECT queries are allowed.');
  }
  if (statement.includes(';')) {
    throw new ToolInvocationError('postgres_query_employees', 'Only a single statement is allowed.');
  }

  const fromIndex = normalized.search(/\bFROM\b/);
  const afterFrom = fromIndex === -1 ? '' : normalized.slice(fromIndex + 'FROM'.length).trimStart();
  if (!/^"?EMPLOYEES"?(\s|$)/.test(afterFrom)) {
    throw new ToolInvocationError(
      'postgres_query_employees',
      "This tool can only query the 'employees' table. The query must start with 'SELECT ... FROM employees ...'.",
    );
  }
}

export class EmployeeDirectory {
  private runner: QueryRunner | null = null;

  constructor(
    private readonly databaseUrl: string | undefined,
    private readonly createRunner: (connectionString: string) => QueryRunner = (connectionString) =>
      new Pool({ connectionString }),
  ) {}

  async query(sql: string): Promise<Array<Record<string, unknown>>> {
    assertEmployeeSelect(sql);
    return this.run('postgres_query_employees', sql, 'Database query failed');
  }

  /** Column name to data type for the employees table. */
  async schema(): Promise<Record<string, string>> {
    const rows = await this.run('postgres_get_employee_schema', SCHEMA_QUERY, 'Failed to get schema');
    const columns: Record<string, string> = {};
    for (const row of rows) {
      const name = row['column_name'];
      const type = row['data_type'];
      if (typeof name === 'string' && typeof type === 'string') {
        columns[name] = type;
      }
    }
    return columns;
  }

  async close(): Promise<void> {
    if (this.runner) {
      const runner = this.runner;
      this.runner = null;
      await runner.end();
    }
  }

  private async run(tool: string, sql: string, failure: string): Promise<Array<Record<string, unknown>>> {
    if (!this.databaseUrl) {
      throw new ToolInvocationError(tool, 'DATABASE_URL is not configured.');
    }
    this.runner ??= this.createRunner(this.databaseUrl);

    try {
      const result = await this.runner.query(sql);
      return result.rows;
    } catch (error) {
      throw new ToolInvocationError(tool, `${failure}: ${toError(error).message}`);
    }
  }
}

export function registerEmployeeTools(server: McpServer, directory: EmployeeDirectory): void {
  server.tool(
    'postgres_query_employees',
    'Executes a read-only SQL SELECT query on the employees table',
    employeeQueryArgsSchema.shape,
    async ({ query }: EmployeeQueryArgs): Promise<CallToolResult> => {
      toolCallCounter.inc({ tool: 'postgres_query_employees' });
      const rows = await directory.query(query);
      return { content: [{ type: 'text', text: JSON.stringify(rows, null, 2) }] };
    },
  );

  server.tool(
    'postgres_get_employee_schema',
    'Returns the column names and data types of the employees table',
    async (): Promise<CallToolResult> => {
      toolCallCounter.inc({ tool: 'postgres_get_employee_schema' });
      const columns = await directory.schema();
      return { content: [{ type: 'text', text: JSON.stringify(columns, null, 2) }] };
    },
  );
}
