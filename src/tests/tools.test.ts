import { describe, test, expect, jest } from '@jest/globals';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { calculate, formatCalculation } from '../tools/calculator.js';
import { EmployeeDirectory, assertEmployeeSelect } from '../tools/employees.js';
import type { QueryRunner } from '../tools/employees.js';
import { VirusTotalClient } from '../tools/virustotal.js';
import type { FetchLike, FetchResponseLike } from '../tools/virustotal.js';
import { ToolInvocationError } from '../types.js';

describe('calculator', () => {
  test('performs the four operations', () => {
    expect(calculate('add', 2, 3)).toBe(5);
    expect(calculate('subtract', 2, 3)).toBe(-1);
    expect(calculate('multiply', 4, 2.5)).toBe(10);
    expect(calculate('divide', 7, 2)).toBe(3.5);
  });

  test('formats the calculation', () => {
    expect(formatCalculation('divide', 7, 2, 3.5)).toBe('7 / 2 = 3.5');
  });

  test('division by zero is an invalid-params error', () => {
    let caught: unknown;
    try {
      calculate('divide', 1, 0);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(McpError);
    expect(caught instanceof McpError && caught.code).toBe(ErrorCode.InvalidParams);
  });
});

describe('assertEmployeeSelect', () => {
  test.each([
    "SELECT name FROM employees WHERE department = 'IT'",
    'select * from employees;',
    'SELECT * FROM "employees" LIMIT 5',
  ])('accepts %s', (sql) => {
    expect(() => assertEmployeeSelect(sql)).not.toThrow();
  });

  test.each([
    ['DELETE FROM employees', 'Only SELECT queries are allowed.'],
    ['SELECT 1; DROP TABLE employees', 'Only a single statement is allowed.'],
    ['SELECT * FROM salaries', "can only query the 'employees' table"],
    ['SELECT * FROM employees_backup', "can only query the 'employees' table"],
    ['SELECT now()', "can only query the 'employees' table"],
  ])('rejects %s', (sql, message) => {
    expect(() => assertEmployeeSelect(sql)).toThrow(message);
  });
});

describe('EmployeeDirectory', () => {
  type FakeRunner = QueryRunner & { queries: string[]; ended: boolean };

  function fakeRunner(rows: Array<Record<string, unknown>>): FakeRunner {
    const runner: FakeRunner = {
      queries: [],
      ended: false,
      async query(sql: string) {
        runner.queries.push(sql);
        return { rows };
      },
      async end() {
        runner.ended = true;
      },
    };
    return runner;
  }

  test('runs validated queries on a lazily created pool', async () => {
    const runner = fakeRunner([{ name: 'Ada' }]);
    const createRunner = jest.fn((_connectionString: string) => runner);
    const directory = new EmployeeDirectory('postgres://test', createRunner);

    expect(createRunner).not.toHaveBeenCalled();
    expect(await directory.query('SELECT name FROM employees')).toEqual([{ name: 'Ada' }]);
    await directory.query('SELECT id FROM employees');

    expect(createRunner).toHaveBeenCalledTimes(1);
    expect(createRunner).toHaveBeenCalledWith('postgres://test');
    expect(runner.queries).toEqual(['SELECT name FROM employees', 'SELECT id FROM employees']);

    await directory.close();
    expect(runner.ended).toBe(true);
  });

  test('rejected queries never reach the database', async () => {
    const runner = fakeRunner([]);
    const directory = new EmployeeDirectory('postgres://test', () => runner);

    await expect(directory.query('DROP TABLE employees')).rejects.toBeInstanceOf(ToolInvocationError);
    expect(runner.queries).toEqual([]);
  });

  test('maps the information schema to column types', async () => {
    const directory = new EmployeeDirectory('postgres://test', () =>
      fakeRunner([
        { column_name: 'id', data_type: 'integer' },
        { column_name: 'name', data_type: 'text' },
      ]),
    );

    expect(await directory.schema()).toEqual({ id: 'integer', name: 'text' });
  });

  test('reports a missing DATABASE_URL', async () => {
    const directory = new EmployeeDirectory(undefined);

    await expect(directory.query('SELECT * FROM employees')).rejects.toThrow('DATABASE_URL is not configured.');
  });

  test('wraps database failures', async () => {
    const directory = new EmployeeDirectory('postgres://test', () => ({
      query: async () => {
        throw new Error('connection refused');
      },
      end: async () => undefined,
    }));

    await expect(directory.query('SELECT * FROM employees')).rejects.toThrow(
      'Database query failed: connection refused',
    );
  });
});

describe('VirusTotalClient', () => {
  function response(status: number, body: string): FetchResponseLike {
    return {
      ok: status >= 200 && status < 300,
      status,
      json: async () => JSON.parse(body),
      text: async () => body,
    };
  }

  test('requests IP and domain reports with the API key', async () => {
    const fetchImpl = jest.fn<FetchLike>(async () => response(200, '{"data":{"id":"report"}}'));
    const client = new VirusTotalClient('test-key', fetchImpl);

    expect(await client.ipReport('192.0.2.1')).toEqual({ data: { id: 'report' } });
    await client.domainReport('example.com');

    expect(fetchImpl.mock.calls).toEqual([
      ['https://www.virustotal.com/api/v3/ip_addresses/192.0.2.1', { headers: { 'x-apikey': 'test-key' } }],
      ['https://www.virustotal.com/api/v3/domains/example.com', { headers: { 'x-apikey': 'test-key' } }],
    ]);
  });

  test('requires an API key', async () => {
    const fetchImpl = jest.fn<FetchLike>(async () => response(200, '{}'));
    const client = new VirusTotalClient(undefined, fetchImpl);

    await expect(client.ipReport('192.0.2.1')).rejects.toThrow('VIRUSTOTAL_API_KEY environment variable is not set.');
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  test('reports the API error message and status', async () => {
    const client = new VirusTotalClient('test-key', async () =>
      response(404, '{"error":{"code":"NotFoundError","message":"Resource not found"}}'),
    );

    await expect(client.domainReport('example.invalid')).rejects.toThrow(
      'API Error: Resource not found (Status code: 404)',
    );
  });

  test('reports a non-JSON error body verbatim', async () => {
    const client = new VirusTotalClient('test-key', async () => response(502, 'Bad gateway'));

    await expect(client.ipReport('192.0.2.1')).rejects.toThrow('API Error: Bad gateway (Status code: 502)');
  });

  test('wraps network failures', async () => {
    const client = new VirusTotalClient('test-key', async () => {
      throw new Error('socket hang up');
    });

    await expect(client.ipReport('192.0.2.1')).rejects.toThrow('Request failed: socket hang up');
  });
});
