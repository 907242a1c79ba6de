import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import supertest from 'supertest';
import { createApp } from '../server.js';
import type { AppContext } from '../server.js';
import { InMemoryBackend } from '../storage/in-memory-backend.js';
import { initializeRequest, testConfig } from './test-utils.js';

const PROTOCOL_VERSION = '2025-03-26';
const ACCEPT = 'application/json, text/event-stream';

const addRequest = {
  jsonrpc: '2.0',
  id: 2,
  method: 'tools/call',
  params: { name: 'calculator_add', arguments: { a: 2, b: 3 } },
};

function sessionIdOf(response: supertest.Response): string {
  const value: unknown = response.headers['mcp-session-id'];
  if (typeof value !== 'string') {
    throw new Error('response carries no mcp-session-id header');
  }
  return value;
}

async function initialize(context: AppContext): Promise<string> {
  const response = await supertest(context.app)
    .post('/mcp')
    .set('Accept', ACCEPT)
    .send(initializeRequest)
    .expect(200);
  const sessionId = sessionIdOf(response);

  await supertest(context.app)
    .post('/mcp')
    .set('Accept', ACCEPT)
    .set('mcp-session-id', sessionId)
    .set('mcp-protocol-version', PROTOCOL_VERSION)
    .send({ jsonrpc: '2.0', method: 'notifications/initialized' })
    .expect(202);

  return sessionId;
}

function callAdd(context: AppContext, sessionId: string): supertest.Test {
  return supertest(context.app)
    .post('/mcp')
    .set('Accept', ACCEPT)
    .set('mcp-session-id', sessionId)
    .set('mcp-protocol-version', PROTOCOL_VERSION)
    .send(addRequest);
}

describe('MCP over Streamable HTTP', () => {
  let backend: InMemoryBackend;
  let context: AppContext;

  beforeEach(async () => {
    backend = new InMemoryBackend();
    context = await createApp({ config: testConfig(), backend });
  });

  afterEach(async () => {
    await context.shutdown();
  });

  test('initialize returns the server identity and a session id', async () => {
    const response = await supertest(context.app)
      .post('/mcp')
      .set('Accept', ACCEPT)
      .send(initializeRequest)
      .expect(200);

    expect(sessionIdOf(response)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(response.body.id).toBe(1);
    expect(response.body.result.serverInfo).toEqual({ name: 'mcp-session-gateway', version: '1.0.0' });
  });

  test('tool calls are served on the initialized session', async () => {
    const sessionId = await initialize(context);

    const response = await callAdd(context, sessionId).expect(200);

    expect(response.body.id).toBe(2);
    expect(response.body.result.content).toEqual([{ type: 'text', text: '2 + 3 = 5' }]);
  });

  test('a restarted process serves the session through a recovered transport', async () => {
    const sessionId = await initialize(context);
    await context.shutdown();

    const restarted = await createApp({ config: testConfig(), backend });
    try {
      const first = await callAdd(restarted, sessionId).expect(200);
      const second = await callAdd(restarted, sessionId).expect(200);

      expect(first.body.result.content).toEqual([{ type: 'text', text: '2 + 3 = 5' }]);
      expect(second.body.result.content).toEqual([{ type: 'text', text: '2 + 3 = 5' }]);
      expect(restarted.services.recovery.attemptFor(sessionId)?.count).toBe(1);
    } finally {
      await restarted.shutdown();
    }
  });

  test('DELETE ends the session', async () => {
    const sessionId = await initialize(context);

    await supertest(context.app)
      .delete('/mcp')
      .set('mcp-session-id', sessionId)
      .set('mcp-protocol-version', PROTOCOL_VERSION)
      .expect(200);

    expect(await context.services.registry.resolve(sessionId)).toEqual({ status: 'unknown' });
  });
});
