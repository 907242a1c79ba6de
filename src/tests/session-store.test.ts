import { describe, test, expect, beforeEach } from '@jest/globals';
import { ApplicationSessionStore, TransportSessionStore } from '../session/session-store.js';
import type { TenantSessionStore } from '../session/session-store.js';
import { InMemoryBackend } from '../storage/in-memory-backend.js';
import { BackendUnavailableError } from '../types.js';
import { ManualClock, START_TIME } from './test-utils.js';

describe('ApplicationSessionStore', () => {
  let clock: ManualClock;
  let backend: InMemoryBackend;
  let store: ApplicationSessionStore;
  let tenant: TenantSessionStore;

  beforeEach(() => {
    clock = new ManualClock();
    backend = new InMemoryBackend(clock.clock);
    store = new ApplicationSessionStore(backend, { ttlSeconds: 3600, graceSeconds: 300 }, clock.clock);
    tenant = store.forTenant('tenant-a');
  });

  test('create stores a session that get returns', async () => {
    const result = await tenant.create('s1', 'client-1', { k: 'v' });

    expect(result.status).toBe('created');
    expect(await tenant.get('s1')).toEqual({
      sessionId: 's1',
      identityHash: 'tenant-a',
      clientId: 'client-1',
      createdAt: START_TIME,
      lastAccessed: START_TIME,
      payload: { k: 'v' },
      isActive: true,
    });
  });

  test('create on an active session reports already-handled and keeps the record', async () => {
    await tenant.create('s1', 'client-1', { first: true });
    clock.advanceSeconds(5);

    const result = await tenant.create('s1', 'client-2', { second: true });

    expect(result.status).toBe('already-handled');
    expect(result.session.clientId).toBe('client-1');
    expect((await tenant.get('s1'))?.payload).toEqual({ first: true });
  });

  test('create replaces a deactivated session', async () => {
    await tenant.create('s1', 'client-1');
    await tenant.deactivate('s1');

    const result = await tenant.create('s1', 'client-2');

    expect(result.status).toBe('created');
    expect(await tenant.get('s1')).toMatchObject({ clientId: 'client-2', isActive: true });
  });

  test('update merges the payload and refreshes lastAccessed', async () => {
    await tenant.create('s1', 'client-1', { a: 1, b: 2 });
    clock.advanceSeconds(10);

    const result = await tenant.update('s1', { b: 3, c: 4 });

    expect(result.status).toBe('ok');
    const stored = await tenant.get('s1');
    expect(stored?.payload).toEqual({ a: 1, b: 3, c: 4 });
    expect(stored?.lastAccessed).toBe(START_TIME + 10_000);
    expect(stored?.createdAt).toBe(START_TIME);
  });

  test('update of a missing session reports absent', async () => {
    expect(await tenant.update('missing', { a: 1 })).toEqual({ status: 'absent' });
  });

  test('sessions expire after the TTL unless refreshed', async () => {
    await tenant.create('s1', 'client-1');

    clock.advanceSeconds(3599);
    expect(await tenant.get('s1')).not.toBeNull();
    await tenant.update('s1');

    clock.advanceSeconds(3599);
    expect(await tenant.get('s1')).not.toBeNull();

    clock.advanceSeconds(2);
    expect(await tenant.get('s1')).toBeNull();
  });

  test('deactivate keeps the record readable for the grace period only', async () => {
    await tenant.create('s1', 'client-1');

    expect(await tenant.deactivate('s1')).toBe('ok');

    clock.advanceSeconds(299);
    expect(await tenant.get('s1')).toMatchObject({ isActive: false });

    clock.advanceSeconds(1);
    expect(await tenant.get('s1')).toBeNull();
  });

  test('deactivate of a missing session reports absent', async () => {
    expect(await tenant.deactivate('missing')).toBe('absent');
  });

  test('delete is idempotent', async () => {
    await tenant.create('s1', 'client-1');

    expect(await tenant.delete('s1')).toBe('ok');
    expect(await tenant.delete('s1')).toBe('absent');
    expect(await tenant.get('s1')).toBeNull();
  });

  test('extend replaces the TTL', async () => {
    await tenant.create('s1', 'client-1');

    expect(await tenant.extend('s1', 10)).toBe('ok');
    clock.advanceSeconds(10);

    expect(await tenant.get('s1')).toBeNull();
    expect(await tenant.extend('s1')).toBe('absent');
  });

  test('tenants presenting the same session id stay isolated', async () => {
    const other = store.forTenant('tenant-b');
    await tenant.create('s1', 'client-a', { owner: 'a' });

    expect(await other.get('s1')).toBeNull();
    expect((await other.create('s1', 'client-b', { owner: 'b' })).status).toBe('created');

    expect((await tenant.get('s1'))?.payload).toEqual({ owner: 'a' });
    expect((await other.get('s1'))?.payload).toEqual({ owner: 'b' });
    expect(await tenant.list()).toEqual(['s1']);
    expect(await other.list()).toEqual(['s1']);
  });

  test('scan returns sessions of every tenant', async () => {
    await tenant.create('s1', 'client-a');
    await store.forTenant('tenant-b').create('s2', 'client-b');

    const ids = (await store.scan()).map((session) => session.sessionId).sort();

    expect(ids).toEqual(['s1', 's2']);
  });

  test('undecodable and malformed records read as absent', async () => {
    await backend.setex('mcp_session:tenant-a:broken', 60, '{not json');
    await backend.setex('mcp_session:tenant-a:wrong', 60, JSON.stringify({ sessionId: 'wrong' }));

    expect(await tenant.get('broken')).toBeNull();
    expect(await tenant.get('wrong')).toBeNull();
  });

  test('an unreachable backend rejects with BackendUnavailableError', async () => {
    backend.setReachable(false);

    await expect(tenant.get('s1')).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(tenant.create('s1', 'client-1')).rejects.toBeInstanceOf(BackendUnavailableError);
  });
});

describe('TransportSessionStore', () => {
  let clock: ManualClock;
  let store: TransportSessionStore;

  beforeEach(() => {
    clock = new ManualClock();
    store = new TransportSessionStore(new InMemoryBackend(clock.clock), 3600, clock.clock);
  });

  test('put records an active existence record', async () => {
    await store.put('s1', 'streamable-http', 'server-a');

    expect(await store.get('s1')).toEqual({
      sessionId: 's1',
      transportKind: 'streamable-http',
      serverName: 'server-a',
      createdAt: START_TIME,
      lastAccessed: START_TIME,
      isActive: true,
    });
    expect(await store.list()).toEqual(['s1']);
  });

  test('touch refreshes lastAccessed and the TTL', async () => {
    await store.put('s1', 'streamable-http', 'server-a');
    clock.advanceSeconds(3000);

    expect(await store.touch('s1')).toBe('ok');
    clock.advanceSeconds(3000);

    expect((await store.get('s1'))?.lastAccessed).toBe(START_TIME + 3_000_000);
  });

  test('touch and delete of a missing record report absent', async () => {
    expect(await store.touch('missing')).toBe('absent');
    expect(await store.delete('missing')).toBe('absent');
  });
});
