import { describe, test, expect, beforeEach } from '@jest/globals';
import { TransportSessionStore } from '../session/session-store.js';
import { TransportRegistry } from '../session/transport-registry.js';
import { InMemoryBackend } from '../storage/in-memory-backend.js';
import { BackendUnavailableError, EXISTENCE_ONLY_KIND } from '../types.js';
import { FakeTransportHandle, ManualClock } from './test-utils.js';

describe('TransportRegistry', () => {
  let clock: ManualClock;
  let backend: InMemoryBackend;
  let records: TransportSessionStore;
  let registry: TransportRegistry;

  beforeEach(() => {
    clock = new ManualClock();
    backend = new InMemoryBackend(clock.clock);
    records = new TransportSessionStore(backend, 3600, clock.clock);
    registry = new TransportRegistry(records);
  });

  test('a bound handle resolves as live', async () => {
    const handle = new FakeTransportHandle('s1', 'initial', 'server-a');

    await registry.bind('s1', handle, 'server-a');
    const resolution = await registry.resolve('s1');

    expect(resolution).toEqual({ status: 'live', handle });
    expect(await records.get('s1')).toMatchObject({ transportKind: 'fake', serverName: 'server-a', isActive: true });
  });

  test('a record without a local handle resolves as orphaned', async () => {
    await registry.bind('s1', new FakeTransportHandle('s1', 'initial', 'server-a'), 'server-a');
    const otherProcess = new TransportRegistry(new TransportSessionStore(backend, 3600, clock.clock));

    const resolution = await otherProcess.resolve('s1');

    expect(resolution.status).toBe('orphaned');
    expect(resolution.status === 'orphaned' && resolution.record.serverName).toBe('server-a');
  });

  test('binding without a handle records existence only', async () => {
    await registry.bind('s1', null, 'LOG_DISCOVERED');

    const resolution = await registry.resolve('s1');

    expect(resolution.status).toBe('orphaned');
    expect(resolution.status === 'orphaned' && resolution.record.transportKind).toBe(EXISTENCE_ONLY_KIND);
    expect(registry.localSessionIds()).toEqual([]);
  });

  test('an existence-only bind keeps the record of a live handle', async () => {
    await registry.bind('s1', new FakeTransportHandle('s1', 'initial', 'server-a'), 'server-a');

    await registry.bind('s1', null, 'LOG_DISCOVERED');

    expect(await records.get('s1')).toMatchObject({ transportKind: 'fake', serverName: 'server-a' });
    expect((await registry.resolve('s1')).status).toBe('live');
  });

  test('one id moves from unknown through orphaned to live', async () => {
    const handle = new FakeTransportHandle('s1', 'recreated', 'server-a');
    expect(await registry.resolve('s1')).toEqual({ status: 'unknown' });

    const otherProcess = new TransportRegistry(new TransportSessionStore(backend, 3600, clock.clock));
    await otherProcess.bind('s1', new FakeTransportHandle('s1', 'initial', 'server-b'), 'server-b');
    const orphaned = await registry.resolve('s1');
    expect(orphaned.status).toBe('orphaned');
    expect(orphaned.status === 'orphaned' && orphaned.record.serverName).toBe('server-b');

    await registry.bind('s1', handle, 'server-a');
    expect(await registry.resolve('s1')).toEqual({ status: 'live', handle });
  });

  test('an id that was never bound resolves as unknown', async () => {
    expect(await registry.resolve('never-seen')).toEqual({ status: 'unknown' });
  });

  test('an inactive record resolves as unknown', async () => {
    await backend.setex(
      'mcp_transport:s1',
      60,
      JSON.stringify({
        sessionId: 's1',
        transportKind: 'fake',
        serverName: 'server-a',
        createdAt: 0,
        lastAccessed: 0,
        isActive: false,
      }),
    );

    expect(await registry.resolve('s1')).toEqual({ status: 'unknown' });
  });

  test('resolving a live handle rewrites an expired existence record', async () => {
    await registry.bind('s1', new FakeTransportHandle('s1', 'initial', 'server-a'), 'server-a');
    clock.advanceSeconds(3600);
    expect(await records.get('s1')).toBeNull();

    expect((await registry.resolve('s1')).status).toBe('live');

    expect(await records.get('s1')).toMatchObject({ transportKind: 'fake', serverName: 'server-a' });
  });

  test('a live handle still resolves while the backend is unreachable', async () => {
    await registry.bind('s1', new FakeTransportHandle('s1', 'initial', 'server-a'), 'server-a');
    backend.setReachable(false);

    expect((await registry.resolve('s1')).status).toBe('live');
    await expect(registry.resolve('s2')).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  test('bind does not keep the handle when the record cannot be written', async () => {
    backend.setReachable(false);

    await expect(
      registry.bind('s1', new FakeTransportHandle('s1', 'initial', 'server-a'), 'server-a'),
    ).rejects.toBeInstanceOf(BackendUnavailableError);
    expect(registry.localSessionIds()).toEqual([]);
  });

  test('unbind drops the handle and the record without closing the handle', async () => {
    const handle = new FakeTransportHandle('s1', 'initial', 'server-a');
    await registry.bind('s1', handle, 'server-a');

    expect(await registry.unbind('s1')).toBe('ok');
    expect(await registry.unbind('s1')).toBe('absent');
    expect(await registry.resolve('s1')).toEqual({ status: 'unknown' });
    expect(handle.closed).toBe(false);
  });

  test('closeAll closes every local handle', async () => {
    const first = new FakeTransportHandle('s1', 'initial', 'server-a');
    const second = new FakeTransportHandle('s2', 'initial', 'server-a');
    await registry.bind('s1', first, 'server-a');
    await registry.bind('s2', second, 'server-a');

    await registry.closeAll();

    expect(first.closed).toBe(true);
    expect(second.closed).toBe(true);
    expect(registry.localSessionIds()).toEqual([]);
  });
});
