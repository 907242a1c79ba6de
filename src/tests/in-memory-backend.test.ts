import { describe, test, expect, beforeEach } from '@jest/globals';
import { InMemoryBackend } from '../storage/in-memory-backend.js';
import { BackendUnavailableError } from '../types.js';
import { ManualClock } from './test-utils.js';

describe('InMemoryBackend', () => {
  let clock: ManualClock;
  let backend: InMemoryBackend;

  beforeEach(() => {
    clock = new ManualClock();
    backend = new InMemoryBackend(clock.clock);
  });

  test('values expire at their TTL', async () => {
    await backend.setex('key', 10, 'value');

    clock.advanceSeconds(9);
    expect(await backend.get('key')).toBe('value');

    clock.advanceSeconds(1);
    expect(await backend.get('key')).toBeNull();
  });

  test('expire resets the TTL of existing keys only', async () => {
    await backend.setex('key', 10, 'value');
    clock.advanceSeconds(9);

    expect(await backend.expire('key', 10)).toBe(true);
    clock.advanceSeconds(9);
    expect(await backend.get('key')).toBe('value');
    expect(await backend.expire('missing', 10)).toBe(false);
  });

  test('sets have no expiry until one is set and vanish when emptied', async () => {
    expect(await backend.sadd('set', 'a')).toBe(1);
    expect(await backend.sadd('set', 'a')).toBe(0);
    await backend.sadd('set', 'b');
    clock.advanceSeconds(100_000);
    expect((await backend.smembers('set')).sort()).toEqual(['a', 'b']);

    await backend.srem('set', 'a');
    await backend.srem('set', 'b');

    expect(await backend.keys('set')).toEqual([]);
    expect(await backend.srem('set', 'a')).toBe(0);
  });

  test('keys matches a literal prefix', async () => {
    await backend.setex('mcp_session:a:1', 60, '{}');
    await backend.setex('mcp_session:b:1', 60, '{}');
    await backend.setex('mcp_transport:1', 60, '{}');

    expect((await backend.keys('mcp_session:')).sort()).toEqual(['mcp_session:a:1', 'mcp_session:b:1']);
    expect(await backend.keys('mcp_session:a:')).toEqual(['mcp_session:a:1']);
  });

  test('del reports whether a live key was removed', async () => {
    await backend.setex('key', 1, 'value');

    expect(await backend.del('key')).toBe(1);
    expect(await backend.del('key')).toBe(0);
  });

  test('type mismatches are rejected', async () => {
    await backend.sadd('set', 'a');
    await backend.setex('string', 60, 'value');

    await expect(backend.get('set')).rejects.toThrow('WRONGTYPE');
    await expect(backend.sadd('string', 'a')).rejects.toThrow('WRONGTYPE');
  });

  test('cleanup removes expired entries', async () => {
    await backend.setex('short', 1, 'value');
    await backend.setex('long', 60, 'value');
    clock.advanceSeconds(1);

    expect(backend.cleanup()).toBe(1);
    expect(await backend.keys('')).toEqual(['long']);
  });

  test('every command rejects while unreachable', async () => {
    backend.setReachable(false);

    await expect(backend.ping()).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(backend.smembers('set')).rejects.toBeInstanceOf(BackendUnavailableError);

    backend.setReachable(true);
    await expect(backend.ping()).resolves.toBeUndefined();
  });
});
