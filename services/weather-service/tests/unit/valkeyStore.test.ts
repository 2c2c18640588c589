/**
 * Focus:
 * - availability tracking from connection events
 * - commands map to Redis calls with PX TTLs
 * - outages surface as StoreUnavailableError, never as a miss
 */

import { EventEmitter } from 'events';

const mockRedis = Object.assign(new EventEmitter(), {
  get: jest.fn(),
  set: jest.fn(),
  del: jest.fn(),
  disconnect: jest.fn(),
});

// Mock ioredis BEFORE importing the store
jest.mock('ioredis', () => jest.fn(() => mockRedis));

import { StoreUnavailableError } from '@/errors';
import { ValkeyStore } from '@/store/valkeyStore';

describe('ValkeyStore (unit)', () => {
  let store: ValkeyStore;

  beforeEach(() => {
    mockRedis.removeAllListeners();
    mockRedis.get.mockReset();
    mockRedis.set.mockReset();
    mockRedis.del.mockReset();
    mockRedis.disconnect.mockReset();

    store = new ValkeyStore({ host: '127.0.0.1', port: 6379, commandTimeoutMs: 500 });
  });

  /**
   * Purpose:
   * Tracks availability based on connection events.
   */
  test('updates availability on ready, error and close events', () => {
    expect(store.available()).toBe(false);

    mockRedis.emit('ready');
    expect(store.available()).toBe(true);

    mockRedis.emit('error', new Error('valkey down'));
    expect(store.available()).toBe(false);

    mockRedis.emit('ready');
    mockRedis.emit('close');
    expect(store.available()).toBe(false);
  });

  test('returns raw values when available', async () => {
    mockRedis.emit('ready');
    mockRedis.get.mockResolvedValue('{"a":1}');

    await expect(store.get('key1')).resolves.toBe('{"a":1}');
    expect(mockRedis.get).toHaveBeenCalledWith('key1');
  });

  /**
   * Purpose:
   * Verifies TTL writes use milliseconds and TTL-less writes persist.
   */
  test('writes with PX when a TTL is given and without expiry otherwise', async () => {
    mockRedis.emit('ready');
    mockRedis.set.mockResolvedValue('OK');

    await store.set('cache', 'v1', 300_000);
    await store.set('override', 'v2');

    expect(mockRedis.set).toHaveBeenNthCalledWith(1, 'cache', 'v1', 'PX', 300_000);
    expect(mockRedis.set).toHaveBeenNthCalledWith(2, 'override', 'v2');
  });

  test('deletes keys', async () => {
    mockRedis.emit('ready');
    mockRedis.del.mockResolvedValue(1);

    await store.delete('key1');

    expect(mockRedis.del).toHaveBeenCalledWith('key1');
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - unavailable backend raises without issuing commands
   */
  test('raises StoreUnavailableError while disconnected', async () => {
    await expect(store.get('key1')).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(store.set('key1', 'v', 10)).rejects.toMatchObject({
      detail: { operation: 'set' },
    });

    expect(mockRedis.get).not.toHaveBeenCalled();
    expect(mockRedis.set).not.toHaveBeenCalled();
  });

  test('wraps command failures in StoreUnavailableError', async () => {
    mockRedis.emit('ready');
    mockRedis.get.mockRejectedValue(new Error('Command timed out'));

    await expect(store.get('key1')).rejects.toMatchObject({
      kind: 'StoreUnavailable',
      detail: { operation: 'get' },
    });
    await expect(store.get('key1')).rejects.toThrow('Command timed out');
  });

  /**
   * Purpose:
   * Ensures shutdown closes the client and stops serving commands.
   */
  test('disconnects the client on close', async () => {
    mockRedis.emit('ready');

    await store.close();

    expect(mockRedis.disconnect).toHaveBeenCalled();
    expect(store.available()).toBe(false);
  });
});
