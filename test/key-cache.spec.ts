import { EventEmitter2 } from '@nestjs/event-emitter';
import { generateKeyPairSync, KeyObject } from 'node:crypto';
import { KEY_EVICTED_EVENT, KeyCache } from '../src/core/key-cache';
import {
  KEY_REFRESH_FAILED_EVENT,
  KeyRefresher,
  RoleKeyFetcher,
} from '../src/core/key-refresher';
import { KeyRole } from '../src/types/key-role.type';

function publicKey(): KeyObject {
  return generateKeyPairSync('ed25519').publicKey;
}

describe('KeyCache', () => {
  let now: number;
  let events: EventEmitter2;
  let cache: KeyCache;

  beforeEach(() => {
    now = 1_000_000;
    events = new EventEmitter2();
    cache = new KeyCache(
      { defaultTtl: 1000, cleanupInterval: 0, now: () => now },
      events
    );
  });

  it('returns a key right after it is set', () => {
    const key = publicKey();
    cache.set(KeyRole.VerificationKey, key);

    expect(cache.get(KeyRole.VerificationKey)).toBe(key);
    expect(cache.has(KeyRole.VerificationKey)).toBe(true);
    expect(cache.get(KeyRole.ConsentSigningKey)).toBeUndefined();
  });

  it('reports an expired entry as absent before the sweep runs', () => {
    cache.set(KeyRole.VerificationKey, publicKey());
    now += 1000;

    expect(cache.get(KeyRole.VerificationKey)).toBeUndefined();
  });

  it('keeps entries with a non-positive ttl forever', () => {
    const key = publicKey();
    cache.set(KeyRole.VerificationKey, key, 0);
    now += 10_000_000;

    expect(cache.deleteExpired()).toEqual([]);
    expect(cache.get(KeyRole.VerificationKey)).toBe(key);
  });

  it('announces each expired role when sweeping', () => {
    const evicted = jest.fn();
    events.on(KEY_EVICTED_EVENT, evicted);

    cache.set(KeyRole.VerificationKey, publicKey(), 500);
    cache.set(KeyRole.ConsentSigningKey, publicKey(), 2000);
    now += 600;

    expect(cache.deleteExpired()).toEqual([KeyRole.VerificationKey]);
    expect(evicted).toHaveBeenCalledTimes(1);
    expect(evicted).toHaveBeenCalledWith({ role: KeyRole.VerificationKey });
    expect(cache.has(KeyRole.ConsentSigningKey)).toBe(true);
  });

  it('moves to a new generation on every flush', () => {
    const before = cache.generation;
    cache.set(KeyRole.VerificationKey, publicKey());
    expect(cache.generation).toBe(before);

    cache.flush();
    expect(cache.generation).toBe(before + 1);
  });

  it('does not announce flushed entries', () => {
    const evicted = jest.fn();
    events.on(KEY_EVICTED_EVENT, evicted);

    cache.set(KeyRole.VerificationKey, publicKey());
    cache.set(KeyRole.ConsentSigningKey, publicKey());
    cache.flush();

    expect(cache.has(KeyRole.VerificationKey)).toBe(false);
    expect(cache.has(KeyRole.ConsentSigningKey)).toBe(false);
    expect(evicted).not.toHaveBeenCalled();
  });

  describe('with a refresher', () => {
    let fetchKey: jest.Mock<Promise<KeyObject>, [KeyRole]>;
    let refresher: KeyRefresher;

    beforeEach(() => {
      fetchKey = jest.fn<Promise<KeyObject>, [KeyRole]>();
      const fetcher: RoleKeyFetcher = { fetchKey };
      refresher = new KeyRefresher(cache, fetcher, events);
      refresher.start();
    });

    afterEach(() => {
      refresher.stop();
    });

    it('replaces an evicted key with a freshly fetched one', async () => {
      const first = publicKey();
      const second = publicKey();
      fetchKey.mockResolvedValue(second);

      cache.set(KeyRole.VerificationKey, first);
      expect(cache.get(KeyRole.VerificationKey)).toBe(first);

      now += 1000;
      cache.deleteExpired();
      expect(cache.get(KeyRole.VerificationKey)).toBeUndefined();

      await refresher.whenIdle();

      expect(fetchKey).toHaveBeenCalledWith(KeyRole.VerificationKey);
      expect(cache.get(KeyRole.VerificationKey)).toBe(second);
    });

    it('stores the refreshed key with the default ttl', async () => {
      fetchKey.mockResolvedValue(publicKey());
      cache.set(KeyRole.ConsentSigningKey, publicKey(), 10);

      now += 10;
      cache.deleteExpired();
      await refresher.whenIdle();

      now += 999;
      expect(cache.has(KeyRole.ConsentSigningKey)).toBe(true);
      now += 1;
      expect(cache.has(KeyRole.ConsentSigningKey)).toBe(false);
    });

    it('leaves the role absent when the refresh fails', async () => {
      fetchKey.mockRejectedValueOnce(new Error('connection refused'));

      cache.set(KeyRole.VerificationKey, publicKey());
      now += 1000;
      cache.deleteExpired();
      await refresher.whenIdle();

      expect(fetchKey).toHaveBeenCalledTimes(1);
      expect(cache.get(KeyRole.VerificationKey)).toBeUndefined();
      expect(refresher.consecutiveFailures(KeyRole.VerificationKey)).toBe(1);

      const recovered = publicKey();
      fetchKey.mockResolvedValueOnce(recovered);
      refresher.enqueue(KeyRole.VerificationKey);
      await refresher.whenIdle();

      expect(cache.get(KeyRole.VerificationKey)).toBe(recovered);
      expect(refresher.consecutiveFailures(KeyRole.VerificationKey)).toBe(0);
    });

    it('runs one refresh per role at a time', async () => {
      fetchKey.mockResolvedValue(publicKey());

      refresher.enqueue(KeyRole.ConsentSigningKey);
      refresher.enqueue(KeyRole.ConsentSigningKey);
      refresher.enqueue(KeyRole.VerificationKey);
      await refresher.whenIdle();

      expect(fetchKey).toHaveBeenCalledTimes(2);
    });

    it('reports a failed refresh that leaves the role absent', async () => {
      const error = new Error('connection refused');
      fetchKey.mockRejectedValue(error);
      const failed = jest.fn();
      events.on(KEY_REFRESH_FAILED_EVENT, failed);

      cache.set(KeyRole.VerificationKey, publicKey());
      now += 1000;
      cache.deleteExpired();
      await refresher.whenIdle();

      expect(failed).toHaveBeenCalledTimes(1);
      expect(failed).toHaveBeenCalledWith({
        role: KeyRole.VerificationKey,
        failures: 1,
        error,
      });

      // nothing is left to evict, so later sweeps do not retry
      now += 10_000;
      expect(cache.deleteExpired()).toEqual([]);
      await refresher.whenIdle();
      expect(fetchKey).toHaveBeenCalledTimes(1);
      expect(cache.has(KeyRole.VerificationKey)).toBe(false);
    });

    it('discards a key fetched across a flush', async () => {
      let resolveFetch: (key: KeyObject) => void = () => undefined;
      fetchKey.mockReturnValue(
        new Promise<KeyObject>(resolve => {
          resolveFetch = resolve;
        })
      );

      cache.set(KeyRole.ConsentSigningKey, publicKey());
      now += 1000;
      cache.deleteExpired();
      await new Promise(resolve => setImmediate(resolve));
      await new Promise(resolve => setImmediate(resolve));
      expect(fetchKey).toHaveBeenCalledTimes(1);

      cache.flush();
      resolveFetch(publicKey());
      await refresher.whenIdle();

      expect(cache.has(KeyRole.ConsentSigningKey)).toBe(false);
    });

    it('ignores evictions once stopped', async () => {
      refresher.stop();
      cache.set(KeyRole.VerificationKey, publicKey());
      now += 1000;
      cache.deleteExpired();
      await refresher.whenIdle();

      expect(fetchKey).not.toHaveBeenCalled();
    });
  });
});
