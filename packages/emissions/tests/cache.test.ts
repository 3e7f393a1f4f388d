import assert from 'node:assert/strict';
import { test } from 'node:test';

import { QueryCache, type CacheLookup } from '../src';

function createClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    }
  };
}

test('entries expire once their time to live has elapsed', () => {
  const clock = createClock();
  const cache = new QueryCache<number>({ ttlMs: 1000, now: clock.now });

  cache.set('SELECT 1', 1);
  assert.equal(cache.get('SELECT 1'), 1);

  clock.advance(999);
  assert.equal(cache.get('SELECT 1'), 1);

  clock.advance(1);
  assert.equal(cache.get('SELECT 1'), undefined);
  assert.equal(cache.size, 0);
});

test('parameters are part of the cache key regardless of their order', () => {
  const cache = new QueryCache<string>();

  cache.set('SELECT rate', 'pacific', { zone: 'US/Pacific', bucket: 'month' });

  assert.equal(cache.get('SELECT rate'), undefined);
  assert.equal(cache.get('SELECT rate', { bucket: 'month', zone: 'US/Pacific' }), 'pacific');
  assert.equal(cache.get('SELECT rate', { bucket: 'week', zone: 'US/Pacific' }), undefined);
});

test('invalidate removes one parameter set or every entry of a query', () => {
  const cache = new QueryCache<number>();
  cache.set('q', 1, { a: 1 });
  cache.set('q', 2, { a: 2 });
  cache.set('r', 3);

  assert.equal(cache.invalidate('q', { a: 1 }), 1);
  assert.equal(cache.get('q', { a: 2 }), 2);

  cache.set('q', 1, { a: 1 });
  assert.equal(cache.invalidate('q'), 2);
  assert.equal(cache.size, 1);
  assert.equal(cache.get('r'), 3);

  cache.clear();
  assert.equal(cache.size, 0);
});

test('getOrLoad runs a single load for concurrent callers and reports lookups', async () => {
  const cache = new QueryCache<string>();
  const lookups: CacheLookup[] = [];
  let calls = 0;
  const load = async () => {
    calls += 1;
    return 'rows';
  };

  const [first, second] = await Promise.all([
    cache.getOrLoad('q', load, undefined, (lookup) => lookups.push(lookup)),
    cache.getOrLoad('q', load, undefined, (lookup) => lookups.push(lookup))
  ]);
  const third = await cache.getOrLoad('q', load, undefined, (lookup) => lookups.push(lookup));

  assert.equal(first, 'rows');
  assert.equal(second, 'rows');
  assert.equal(third, 'rows');
  assert.equal(calls, 1);
  assert.deepEqual(lookups, ['miss', 'miss', 'hit']);
});

test('getOrLoad does not cache a failed load', async () => {
  const cache = new QueryCache<string>();
  let calls = 0;

  await assert.rejects(
    cache.getOrLoad('q', async () => {
      calls += 1;
      throw new Error('warehouse unavailable');
    }),
    /warehouse unavailable/
  );

  const value = await cache.getOrLoad('q', async () => {
    calls += 1;
    return 'recovered';
  });

  assert.equal(value, 'recovered');
  assert.equal(calls, 2);
});

test('a load in flight when its query is invalidated is not stored', async () => {
  const cache = new QueryCache<string>();
  let resolveStale: (value: string) => void = () => undefined;
  const stale = cache.getOrLoad(
    'SELECT series',
    () =>
      new Promise<string>((resolve) => {
        resolveStale = resolve;
      })
  );

  cache.invalidate('SELECT series');
  resolveStale('stale');

  assert.equal(await stale, 'stale');
  assert.equal(cache.get('SELECT series'), undefined);
  assert.equal(await cache.getOrLoad('SELECT series', async () => 'fresh'), 'fresh');
  assert.equal(cache.get('SELECT series'), 'fresh');
});

test('clear discards loads that are still in flight', async () => {
  const cache = new QueryCache<string>();
  let resolveStale: (value: string) => void = () => undefined;
  const stale = cache.getOrLoad(
    'SELECT series',
    () =>
      new Promise<string>((resolve) => {
        resolveStale = resolve;
      }),
    { zone: 'US/Pacific' }
  );

  cache.clear();
  const fresh = cache.getOrLoad('SELECT series', async () => 'fresh', { zone: 'US/Pacific' });
  resolveStale('stale');

  assert.equal(await stale, 'stale');
  assert.equal(await fresh, 'fresh');
  assert.equal(cache.get('SELECT series', { zone: 'US/Pacific' }), 'fresh');
  assert.equal(cache.size, 1);
});

test('rejects a non-positive time to live', () => {
  assert.throws(() => new QueryCache({ ttlMs: 0 }), RangeError);
});
