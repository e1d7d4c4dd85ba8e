import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildCacheKey, ResponseCache } from '../../../src/core/registry/response-cache.js';

describe('buildCacheKey', () => {
  it('returns the bare endpoint without parameters', () => {
    assert.equal(buildCacheKey('project/sodium'), 'project/sodium');
    assert.equal(buildCacheKey('project/sodium', {}), 'project/sodium');
  });

  it('sorts parameters by name', () => {
    assert.equal(
      buildCacheKey('search', { query: 'map', limit: '5' }),
      buildCacheKey('search', { limit: '5', query: 'map' })
    );
    assert.equal(buildCacheKey('search', { query: 'map', limit: '5' }), 'search?limit=5&query=map');
  });
});

describe('ResponseCache', () => {
  it('serves entries until the ttl has elapsed', () => {
    let clock = 1_000;
    const cache = new ResponseCache(300, () => clock);
    cache.set('k', { value: 1 });

    clock = 1_299;
    assert.deepEqual(cache.get('k'), { value: 1 });

    clock = 1_300;
    assert.equal(cache.get('k'), undefined);
  });

  it('loads once per ttl window', async () => {
    let clock = 0;
    let loads = 0;
    const cache = new ResponseCache(1_000, () => clock);
    const load = async (): Promise<unknown> => {
      loads += 1;
      return { loads };
    };

    assert.deepEqual(await cache.getOrLoad('k', load), { loads: 1 });
    clock = 999;
    assert.deepEqual(await cache.getOrLoad('k', load), { loads: 1 });
    clock = 2_000;
    assert.deepEqual(await cache.getOrLoad('k', load), { loads: 2 });
    assert.equal(loads, 2);
  });

  it('does not cache failed loads', async () => {
    const cache = new ResponseCache(1_000, () => 0);
    await assert.rejects(cache.getOrLoad('k', async () => { throw new Error('boom'); }), /boom/);
    assert.equal(cache.size, 0);
    assert.equal(await cache.getOrLoad('k', async () => 'ok'), 'ok');
  });

  it('clear drops every entry', () => {
    const cache = new ResponseCache(1_000, () => 0);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.clear();
    assert.equal(cache.size, 0);
    assert.equal(cache.get('a'), undefined);
  });
});
