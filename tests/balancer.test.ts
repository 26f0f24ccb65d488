import { describe, expect, it } from 'vitest';

import type { BalanceMethod, UpstreamGroup } from '../src/config/types.js';
import { hashToUint32 } from '../src/crypto.js';
import { UpstreamPool } from '../src/services/balancer.js';
import { UpstreamRegistry } from '../src/services/registry.js';

function group(
  method: BalanceMethod,
  weights: readonly number[] = [1, 1, 1]
): UpstreamGroup {
  return {
    name: 'api',
    method,
    servers: weights.map((weight, index) => ({
      address: `10.0.0.${index + 1}:80`,
      weight,
    })),
  };
}

function pickAddresses(pool: UpstreamPool, count: number): string[] {
  return Array.from({ length: count }, () => {
    const lease = pool.acquire();
    lease.release();
    return lease.server.address;
  });
}

describe('UpstreamPool', () => {
  it('cycles through servers in order for round-robin', () => {
    const pool = new UpstreamPool(group('roundrobin'));
    expect(pickAddresses(pool, 4)).toEqual([
      '10.0.0.1:80',
      '10.0.0.2:80',
      '10.0.0.3:80',
      '10.0.0.1:80',
    ]);
  });

  it('interleaves picks by weight', () => {
    const pool = new UpstreamPool(group('weightedroundrobin', [5, 1, 1]));
    expect(pickAddresses(pool, 7)).toEqual([
      '10.0.0.1:80',
      '10.0.0.1:80',
      '10.0.0.2:80',
      '10.0.0.1:80',
      '10.0.0.3:80',
      '10.0.0.1:80',
      '10.0.0.1:80',
    ]);
  });

  it('pins a client address to one server', () => {
    const pool = new UpstreamPool(group('iphash'));
    const expected = `10.0.0.${(hashToUint32('192.0.2.7') % 3) + 1}:80`;

    for (let attempt = 0; attempt < 3; attempt += 1) {
      const lease = pool.acquire({ clientIp: '192.0.2.7' });
      expect(lease.server.address).toBe(expected);
      lease.release();
    }
    expect(pool.acquire().server.address).toBe('10.0.0.1:80');
  });

  it('sends requests to the server with the fewest in flight', () => {
    const pool = new UpstreamPool(group('leastconn', [1, 1]));

    const first = pool.acquire();
    const second = pool.acquire();
    expect(first.server.address).toBe('10.0.0.1:80');
    expect(second.server.address).toBe('10.0.0.2:80');

    first.release();
    const third = pool.acquire();
    expect(third.server.address).toBe('10.0.0.1:80');

    second.release();
    first.release();
    expect(pool.acquire().server.address).toBe('10.0.0.2:80');
  });
});

describe('UpstreamRegistry', () => {
  it('replaces every pool at once', () => {
    const registry = new UpstreamRegistry();
    registry.replaceAll([group('roundrobin')]);
    expect(registry.names()).toEqual(['api']);
    expect(registry.get('api')?.name).toBe('api');

    registry.replaceAll([{ ...group('iphash'), name: 'web' }]);
    expect(registry.has('api')).toBe(false);
    expect(registry.get('web')?.group.method).toBe('iphash');

    registry.clear();
    expect(registry.names()).toEqual([]);
  });
});
