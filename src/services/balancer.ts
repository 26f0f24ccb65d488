import type {
  BalanceMethod,
  UpstreamGroup,
  UpstreamServer,
} from '../config/types.js';

import { hashToUint32 } from '../crypto.js';

export interface SelectionInput {
  /** Client address, used by the ip-hash policy. */
  readonly clientIp?: string;
}

export interface Lease {
  readonly server: UpstreamServer;
  /** Marks the request finished. Safe to call more than once. */
  release(): void;
}

interface Balancer {
  pick(input: SelectionInput): number;
  acquire?(index: number): void;
  release?(index: number): void;
}

function createRoundRobin(size: number): Balancer {
  let next = 0;
  return {
    pick: () => {
      const index = next;
      next = (next + 1) % size;
      return index;
    },
  };
}

// Smooth weighted round-robin: every pick raises each server's current
// weight by its configured weight, takes the highest and lowers it by the total.
function createWeightedRoundRobin(
  servers: readonly UpstreamServer[]
): Balancer {
  const current = servers.map(() => 0);
  const total = servers.reduce((sum, server) => sum + server.weight, 0);

  return {
    pick: () => {
      let best = 0;
      for (let index = 0; index < servers.length; index += 1) {
        const weight = servers[index]?.weight ?? 0;
        current[index] = (current[index] ?? 0) + weight;
        if ((current[index] ?? 0) > (current[best] ?? 0)) best = index;
      }
      current[best] = (current[best] ?? 0) - total;
      return best;
    },
  };
}

function createIpHash(size: number): Balancer {
  return {
    pick: ({ clientIp }) =>
      clientIp ? hashToUint32(clientIp) % size : 0,
  };
}

function createLeastConnections(size: number): Balancer {
  const active = new Array<number>(size).fill(0);
  return {
    pick: () => {
      let best = 0;
      for (let index = 1; index < size; index += 1) {
        if ((active[index] ?? 0) < (active[best] ?? 0)) best = index;
      }
      return best;
    },
    acquire: (index) => {
      active[index] = (active[index] ?? 0) + 1;
    },
    release: (index) => {
      active[index] = Math.max(0, (active[index] ?? 0) - 1);
    },
  };
}

function createBalancer(
  method: BalanceMethod,
  servers: readonly UpstreamServer[]
): Balancer {
  switch (method) {
    case 'roundrobin':
      return createRoundRobin(servers.length);
    case 'weightedroundrobin':
      return createWeightedRoundRobin(servers);
    case 'iphash':
      return createIpHash(servers.length);
    case 'leastconn':
      return createLeastConnections(servers.length);
  }
}

/** An upstream group together with its selection state. */
export class UpstreamPool {
  private readonly balancer: Balancer;

  constructor(readonly group: UpstreamGroup) {
    this.balancer = createBalancer(group.method, group.servers);
  }

  get name(): string {
    return this.group.name;
  }

  acquire(input: SelectionInput = {}): Lease {
    const index = this.balancer.pick(input);
    const server = this.group.servers[index] ?? this.group.servers[0];
    if (!server) {
      throw new Error(`Upstream ${this.group.name} has no servers`);
    }

    this.balancer.acquire?.(index);
    let released = false;
    return {
      server,
      release: () => {
        if (released) return;
        released = true;
        this.balancer.release?.(index);
      },
    };
  }
}
