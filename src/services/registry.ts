import type { HostConfig, UpstreamGroup } from '../config/types.js';

import { UpstreamPool } from './balancer.js';

/** `domain → host` for one port. The `null` key holds the port's default host. */
export type DomainTable = ReadonlyMap<string | null, HostConfig>;

/** `port → (domain → host)` */
export type HostTable = ReadonlyMap<number, DomainTable>;

export function buildHostTable(hosts: readonly HostConfig[]): HostTable {
  const table = new Map<number, Map<string | null, HostConfig>>();
  for (const host of hosts) {
    const domains = table.get(host.port) ?? new Map<string | null, HostConfig>();
    if (domains.has(host.serverName)) {
      throw new Error(
        `Host ${host.serverName ?? 'default'} already registered on port ${host.port}`
      );
    }
    domains.set(host.serverName, host);
    table.set(host.port, domains);
  }
  return table;
}

// Readers take one snapshot per request. Writers build a complete table and
// install it with a single assignment, so a snapshot is never half old, half new.
export class HostRegistry {
  private table: HostTable = new Map();

  snapshot(): HostTable {
    return this.table;
  }

  replaceAll(hosts: readonly HostConfig[]): void {
    this.table = buildHostTable(hosts);
  }

  clear(): void {
    this.table = new Map();
  }

  ports(): number[] {
    return [...this.table.keys()];
  }

  hostsForPort(port: number): HostConfig[] {
    return [...(this.table.get(port)?.values() ?? [])];
  }

  get size(): number {
    let count = 0;
    for (const domains of this.table.values()) count += domains.size;
    return count;
  }
}

export class UpstreamRegistry {
  private pools: ReadonlyMap<string, UpstreamPool> = new Map();

  get(name: string): UpstreamPool | undefined {
    return this.pools.get(name);
  }

  has(name: string): boolean {
    return this.pools.has(name);
  }

  names(): string[] {
    return [...this.pools.keys()];
  }

  replaceAll(groups: readonly UpstreamGroup[]): void {
    this.pools = new Map(
      groups.map((group) => [group.name, new UpstreamPool(group)] as const)
    );
  }

  clear(): void {
    this.pools = new Map();
  }
}
