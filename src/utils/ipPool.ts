import { ConfigurationError, PoolExhaustedError } from './errors';

function ipToInt(ip: string): number {
  const parts = ip.split('.');
  if (parts.length !== 4) {
    throw new ConfigurationError(`Invalid IPv4 address: ${ip}`);
  }
  return parts.reduce((acc, part) => {
    const octet = Number(part);
    if (!/^\d{1,3}$/.test(part) || octet > 255) {
      throw new ConfigurationError(`Invalid IPv4 address: ${ip}`);
    }
    return acc * 256 + octet;
  }, 0);
}

function intToIp(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join('.');
}

/**
 * Hands out distinct client addresses from an IPv4 CIDR block. The network
 * address, the first host (reserved for the relay gateway) and the broadcast
 * address are never assigned.
 */
export class VirtualIpPool {
  private readonly first: number;
  private readonly last: number;
  private readonly used = new Set<number>();
  private readonly pending = new Set<number>();
  /** Address -> snapshot generation in which it was confirmed. */
  private readonly confirmedIn = new Map<number, number>();
  private generation = 0;
  private cursor: number;

  constructor(private readonly cidr: string) {
    const [base, prefixRaw] = cidr.split('/');
    const prefix = Number(prefixRaw);
    if (!base || !Number.isInteger(prefix) || prefix < 8 || prefix > 30) {
      throw new ConfigurationError(`Invalid virtual IP range: ${cidr}`);
    }
    const size = 2 ** (32 - prefix);
    const network = Math.floor(ipToInt(base) / size) * size;
    this.first = network + 2;
    this.last = network + size - 2;
    this.cursor = this.first;
  }

  get capacity(): number {
    return this.last - this.first + 1;
  }

  get inUse(): number {
    return this.used.size;
  }

  contains(ip: string): boolean {
    const value = ipToInt(ip);
    return value >= this.first && value <= this.last;
  }

  allocate(): string {
    if (this.used.size >= this.capacity) {
      throw new PoolExhaustedError(this.cidr);
    }
    for (let i = 0; i < this.capacity; i++) {
      const candidate = this.cursor;
      this.cursor = this.cursor >= this.last ? this.first : this.cursor + 1;
      if (!this.used.has(candidate)) {
        this.used.add(candidate);
        this.pending.add(candidate);
        return intToIp(candidate);
      }
    }
    throw new PoolExhaustedError(this.cidr);
  }

  /** Marks an allocated address as persisted on a session row. */
  confirm(ip: string): void {
    const value = ipToInt(ip);
    this.pending.delete(value);
    this.confirmedIn.set(value, this.generation);
  }

  release(ip: string): void {
    const value = ipToInt(ip);
    this.used.delete(value);
    this.pending.delete(value);
    this.confirmedIn.delete(value);
  }

  /** Opens a snapshot; take it before reading live addresses from storage. */
  mark(): number {
    this.generation += 1;
    return this.generation;
  }

  /**
   * Replaces the in-use set with the addresses held by live sessions. Keeps
   * allocations that have not reached storage yet and addresses confirmed
   * after `snapshot` was marked, which the read may have missed.
   */
  resync(activeIps: string[], snapshot: number): void {
    const live = new Set<number>();
    for (const ip of activeIps) {
      if (this.contains(ip)) {
        live.add(ipToInt(ip));
      }
    }

    this.used.clear();
    for (const value of this.pending) {
      this.used.add(value);
    }
    for (const [value, generation] of this.confirmedIn) {
      if (generation >= snapshot) {
        this.used.add(value);
      } else if (!live.has(value)) {
        this.confirmedIn.delete(value);
      }
    }
    for (const value of live) {
      this.used.add(value);
    }
  }
}
