import { nthSubnet, parsePrefix, subnetCount, type Prefix } from "./address.js";
import { PoolExhaustedError } from "./errors.js";

/** Subnets skipped at the head and tail of every block. */
export type Reservation = {
  head: number;
  tail: number;
};

type Block = {
  prefix: Prefix;
  first: bigint;
  usable: bigint;
};

/**
 * Hands out consecutive /length subnets from one or more reserved blocks.
 * The cursor only moves forward; a pool lives for a single allocation run.
 */
export class AddressPool {
  private readonly blocks: Block[];
  private cursor = 0n;

  constructor(
    readonly name: string,
    cidrs: readonly string[],
    readonly length: number,
    reservation: Reservation = { head: 0, tail: 0 },
  ) {
    this.blocks = cidrs.map((cidr) => {
      const prefix = parsePrefix(cidr);
      const total = subnetCount(prefix, length);
      const usable = total - BigInt(reservation.head) - BigInt(reservation.tail);
      return { prefix, first: BigInt(reservation.head), usable: usable > 0n ? usable : 0n };
    });
  }

  get capacity(): bigint {
    return this.blocks.reduce((sum, b) => sum + b.usable, 0n);
  }

  get remaining(): bigint {
    return this.capacity - this.cursor;
  }

  /** Fails unless count more subnets can be drawn. Does not move the cursor. */
  ensure(count: number): void {
    if (BigInt(count) > this.remaining) {
      throw new PoolExhaustedError(this.name, BigInt(count), this.capacity);
    }
  }

  next(): Prefix {
    let offset = this.cursor;
    for (const b of this.blocks) {
      if (offset < b.usable) {
        this.cursor += 1n;
        return nthSubnet(b.prefix, this.length, b.first + offset);
      }
      offset -= b.usable;
    }
    throw new PoolExhaustedError(this.name, this.cursor + 1n, this.capacity);
  }
}

export type Pools = {
  loopback4: AddressPool;
  loopback6: AddressPool;
  p2p4: AddressPool;
  p2p6: AddressPool;
};

export const LOOPBACK4_BLOCKS = ["192.0.2.0/24"] as const;
export const LOOPBACK6_BLOCKS = ["2001:db8:8000::/33"] as const;
export const P2P4_BLOCKS = ["198.51.100.0/24", "203.0.113.0/24"] as const;
export const P2P6_BLOCKS = ["2001:db8::/33"] as const;

export function createPools(): Pools {
  return {
    // .0 and .255 are the network and broadcast addresses of the /24.
    loopback4: new AddressPool("loopback4", LOOPBACK4_BLOCKS, 32, { head: 1, tail: 1 }),
    // ::0 of the block is the subnet-router anycast address.
    loopback6: new AddressPool("loopback6", LOOPBACK6_BLOCKS, 128, { head: 1, tail: 0 }),
    p2p4: new AddressPool("p2p4", P2P4_BLOCKS, 31),
    p2p6: new AddressPool("p2p6", P2P6_BLOCKS, 127),
  };
}
