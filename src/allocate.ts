import { createPools, type Pools } from "./pools.js";
import type { Prefix } from "./address.js";
import type { Topology } from "./topology.js";
import { compareNames } from "./util.js";

export type NodeAddresses = {
  loopback4: Prefix;
  loopback6: Prefix;
};

export type LinkAddresses = {
  subnet4: Prefix;
  subnet6: Prefix;
  /** Endpoint holding ordinal 0 of both subnets: the lower name. */
  first: string;
  second: string;
};

export type AddressPlan = {
  nodes: Map<string, NodeAddresses>;
  /** Same order as topology.links. */
  links: LinkAddresses[];
};

/**
 * Assigns loopbacks in node-name order and point-to-point subnets in link
 * declaration order. Every pool is checked for room before anything is drawn.
 */
export function allocate(topology: Topology, pools: Pools = createPools()): AddressPlan {
  pools.loopback4.ensure(topology.nodes.length);
  pools.loopback6.ensure(topology.nodes.length);
  pools.p2p4.ensure(topology.links.length);
  pools.p2p6.ensure(topology.links.length);

  const nodes = new Map<string, NodeAddresses>();
  for (const n of topology.nodes) {
    nodes.set(n.name, {
      loopback4: pools.loopback4.next(),
      loopback6: pools.loopback6.next(),
    });
  }

  const links = topology.links.map((l): LinkAddresses => {
    const [a, b] = l.endpoints;
    const [first, second] = compareNames(a.node, b.node) <= 0 ? [a.node, b.node] : [b.node, a.node];
    return {
      subnet4: pools.p2p4.next(),
      subnet6: pools.p2p6.next(),
      first,
      second,
    };
  });

  return { nodes, links };
}
