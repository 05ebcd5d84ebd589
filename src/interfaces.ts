import { formatAddress, formatPrefix, hostAddress } from "./address.js";
import type { AddressPlan, LinkAddresses } from "./allocate.js";
import type { Topology } from "./topology.js";
import { dict } from "./util.js";

export type InterfaceVars = {
  local_ip4: string;
  local_ip6: string;
  subnet4: string;
  subnet6: string;
  neighbor_name: string;
  neighbor_ip4: string;
  neighbor_ip6: string;
};

export type InterfaceMap = Map<string, Record<string, InterfaceVars>>;

function ordinalOf(addrs: LinkAddresses, node: string): bigint {
  return node === addrs.first ? 0n : 1n;
}

/**
 * Interface records for every node, keyed by the declared interface name or,
 * when the endpoint names none, by the next free ethN on that node.
 */
export function buildInterfaces(topology: Topology, plan: AddressPlan): InterfaceMap {
  const out: InterfaceMap = new Map();
  for (const n of topology.nodes) out.set(n.name, dict<InterfaceVars>());

  const taken = new Map<string, Set<string>>();
  for (const l of topology.links) {
    for (const ep of l.endpoints) {
      if (ep.interface === undefined) continue;
      const names = taken.get(ep.node) ?? new Set<string>();
      names.add(ep.interface);
      taken.set(ep.node, names);
    }
  }
  const counters = new Map<string, number>();
  const synthesize = (node: string): string => {
    const names = taken.get(node) ?? new Set<string>();
    let n = counters.get(node) ?? 1;
    while (names.has(`eth${n}`)) n += 1;
    counters.set(node, n + 1);
    names.add(`eth${n}`);
    taken.set(node, names);
    return `eth${n}`;
  };

  for (const l of topology.links) {
    const addrs = plan.links[l.index];
    if (!addrs) throw new RangeError(`No addresses planned for link ${l.index}`);
    const [a, b] = l.endpoints;
    for (const [self, peer] of [[a, b], [b, a]] as const) {
      const local = ordinalOf(addrs, self.node);
      const remote = ordinalOf(addrs, peer.node);
      const key = self.interface ?? synthesize(self.node);
      const vars: InterfaceVars = {
        local_ip4: formatAddress(4, hostAddress(addrs.subnet4, local)),
        local_ip6: formatAddress(6, hostAddress(addrs.subnet6, local)),
        subnet4: formatPrefix(addrs.subnet4),
        subnet6: formatPrefix(addrs.subnet6),
        neighbor_name: peer.node,
        neighbor_ip4: formatAddress(4, hostAddress(addrs.subnet4, remote)),
        neighbor_ip6: formatAddress(6, hostAddress(addrs.subnet6, remote)),
      };
      const record = out.get(self.node) ?? dict<InterfaceVars>();
      record[key] = vars;
      out.set(self.node, record);
    }
  }
  return out;
}
