import { formatAddress, type Prefix } from "./address.js";
import { allocate, type AddressPlan } from "./allocate.js";
import { deriveNet } from "./clns.js";
import { buildInterfaces, type InterfaceMap, type InterfaceVars } from "./interfaces.js";
import { buildTopology, type Topology } from "./topology.js";
import { compareNames, dict, type TopologyDescription } from "./util.js";

export type HostVars = {
  kind?: string;
  loopback4: string;
  loopback6: string;
  clns_net: string;
  interfaces: Record<string, InterfaceVars>;
};

export type InventoryModel = {
  lab: string;
  prefix?: string;
  /** Group name (node type) to member names, both sorted. */
  groups: Record<string, string[]>;
  hosts: Record<string, HostVars>;
};

function bare(p: Prefix): string {
  return formatAddress(p.family, p.network);
}

export function deriveNets(plan: AddressPlan): Map<string, string> {
  const nets = new Map<string, string>();
  for (const [name, addrs] of plan.nodes) nets.set(name, deriveNet(addrs.loopback4));
  return nets;
}

export function assemble(
  topology: Topology,
  plan: AddressPlan,
  nets: Map<string, string>,
  interfaces: InterfaceMap,
): InventoryModel {
  const groups = dict<string[]>();
  const hosts = dict<HostVars>();
  const types = Array.from(new Set(topology.nodes.map((n) => n.type))).sort(compareNames);
  for (const t of types) groups[t] = [];

  for (const n of topology.nodes) {
    const addrs = plan.nodes.get(n.name);
    const net = nets.get(n.name);
    if (!addrs || net === undefined) throw new RangeError(`Node '${n.name}' missing from address plan`);
    groups[n.type]?.push(n.name);
    const vars: HostVars = {
      loopback4: bare(addrs.loopback4),
      loopback6: bare(addrs.loopback6),
      clns_net: net,
      interfaces: interfaces.get(n.name) ?? dict<InterfaceVars>(),
    };
    if (n.kind !== undefined) vars.kind = n.kind;
    hosts[n.name] = vars;
  }

  const model: InventoryModel = { lab: topology.name, groups, hosts };
  if (topology.prefix !== undefined) model.prefix = topology.prefix;
  return model;
}

/**
 * Topology description in, fully addressed inventory out. Every call starts
 * from fresh pools.
 */
export function buildInventory(desc: TopologyDescription): InventoryModel {
  const topology = buildTopology(desc);
  const plan = allocate(topology);
  const nets = deriveNets(plan);
  const interfaces = buildInterfaces(topology, plan);
  return assemble(topology, plan, nets, interfaces);
}
