import { MalformedTopologyError } from "./errors.js";
import { compareNames, type EndpointDescription, type TopologyDescription } from "./util.js";

export type TopologyNode = {
  name: string;
  type: string;
  kind?: string;
};

export type TopologyLink = {
  index: number;
  endpoints: [EndpointDescription, EndpointDescription];
};

export type Topology = {
  name: string;
  prefix?: string;
  /** Sorted by name. */
  nodes: TopologyNode[];
  /** Declaration order. */
  links: TopologyLink[];
  byName: Map<string, TopologyNode>;
};

// Names the inventory document already uses at its top level.
const RESERVED_GROUPS = new Set(["all", "ungrouped", "_meta"]);

export function nodeType(name: string): string {
  const dash = name.indexOf("-");
  if (dash < 0) {
    throw new MalformedTopologyError(`Node name '${name}' has no '<type>-' prefix`, name);
  }
  if (dash === 0) {
    throw new MalformedTopologyError(`Node name '${name}' has an empty type prefix`, name);
  }
  const type = name.slice(0, dash);
  if (RESERVED_GROUPS.has(type)) {
    throw new MalformedTopologyError(`Node name '${name}' yields reserved group name '${type}'`, name);
  }
  return type;
}

export function buildTopology(desc: TopologyDescription): Topology {
  const byName = new Map<string, TopologyNode>();
  for (const n of desc.nodes) {
    if (byName.has(n.name)) {
      throw new MalformedTopologyError(`Duplicate node name '${n.name}'`, n.name);
    }
    const node: TopologyNode = { name: n.name, type: nodeType(n.name) };
    if (n.kind !== undefined) node.kind = n.kind;
    byName.set(n.name, node);
  }

  const declared = new Map<string, Set<string>>();
  const links = desc.links.map((l, index): TopologyLink => {
    const [a, b] = l.endpoints;
    for (const ep of l.endpoints) {
      if (!byName.has(ep.node)) {
        throw new MalformedTopologyError(`Link ${index} references unknown node '${ep.node}'`, ep.node);
      }
    }
    if (a.node === b.node) {
      throw new MalformedTopologyError(`Link ${index} connects node '${a.node}' to itself`, a.node);
    }
    for (const ep of l.endpoints) {
      if (ep.interface === undefined) continue;
      let names = declared.get(ep.node);
      if (!names) {
        names = new Set<string>();
        declared.set(ep.node, names);
      }
      if (names.has(ep.interface)) {
        throw new MalformedTopologyError(
          `Interface '${ep.interface}' of node '${ep.node}' is used by more than one link`,
          `${ep.node}:${ep.interface}`,
        );
      }
      names.add(ep.interface);
    }
    return { index, endpoints: [{ ...a }, { ...b }] };
  });

  const nodes = Array.from(byName.values()).sort((x, y) => compareNames(x.name, y.name));
  const topology: Topology = { name: desc.name, nodes, links, byName };
  if (desc.prefix !== undefined) topology.prefix = desc.prefix;
  return topology;
}

export function lookupNode(topology: Topology, name: string): TopologyNode {
  const node = topology.byName.get(name);
  if (!node) throw new MalformedTopologyError(`Unknown node '${name}'`, name);
  return node;
}
