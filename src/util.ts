import fs from "fs";

export type EndpointDescription = {
  node: string;
  interface?: string;
};

export type NodeDescription = {
  name: string;
  kind?: string;
};

export type LinkDescription = {
  endpoints: [EndpointDescription, EndpointDescription];
};

export type TopologyDescription = {
  name: string;
  prefix?: string;
  nodes: NodeDescription[];
  links: LinkDescription[];
};

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

/**
 * Record keyed by names taken from the topology. No prototype, so a name
 * such as "__proto__" becomes an own key like any other.
 */
export function dict<T>(): Record<string, T> {
  return Object.create(null);
}

// Code-unit order; localeCompare would make the address plan depend on the host locale.
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
