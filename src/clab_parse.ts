import fs from "fs";
import { pathToFileURL } from "url";
import yaml from "js-yaml";
import { z } from "zod";
import { MalformedTopologyError, TopologySourceError } from "./errors.js";
import type { EndpointDescription, LinkDescription, NodeDescription, TopologyDescription } from "./util.js";

const nodeSchema = z
  .object({
    kind: z.string().optional(),
    group: z.string().optional(),
  })
  .passthrough();

const endpointSchema = z.union([
  z.string(),
  z.object({ node: z.string(), interface: z.string().optional() }).passthrough(),
]);

const clabSchema = z.object({
  name: z.string().min(1),
  prefix: z.string().optional(),
  topology: z.object({
    defaults: nodeSchema.nullable().optional(),
    groups: z.record(z.string(), nodeSchema.nullable()).nullable().optional(),
    nodes: z.record(z.string(), nodeSchema.nullable()).nullable().optional(),
    links: z.array(z.object({ endpoints: z.array(endpointSchema).optional() }).passthrough()).nullable().optional(),
  }),
});

type ClabNode = z.infer<typeof nodeSchema>;

// Pseudo nodes containerlab wires to the host side rather than to a lab node.
const HOST_SIDE_NODES = new Set(["host", "mgmt-net", "macvlan"]);

function parseEndpoint(ep: z.infer<typeof endpointSchema>): EndpointDescription {
  if (typeof ep !== "string") {
    return ep.interface !== undefined ? { node: ep.node, interface: ep.interface } : { node: ep.node };
  }
  const colon = ep.indexOf(":");
  if (colon < 0) return { node: ep };
  return { node: ep.slice(0, colon), interface: ep.slice(colon + 1) };
}

function resolveKind(node: ClabNode, groups: Record<string, ClabNode | null>, defaults: ClabNode): string | undefined {
  const group =
    node.group !== undefined && Object.prototype.hasOwnProperty.call(groups, node.group)
      ? groups[node.group] ?? undefined
      : undefined;
  return node.kind ?? group?.kind ?? defaults.kind;
}

/**
 * Reads a containerlab topology document into the node and link lists the
 * allocator works on. Links to host-side pseudo nodes and single-endpoint
 * links are left out; they carry no point-to-point subnet.
 */
export function parseClabTopology(text: string, source = "<topology>"): TopologyDescription {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (e) {
    throw new TopologySourceError(`Cannot parse ${source}`, source, e instanceof Error ? e : undefined);
  }
  const parsed = clabSchema.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new TopologySourceError(`${source}: invalid topology at ${where}: ${issue?.message ?? "unknown error"}`, source);
  }
  const lab = parsed.data;
  const defaults: ClabNode = lab.topology.defaults ?? {};
  const groups: Record<string, ClabNode | null> = lab.topology.groups ?? {};

  const nodes: NodeDescription[] = Object.entries(lab.topology.nodes ?? {}).map(([name, cfg]) => {
    const kind = resolveKind(cfg ?? {}, groups, defaults);
    return kind !== undefined ? { name, kind } : { name };
  });

  const links: LinkDescription[] = [];
  (lab.topology.links ?? []).forEach((l, i) => {
    if (l.endpoints === undefined) return;
    const eps = l.endpoints.map(parseEndpoint);
    if (eps.some((ep) => HOST_SIDE_NODES.has(ep.node))) return;
    const [a, b] = eps;
    if (eps.length !== 2 || !a || !b) {
      throw new MalformedTopologyError(`${source}: link ${i} has ${eps.length} endpoints, expected 2`);
    }
    links.push({ endpoints: [a, b] });
  });

  const desc: TopologyDescription = { name: lab.name, nodes, links };
  if (lab.prefix !== undefined) desc.prefix = lab.prefix;
  return desc;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2] ?? "";
  const output = process.argv[3] ?? "-";
  const desc = parseClabTopology(fs.readFileSync(input, "utf8"), input);
  const data = JSON.stringify(desc, null, 2);
  if (output === "-") {
    process.stdout.write(data);
  } else {
    fs.writeFileSync(output, data, "utf8");
  }
  console.error(`clab_parse: nodes=${desc.nodes.length} links=${desc.links.length}`);
}
