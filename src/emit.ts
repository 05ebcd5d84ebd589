import type { HostVars, InventoryModel } from "./inventory.js";
import type { KindResolver, KindVars } from "./kinds.js";
import { dict } from "./util.js";

export type GroupEntry = {
  hosts: string[];
  vars: KindVars;
};

export type HostEntry = HostVars & { ansible_host: string } & { [name: string]: unknown };

export type ListDocument = {
  children: string[];
  groups: Record<string, GroupEntry>;
  hostvars: Record<string, HostEntry>;
};

export type EmitOptions = {
  kinds: KindResolver;
};

/** Container name containerlab gives the node, which is what Ansible connects to. */
export function containerName(lab: string, prefix: string | undefined, node: string): string {
  if (prefix === undefined) return `clab-${lab}-${node}`;
  if (prefix.trim() === "") return node;
  return `${prefix.trim()}-${lab}-${node}`;
}

function sharedKind(model: InventoryModel, members: string[]): { kind: string | undefined } | undefined {
  const kinds = new Set(members.map((m) => model.hosts[m]?.kind));
  if (kinds.size !== 1) return undefined;
  const [kind] = kinds;
  return { kind };
}

/**
 * Connection variables sit on the group when every member shares a kind,
 * otherwise on each host.
 */
export function renderList(model: InventoryModel, options: EmitOptions): ListDocument {
  const groups = dict<GroupEntry>();
  const hostvars = dict<HostEntry>();
  const children = Object.keys(model.groups);

  for (const [group, members] of Object.entries(model.groups)) {
    const shared = sharedKind(model, members);
    groups[group] = { hosts: [...members], vars: shared ? options.kinds(shared.kind) : {} };
    for (const name of members) {
      const vars = model.hosts[name];
      if (!vars) continue;
      const connection: Record<string, unknown> = shared ? {} : options.kinds(vars.kind);
      hostvars[name] = {
        ...connection,
        ansible_host: containerName(model.lab, model.prefix, name),
        ...vars,
      };
    }
  }
  return { children, groups, hostvars };
}

/** The `--list` document: groups at the top level, host variables under _meta. */
export function listJson(doc: ListDocument): string {
  const out = dict<unknown>();
  out.all = { children: doc.children };
  for (const [group, entry] of Object.entries(doc.groups)) out[group] = entry;
  out._meta = { hostvars: doc.hostvars };
  return JSON.stringify(out, null, 4);
}

export function renderHost(doc: ListDocument, name: string): Record<string, unknown> {
  return Object.prototype.hasOwnProperty.call(doc.hostvars, name) ? { ...doc.hostvars[name] } : {};
}

export function hostJson(doc: ListDocument, name: string): string {
  return JSON.stringify(renderHost(doc, name), null, 4);
}
