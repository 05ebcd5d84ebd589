import yaml from "js-yaml";
import { z } from "zod";
import { TopologySourceError } from "./errors.js";
import { dict, readText } from "./util.js";

export type KindVars = Record<string, string | number | boolean>;
export type KindTable = Record<string, KindVars>;

const eosVars: KindVars = {
  ansible_connection: "ansible.netcommon.network_cli",
  ansible_network_os: "arista.eos.eos",
  ansible_user: "admin",
  ansible_password: "admin",
  ansible_become: "yes",
  ansible_become_method: "enable",
};

export const defaultKinds: KindTable = {
  ceos: eosVars,
  arista_ceos: eosVars,
  linux: {},
};

const kindFileSchema = z.object({
  kinds: z.record(z.string(), z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).nullable()),
});

/**
 * Entries from the override document replace built-in kinds wholesale;
 * a null entry maps the kind to no variables.
 */
export function mergeKinds(base: KindTable, doc: unknown): KindTable {
  const parsed = kindFileSchema.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new TopologySourceError(`Invalid kind overrides at ${where}: ${issue?.message ?? "unknown error"}`);
  }
  const out = dict<KindVars>();
  for (const [kind, vars] of Object.entries(base)) out[kind] = { ...vars };
  for (const [kind, vars] of Object.entries(parsed.data.kinds)) out[kind] = { ...(vars ?? {}) };
  return out;
}

export function loadKinds(path: string | undefined): KindTable {
  if (!path) return mergeKinds(defaultKinds, { kinds: {} });
  let doc: unknown;
  try {
    doc = yaml.load(readText(path));
  } catch (e) {
    throw new TopologySourceError(`Cannot read kind overrides ${path}`, path, e instanceof Error ? e : undefined);
  }
  return mergeKinds(defaultKinds, doc);
}

export type KindResolver = (kind: string | undefined) => KindVars;

/**
 * Lookup with an explicit fallback: unknown kinds get no connection
 * variables and one warning each.
 */
export function kindResolver(table: KindTable, warn: (msg: string) => void = console.error): KindResolver {
  const warned = new Set<string>();
  return (kind) => {
    if (kind === undefined) return {};
    const vars = Object.prototype.hasOwnProperty.call(table, kind) ? table[kind] : undefined;
    if (vars) return { ...vars };
    if (!warned.has(kind)) {
      warned.add(kind);
      warn(`kinds: no connection variables for kind '${kind}'`);
    }
    return {};
  };
}
