import fs from "fs";
import path from "path";
import { TopologySourceError } from "./errors.js";

export type InventoryConfig = {
  /** Explicit topology file; otherwise the one *.clab.yml in searchDir. */
  topologyPath?: string;
  kindsPath?: string;
  searchDir: string;
};

function nonEmpty(v: string | undefined): string | undefined {
  return v !== undefined && v.trim().length > 0 ? v.trim() : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): InventoryConfig {
  const cfg: InventoryConfig = { searchDir: cwd };
  const topologyPath = nonEmpty(env.CLAB_TOPOLOGY);
  const kindsPath = nonEmpty(env.CLAB_INVENTORY_KINDS);
  if (topologyPath) cfg.topologyPath = path.resolve(cwd, topologyPath);
  if (kindsPath) cfg.kindsPath = path.resolve(cwd, kindsPath);
  return cfg;
}

export function findTopologyFile(dir: string): string {
  let entries: string[];
  try {
    entries = fs.readdirSync(dir);
  } catch (e) {
    throw new TopologySourceError(`Cannot list ${dir}`, dir, e instanceof Error ? e : undefined);
  }
  const found = entries.filter((f) => f.endsWith(".clab.yml") || f.endsWith(".clab.yaml")).sort();
  if (found.length !== 1) {
    throw new TopologySourceError(`expected *one* .clab.yml file in ${dir} but found ${found.length}`, dir);
  }
  return path.join(dir, found[0] ?? "");
}

export function topologyFile(cfg: InventoryConfig): string {
  return cfg.topologyPath ?? findTopologyFile(cfg.searchDir);
}
