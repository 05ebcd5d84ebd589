#!/usr/bin/env node
import fs from "fs";
import { pathToFileURL } from "url";
import { parseClabTopology } from "./clab_parse.js";
import { loadConfig, topologyFile, type InventoryConfig } from "./config.js";
import { hostJson, listJson, renderList } from "./emit.js";
import { buildInventory } from "./inventory.js";
import { kindResolver, loadKinds } from "./kinds.js";
import { readText } from "./util.js";

export const USAGE = "Usage: clab-inventory [--list | --host <name>]";

export type Command = { mode: "list" } | { mode: "host"; host: string };

export function parseArgs(args: string[]): Command | undefined {
  if (args.length === 0 || (args.length === 1 && args[0] === "--list")) return { mode: "list" };
  const [flag, host] = args;
  if (args.length === 2 && flag === "--host" && host) return { mode: "host", host };
  return undefined;
}

export function run(cmd: Command, cfg: InventoryConfig): string {
  const file = topologyFile(cfg);
  const desc = parseClabTopology(readText(file), file);
  const model = buildInventory(desc);
  const doc = renderList(model, { kinds: kindResolver(loadKinds(cfg.kindsPath)) });
  console.error(`clab-inventory: ${file}: hosts=${Object.keys(model.hosts).length} links=${desc.links.length}`);
  return cmd.mode === "host" ? hostJson(doc, cmd.host) : listJson(doc);
}

function main(): void {
  const cmd = parseArgs(process.argv.slice(2));
  if (!cmd) {
    console.error(USAGE);
    process.exit(1);
  }
  try {
    process.stdout.write(`${run(cmd, loadConfig())}\n`);
  } catch (e) {
    console.error(`error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }
}

// npm links the bin, so compare against the resolved script path.
function invokedDirectly(): boolean {
  const script = process.argv[1];
  if (!script || !fs.existsSync(script)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(script)).href;
}

if (invokedDirectly()) main();
