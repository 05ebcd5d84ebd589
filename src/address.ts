export type Family = 4 | 6;

export type Prefix = {
  family: Family;
  network: bigint;
  length: number;
};

const WIDTH: Record<Family, number> = { 4: 32, 6: 128 };

function parseIpv4(text: string): bigint | undefined {
  const parts = text.split(".");
  if (parts.length !== 4) return undefined;
  let value = 0n;
  for (const p of parts) {
    if (!/^\d{1,3}$/.test(p)) return undefined;
    const octet = Number(p);
    if (octet > 255) return undefined;
    value = (value << 8n) | BigInt(octet);
  }
  return value;
}

function parseGroups(text: string): number[] | undefined {
  if (text === "") return [];
  const groups: number[] = [];
  for (const g of text.split(":")) {
    if (!/^[0-9a-fA-F]{1,4}$/.test(g)) return undefined;
    groups.push(parseInt(g, 16));
  }
  return groups;
}

function parseIpv6(text: string): bigint | undefined {
  const halves = text.split("::");
  if (halves.length > 2) return undefined;
  const head = parseGroups(halves[0] ?? "");
  const tail = halves.length === 2 ? parseGroups(halves[1] ?? "") : [];
  if (!head || !tail) return undefined;
  const missing = 8 - head.length - tail.length;
  if (halves.length === 2 ? missing < 1 : missing !== 0) return undefined;
  const groups = [...head, ...new Array<number>(missing).fill(0), ...tail];
  let value = 0n;
  for (const g of groups) value = (value << 16n) | BigInt(g);
  return value;
}

export function parseAddress(text: string): { family: Family; value: bigint } {
  const trimmed = text.trim();
  const v4 = parseIpv4(trimmed);
  if (v4 !== undefined) return { family: 4, value: v4 };
  const v6 = trimmed.includes(":") ? parseIpv6(trimmed) : undefined;
  if (v6 !== undefined) return { family: 6, value: v6 };
  throw new Error(`Invalid IP address: ${text}`);
}

export function parsePrefix(cidr: string): Prefix {
  const [addr, len, ...rest] = cidr.split("/");
  if (addr === undefined || len === undefined || rest.length > 0 || !/^\d{1,3}$/.test(len)) {
    throw new Error(`Invalid prefix: ${cidr}`);
  }
  const { family, value } = parseAddress(addr);
  const length = Number(len);
  const width = WIDTH[family];
  if (length > width) throw new Error(`Invalid prefix length in ${cidr}`);
  const hostBits = BigInt(width - length);
  if ((value & ((1n << hostBits) - 1n)) !== 0n) throw new Error(`Host bits set in ${cidr}`);
  return { family, network: value, length };
}

function formatIpv6(value: bigint): string {
  const groups: number[] = [];
  for (let i = 7; i >= 0; i -= 1) {
    groups.push(Number((value >> BigInt(i * 16)) & 0xffffn));
  }
  // Longest run of zero groups (first one on ties), only if two or more long.
  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i += 1;
      continue;
    }
    let j = i;
    while (j < 8 && groups[j] === 0) j += 1;
    if (j - i > bestLen) {
      bestStart = i;
      bestLen = j - i;
    }
    i = j;
  }
  const hex = groups.map((g) => g.toString(16));
  if (bestLen < 2) return hex.join(":");
  const head = hex.slice(0, bestStart).join(":");
  const tail = hex.slice(bestStart + bestLen).join(":");
  return `${head}::${tail}`;
}

export function formatAddress(family: Family, value: bigint): string {
  if (family === 6) return formatIpv6(value);
  const octets: number[] = [];
  for (let i = 3; i >= 0; i -= 1) {
    octets.push(Number((value >> BigInt(i * 8)) & 0xffn));
  }
  return octets.join(".");
}

export function formatPrefix(p: Prefix): string {
  return `${formatAddress(p.family, p.network)}/${p.length}`;
}

export function subnetCount(parent: Prefix, length: number): bigint {
  if (length < parent.length || length > WIDTH[parent.family]) {
    throw new Error(`Cannot carve /${length} out of ${formatPrefix(parent)}`);
  }
  return 1n << BigInt(length - parent.length);
}

/**
 * The index-th /length subnet inside parent, counting from its network address.
 */
export function nthSubnet(parent: Prefix, length: number, index: bigint): Prefix {
  const count = subnetCount(parent, length);
  if (index < 0n || index >= count) {
    throw new RangeError(`Subnet index ${index} outside ${formatPrefix(parent)} /${length}`);
  }
  const step = 1n << BigInt(WIDTH[parent.family] - length);
  return { family: parent.family, network: parent.network + index * step, length };
}

export function hostAddress(p: Prefix, ordinal: bigint): bigint {
  const size = 1n << BigInt(WIDTH[p.family] - p.length);
  if (ordinal < 0n || ordinal >= size) {
    throw new RangeError(`Ordinal ${ordinal} outside ${formatPrefix(p)}`);
  }
  return p.network + ordinal;
}
