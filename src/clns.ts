import { formatPrefix, type Prefix } from "./address.js";
import { EncodingError } from "./errors.js";

const AREA = "49.0001";
const NSEL = "00";

/**
 * NET for IS-IS from an IPv4 loopback: each octet padded to three digits,
 * the twelve digits split into dotted groups of four.
 * 192.0.2.1 -> 49.0001.1920.0000.2001.00
 */
export function deriveNet(loopback4: Prefix): string {
  if (loopback4.family !== 4 || loopback4.length !== 32) {
    throw new EncodingError(`CLNS NET needs an IPv4 /32 loopback, got ${formatPrefix(loopback4)}`, formatPrefix(loopback4));
  }
  let digits = "";
  for (let shift = 24; shift >= 0; shift -= 8) {
    const octet = String(Number((loopback4.network >> BigInt(shift)) & 0xffn));
    if (octet.length > 3) {
      throw new EncodingError(`Octet ${octet} does not fit in three digits`, formatPrefix(loopback4));
    }
    digits += octet.padStart(3, "0");
  }
  return `${AREA}.${digits.slice(0, 4)}.${digits.slice(4, 8)}.${digits.slice(8)}.${NSEL}`;
}
