/**
 * Group address helpers
 *
 * A group address is a 16-bit number. Text notations:
 *   3-level  main/middle/sub   5 / 3 / 8 bits  (e.g. "1/0/1" = 2049)
 *   2-level  main/sub          5 / 11 bits     (e.g. "1/1"   = 2049)
 */

const THREE_LEVEL = /^(\d{1,2})\/(\d)\/(\d{1,3})$/;
const TWO_LEVEL = /^(\d{1,2})\/(\d{1,4})$/;

export function parseGroupAddress(text: string): number {
  const trimmed = text.trim();

  const three = THREE_LEVEL.exec(trimmed);
  if (three) {
    const main = Number(three[1]);
    const middle = Number(three[2]);
    const sub = Number(three[3]);
    if (main > 31 || middle > 7 || sub > 255) {
      throw new RangeError(`Group address out of range: ${text}`);
    }
    return (main << 11) | (middle << 8) | sub;
  }

  const two = TWO_LEVEL.exec(trimmed);
  if (two) {
    const main = Number(two[1]);
    const sub = Number(two[2]);
    if (main > 31 || sub > 2047) {
      throw new RangeError(`Group address out of range: ${text}`);
    }
    return (main << 11) | sub;
  }

  throw new Error(`Invalid group address: ${text}`);
}

export function formatGroupAddress(address: number): string {
  if (!Number.isInteger(address) || address < 0 || address > 0xffff) {
    throw new RangeError(`Group address must be a 16-bit integer: ${address}`);
  }
  return `${address >> 11}/${(address >> 8) & 0x07}/${address & 0xff}`;
}

/**
 * Formats for log output; never throws
 */
export function describeGroupAddress(address: number): string {
  try {
    return formatGroupAddress(address);
  } catch {
    return `#${address}`;
  }
}
