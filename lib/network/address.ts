import { AddressRangeExhaustedError, MalformedAddressError } from "../errors";

// Upper bound on workers per cluster. Addresses follow the coordinator with carry,
// so a high base spills into the next /24.
export const MAX_WORKERS = 254;

const OCTET = /^(0|[1-9]\d{0,2})$/;

export function parseAddress(address: string): [number, number, number, number] {
  const parts = address.trim().split(".");
  if (parts.length !== 4) throw new MalformedAddressError(address);

  const octets = parts.map((p) => {
    if (!OCTET.test(p)) throw new MalformedAddressError(address);
    const n = Number(p);
    if (n > 255) throw new MalformedAddressError(address);
    return n;
  });
  return [octets[0], octets[1], octets[2], octets[3]];
}

export function formatAddress(octets: readonly number[]): string {
  return octets.join(".");
}

/**
 * Dotted-quad successor: increments the last octet and carries into the
 * higher ones on 255 -> 0. This is numeric, not a string successor, so
 * `192.168.205.19` becomes `192.168.205.20` (never `.10`).
 */
export function nextAddress(address: string): string {
  const octets = parseAddress(address);
  for (let i = 3; i >= 0; i--) {
    if (octets[i] < 255) {
      octets[i] += 1;
      return formatAddress(octets);
    }
    octets[i] = 0;
  }
  throw new AddressRangeExhaustedError(`no IPv4 address follows ${address}`);
}

export function allocateWorkerAddresses(base: string, count: number): string[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new AddressRangeExhaustedError(`worker count must be a non-negative integer, got ${count}`);
  }
  if (count > MAX_WORKERS) {
    throw new AddressRangeExhaustedError(
      `cannot allocate ${count} workers after ${base}: at most ${MAX_WORKERS} are supported`
    );
  }

  const out: string[] = [];
  let current = formatAddress(parseAddress(base));
  for (let i = 0; i < count; i++) {
    current = nextAddress(current);
    out.push(current);
  }
  return out;
}
