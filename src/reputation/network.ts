import ipaddr from 'ipaddr.js';

export type IpAddress = ipaddr.IPv4 | ipaddr.IPv6;

export type NetworkRange =
  | { readonly kind: 'ipv4'; readonly base: ipaddr.IPv4; readonly prefix: number }
  | { readonly kind: 'ipv6'; readonly base: ipaddr.IPv6; readonly prefix: number };

function unmap(addr: IpAddress): IpAddress {
  if (addr instanceof ipaddr.IPv6 && addr.isIPv4MappedAddress()) return addr.toIPv4Address();
  return addr;
}

/**
 * Parses a literal IPv4/IPv6 address. IPv4-mapped IPv6 (`::ffff:a.b.c.d`) comes back as IPv4,
 * zone ids are rejected. Shorthand IPv4 forms such as `127.1` are not addresses here.
 */
export function parseAddress(input: string): IpAddress | null {
  const raw = input.trim();
  if (!raw || raw.includes('%') || raw.includes('/')) return null;

  if (ipaddr.IPv4.isValidFourPartDecimal(raw)) return ipaddr.IPv4.parse(raw);
  if (!raw.includes(':') || !ipaddr.IPv6.isValid(raw)) return null;

  try {
    return unmap(ipaddr.IPv6.parse(raw));
  } catch {
    return null;
  }
}

/**
 * Parses `base/prefix`. Host bits in the base are kept as written; matching only looks at the
 * first `prefix` bits. A bare address is not a range.
 */
export function parseNetwork(input: string): NetworkRange | null {
  const raw = input.trim();
  const slash = raw.indexOf('/');
  if (slash <= 0) return null;

  const prefixText = raw.slice(slash + 1);
  if (!/^\d{1,3}$/.test(prefixText)) return null;
  const prefix = Number(prefixText);

  const addr = parseAddress(raw.slice(0, slash));
  if (!addr) return null;

  let range: NetworkRange;
  if (addr instanceof ipaddr.IPv4) {
    if (prefix > 32) return null;
    range = { kind: 'ipv4', base: addr, prefix };
  } else {
    if (prefix > 128) return null;
    range = { kind: 'ipv6', base: addr, prefix };
  }
  return Object.freeze(range);
}

export function contains(range: NetworkRange, addr: IpAddress): boolean {
  if (range.kind === 'ipv4') {
    return addr instanceof ipaddr.IPv4 && addr.match(range.base, range.prefix);
  }
  return addr instanceof ipaddr.IPv6 && addr.match(range.base, range.prefix);
}

export function addressKey(addr: IpAddress): string {
  return `${addr.kind()}:${addr.toNormalizedString()}`;
}
