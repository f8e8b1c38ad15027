import { z } from 'zod';
import { parseAddress, parseNetwork } from '../reputation/network.js';
import type { FeedEntry } from '../reputation/snapshot.js';

export type RowResult =
  | { kind: 'entry'; entry: FeedEntry }
  // Blank line or comment: not an error.
  | { kind: 'skip' }
  | { kind: 'invalid'; row: string };

const SKIP: RowResult = { kind: 'skip' };

function stripComment(line: string): string {
  const hash = line.indexOf('#');
  return (hash >= 0 ? line.slice(0, hash) : line).trim();
}

export function parseEntry(text: string): FeedEntry | null {
  if (text.includes('/')) {
    const range = parseNetwork(text);
    return range ? { type: 'network', range } : null;
  }
  const address = parseAddress(text);
  return address ? { type: 'address', address } : null;
}

// "10.0.0.0/8", "192.0.2.1", "# comment", "198.51.100.0/24 # inline"
export function parseNetsetLine(raw: string): RowResult {
  const line = stripComment(raw);
  if (!line) return SKIP;
  const entry = parseEntry(line);
  return entry ? { kind: 'entry', entry } : { kind: 'invalid', row: line };
}

// One bare address per line; anything after the first whitespace is ignored ("192.0.2.1\t7").
export function parsePlainLine(raw: string): RowResult {
  const line = stripComment(raw);
  if (!line) return SKIP;
  const first = line.split(/\s+/)[0] ?? '';
  const address = parseAddress(first);
  return address ? { kind: 'entry', entry: { type: 'address', address } } : { kind: 'invalid', row: line };
}

// First column is a CIDR block: "192.0.2.0/24,NL,NL-NH,Amsterdam,".
export function parseCsvLine(raw: string): RowResult {
  const line = raw.trim();
  if (!line || line.startsWith('#')) return SKIP;
  const comma = line.indexOf(',');
  const first = (comma >= 0 ? line.slice(0, comma) : line).trim().replace(/^"(.*)"$/, '$1').trim();
  const entry = first ? parseEntry(first) : null;
  return entry ? { kind: 'entry', entry } : { kind: 'invalid', row: line };
}

export const regionsDocumentSchema = z.object({
  regions: z.array(
    z.object({
      region: z.string().optional(),
      cidrs: z.array(z.object({ cidr: z.string() }))
    })
  )
});

export type RegionsDocument = z.infer<typeof regionsDocumentSchema>;

export function extractRegionCidrs(doc: RegionsDocument): string[] {
  const out: string[] = [];
  for (const region of doc.regions) {
    for (const item of region.cidrs) out.push(item.cidr);
  }
  return out;
}
