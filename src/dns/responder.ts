import type { Answer, Question } from 'dns-packet';
import type { Classifier } from '../reputation/classifier.js';
import { parseAddress, type IpAddress } from '../reputation/network.js';

export type ResponderOptions = {
  ttl: number;
  // Returned for A queries on SAFE addresses.
  safeAddress: string;
  // Returned for A queries on every other verdict.
  flaggedAddress: string;
};

/** "203.0.113.5." → 203.0.113.5; anything that is not an address literal → null. */
export function parseQueryAddress(name: string): IpAddress | null {
  const trimmed = name.trim();
  const noDot = trimmed.endsWith('.') ? trimmed.slice(0, -1) : trimmed;
  return parseAddress(noDot);
}

export function respond(classifier: Classifier, question: Question, opts: ResponderOptions): Answer[] {
  if (question.type !== 'A' && question.type !== 'TXT') return [];
  // Verdicts only exist in the Internet class; CH/HS questions get an empty answer section.
  if (question.class !== undefined && question.class !== 'IN') return [];

  const addr = parseQueryAddress(question.name);
  if (!addr) return [];

  const verdict = classifier.classify(addr);
  if (question.type === 'A') {
    return [
      {
        type: 'A',
        class: 'IN',
        name: question.name,
        ttl: opts.ttl,
        data: verdict === 'SAFE' ? opts.safeAddress : opts.flaggedAddress
      }
    ];
  }

  return [{ type: 'TXT', class: 'IN', name: question.name, ttl: opts.ttl, data: verdict }];
}
