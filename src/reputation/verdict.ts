export type Verdict = 'FLAGGED' | 'DATACENTER' | 'TOR_EXIT' | 'SAFE';

// The list a feed contributes to. SAFE is the absence of a match, never a category.
export type FeedCategory = Exclude<Verdict, 'SAFE'>;

// Highest first. An address on several lists gets the first category that matches.
export const VERDICT_PRECEDENCE: readonly FeedCategory[] = ['FLAGGED', 'DATACENTER', 'TOR_EXIT'];
