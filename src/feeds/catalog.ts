import type { AppConfig } from '../config.js';
import type { FeedCategory } from '../reputation/verdict.js';

export type FeedFormat = 'netset' | 'plain' | 'csv' | 'json-regions';

export type FeedDescriptor = {
  id: string;
  name: string;
  category: FeedCategory;
  format: FeedFormat;
  url: string;
};

export function defaultFeeds(config: AppConfig): FeedDescriptor[] {
  const all: FeedDescriptor[] = [
    { id: 'firehol_level1', name: 'FireHOL Level 1', category: 'FLAGGED', format: 'netset', url: config.FEED_FIREHOL_URL },
    { id: 'ipsum', name: 'IPsum (level 3)', category: 'FLAGGED', format: 'plain', url: config.FEED_IPSUM_URL },
    { id: 'datacenters', name: 'Datacenter ranges', category: 'DATACENTER', format: 'netset', url: config.FEED_DATACENTERS_URL },
    { id: 'oci', name: 'Oracle Cloud', category: 'DATACENTER', format: 'json-regions', url: config.FEED_OCI_URL },
    { id: 'digitalocean', name: 'DigitalOcean', category: 'DATACENTER', format: 'csv', url: config.FEED_DIGITALOCEAN_URL },
    { id: 'tor_exit', name: 'Tor exit nodes', category: 'TOR_EXIT', format: 'plain', url: config.FEED_TOR_URL }
  ];

  const disabled = new Set(config.FEEDS_DISABLED);
  return all.filter((feed) => !disabled.has(feed.id));
}
