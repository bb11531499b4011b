import type { ConceptPathConfig } from './types.js';

export const DEFAULT_CONFIG: ConceptPathConfig = {
  remote: {
    base_url: 'http://api.conceptnet.io',
    rate_per_second: 1,
    timeout_ms: 10_000,
    page_size: null,
    max_pages: 1,
  },
  search: {
    max_depth: 10,
  },
  cache: {
    file: 'adjacency-cache.json',
  },
  log: {
    level: 'info',
    file: null,
  },
};
