/**
 * Configuration type definitions
 */

import type { LogLevel } from '../shared/logger.js';

export interface ConceptPathConfig {
  /** Remote concept-relation service */
  remote: {
    base_url: string;
    /** Permitted requests per second */
    rate_per_second: number;
    timeout_ms: number;
    /** Sent as `limit`; null leaves the service default */
    page_size: number | null;
    /** Upper bound on `view.nextPage` links followed per node */
    max_pages: number;
  };

  search: {
    max_depth: number;
  };

  cache: {
    /** Relative paths resolve against the .concept-path directory */
    file: string;
  };

  log: {
    level: LogLevel;
    file: string | null;
  };
}
