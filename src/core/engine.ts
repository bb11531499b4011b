/**
 * ConceptPathEngine - Core Layer facade
 *
 * Interface Layer (CLI / MCP) accesses all functionality through this facade only.
 * The adjacency cache is loaded when the engine is created and saved once at
 * the end of every search, whatever its outcome.
 */

import * as path from 'node:path';
import { performance } from 'node:perf_hooks';
import type { ConceptPathConfig } from '../config/types.js';
import { loadConfig, resolveCachePath, resolveConfigPath, configExists } from '../config/config.js';
import type { FindPathOutput, NodeId, StatusOutput } from '../shared/types.js';
import { AsyncMutex } from '../shared/async.js';
import { configureLogger, createLogger, type Logger, type LogLevel } from '../shared/logger.js';
import { AdjacencyCache } from '../data/adjacency-cache.js';
import { GraphClient } from '../remote/graph-client.js';
import { RequestThrottle } from '../remote/request-throttle.js';
import {
  BidirectionalSearch,
  type SearchOptions,
  type SearchResult,
} from './graph/bidirectional-search.js';

export interface EngineOverrides {
  baseUrl?: string;
  ratePerSecond?: number;
  timeoutMs?: number;
  maxDepth?: number;
  /** Relative paths resolve against the working directory */
  cacheFile?: string;
  logLevel?: LogLevel;
}

export interface EngineComponents {
  cwd: string;
  config: ConceptPathConfig;
  cache: AdjacencyCache;
  search: BidirectionalSearch;
  requests: { readonly requestCount: number };
  logger?: Logger;
}

export class ConceptPathEngine {
  private readonly mutex = new AsyncMutex();
  private readonly logger: Logger;

  constructor(private readonly components: EngineComponents) {
    this.logger = components.logger ?? createLogger('ConceptPathEngine');
  }

  get config(): ConceptPathConfig {
    return this.components.config;
  }

  get search(): BidirectionalSearch {
    return this.components.search;
  }

  /**
   * Search for a relation chain from `start` to `end`. Calls are serialized:
   * one engine never runs two searches over its cache at once.
   */
  async findPath(start: NodeId, end: NodeId, options: SearchOptions = {}): Promise<FindPathOutput> {
    return this.mutex.runExclusive(async () => {
      const { cache, search, requests } = this.components;
      const startedAt = performance.now();
      const requestsBefore = requests.requestCount;

      this.logger.debug('search started', { start, end });

      let result: SearchResult;
      let cacheSaved = false;
      try {
        result = await search.run(start, end, options);
      } finally {
        cacheSaved = await cache.save();
      }

      const output = this.toOutput(start, end, result, {
        elapsedMs: Math.round(performance.now() - startedAt),
        networkRequests: requests.requestCount - requestsBefore,
        cacheSaved,
      });

      const fields = {
        start,
        end,
        nodes_processed: output.nodes_processed,
        network_requests: output.network_requests,
        elapsed_ms: output.elapsed_ms,
      };
      if (output.status === 'found') {
        this.logger.info('path found', { ...fields, length: output.steps.length });
      } else if (output.status === 'not_found') {
        this.logger.info('no path found', fields);
      } else {
        this.logger.warn('search interrupted', fields);
      }

      return output;
    });
  }

  async getStatus(): Promise<StatusOutput> {
    const { cwd, config, cache } = this.components;
    return {
      cwd,
      config_file: configExists(cwd) ? resolveConfigPath(cwd) : null,
      remote: { ...config.remote },
      search: { ...config.search },
      cache: await cache.stats(),
    };
  }

  /** Resolves once every queued and running search has finished. */
  async whenIdle(): Promise<void> {
    await this.mutex.runExclusive(async () => {});
  }

  async clearCache(): Promise<void> {
    await this.mutex.runExclusive(() => this.components.cache.clear());
  }

  private toOutput(
    start: NodeId,
    end: NodeId,
    result: SearchResult,
    meta: { elapsedMs: number; networkRequests: number; cacheSaved: boolean },
  ): FindPathOutput {
    const base = {
      start,
      end,
      nodes_processed: result.nodesProcessed,
      network_requests: meta.networkRequests,
      elapsed_ms: meta.elapsedMs,
      cache_saved: meta.cacheSaved,
    };
    switch (result.status) {
      case 'found':
        return { ...base, status: 'found', nodes: result.path.nodes, steps: result.path.steps };
      case 'exhausted':
        return { ...base, status: 'not_found', nodes: [], steps: [] };
      case 'interrupted':
        return { ...base, status: 'interrupted', nodes: [], steps: [] };
    }
  }
}

/**
 * Apply per-invocation overrides on top of the loaded configuration.
 */
export function applyOverrides(
  config: ConceptPathConfig,
  cwd: string,
  overrides: EngineOverrides,
): ConceptPathConfig {
  return {
    ...config,
    remote: {
      ...config.remote,
      base_url: overrides.baseUrl ?? config.remote.base_url,
      rate_per_second: overrides.ratePerSecond ?? config.remote.rate_per_second,
      timeout_ms: overrides.timeoutMs ?? config.remote.timeout_ms,
    },
    search: {
      max_depth: overrides.maxDepth ?? config.search.max_depth,
    },
    cache: {
      file:
        overrides.cacheFile !== undefined
          ? path.resolve(cwd, overrides.cacheFile)
          : config.cache.file,
    },
    log: {
      ...config.log,
      level: overrides.logLevel ?? config.log.level,
    },
  };
}

/**
 * Load configuration, wire throttle, client, cache and search, and load the
 * cache from disk.
 */
export async function createConceptPathEngine(
  cwd: string,
  overrides: EngineOverrides = {},
): Promise<ConceptPathEngine> {
  const config = applyOverrides(loadConfig(cwd), cwd, overrides);
  configureLogger({
    level: config.log.level,
    file: config.log.file !== null ? path.resolve(cwd, config.log.file) : null,
  });

  const throttle = new RequestThrottle(config.remote.rate_per_second);
  const client = new GraphClient(throttle, {
    baseUrl: config.remote.base_url,
    timeoutMs: config.remote.timeout_ms,
    pageSize: config.remote.page_size,
    maxPages: config.remote.max_pages,
  });
  const cache = new AdjacencyCache(resolveCachePath(cwd, config), client);
  await cache.load();

  const search = new BidirectionalSearch(cache, config.search.max_depth);
  return new ConceptPathEngine({ cwd, config, cache, search, requests: client });
}
