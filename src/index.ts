/**
 * Library entry point
 */

export {
  ConceptPathEngine,
  createConceptPathEngine,
  applyOverrides,
  type EngineOverrides,
  type EngineComponents,
} from './core/engine.js';
export {
  BidirectionalSearch,
  DEFAULT_MAX_DEPTH,
  type EdgeLookup,
  type SearchResult,
  type SearchListener,
  type SearchEventType,
  type SearchEventData,
  type SearchOptions,
  type SearchState,
} from './core/graph/bidirectional-search.js';
export { reconstructPath, flipDirection } from './core/graph/path-reconstructor.js';
export { AdjacencyCache, serializeCache, deserializeCache } from './data/adjacency-cache.js';
export { GraphClient, classifyEdges, endpointMatches, type GraphClientOptions } from './remote/graph-client.js';
export { RequestThrottle, systemClock, type Clock, type RequestGate } from './remote/request-throttle.js';
export type { EdgeSource } from './remote/edge-source.js';
export { loadConfig, parseConfig } from './config/config.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export type { ConceptPathConfig } from './config/types.js';
export * from './shared/errors.js';
export type * from './shared/types.js';
