/**
 * Shared type definitions
 * Base types used across all layers
 */

// --- Graph ---

/** Concept identifier in the remote graph, e.g. "/c/en/dog". Compared by exact string equality. */
export type NodeId = string;

export type EdgeDirection = 'outgoing' | 'incoming';

/**
 * A labeled relation seen from the queried node.
 * `outgoing`: the queried node is the relation's start and `neighbor` its end.
 * `incoming`: `neighbor` is the start and the queried node the end.
 */
export interface Edge {
  relation: string;
  neighbor: NodeId;
  direction: EdgeDirection;
}

/** Edges taken from a fixed origin node, in walking order. */
export type Path = readonly Edge[];

/** One displayable hop of a reconstructed path. */
export interface PathStep {
  from: NodeId;
  relation: string;
  direction: EdgeDirection;
  to: NodeId;
}

export interface ReconstructedPath {
  nodes: NodeId[];
  steps: PathStep[];
}

// --- Find Path ---

export type FindPathStatus = 'found' | 'not_found' | 'interrupted';

export interface FindPathInput {
  start: NodeId;
  end: NodeId;
}

export interface FindPathOutput {
  start: NodeId;
  end: NodeId;
  status: FindPathStatus;
  nodes: NodeId[];
  steps: PathStep[];
  nodes_processed: number;
  network_requests: number;
  elapsed_ms: number;
  cache_saved: boolean;
}

// --- Batch ---

export interface PathPair {
  start: NodeId;
  end: NodeId;
  enabled: boolean;
}

export interface BatchOutput {
  results: FindPathOutput[];
  skipped: FindPathInput[];
}

// --- Status ---

export interface CacheStats {
  file: string;
  file_exists: boolean;
  node_count: number;
  edge_count: number;
}

export interface StatusOutput {
  cwd: string;
  config_file: string | null;
  remote: {
    base_url: string;
    rate_per_second: number;
    timeout_ms: number;
    page_size: number | null;
    max_pages: number;
  };
  search: {
    max_depth: number;
  };
  cache: CacheStats;
}
