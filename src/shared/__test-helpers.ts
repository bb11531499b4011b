/**
 * Shared test helpers
 */

import { vi } from 'vitest';
import type { Edge, NodeId } from './types.js';
import type { Logger } from './logger.js';

/** [start, relation, end] as the remote service reports an edge */
export type Triple = [start: NodeId, relation: string, end: NodeId];

/**
 * Adjacency lists seen from each endpoint, in triple order.
 */
export function buildAdjacency(triples: readonly Triple[]): Map<NodeId, Edge[]> {
  const adjacency = new Map<NodeId, Edge[]>();
  const push = (node: NodeId, edge: Edge) => {
    const list = adjacency.get(node) ?? [];
    list.push(edge);
    adjacency.set(node, list);
  };
  for (const [start, relation, end] of triples) {
    push(start, { relation, neighbor: end, direction: 'outgoing' });
    push(end, { relation, neighbor: start, direction: 'incoming' });
  }
  return adjacency;
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}
