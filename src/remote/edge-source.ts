/**
 * Edge source interface
 *
 * Anything that can list the edges of a node. The cache layer depends on this
 * interface only; GraphClient is the remote implementation.
 */

import type { Edge, NodeId } from '../shared/types.js';

export interface EdgeSource {
  /**
   * Fetch every edge touching `node`.
   * Rejects with TransportError or ProtocolError; never resolves with a
   * partial result.
   */
  fetch(node: NodeId): Promise<Edge[]>;
}
