/**
 * PathReconstructor - joins the two half-paths met at an intersection
 */

import type {
  EdgeDirection,
  NodeId,
  Path,
  PathStep,
  ReconstructedPath,
} from '../../shared/types.js';

export function flipDirection(direction: EdgeDirection): EdgeDirection {
  return direction === 'outgoing' ? 'incoming' : 'outgoing';
}

/**
 * Build the display chain from `start` to `end`.
 *
 * The forward half is emitted as recorded. The backward half was walked from
 * `end`, so it is emitted in reverse order with every direction flipped: its
 * step k led from node k-1 to node k, and is shown leading from k to k-1.
 */
export function reconstructPath(
  start: NodeId,
  end: NodeId,
  forwardHalf: Path,
  backwardHalf: Path,
): ReconstructedPath {
  const steps: PathStep[] = [];

  let current = start;
  for (const edge of forwardHalf) {
    steps.push({
      from: current,
      relation: edge.relation,
      direction: edge.direction,
      to: edge.neighbor,
    });
    current = edge.neighbor;
  }

  // Nodes along the backward walk: end, n1, ..., meeting node
  const backwardNodes: NodeId[] = [end, ...backwardHalf.map((edge) => edge.neighbor)];
  for (let i = backwardHalf.length - 1; i >= 0; i--) {
    const edge = backwardHalf[i];
    const towardEnd = backwardNodes[i];
    if (edge === undefined || towardEnd === undefined) continue;
    steps.push({
      from: edge.neighbor,
      relation: edge.relation,
      direction: flipDirection(edge.direction),
      to: towardEnd,
    });
  }

  const nodes: NodeId[] = [start, ...steps.map((step) => step.to)];
  return { nodes, steps };
}
