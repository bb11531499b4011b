/**
 * BidirectionalSearch - breadth-first search from both ends of a query
 *
 * Two frontiers (origin = start, origin = end) advance alternately, one
 * dequeued node per side per round. The search stops at the first edge that
 * leads into a node already visited by the opposite frontier; edges are taken
 * in the order the edge lookup returns them. This first-found rule does not
 * promise the globally shortest combined path.
 *
 * Lookup failures surface as empty edge lists and only stop that node from
 * expanding.
 */

import type { Edge, NodeId, Path, ReconstructedPath } from '../../shared/types.js';
import { reconstructPath } from './path-reconstructor.js';

export const DEFAULT_MAX_DEPTH = 10;

export interface EdgeLookup {
  getOrFetch(node: NodeId): Promise<Edge[]>;
}

export type SearchSide = 'forward' | 'backward';

export type SearchState = 'initial' | 'expanding' | 'found' | 'exhausted' | 'interrupted';

export type SearchResult =
  | {
      status: 'found';
      meetingNode: NodeId;
      forwardHalf: Path;
      backwardHalf: Path;
      path: ReconstructedPath;
      nodesProcessed: number;
    }
  | { status: 'exhausted'; nodesProcessed: number }
  | { status: 'interrupted'; nodesProcessed: number };

export type SearchEventType =
  | 'node:expanded'
  | 'node:pruned'
  | 'search:found'
  | 'search:exhausted'
  | 'search:interrupted';

export interface SearchEventData {
  side?: SearchSide;
  node?: NodeId;
  depth?: number;
  edges?: number;
  nodesProcessed: number;
}

export type SearchListener = (event: SearchEventType, data: SearchEventData) => void;

export interface SearchOptions {
  /**
   * Aborting stops the search at the next step boundary; a lookup already in
   * progress (throttle wait or fetch) completes first.
   */
  signal?: AbortSignal;
}

interface Frontier {
  side: SearchSide;
  visited: Map<NodeId, Path>;
  queue: Array<[NodeId, Path]>;
  head: number;
}

interface Intersection {
  meetingNode: NodeId;
  forwardHalf: Path;
  backwardHalf: Path;
}

function createFrontier(side: SearchSide, origin: NodeId): Frontier {
  return {
    side,
    visited: new Map<NodeId, Path>([[origin, []]]),
    queue: [[origin, []]],
    head: 0,
  };
}

function hasPending(frontier: Frontier): boolean {
  return frontier.head < frontier.queue.length;
}

export class BidirectionalSearch {
  private listeners: SearchListener[] = [];
  private _state: SearchState = 'initial';
  private nodesProcessed = 0;

  constructor(
    private readonly lookup: EdgeLookup,
    private readonly maxDepth: number = DEFAULT_MAX_DEPTH,
  ) {}

  /** State of the most recent (or running) search */
  get state(): SearchState {
    return this._state;
  }

  on(listener: SearchListener): void {
    this.listeners.push(listener);
  }

  off(listener: SearchListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  async run(start: NodeId, end: NodeId, options: SearchOptions = {}): Promise<SearchResult> {
    this._state = 'initial';
    this.nodesProcessed = 0;

    if (start === end) {
      return this.found({ meetingNode: start, forwardHalf: [], backwardHalf: [] }, start, end);
    }

    const forward = createFrontier('forward', start);
    const backward = createFrontier('backward', end);
    this._state = 'expanding';

    while (hasPending(forward) && hasPending(backward)) {
      if (options.signal?.aborted) return this.interrupted();

      const fromForward = await this.step(forward, backward);
      if (fromForward) return this.found(fromForward, start, end);

      if (options.signal?.aborted) return this.interrupted();

      const fromBackward = await this.step(backward, forward);
      if (fromBackward) return this.found(fromBackward, start, end);
    }

    this._state = 'exhausted';
    this.emit('search:exhausted', { nodesProcessed: this.nodesProcessed });
    return { status: 'exhausted', nodesProcessed: this.nodesProcessed };
  }

  /**
   * Dequeue and expand one node of `own`, checking each neighbor against
   * `other`. Returns the intersection if one is found.
   */
  private async step(own: Frontier, other: Frontier): Promise<Intersection | null> {
    const entry = own.queue[own.head];
    if (entry === undefined) return null;
    own.head++;

    const [node, path] = entry;
    if (path.length > this.maxDepth) {
      this.emit('node:pruned', {
        side: own.side,
        node,
        depth: path.length,
        nodesProcessed: this.nodesProcessed,
      });
      return null;
    }

    const edges = await this.lookup.getOrFetch(node);
    this.nodesProcessed++;
    this.emit('node:expanded', {
      side: own.side,
      node,
      depth: path.length,
      edges: edges.length,
      nodesProcessed: this.nodesProcessed,
    });

    for (const edge of edges) {
      const extended: Path = [...path, edge];

      const otherHalf = other.visited.get(edge.neighbor);
      if (otherHalf !== undefined) {
        return own.side === 'forward'
          ? { meetingNode: edge.neighbor, forwardHalf: extended, backwardHalf: otherHalf }
          : { meetingNode: edge.neighbor, forwardHalf: otherHalf, backwardHalf: extended };
      }

      if (!own.visited.has(edge.neighbor) && extended.length <= this.maxDepth) {
        own.visited.set(edge.neighbor, extended);
        own.queue.push([edge.neighbor, extended]);
      }
    }

    return null;
  }

  private found(intersection: Intersection, start: NodeId, end: NodeId): SearchResult {
    this._state = 'found';
    const path = reconstructPath(start, end, intersection.forwardHalf, intersection.backwardHalf);
    this.emit('search:found', {
      node: intersection.meetingNode,
      depth: path.steps.length,
      nodesProcessed: this.nodesProcessed,
    });
    return {
      status: 'found',
      ...intersection,
      path,
      nodesProcessed: this.nodesProcessed,
    };
  }

  private interrupted(): SearchResult {
    this._state = 'interrupted';
    this.emit('search:interrupted', { nodesProcessed: this.nodesProcessed });
    return { status: 'interrupted', nodesProcessed: this.nodesProcessed };
  }

  private emit(event: SearchEventType, data: SearchEventData): void {
    for (const listener of this.listeners) {
      try {
        listener(event, data);
      } catch {
        // listener errors are ignored
      }
    }
  }
}
