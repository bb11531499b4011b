/**
 * AdjacencyCache - durable node -> edges mapping
 *
 * Cache hits never touch the network. A node becomes a key only after its
 * whole edge list was fetched successfully, so a failed fetch is retried the
 * next time the node is asked for.
 *
 * On disk: one JSON object, `{ [nodeId]: [[relation, neighbor, "outgoing" | "incoming"], ...] }`.
 */

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import type { CacheStats, Edge, NodeId } from '../shared/types.js';
import { StorageCorruptError, StorageWriteError, toError } from '../shared/errors.js';
import { atomicWrite, isEnoent, readFileOrNull } from '../shared/fs.js';
import { createLogger, type Logger } from '../shared/logger.js';
import type { EdgeSource } from '../remote/edge-source.js';

const edgeRecordsSchema = z.array(
  z.tuple([z.string(), z.string(), z.enum(['outgoing', 'incoming'])]),
);

type EdgeRecord = z.infer<typeof edgeRecordsSchema>[number];

export type SerializedCache = Record<NodeId, EdgeRecord[]>;

export function serializeCache(entries: ReadonlyMap<NodeId, readonly Edge[]>): SerializedCache {
  // fromEntries defines own properties, so a "__proto__" node stays a key
  return Object.fromEntries(
    Array.from(entries, ([node, edges]): [NodeId, EdgeRecord[]] => [
      node,
      edges.map((e): EdgeRecord => [e.relation, e.neighbor, e.direction]),
    ]),
  );
}

/**
 * Validate file content and build the in-memory mapping. Each node's records
 * are checked on their own; a whole-object record schema would drop a
 * "__proto__" key. Throws on any malformed entry.
 */
export function deserializeCache(data: unknown): Map<NodeId, Edge[]> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new TypeError('expected an object mapping node ids to edge lists');
  }
  const entries = new Map<NodeId, Edge[]>();
  for (const [node, raw] of Object.entries(data)) {
    const records = edgeRecordsSchema.parse(raw);
    entries.set(
      node,
      records.map(([relation, neighbor, direction]) => ({ relation, neighbor, direction })),
    );
  }
  return entries;
}

export class AdjacencyCache {
  private entries = new Map<NodeId, Edge[]>();
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    private readonly source: EdgeSource,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('AdjacencyCache');
  }

  get file(): string {
    return this.filePath;
  }

  get size(): number {
    return this.entries.size;
  }

  has(node: NodeId): boolean {
    return this.entries.has(node);
  }

  /**
   * Replace the in-memory mapping with the file content. A missing file gives
   * an empty cache; an unreadable or malformed one is logged and also gives
   * an empty cache.
   */
  async load(): Promise<void> {
    this.entries = new Map();

    let raw: string | null;
    try {
      raw = await readFileOrNull(this.filePath);
    } catch (err) {
      this.reportCorrupt(new StorageCorruptError(this.filePath, toError(err)));
      return;
    }
    if (raw === null) {
      this.logger.debug('no cache file, starting empty', { file: this.filePath });
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.reportCorrupt(new StorageCorruptError(this.filePath, toError(err)));
      return;
    }

    try {
      this.entries = deserializeCache(parsed);
    } catch (err) {
      this.reportCorrupt(new StorageCorruptError(this.filePath, toError(err)));
      return;
    }
    this.logger.debug('cache loaded', { file: this.filePath, nodes: this.entries.size });
  }

  /**
   * Cached edges for `node`, fetching them on a miss. A failed fetch returns
   * an empty list and stores nothing.
   */
  async getOrFetch(node: NodeId): Promise<Edge[]> {
    const cached = this.entries.get(node);
    if (cached !== undefined) {
      return cached;
    }

    let edges: Edge[];
    try {
      edges = await this.source.fetch(node);
    } catch (err) {
      const error = toError(err);
      this.logger.warn('fetch failed, node left uncached', {
        node,
        error: error.name,
        message: error.message,
      });
      return [];
    }

    this.entries.set(node, edges);
    return edges;
  }

  /**
   * Write the whole mapping, replacing prior content. Failures are logged;
   * the return value tells whether the write succeeded.
   */
  async save(): Promise<boolean> {
    try {
      await atomicWrite(this.filePath, JSON.stringify(serializeCache(this.entries)));
      this.logger.debug('cache saved', { file: this.filePath, nodes: this.entries.size });
      return true;
    } catch (err) {
      const error = new StorageWriteError(this.filePath, toError(err));
      this.logger.error(error.message, { cause: error.cause?.message });
      return false;
    }
  }

  /** Drop every entry and delete the file. */
  async clear(): Promise<void> {
    this.entries = new Map();
    try {
      await fs.unlink(this.filePath);
    } catch (err) {
      if (!isEnoent(err)) throw new StorageWriteError(this.filePath, toError(err));
    }
  }

  async stats(): Promise<CacheStats> {
    let edgeCount = 0;
    for (const edges of this.entries.values()) {
      edgeCount += edges.length;
    }
    let fileExists: boolean;
    try {
      await fs.access(this.filePath);
      fileExists = true;
    } catch {
      fileExists = false;
    }
    return {
      file: this.filePath,
      file_exists: fileExists,
      node_count: this.entries.size,
      edge_count: edgeCount,
    };
  }

  private reportCorrupt(error: StorageCorruptError): void {
    this.logger.warn(`${error.message}; starting with an empty cache`, {
      cause: error.cause?.message,
    });
  }
}
