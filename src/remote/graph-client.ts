/**
 * GraphClient - reads adjacency lists from the remote concept-relation service
 *
 * Error types thrown:
 *   - `TransportError` — network failure, timeout, non-2xx status
 *   - `ProtocolError`  — body is not JSON or not an edge listing
 */

import { z } from 'zod';
import type { Edge, NodeId } from '../shared/types.js';
import { ProtocolError, TransportError, toError } from '../shared/errors.js';
import { createLogger, type Logger } from '../shared/logger.js';
import type { EdgeSource } from './edge-source.js';
import type { RequestGate } from './request-throttle.js';

const endpointSchema = z.object({
  '@id': z.string(),
});

const edgeListingSchema = z.object({
  edges: z.array(
    z.object({
      rel: z.object({
        '@id': z.string().optional(),
        label: z.string().optional(),
      }),
      start: endpointSchema,
      end: endpointSchema,
    }),
  ),
  view: z
    .object({
      nextPage: z.string().optional(),
    })
    .optional(),
});

export type EdgeListing = z.infer<typeof edgeListingSchema>;

export interface GraphClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Sent as `limit`; null leaves the service default */
  pageSize?: number | null;
  maxPages?: number;
  logger?: Logger;
}

/**
 * True when `endpoint` names `node` itself or a sense-qualified child of it
 * ("/c/en/dog/n" for "/c/en/dog").
 */
export function endpointMatches(endpoint: string, node: NodeId): boolean {
  if (endpoint === node) return true;
  const prefix = node.endsWith('/') ? node : `${node}/`;
  return endpoint.startsWith(prefix);
}

/**
 * Orient raw service edges relative to `node`. Edges where `node` is
 * neither endpoint are dropped.
 */
export function classifyEdges(node: NodeId, listing: EdgeListing): Edge[] {
  const edges: Edge[] = [];
  for (const raw of listing.edges) {
    const relation = raw.rel.label ?? raw.rel['@id'];
    if (relation === undefined) continue;

    const start = raw.start['@id'];
    const end = raw.end['@id'];
    if (endpointMatches(start, node)) {
      edges.push({ relation, neighbor: end, direction: 'outgoing' });
    } else if (endpointMatches(end, node)) {
      edges.push({ relation, neighbor: start, direction: 'incoming' });
    }
  }
  return edges;
}

export class GraphClient implements EdgeSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number | null;
  private readonly maxPages: number;
  private readonly logger: Logger;
  private requests = 0;

  constructor(
    private readonly gate: RequestGate,
    options: GraphClientOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.pageSize = options.pageSize ?? null;
    this.maxPages = Math.max(1, options.maxPages ?? 1);
    this.logger = options.logger ?? createLogger('GraphClient');
  }

  /** Number of HTTP requests issued so far */
  get requestCount(): number {
    return this.requests;
  }

  async fetch(node: NodeId): Promise<Edge[]> {
    const edges: Edge[] = [];
    let url: string | undefined = this.nodeUrl(node);

    for (let page = 0; page < this.maxPages && url !== undefined; page++) {
      const listing = await this.fetchPage(url);
      edges.push(...classifyEdges(node, listing));
      const next = listing.view?.nextPage;
      url = next ? new URL(next, `${this.baseUrl}/`).toString() : undefined;
    }

    this.logger.debug('fetched edges', { node, edges: edges.length });
    return edges;
  }

  private nodeUrl(node: NodeId): string {
    const pathPart = node.startsWith('/') ? node : `/${node}`;
    const url = new URL(this.baseUrl + pathPart);
    if (this.pageSize !== null) {
      url.searchParams.set('limit', String(this.pageSize));
    }
    return url.toString();
  }

  private async fetchPage(url: string): Promise<EdgeListing> {
    await this.gate.wait();
    this.requests++;

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransportError(
        `Request to ${url} failed: ${toError(err).message}`,
        null,
        toError(err),
      );
    }

    if (!response.ok) {
      throw new TransportError(`Request to ${url} returned HTTP ${response.status}`, response.status);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new TransportError(
        `Reading response from ${url} failed: ${toError(err).message}`,
        response.status,
        toError(err),
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new ProtocolError(`Response from ${url} is not valid JSON`, toError(err));
    }

    const parsed = edgeListingSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ProtocolError(
        `Unexpected response shape from ${url}${issue ? `: ${issue.path.join('.')} ${issue.message}` : ''}`,
        parsed.error,
      );
    }
    return parsed.data;
  }
}
