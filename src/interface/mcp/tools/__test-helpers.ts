/**
 * Shared test helpers for MCP tool tests
 */

import { vi } from 'vitest';
import type { ConceptPathEngine } from '../../../core/engine.js';
import type { FindPathOutput } from '../../../shared/types.js';

/**
 * Create a mock ConceptPathEngine with the tool-facing methods as vi.fn()
 */
export function createMockEngine(
  overrides?: Partial<Record<keyof ConceptPathEngine, unknown>>,
): ConceptPathEngine {
  const engine = {
    findPath: vi.fn(),
    getStatus: vi.fn(),
    whenIdle: vi.fn(),
    clearCache: vi.fn(),
    ...overrides,
  } as unknown as ConceptPathEngine;

  return engine;
}

type ToolHandler = (input: Record<string, unknown>) => Promise<unknown>;

/**
 * Capture a tool handler registered via server.tool().
 *
 * Creates a mock McpServer, calls the register function, and returns
 * the async handler callback for direct invocation in tests.
 */
export function captureToolHandler(
  registerFn: (server: never, engine: ConceptPathEngine, signal?: AbortSignal) => void,
  engine: ConceptPathEngine,
  signal?: AbortSignal,
): { name: string; handler: ToolHandler } {
  let captured: { name: string; handler: ToolHandler } | null = null;

  const mockServer = {
    tool: (
      name: string,
      _descriptionOrSchema: unknown,
      schemaOrHandler: unknown,
      handler?: unknown,
    ) => {
      // server.tool() has two overloads:
      //   server.tool(name, description, schema, handler)
      //   server.tool(name, schema, handler)
      if (typeof handler === 'function') {
        captured = { name, handler: handler as ToolHandler };
      } else if (typeof schemaOrHandler === 'function') {
        captured = { name, handler: schemaOrHandler as ToolHandler };
      }
    },
  };

  registerFn(mockServer as never, engine, signal);

  if (!captured) {
    throw new Error('Tool handler was not registered');
  }

  return captured;
}

export function makeSampleFindPathOutput(): FindPathOutput {
  return {
    start: '/c/en/dog',
    end: '/c/en/animal',
    status: 'found',
    nodes: ['/c/en/dog', '/c/en/animal'],
    steps: [{ from: '/c/en/dog', relation: 'IsA', direction: 'outgoing', to: '/c/en/animal' }],
    nodes_processed: 1,
    network_requests: 1,
    elapsed_ms: 12,
    cache_saved: true,
  };
}
