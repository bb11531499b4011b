/**
 * Register all MCP tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ConceptPathEngine } from '../../../core/engine.js';
import { registerFindPathTool } from './find-path.js';

export function registerAllTools(
  server: McpServer,
  engine: ConceptPathEngine,
  signal?: AbortSignal,
): void {
  registerFindPathTool(server, engine, signal);
}
