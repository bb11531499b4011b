/**
 * MCP Server initialization and transport
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './tools/index.js';
import { logToStderr, interceptConsole } from './logger.js';
import type { ConceptPathEngine } from '../../core/engine.js';
import { getVersion } from '../cli/version.js';

export interface McpServerHandle {
  /** Interrupt running searches, wait for their cache saves, then close the transport. */
  shutdown(): Promise<void>;
}

export async function startMcpServer(engine: ConceptPathEngine): Promise<McpServerHandle> {
  interceptConsole();

  const controller = new AbortController();
  const server = new McpServer({
    name: 'concept-path',
    version: getVersion(),
  });

  registerAllTools(server, engine, controller.signal);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logToStderr('MCP server started (stdio transport)');

  return {
    async shutdown() {
      controller.abort();
      await engine.whenIdle();
      await server.close();
    },
  };
}
