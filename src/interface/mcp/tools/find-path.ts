/**
 * find_path - Find a chain of relations between two concepts
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ConceptPathEngine } from '../../../core/engine.js';
import { toMcpError } from '../errors.js';
import { logToStderr } from '../logger.js';

export function registerFindPathTool(
  server: McpServer,
  engine: ConceptPathEngine,
  signal?: AbortSignal,
): void {
  server.tool(
    'find_path',
    [
      'Find a chain of labeled relations connecting two concepts in the semantic graph.',
      'Concepts are identifiers such as "/c/en/dog".',
      'Searches from both ends at once; may take one remote request per explored concept.',
      'Returns status (found / not_found / interrupted), the steps with relation and direction, and search statistics.',
    ].join('\n'),
    {
      start: z.string().min(1).describe('Start concept identifier, e.g. "/c/en/dog"'),
      end: z.string().min(1).describe('End concept identifier, e.g. "/c/en/cat"'),
    },
    async (input) => {
      try {
        const result = await engine.findPath(input.start, input.end, { signal });

        logToStderr('find_path completed', 'debug', {
          start: input.start,
          end: input.end,
          status: result.status,
          elapsed_ms: result.elapsed_ms,
        });

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      } catch (error) {
        throw toMcpError(error);
      }
    },
  );
}
