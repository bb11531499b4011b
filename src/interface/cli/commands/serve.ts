/**
 * concept-path serve - Start the MCP server over stdio
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { addSearchOptions, toEngineOverrides, type RawSearchOptions } from '../utils/search-options.js';
import { createConceptPathEngine } from '../../../core/engine.js';
import { handleCommandError } from '../output/error-display.js';
import { startMcpServer } from '../../mcp/server.js';
import { logToStderr } from '../../mcp/logger.js';
import { closeLogger } from '../../../shared/logger.js';

export function serveCommand(): Command {
  return addSearchOptions(
    new Command('serve').description('Start an MCP server exposing the find_path tool (stdio)'),
  ).action(async (options: RawSearchOptions, cmd: Command) => {
    const globals = resolveGlobalOptions(cmd);

    try {
      const engine = await createConceptPathEngine(globals.cwd, {
        ...toEngineOverrides(options),
        logLevel: globals.verbose ? 'debug' : 'warn',
      });

      const { shutdown } = await startMcpServer(engine);

      let shuttingDown = false;
      const gracefulShutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logToStderr(`Received ${signal}. Shutting down...`);

        // Searches in flight finish their step and save the cache
        await shutdown();
        closeLogger();
        process.exit(0);
      };

      process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
      process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    } catch (error) {
      handleCommandError(error, globals);
    }
  });
}
