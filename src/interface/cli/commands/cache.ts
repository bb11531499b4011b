/**
 * concept-path cache clear - Delete the adjacency cache file
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { createConceptPathEngine } from '../../../core/engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess } from '../output/formatter.js';

export function cacheCommand(): Command {
  const cache = new Command('cache').description('Manage the adjacency cache');

  cache
    .command('clear')
    .description('Delete the adjacency cache file')
    .option('--cache <file>', 'Adjacency cache file')
    .action(async (options: { cache?: string }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await createConceptPathEngine(globals.cwd, { cacheFile: options.cache });
        const before = await engine.getStatus();
        await engine.clearCache();

        if (globals.json) {
          printJson({ cleared: before.cache.file, node_count: before.cache.node_count });
        } else if (!globals.quiet) {
          process.stderr.write(
            `  ${formatSuccess(`Cleared ${before.cache.node_count} cached nodes from ${before.cache.file}`)}\n`,
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });

  return cache;
}
