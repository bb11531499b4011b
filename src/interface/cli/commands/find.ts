/**
 * concept-path find <start> <end> - Search for a relation chain between two concepts
 */

import { Command } from 'commander';
import { logLevelOverride, resolveGlobalOptions } from '../utils/global-options.js';
import { addSearchOptions, toEngineOverrides, type RawSearchOptions } from '../utils/search-options.js';
import { INTERRUPTED_EXIT_CODE, withInterruption } from '../utils/interruption.js';
import { createConceptPathEngine } from '../../../core/engine.js';
import { closeLogger } from '../../../shared/logger.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatFindPathResult } from '../output/formatter.js';
import { createProgressListener } from '../output/progress.js';

export function findCommand(): Command {
  const command = new Command('find')
    .description('Find a chain of relations from <start> to <end>')
    .argument('<start>', 'Start concept, e.g. /c/en/dog')
    .argument('<end>', 'End concept, e.g. /c/en/cat');

  return addSearchOptions(command).action(
    async (start: string, end: string, options: RawSearchOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await createConceptPathEngine(globals.cwd, {
          ...toEngineOverrides(options),
          logLevel: logLevelOverride(globals),
        });

        const progress = createProgressListener(globals);
        if (progress) engine.search.on(progress);

        const result = await withInterruption((signal) => engine.findPath(start, end, { signal }));

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          process.stderr.write('\n' + formatFindPathResult(result).map((l) => `  ${l}`).join('\n') + '\n\n');
        }

        if (result.status === 'interrupted') {
          process.exitCode = INTERRUPTED_EXIT_CODE;
        }
        closeLogger();
      } catch (error) {
        handleCommandError(error, globals);
      }
    },
  );
}
