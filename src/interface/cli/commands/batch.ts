/**
 * concept-path batch <pairs-file> - Run every enabled pair of a pairs file
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { logLevelOverride, resolveGlobalOptions } from '../utils/global-options.js';
import { addSearchOptions, toEngineOverrides, type RawSearchOptions } from '../utils/search-options.js';
import { INTERRUPTED_EXIT_CODE, withInterruption } from '../utils/interruption.js';
import { loadPairsFile } from '../utils/pairs-file.js';
import { createConceptPathEngine, type ConceptPathEngine } from '../../../core/engine.js';
import { closeLogger } from '../../../shared/logger.js';
import type { BatchOutput, PathPair } from '../../../shared/types.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatFindPathResult } from '../output/formatter.js';
import { createProgressListener } from '../output/progress.js';

/**
 * Search each enabled pair in order, stopping early once a search is interrupted.
 */
export async function runBatch(
  engine: Pick<ConceptPathEngine, 'findPath'>,
  pairs: readonly PathPair[],
  signal?: AbortSignal,
): Promise<BatchOutput> {
  const output: BatchOutput = { results: [], skipped: [] };

  for (const pair of pairs) {
    if (!pair.enabled) {
      output.skipped.push({ start: pair.start, end: pair.end });
      continue;
    }
    if (signal?.aborted) break;

    const result = await engine.findPath(pair.start, pair.end, { signal });
    output.results.push(result);
    if (result.status === 'interrupted') break;
  }

  return output;
}

export function batchCommand(): Command {
  const command = new Command('batch')
    .description('Find paths for every enabled { start, end } pair in a JSON file')
    .argument('<pairs-file>', 'JSON array of { "start", "end", "enabled"? }');

  return addSearchOptions(command).action(
    async (pairsFile: string, options: RawSearchOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const pairs = await loadPairsFile(resolve(globals.cwd, pairsFile));
        const engine = await createConceptPathEngine(globals.cwd, {
          ...toEngineOverrides(options),
          logLevel: logLevelOverride(globals),
        });

        const progress = createProgressListener(globals);
        if (progress) engine.search.on(progress);

        const output = await withInterruption((signal) => runBatch(engine, pairs, signal));

        if (globals.json) {
          printJson(output);
        } else if (!globals.quiet) {
          renderBatch(output);
        }

        if (output.results.some((r) => r.status === 'interrupted')) {
          process.exitCode = INTERRUPTED_EXIT_CODE;
        }
        closeLogger();
      } catch (error) {
        handleCommandError(error, globals);
      }
    },
  );
}

function renderBatch(output: BatchOutput): void {
  const found = output.results.filter((r) => r.status === 'found').length;
  process.stderr.write('\n');
  process.stderr.write(
    `  ${formatBold(`Batch: ${found}/${output.results.length} paths found, ${output.skipped.length} skipped`)}\n\n`,
  );
  for (const result of output.results) {
    for (const line of formatFindPathResult(result)) {
      process.stderr.write(`  ${line}\n`);
    }
    process.stderr.write('\n');
  }
}
