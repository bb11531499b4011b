/**
 * concept-path status - Show the configuration in effect and cache statistics
 */

import { Command } from 'commander';
import { logLevelOverride, resolveGlobalOptions } from '../utils/global-options.js';
import { addSearchOptions, toEngineOverrides, type RawSearchOptions } from '../utils/search-options.js';
import { createConceptPathEngine } from '../../../core/engine.js';
import type { StatusOutput } from '../../../shared/types.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatDim } from '../output/formatter.js';

export function statusCommand(): Command {
  return addSearchOptions(
    new Command('status').description('Show configuration and adjacency cache statistics'),
  ).action(async (options: RawSearchOptions, cmd: Command) => {
    const globals = resolveGlobalOptions(cmd);

    try {
      const engine = await createConceptPathEngine(globals.cwd, {
        ...toEngineOverrides(options),
        logLevel: logLevelOverride(globals),
      });
      const status = await engine.getStatus();

      if (globals.json) {
        printJson(status);
      } else if (!globals.quiet) {
        renderStatus(status);
      }
    } catch (error) {
      handleCommandError(error, globals);
    }
  });
}

function renderStatus(status: StatusOutput): void {
  const pageSize = status.remote.page_size === null ? 'service default' : String(status.remote.page_size);
  const lines = [
    '',
    `  ${formatBold('Configuration')} ${formatDim(status.config_file ?? '(defaults)')}`,
    `    Remote:      ${status.remote.base_url}`,
    `    Rate:        ${status.remote.rate_per_second} req/s`,
    `    Timeout:     ${status.remote.timeout_ms}ms`,
    `    Page size:   ${pageSize} (max ${status.remote.max_pages} pages)`,
    `    Max depth:   ${status.search.max_depth}`,
    '',
    `  ${formatBold('Adjacency cache')} ${formatDim(status.cache.file)}`,
    status.cache.file_exists
      ? `    Nodes:       ${status.cache.node_count}`
      : `    ${formatDim('No cache file yet')}`,
  ];
  if (status.cache.file_exists) {
    lines.push(`    Edges:       ${status.cache.edge_count}`);
  }
  lines.push('');
  process.stderr.write(lines.join('\n') + '\n');
}
