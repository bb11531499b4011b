/**
 * Single-line search progress for the CLI (stderr output)
 */

import type { SearchEventData, SearchEventType, SearchListener } from '../../../core/graph/bidirectional-search.js';
import type { GlobalOptions } from '../utils/global-options.js';

export function formatProgressLine(data: SearchEventData): string {
  const side = (data.side ?? '').padEnd(8);
  const depth = data.depth !== undefined ? `depth ${data.depth}` : '';
  return `  ${'expanding'.padEnd(10)} ${side} ${depth.padEnd(8)} ${data.nodesProcessed} nodes  ${data.node ?? ''}`;
}

/**
 * Listener that redraws one progress line per expanded node.
 * Returns null when progress output is disabled.
 */
export function createProgressListener(globals: GlobalOptions): SearchListener | null {
  if (globals.quiet || globals.json || !globals.verbose) return null;

  let drawn = false;
  return (event: SearchEventType, data: SearchEventData) => {
    if (event === 'node:expanded') {
      process.stderr.write(`\r\x1b[2K${formatProgressLine(data)}`);
      drawn = true;
    } else if (event.startsWith('search:') && drawn) {
      process.stderr.write('\n');
      drawn = false;
    }
  };
}
