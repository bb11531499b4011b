/**
 * CLI output formatter with picocolors
 */

import colors from 'picocolors';
import type { FindPathOutput, PathStep } from '../../../shared/types.js';

let pc = colors.createColors(colors.isColorSupported);

/** Switch ANSI colors on or off for every formatter below. */
export function setColorEnabled(enabled: boolean): void {
  pc = colors.createColors(enabled);
}

export function formatSuccess(message: string): string {
  return pc.green(`OK ${message}`);
}

export function formatWarning(message: string): string {
  return pc.yellow(`WARN ${message}`);
}

export function formatError(message: string): string {
  return pc.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return pc.cyan(`Hint: ${message}`);
}

export function formatDim(text: string): string {
  return pc.dim(text);
}

export function formatBold(text: string): string {
  return pc.bold(text);
}

/**
 * One hop as an arrow from `from` to `to`:
 *   "/c/en/dog --[IsA]--> /c/en/animal" or "/c/en/tail <--[PartOf]-- /c/en/dog"
 */
export function formatStep(step: PathStep): string {
  const label = pc.cyan(step.relation);
  const arrow = step.direction === 'outgoing' ? `--[${label}]-->` : `<--[${label}]--`;
  return `${step.from} ${arrow} ${step.to}`;
}

export function formatElapsed(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

export function formatSummary(result: FindPathOutput): string {
  return formatDim(
    `${result.nodes_processed} nodes processed, ${result.network_requests} requests, ${formatElapsed(result.elapsed_ms)}`,
  );
}

/**
 * Human-readable report of one search, one line per entry.
 */
export function formatFindPathResult(result: FindPathOutput): string[] {
  const lines: string[] = [];
  const query = `${result.start} -> ${result.end}`;

  if (result.status === 'found') {
    lines.push(formatSuccess(`Path found: ${query} (${result.steps.length} steps)`));
    if (result.steps.length === 0) {
      lines.push(`    ${formatDim('start and end are the same node')}`);
    }
    for (const [i, step] of result.steps.entries()) {
      lines.push(`    ${formatDim(`${i + 1}.`)} ${formatStep(step)}`);
    }
  } else if (result.status === 'not_found') {
    lines.push(formatWarning(`No path found: ${query}`));
  } else {
    lines.push(formatWarning(`Search interrupted: ${query}`));
  }

  lines.push(`    ${formatSummary(result)}`);
  if (!result.cache_saved) {
    lines.push(`    ${formatWarning('adjacency cache could not be saved')}`);
  }
  return lines;
}
