/**
 * 3-layer error display: Error / Cause / Hint
 */

import { formatDim, formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { ConceptPathError } from '../../../shared/errors.js';

export interface ErrorDisplay {
  message: string;
  code?: string;
  cause?: string;
  hint?: string;
  stack?: string;
}

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof ConceptPathError) {
    return {
      message: error.message,
      code: error.code,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return 'Check .concept-path/config.json and the command-line flags.';
    case 'PAIRS_FILE_ERROR':
      return 'The pairs file must be a JSON array of { "start", "end", "enabled"? } objects.';
    case 'STORAGE_WRITE_ERROR':
      return 'Check that the cache file location is writable, or pass --cache <file>.';
    case 'TRANSPORT_ERROR':
      return 'Check network access to the remote service, or pass --base-url <url>.';
    default:
      return undefined;
  }
}

export function renderError(error: ErrorDisplay, globals: GlobalOptions): void {
  if (globals.json) {
    printJsonError({
      message: error.message,
      code: error.code,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(formatDim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export function exitWithError(error: ErrorDisplay, globals: GlobalOptions): never {
  renderError(error, globals);
  process.exit(1);
}

export function handleCommandError(error: unknown, globals: GlobalOptions): never {
  exitWithError(toErrorDisplay(error), globals);
}
