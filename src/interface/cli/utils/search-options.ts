/**
 * Search-tuning options shared by `find` and `batch`
 */

import type { Command } from 'commander';
import { ConfigError } from '../../../shared/errors.js';
import type { EngineOverrides } from '../../../core/engine.js';

export interface RawSearchOptions {
  rate?: string;
  timeout?: string;
  maxDepth?: string;
  cache?: string;
  baseUrl?: string;
}

export function addSearchOptions(command: Command): Command {
  return command
    .option('--rate <n>', 'Maximum requests per second to the remote service')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds')
    .option('--max-depth <n>', 'Longest half-path explored from either end')
    .option('--cache <file>', 'Adjacency cache file')
    .option('--base-url <url>', 'Remote service base URL');
}

function parsePositive(value: string, flag: string, integer: boolean): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0 || (integer && !Number.isInteger(n))) {
    throw new ConfigError(`${flag} must be a positive ${integer ? 'integer' : 'number'}, got "${value}"`);
  }
  return n;
}

export function toEngineOverrides(options: RawSearchOptions): EngineOverrides {
  const overrides: EngineOverrides = {};
  if (options.rate !== undefined) {
    overrides.ratePerSecond = parsePositive(options.rate, '--rate', false);
  }
  if (options.timeout !== undefined) {
    overrides.timeoutMs = parsePositive(options.timeout, '--timeout', true);
  }
  if (options.maxDepth !== undefined) {
    const n = Number(options.maxDepth);
    if (!Number.isInteger(n) || n < 0) {
      throw new ConfigError(`--max-depth must be a non-negative integer, got "${options.maxDepth}"`);
    }
    overrides.maxDepth = n;
  }
  if (options.cache !== undefined) {
    overrides.cacheFile = options.cache;
  }
  if (options.baseUrl !== undefined) {
    overrides.baseUrl = options.baseUrl;
  }
  return overrides;
}
