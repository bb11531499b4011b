/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { ConceptPathConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, toError } from '../shared/errors.js';

const CONFIG_DIR = '.concept-path';
const CONFIG_FILE = 'config.json';

const configFileSchema = z
  .object({
    remote: z
      .object({
        base_url: z.string().url(),
        rate_per_second: z.number().positive(),
        timeout_ms: z.number().int().positive(),
        page_size: z.number().int().positive().nullable(),
        max_pages: z.number().int().positive(),
      })
      .partial(),
    search: z
      .object({
        max_depth: z.number().int().nonnegative(),
      })
      .partial(),
    cache: z
      .object({
        file: z.string().min(1),
      })
      .partial(),
    log: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']),
        file: z.string().min(1).nullable(),
      })
      .partial(),
  })
  .partial()
  .strict();

export type PartialConfig = z.infer<typeof configFileSchema>;

/**
 * Formats a zod issue path as "remote.rate_per_second" or "(root)".
 */
export function formatIssuePath(issuePath: readonly (string | number)[]): string {
  if (issuePath.length === 0) return '(root)';
  return issuePath
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('');
}

export function resolveConfigDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

export function resolveConfigPath(cwd: string): string {
  return path.join(resolveConfigDir(cwd), CONFIG_FILE);
}

/**
 * Resolve the adjacency cache file. Absolute paths are kept as-is.
 */
export function resolveCachePath(cwd: string, config: ConceptPathConfig): string {
  return path.resolve(resolveConfigDir(cwd), config.cache.file);
}

export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Validate raw config content and merge it over the defaults.
 */
export function parseConfig(raw: unknown): ConceptPathConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${formatIssuePath(issue.path)}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }
  return mergeWithDefaults(result.data);
}

/**
 * Load config from disk, merging with defaults. A missing file yields the defaults.
 */
export function loadConfig(cwd: string): ConceptPathConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    return mergeWithDefaults({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${toError(err).message}`,
      toError(err),
    );
  }
  return parseConfig(raw);
}

/**
 * Merge a partial config with defaults.
 */
export function mergeWithDefaults(partial: PartialConfig): ConceptPathConfig {
  return {
    remote: {
      base_url: partial.remote?.base_url ?? DEFAULT_CONFIG.remote.base_url,
      rate_per_second: partial.remote?.rate_per_second ?? DEFAULT_CONFIG.remote.rate_per_second,
      timeout_ms: partial.remote?.timeout_ms ?? DEFAULT_CONFIG.remote.timeout_ms,
      page_size:
        partial.remote?.page_size !== undefined
          ? partial.remote.page_size
          : DEFAULT_CONFIG.remote.page_size,
      max_pages: partial.remote?.max_pages ?? DEFAULT_CONFIG.remote.max_pages,
    },
    search: {
      max_depth: partial.search?.max_depth ?? DEFAULT_CONFIG.search.max_depth,
    },
    cache: {
      file: partial.cache?.file ?? DEFAULT_CONFIG.cache.file,
    },
    log: {
      level: partial.log?.level ?? DEFAULT_CONFIG.log.level,
      file: partial.log?.file !== undefined ? partial.log.file : DEFAULT_CONFIG.log.file,
    },
  };
}
