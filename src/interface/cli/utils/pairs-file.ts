/**
 * Pairs file for `batch`: a JSON array of { start, end, enabled? }
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { InvalidPairsFileError, toError } from '../../../shared/errors.js';
import { formatIssuePath } from '../../../config/config.js';
import type { PathPair } from '../../../shared/types.js';

const pairsFileSchema = z.array(
  z
    .object({
      start: z.string().min(1),
      end: z.string().min(1),
      enabled: z.boolean().default(true),
    })
    .strict(),
);

export function parsePairs(raw: unknown, filepath: string): PathPair[] {
  const result = pairsFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `at ${formatIssuePath(issue.path)} ` : '';
    throw new InvalidPairsFileError(`${where}${issue?.message ?? 'invalid content'}`, filepath);
  }
  return result.data;
}

export async function loadPairsFile(filepath: string): Promise<PathPair[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filepath, 'utf-8'));
  } catch (err) {
    throw new InvalidPairsFileError('cannot be read as JSON', filepath, toError(err));
  }
  return parsePairs(raw, filepath);
}
