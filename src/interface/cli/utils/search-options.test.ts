import { describe, it, expect } from 'vitest';
import { Command } from 'commander';
import { addSearchOptions, toEngineOverrides, type RawSearchOptions } from './search-options.js';
import { ConfigError } from '../../../shared/errors.js';

describe('toEngineOverrides', () => {
  it('returns no overrides when no flag is given', () => {
    expect(toEngineOverrides({})).toEqual({});
  });

  it('converts every flag', () => {
    expect(
      toEngineOverrides({
        rate: '2.5',
        timeout: '500',
        maxDepth: '0',
        cache: 'edges.json',
        baseUrl: 'http://graph.test',
      }),
    ).toEqual({
      ratePerSecond: 2.5,
      timeoutMs: 500,
      maxDepth: 0,
      cacheFile: 'edges.json',
      baseUrl: 'http://graph.test',
    });
  });

  it('rejects invalid numbers with the flag name', () => {
    expect(() => toEngineOverrides({ rate: '0' })).toThrow(
      '--rate must be a positive number, got "0"',
    );
    expect(() => toEngineOverrides({ timeout: '1.5' })).toThrow(
      '--timeout must be a positive integer, got "1.5"',
    );
    expect(() => toEngineOverrides({ maxDepth: '-1' })).toThrow(
      '--max-depth must be a non-negative integer, got "-1"',
    );
    expect(() => toEngineOverrides({ rate: 'fast' })).toThrow(ConfigError);
  });
});

describe('addSearchOptions', () => {
  it('parses the search flags into raw options', () => {
    const command = addSearchOptions(new Command('find').exitOverride());

    command.parse(['--rate', '3', '--max-depth', '4', '--cache', 'c.json'], { from: 'user' });

    expect(command.opts<RawSearchOptions>()).toEqual({ rate: '3', maxDepth: '4', cache: 'c.json' });
  });
});
