import { describe, it, expect, beforeAll } from 'vitest';
import {
  formatElapsed,
  formatFindPathResult,
  formatStep,
  setColorEnabled,
} from './formatter.js';
import type { FindPathOutput } from '../../../shared/types.js';

function makeOutput(overrides: Partial<FindPathOutput> = {}): FindPathOutput {
  return {
    start: '/c/en/dog',
    end: '/c/en/animal',
    status: 'found',
    nodes: ['/c/en/dog', '/c/en/animal'],
    steps: [{ from: '/c/en/dog', relation: 'IsA', direction: 'outgoing', to: '/c/en/animal' }],
    nodes_processed: 1,
    network_requests: 1,
    elapsed_ms: 12,
    cache_saved: true,
    ...overrides,
  };
}

describe('formatter', () => {
  beforeAll(() => {
    setColorEnabled(false);
  });

  describe('formatStep', () => {
    it('draws outgoing and incoming arrows', () => {
      expect(formatStep({ from: 'a', relation: 'IsA', direction: 'outgoing', to: 'b' })).toBe(
        'a --[IsA]--> b',
      );
      expect(formatStep({ from: 'a', relation: 'PartOf', direction: 'incoming', to: 'b' })).toBe(
        'a <--[PartOf]-- b',
      );
    });
  });

  describe('formatElapsed', () => {
    it('uses milliseconds below one second and seconds above', () => {
      expect(formatElapsed(0)).toBe('0ms');
      expect(formatElapsed(999)).toBe('999ms');
      expect(formatElapsed(1500)).toBe('1.5s');
    });
  });

  describe('formatFindPathResult', () => {
    it('lists numbered steps for a found path', () => {
      expect(formatFindPathResult(makeOutput())).toEqual([
        'OK Path found: /c/en/dog -> /c/en/animal (1 steps)',
        '    1. /c/en/dog --[IsA]--> /c/en/animal',
        '    1 nodes processed, 1 requests, 12ms',
      ]);
    });

    it('notes a zero-step path', () => {
      const lines = formatFindPathResult(
        makeOutput({ end: '/c/en/dog', nodes: ['/c/en/dog'], steps: [], nodes_processed: 0, network_requests: 0 }),
      );

      expect(lines).toEqual([
        'OK Path found: /c/en/dog -> /c/en/dog (0 steps)',
        '    start and end are the same node',
        '    0 nodes processed, 0 requests, 12ms',
      ]);
    });

    it('warns for no path and for an unsaved cache', () => {
      const lines = formatFindPathResult(
        makeOutput({
          status: 'not_found',
          nodes: [],
          steps: [],
          nodes_processed: 4,
          network_requests: 3,
          elapsed_ms: 1500,
          cache_saved: false,
        }),
      );

      expect(lines).toEqual([
        'WARN No path found: /c/en/dog -> /c/en/animal',
        '    4 nodes processed, 3 requests, 1.5s',
        '    WARN adjacency cache could not be saved',
      ]);
    });

    it('reports an interrupted search', () => {
      const lines = formatFindPathResult(makeOutput({ status: 'interrupted', nodes: [], steps: [] }));

      expect(lines[0]).toBe('WARN Search interrupted: /c/en/dog -> /c/en/animal');
    });
  });
});
