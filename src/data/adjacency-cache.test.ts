import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { AdjacencyCache, deserializeCache, serializeCache } from './adjacency-cache.js';
import { TransportError, ProtocolError } from '../shared/errors.js';
import type { Edge, NodeId } from '../shared/types.js';
import { createMockLogger } from '../shared/__test-helpers.js';

const DOG_EDGES: Edge[] = [
  { relation: 'IsA', neighbor: '/c/en/animal', direction: 'outgoing' },
  { relation: 'CapableOf', neighbor: '/c/en/bark', direction: 'outgoing' },
  { relation: 'IsA', neighbor: '/c/en/puppy', direction: 'incoming' },
];

describe('AdjacencyCache', () => {
  let tmpDir: string;
  let cacheFile: string;
  let source: { fetch: Mock<(node: NodeId) => Promise<Edge[]>> };
  let logger: ReturnType<typeof createMockLogger>;
  let cache: AdjacencyCache;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'concept-path-cache-'));
    cacheFile = path.join(tmpDir, 'adjacency-cache.json');
    source = { fetch: vi.fn<(node: NodeId) => Promise<Edge[]>>() };
    logger = createMockLogger();
    cache = new AdjacencyCache(cacheFile, source, logger);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('starts empty when the file does not exist', async () => {
      await cache.load();

      expect(cache.size).toBe(0);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('reads a previously saved mapping', async () => {
      fs.writeFileSync(
        cacheFile,
        JSON.stringify({ '/c/en/dog': [['IsA', '/c/en/animal', 'outgoing']] }),
      );

      await cache.load();
      const edges = await cache.getOrFetch('/c/en/dog');

      expect(edges).toEqual([{ relation: 'IsA', neighbor: '/c/en/animal', direction: 'outgoing' }]);
      expect(source.fetch).not.toHaveBeenCalled();
    });

    it('starts empty and logs when the file is not JSON', async () => {
      fs.writeFileSync(cacheFile, '{"/c/en/dog": [[');

      await cache.load();

      expect(cache.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn.mock.calls[0]?.[0]).toBe(
        `Cache file is unreadable: ${cacheFile}; starting with an empty cache`,
      );
    });

    it('starts empty when a record has an unknown direction marker', async () => {
      fs.writeFileSync(
        cacheFile,
        JSON.stringify({ '/c/en/dog': [['IsA', '/c/en/animal', 'sideways']] }),
      );

      await cache.load();

      expect(cache.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('starts empty when the top level is not an object', async () => {
      fs.writeFileSync(cacheFile, JSON.stringify([['IsA', '/c/en/animal', 'outgoing']]));

      await cache.load();

      expect(cache.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('getOrFetch', () => {
    it('fetches on a miss and serves the second call from memory', async () => {
      source.fetch.mockResolvedValue(DOG_EDGES);

      const first = await cache.getOrFetch('/c/en/dog');
      const second = await cache.getOrFetch('/c/en/dog');

      expect(first).toEqual(DOG_EDGES);
      expect(second).toEqual(DOG_EDGES);
      expect(source.fetch).toHaveBeenCalledTimes(1);
      expect(cache.has('/c/en/dog')).toBe(true);
    });

    it('caches a successful empty result', async () => {
      source.fetch.mockResolvedValue([]);

      await cache.getOrFetch('/c/en/orphan');
      await cache.getOrFetch('/c/en/orphan');

      expect(cache.has('/c/en/orphan')).toBe(true);
      expect(source.fetch).toHaveBeenCalledTimes(1);
    });

    it('returns no edges and caches nothing when the fetch fails', async () => {
      source.fetch.mockRejectedValueOnce(new TransportError('timed out'));

      const edges = await cache.getOrFetch('/c/en/dog');

      expect(edges).toEqual([]);
      expect(cache.has('/c/en/dog')).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('fetch failed, node left uncached', {
        node: '/c/en/dog',
        error: 'TransportError',
        message: 'timed out',
      });
    });

    it('retries the network after a failed fetch', async () => {
      source.fetch
        .mockRejectedValueOnce(new ProtocolError('bad body'))
        .mockResolvedValueOnce(DOG_EDGES);

      await cache.getOrFetch('/c/en/dog');
      const edges = await cache.getOrFetch('/c/en/dog');

      expect(edges).toEqual(DOG_EDGES);
      expect(source.fetch).toHaveBeenCalledTimes(2);
      expect(cache.has('/c/en/dog')).toBe(true);
    });
  });

  describe('save', () => {
    it('round-trips the mapping through the file', async () => {
      const original = { '/c/en/dog': [['IsA', '/c/en/animal', 'outgoing']] };
      fs.writeFileSync(cacheFile, JSON.stringify(original));

      await cache.load();
      const saved = await cache.save();

      expect(saved).toBe(true);
      expect(JSON.parse(fs.readFileSync(cacheFile, 'utf-8'))).toEqual(original);
    });

    it('keeps a "__proto__" node id through save and load', async () => {
      source.fetch.mockResolvedValue([{ relation: 'RelatedTo', neighbor: '/c/en/object', direction: 'outgoing' }]);

      await cache.getOrFetch('__proto__');
      await cache.save();

      expect(fs.readFileSync(cacheFile, 'utf-8')).toBe(
        '{"__proto__":[["RelatedTo","/c/en/object","outgoing"]]}',
      );
      const reloaded = new AdjacencyCache(cacheFile, source, logger);
      await reloaded.load();
      expect(reloaded.has('__proto__')).toBe(true);
      await expect(reloaded.getOrFetch('__proto__')).resolves.toEqual([
        { relation: 'RelatedTo', neighbor: '/c/en/object', direction: 'outgoing' },
      ]);
      expect(source.fetch).toHaveBeenCalledTimes(1);
    });

    it('persists fetched nodes but not failed ones', async () => {
      source.fetch.mockImplementation(async (node) => {
        if (node === '/c/en/broken') throw new TransportError('unreachable');
        return DOG_EDGES;
      });

      await cache.getOrFetch('/c/en/dog');
      await cache.getOrFetch('/c/en/broken');
      await cache.save();

      const reloaded = new AdjacencyCache(cacheFile, source, logger);
      await reloaded.load();
      expect(reloaded.has('/c/en/dog')).toBe(true);
      expect(reloaded.has('/c/en/broken')).toBe(false);
      await expect(reloaded.getOrFetch('/c/en/dog')).resolves.toEqual(DOG_EDGES);
    });

    it('creates the parent directory when missing', async () => {
      const nested = path.join(tmpDir, 'a', 'b', 'cache.json');
      const nestedCache = new AdjacencyCache(nested, source, logger);

      await expect(nestedCache.save()).resolves.toBe(true);
      expect(JSON.parse(fs.readFileSync(nested, 'utf-8'))).toEqual({});
    });

    it('logs and reports false when the file cannot be written', async () => {
      const blocker = path.join(tmpDir, 'blocker');
      fs.writeFileSync(blocker, 'not a directory');
      const blocked = new AdjacencyCache(path.join(blocker, 'cache.json'), source, logger);

      await expect(blocked.save()).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error.mock.calls[0]?.[0]).toBe(
        `Cache file could not be written: ${path.join(blocker, 'cache.json')}`,
      );
    });

    it('leaves no temporary files behind', async () => {
      source.fetch.mockResolvedValue(DOG_EDGES);
      await cache.getOrFetch('/c/en/dog');
      await cache.save();

      expect(fs.readdirSync(tmpDir)).toEqual(['adjacency-cache.json']);
    });
  });

  describe('clear and stats', () => {
    it('reports node and edge counts', async () => {
      source.fetch.mockResolvedValue(DOG_EDGES);
      await cache.getOrFetch('/c/en/dog');

      await expect(cache.stats()).resolves.toEqual({
        file: cacheFile,
        file_exists: false,
        node_count: 1,
        edge_count: 3,
      });
    });

    it('deletes the file and empties memory', async () => {
      source.fetch.mockResolvedValue(DOG_EDGES);
      await cache.getOrFetch('/c/en/dog');
      await cache.save();

      await cache.clear();

      expect(cache.size).toBe(0);
      expect(fs.existsSync(cacheFile)).toBe(false);
    });

    it('clears without error when there is no file', async () => {
      await expect(cache.clear()).resolves.toBeUndefined();
    });
  });
});

describe('serializeCache / deserializeCache', () => {
  it('maps edges to [relation, neighbor, direction] records and back', () => {
    const entries = new Map<NodeId, Edge[]>([['/c/en/dog', DOG_EDGES]]);

    const serialized = serializeCache(entries);

    expect(serialized).toEqual({
      '/c/en/dog': [
        ['IsA', '/c/en/animal', 'outgoing'],
        ['CapableOf', '/c/en/bark', 'outgoing'],
        ['IsA', '/c/en/puppy', 'incoming'],
      ],
    });
    expect(deserializeCache(serialized)).toEqual(entries);
  });

  it('writes a "__proto__" node as an own key', () => {
    const entries = new Map<NodeId, Edge[]>([['__proto__', DOG_EDGES.slice(0, 1)]]);

    const serialized = serializeCache(entries);

    expect(Object.keys(serialized)).toEqual(['__proto__']);
    expect(JSON.stringify(serialized)).toBe('{"__proto__":[["IsA","/c/en/animal","outgoing"]]}');
    expect([...deserializeCache(JSON.parse(JSON.stringify(serialized))).keys()]).toEqual(['__proto__']);
  });

  it('rejects content that is not an object of edge lists', () => {
    expect(() => deserializeCache([])).toThrow(TypeError);
    expect(() => deserializeCache({ '/c/en/dog': [['IsA', '/c/en/animal']] })).toThrow();
  });
});
