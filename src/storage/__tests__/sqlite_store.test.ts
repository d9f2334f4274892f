import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { AnchorValidationError, StorageError, ValidationError } from '../../core/errors.js';
import { SqliteWorldModelStore, createSqliteWorldModelStore } from '../sqlite_store.js';
import type { EvidenceSpan, FrameworkEntity, MechanismNode } from '../../world_model/types.js';
import type { MechanismEdgeInput } from '../types.js';

const entities: FrameworkEntity[] = [
  { kind: 'pillar', id: 'P1', label: 'Patience', parentId: null },
  { kind: 'core_value', id: 'CV1', label: 'Gratitude', parentId: 'P1' },
];

const nodes: MechanismNode[] = [
  { id: 'n1', refKind: 'pillar', refId: 'P1', label: 'Patience', sourceId: null },
  { id: 'n2', refKind: 'core_value', refId: 'CV1', label: 'Gratitude', sourceId: 'chunk-7' },
  { id: 'n3', refKind: 'mechanism', refId: 'M1', label: 'Trust', sourceId: null },
];

const edges: MechanismEdgeInput[] = [
  { id: 'e1', fromNode: 'n1', toNode: 'n2', relationType: 'ENABLES', confidence: 0.4 },
  { id: 'e2', fromNode: 'n2', toNode: 'n1', relationType: 'INHIBITS', confidence: 0.6 },
  { id: 'e3', fromNode: 'n2', toNode: 'n3', relationType: 'REINFORCES' },
];

const spans: EvidenceSpan[] = [
  { edgeId: 'e1', chunkId: 'c2', spanStart: 5, spanEnd: 20, quote: 'Gratitude follows patience' },
  { edgeId: 'e1', chunkId: 'c1', spanStart: 0, spanEnd: 10, quote: 'Patience opens gratitude' },
  { edgeId: 'e2', chunkId: 'c1', spanStart: 30, spanEnd: 45, quote: 'Gratitude restrains haste' },
];

async function seed(store: SqliteWorldModelStore): Promise<void> {
  await store.upsertFrameworkEntities(entities);
  await store.upsertNodes(nodes);
  await store.upsertEdges(edges);
  await store.insertSpans(spans);
}

describe('SqliteWorldModelStore', () => {
  let store: SqliteWorldModelStore;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    store = createSqliteWorldModelStore(':memory:');
    await store.initialize();
    await seed(store);
  });

  afterEach(async () => {
    await store.close();
    vi.restoreAllMocks();
  });

  describe('framework anchors', () => {
    it('lists entities by kind', async () => {
      expect(await store.listFrameworkEntities('pillar')).toEqual([entities[0]]);
      expect((await store.listFrameworkEntities()).map((entity) => entity.id)).toEqual(['CV1', 'P1']);
    });

    it('rejects framework nodes without an entity', async () => {
      await expect(store.upsertNodes([{ id: 'n9', refKind: 'pillar', refId: 'P9', label: 'Unknown' }]))
        .rejects.toBeInstanceOf(AnchorValidationError);
      expect((await store.loadNodes()).map((node) => node.id)).toEqual(['n1', 'n2', 'n3']);
    });

    it('rejects empty labels', async () => {
      await expect(store.upsertNodes([{ id: 'n9', refKind: 'mechanism', refId: 'M9', label: '  ' }]))
        .rejects.toBeInstanceOf(AnchorValidationError);
    });

    it('accepts mechanism and outcome nodes without an entity', async () => {
      await store.upsertNodes([{ id: 'n4', refKind: 'outcome', refId: 'O1', label: 'Calm' }]);
      expect(await store.loadNodesByIds(['n4'])).toEqual([
        { id: 'n4', refKind: 'outcome', refId: 'O1', label: 'Calm', sourceId: null },
      ]);
    });
  });

  describe('edges and spans', () => {
    it('loads topology with evidence aggregates and no span bodies', async () => {
      const loaded = await store.loadEdges();
      expect(loaded).toEqual([
        {
          id: 'e1',
          fromNode: 'n1',
          toNode: 'n2',
          relationType: 'ENABLES',
          polarity: 1,
          confidence: 0.4,
          spanCount: 2,
          chunkDiversity: 2,
          spans: [],
          polarityOverridden: false,
        },
        {
          id: 'e2',
          fromNode: 'n2',
          toNode: 'n1',
          relationType: 'INHIBITS',
          polarity: -1,
          confidence: 0.6,
          spanCount: 1,
          chunkDiversity: 1,
          spans: [],
          polarityOverridden: false,
        },
        {
          id: 'e3',
          fromNode: 'n2',
          toNode: 'n3',
          relationType: 'REINFORCES',
          polarity: 1,
          confidence: 0.5,
          spanCount: 0,
          chunkDiversity: 0,
          spans: [],
          polarityOverridden: false,
        },
      ]);
    });

    it('loads span bodies for selected edges, ordered by position', async () => {
      const loaded = await store.loadSpans(new Set(['e1', 'e3']));
      expect([...loaded.keys()]).toEqual(['e1']);
      expect(loaded.get('e1')?.map((span) => span.quote)).toEqual([
        'Patience opens gratitude',
        'Gratitude follows patience',
      ]);

      const [withSpans] = await store.loadEdgesByIds(['e1'], { includeSpans: true });
      expect(withSpans.spans).toHaveLength(2);
    });

    it('ignores duplicate spans', async () => {
      expect(await store.insertSpans([spans[0]])).toEqual({ written: 0, skipped: 1 });
    });

    it('rejects a polarity that departs from the relation default unless overridden', async () => {
      await expect(store.upsertEdges([{ id: 'e4', fromNode: 'n3', toNode: 'n1', relationType: 'ENABLES', polarity: -1 }]))
        .rejects.toBeInstanceOf(ValidationError);

      await store.upsertEdges([
        { id: 'e4', fromNode: 'n3', toNode: 'n1', relationType: 'ENABLES', polarity: -1, polarityOverridden: true },
      ]);
      const [edge] = await store.loadEdgesByIds(['e4']);
      expect(edge.polarity).toBe(-1);
      expect(edge.polarityOverridden).toBe(true);
    });

    it('rejects edges to unknown nodes and malformed spans', async () => {
      await expect(store.upsertEdges([{ id: 'e5', fromNode: 'n1', toNode: 'n9', relationType: 'ENABLES' }]))
        .rejects.toBeInstanceOf(ValidationError);
      await expect(store.insertSpans([{ edgeId: 'e3', chunkId: 'c1', spanStart: 10, spanEnd: 5, quote: 'backwards' }]))
        .rejects.toBeInstanceOf(ValidationError);
      await expect(store.insertSpans([{ edgeId: 'e3', chunkId: 'c1', spanStart: 0, spanEnd: 5, quote: ' ' }]))
        .rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('persisted loops', () => {
    it('stores each loop id once', async () => {
      const loop = { loopId: 'loop-1', loopType: 'balancing' as const, edgeIds: ['e1', 'e2'] };
      expect(await store.persistLoops([loop])).toEqual({ written: 1, skipped: 0 });
      expect(await store.persistLoops([loop])).toEqual({ written: 0, skipped: 1 });
      expect(await store.loadPersistedLoops(10)).toEqual([loop]);
      expect(await store.loadPersistedLoops(0)).toEqual([]);
    });

    it('returns the shortest loops first, then by loop id', async () => {
      await store.persistLoops([
        { loopId: 'a-long', loopType: 'reinforcing', edgeIds: ['e1', 'e3', 'e2'] },
        { loopId: 'z-short', loopType: 'balancing', edgeIds: ['e1', 'e2'] },
        { loopId: 'm-short', loopType: 'balancing', edgeIds: ['e2', 'e1'] },
      ]);
      expect((await store.loadPersistedLoops()).map((loop) => loop.loopId)).toEqual(['m-short', 'z-short', 'a-long']);
      expect((await store.loadPersistedLoops(1)).map((loop) => loop.loopId)).toEqual(['m-short']);
    });
  });

  it('counts graph statistics', async () => {
    expect(await store.countGraphStats()).toEqual({
      totalNodes: 3,
      totalEdges: 3,
      edgesByPillar: { P1: 2 },
      edgesByRelation: { ENABLES: 1, INHIBITS: 1, REINFORCES: 1 },
      edgesWithSpans: 2,
      avgConfidence: 0.5,
      loopsCount: 0,
    });
  });

  it('refuses reads before initialize', async () => {
    const fresh = new SqliteWorldModelStore(':memory:');
    expect(fresh.isInitialized()).toBe(false);
    await expect(fresh.loadNodes()).rejects.toBeInstanceOf(StorageError);
  });
});

describe('SqliteWorldModelStore on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'world-model-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('keeps the graph across reopen', async () => {
    const dbPath = join(dir, 'nested', 'world-model.sqlite');
    const first = createSqliteWorldModelStore(dbPath);
    await first.initialize();
    await seed(first);
    await first.close();

    const second = createSqliteWorldModelStore(dbPath);
    await second.initialize();
    try {
      expect((await second.loadEdges()).map((edge) => edge.id)).toEqual(['e1', 'e2', 'e3']);
      expect(second.isInitialized()).toBe(true);
    } finally {
      await second.close();
    }
  });
});
