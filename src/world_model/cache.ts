/**
 * @fileoverview TTL cache for loops, graph stats and query results
 *
 * Three slots with independent lifetimes. Reads are synchronous and evict
 * lazily: an expired entry is dropped when it is next read, and every query
 * write sweeps expired query entries. Writes and
 * invalidations are serialized through one promise chain per instance so a
 * late writer cannot interleave with an invalidation.
 *
 * One cache is built at startup and passed to every call that needs it.
 */

import { DEFAULT_WORLD_MODEL_CONFIG } from '../config/world_model_config.js';
import type { CacheConfig } from '../config/world_model_config.js';
import { Ok } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import type { GraphLoader, GraphResult } from './graph_loader.js';
import { loadPersistedLoops } from './loop_detector.js';
import type {
  DetectedLoop,
  InterventionPlan,
  MechanismGraphStats,
  SimulationResult,
  WhatIfResult,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

interface CacheEntry<T> {
  value: T;
  createdAt: number;
  ttlMs: number;
}

export type CachedQuery =
  | { kind: 'intervention_plan'; plan: InterventionPlan }
  | { kind: 'simulation'; result: SimulationResult }
  | { kind: 'what_if'; result: WhatIfResult };

export interface WorldModelCacheOptions extends Partial<CacheConfig> {
  /** Clock in epoch milliseconds. Defaults to Date.now. */
  now?: () => number;
}

// ============================================================================
// CACHE
// ============================================================================

export class WorldModelCache {
  private loops: CacheEntry<DetectedLoop[]> | null = null;
  private stats: CacheEntry<MechanismGraphStats> | null = null;
  private readonly queries = new Map<string, CacheEntry<CachedQuery>>();
  private writeChain: Promise<void> = Promise.resolve();
  private versionCounter = 0;
  private readonly config: CacheConfig;
  private readonly now: () => number;

  constructor(options: WorldModelCacheOptions = {}) {
    const { now, ...ttls } = options;
    this.config = { ...DEFAULT_WORLD_MODEL_CONFIG.cache, ...ttls };
    this.now = now ?? (() => Date.now());
  }

  /** Bumped by every invalidation. For observability only. */
  get version(): number {
    return this.versionCounter;
  }

  /** Query entries held, expired ones included until swept. */
  get querySize(): number {
    return this.queries.size;
  }

  getLoops(): DetectedLoop[] | undefined {
    if (this.loops && this.isExpired(this.loops)) this.loops = null;
    return this.loops?.value;
  }

  getStats(): MechanismGraphStats | undefined {
    if (this.stats && this.isExpired(this.stats)) this.stats = null;
    return this.stats?.value;
  }

  getQuery(key: string): CachedQuery | undefined {
    const entry = this.queries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.queries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  setLoops(loops: DetectedLoop[]): Promise<void> {
    return this.withWriteLock(() => {
      this.loops = this.entry(loops, this.config.loopsTtlMs);
    });
  }

  setStats(stats: MechanismGraphStats): Promise<void> {
    return this.withWriteLock(() => {
      this.stats = this.entry(stats, this.config.statsTtlMs);
    });
  }

  setQuery(key: string, value: CachedQuery): Promise<void> {
    return this.withWriteLock(() => {
      for (const [existing, entry] of this.queries) {
        if (this.isExpired(entry)) this.queries.delete(existing);
      }
      this.queries.set(key, this.entry(value, this.config.queryTtlMs));
    });
  }

  invalidateLoops(): Promise<void> {
    return this.withWriteLock(() => {
      this.loops = null;
      this.versionCounter++;
    });
  }

  invalidateStats(): Promise<void> {
    return this.withWriteLock(() => {
      this.stats = null;
      this.versionCounter++;
    });
  }

  invalidateQueries(): Promise<void> {
    return this.withWriteLock(() => {
      this.queries.clear();
      this.versionCounter++;
    });
  }

  invalidateAll(): Promise<void> {
    return this.withWriteLock(() => {
      this.loops = null;
      this.stats = null;
      this.queries.clear();
      this.versionCounter++;
    });
  }

  private entry<T>(value: T, ttlMs: number): CacheEntry<T> {
    return { value, createdAt: this.now(), ttlMs };
  }

  private isExpired(entry: CacheEntry<unknown>): boolean {
    return this.now() - entry.createdAt >= entry.ttlMs;
  }

  private async withWriteLock(work: () => void): Promise<void> {
    const previous = this.writeChain;
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    this.writeChain = previous.then(() => gate);

    await previous;
    try {
      work();
    } finally {
      release();
    }
  }
}

// ============================================================================
// READ-THROUGH HELPERS
// ============================================================================

/**
 * Cached loops, loading persisted loops on a miss. Loops are never mined
 * here. A failed load is returned as-is and not cached.
 */
export async function getCachedLoops(
  cache: WorldModelCache,
  loader: GraphLoader,
  maxLoops: number = DEFAULT_WORLD_MODEL_CONFIG.loops.maxLoops,
): Promise<GraphResult<DetectedLoop[]>> {
  const cached = cache.getLoops();
  if (cached) return Ok(cached);

  const loaded = await loadPersistedLoops(loader, maxLoops);
  if (!loaded.ok) return loaded;
  await cache.setLoops(loaded.value);
  logDebug('Loop cache refilled', { loops: loaded.value.length, queries: cache.querySize, version: cache.version });
  return loaded;
}

export async function getCachedStats(
  cache: WorldModelCache,
  loader: GraphLoader,
): Promise<GraphResult<MechanismGraphStats>> {
  const cached = cache.getStats();
  if (cached) return Ok(cached);

  const loaded = await loader.loadStats();
  if (!loaded.ok) return loaded;
  await cache.setStats(loaded.value);
  return loaded;
}

/** Call after new mechanism edges are written. */
export function invalidateOnEdgeInsert(cache: WorldModelCache): Promise<void> {
  return cache.invalidateAll();
}
