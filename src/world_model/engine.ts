/**
 * @fileoverview Public entry point of the reasoning core
 *
 * Every public method is fail-empty: a load failure, or any error thrown
 * underneath, is logged once as a warning and the method resolves to an empty
 * value of its return type. Nothing thrown below this class reaches callers.
 */

import { resolveWorldModelConfig } from '../config/world_model_config.js';
import type { WorldModelConfig, WorldModelConfigOverrides } from '../config/world_model_config.js';
import { Ok, safeAsync } from '../core/result.js';
import type { Result } from '../core/result.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import type { WorldModelStore } from '../storage/types.js';
import {
  WorldModelCache,
  getCachedLoops as readCachedLoops,
  getCachedStats as readCachedStats,
  invalidateOnEdgeInsert as invalidateCache,
} from './cache.js';
import { GraphLoader } from './graph_loader.js';
import { computeInterventionPlan as planIntervention } from './intervention_planner.js';
import type { InterventionRequest } from './intervention_planner.js';
import { detectLoops, persistDetectedLoops } from './loop_detector.js';
import { buildWorldModelPlan as selectPlan } from './plan_builder.js';
import type { WorldModelPlanInput } from './plan_builder.js';
import { retrieveRelevantLoops as rankLoops } from './relevance.js';
import {
  SIMULATION_LABEL,
  emptySimulation,
  simulateChange as simulateNodeChange,
  simulateWhatIf as simulatePillarChanges,
} from './simulator.js';
import { NOT_SPECIFIED, formatNodeRef } from './types.js';
import type {
  DetectedLoop,
  EntityRef,
  InterventionPlan,
  MechanismGraphStats,
  SimulationResult,
  WhatIfResult,
  WorldModelPlan,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface WorldModelEngineOptions {
  store: WorldModelStore;
  /** Applied on top of defaults and WORLD_MODEL_* variables. */
  config?: WorldModelConfigOverrides;
  cache?: WorldModelCache;
}

export interface MineLoopsOptions {
  maxLoops?: number;
  maxCycleLength?: number;
  /** Detect without persisting or invalidating. */
  dryRun?: boolean;
}

export interface MineLoopsReport {
  loops: DetectedLoop[];
  written: number;
  skipped: number;
  dryRun: boolean;
}

export interface SimulateOptions {
  maxSteps?: number;
}

export const EMPTY_GRAPH_STATS: MechanismGraphStats = Object.freeze({
  totalNodes: 0,
  totalEdges: 0,
  edgesByPillar: {},
  edgesByRelation: {},
  edgesWithSpans: 0,
  avgConfidence: 0,
  loopsCount: 0,
});

function unavailablePlan(goal: string): InterventionPlan {
  return {
    goal,
    goalFound: false,
    goalNodeRef: null,
    steps: [],
    leadingIndicators: [{ indicator: NOT_SPECIFIED, source: NOT_SPECIFIED, evidence: [] }],
    riskOfImbalance: [],
  };
}

const entityKey = (entities: readonly EntityRef[]): string =>
  entities.map((entity) => formatNodeRef(entity.refKind, entity.refId)).sort().join(',');

// ============================================================================
// ENGINE
// ============================================================================

export class WorldModelEngine {
  readonly config: WorldModelConfig;
  readonly cache: WorldModelCache;
  private readonly store: WorldModelStore;
  private readonly loader: GraphLoader;

  /**
   * @throws ConfigurationError when overrides or WORLD_MODEL_* variables are invalid
   */
  constructor(options: WorldModelEngineOptions) {
    this.config = resolveWorldModelConfig(options.config ?? {});
    this.store = options.store;
    this.loader = new GraphLoader(options.store);
    this.cache = options.cache ?? new WorldModelCache(this.config.cache);
  }

  getCachedLoops(): Promise<DetectedLoop[]> {
    return this.failEmpty<DetectedLoop[]>('getCachedLoops', [], () =>
      readCachedLoops(this.cache, this.loader, this.config.loops.maxLoops));
  }

  getCachedStats(): Promise<MechanismGraphStats> {
    return this.failEmpty('getCachedStats', EMPTY_GRAPH_STATS, () => readCachedStats(this.cache, this.loader));
  }

  /** Rank cached loops against the entities and pillars detected in a question. */
  async retrieveRelevantLoops(
    entities: readonly EntityRef[],
    pillars: readonly string[],
    topK: number = this.config.relevance.defaultTopK,
  ): Promise<DetectedLoop[]> {
    const loops = await this.getCachedLoops();
    return rankLoops(loops, entities, pillars, topK, this.config.relevance);
  }

  /**
   * Plan toward a goal. Cached loops back-fill short plans unless the request
   * brings its own.
   */
  async computeInterventionPlan(request: InterventionRequest): Promise<InterventionPlan> {
    const key = [
      'plan',
      request.goal,
      entityKey(request.detectedEntities ?? []),
      request.maxSteps ?? '',
      request.maxDepth ?? '',
    ].join('\u0000');
    const cached = this.cache.getQuery(key);
    if (cached?.kind === 'intervention_plan' && !request.loops) return cached.plan;

    const loops = request.loops ?? await this.getCachedLoops();
    return this.failEmpty('computeInterventionPlan', unavailablePlan(request.goal), async () => {
      const result = await planIntervention(this.loader, { ...request, loops }, this.config.planner);
      if (result.ok && !request.loops) {
        await this.cache.setQuery(key, { kind: 'intervention_plan', plan: result.value });
      }
      return result;
    });
  }

  /** Simulate a change to the node addressed as `kind:refId`. */
  simulateChange(nodeRef: string, magnitude: number, options: SimulateOptions = {}): Promise<SimulationResult> {
    const config = { ...this.config.simulation, maxSteps: options.maxSteps ?? this.config.simulation.maxSteps };
    const key = ['simulate', nodeRef, magnitude, config.maxSteps].join('\u0000');
    const cached = this.cache.getQuery(key);
    if (cached?.kind === 'simulation') return Promise.resolve(cached.result);

    return this.failEmpty('simulateChange', emptySimulation(magnitude, 'graph unavailable'), async () => {
      const result = await simulateNodeChange(this.loader, nodeRef, magnitude, config, this.config.confidence);
      if (result.ok) await this.cache.setQuery(key, { kind: 'simulation', result: result.value });
      return result;
    });
  }

  simulateWhatIf(
    scenario: string,
    pillarChanges: Readonly<Record<string, number>>,
    options: SimulateOptions = {},
  ): Promise<WhatIfResult> {
    const config = { ...this.config.simulation, maxSteps: options.maxSteps ?? this.config.simulation.maxSteps };
    // Results follow the caller's pillar order, so the key keeps it too.
    const changes = Object.entries(pillarChanges).map(([pillar, magnitude]) => `${pillar}=${magnitude}`);
    const key = ['what-if', scenario, ...changes, config.maxSteps].join('\u0000');
    const cached = this.cache.getQuery(key);
    if (cached?.kind === 'what_if') return Promise.resolve(cached.result);

    const empty: WhatIfResult = { scenario, results: [], combinedImpacts: {}, label: SIMULATION_LABEL };
    return this.failEmpty('simulateWhatIf', empty, async () => {
      const result = await simulatePillarChanges(this.loader, scenario, pillarChanges, config, this.config.confidence);
      if (result.ok) await this.cache.setQuery(key, { kind: 'what_if', result: result.value });
      return result;
    });
  }

  buildWorldModelPlan(input: WorldModelPlanInput): WorldModelPlan {
    return selectPlan(input, this.config.planBuilder);
  }

  /** Drop every cached loop, stat and query result. */
  async invalidateOnEdgeInsert(): Promise<void> {
    await invalidateCache(this.cache);
  }

  /**
   * Offline maintenance: detect loops on the live graph, persist them and
   * invalidate the cache. Never called on a request path.
   */
  async mineLoops(options: MineLoopsOptions = {}): Promise<MineLoopsReport> {
    const dryRun = options.dryRun ?? false;
    const empty: MineLoopsReport = { loops: [], written: 0, skipped: 0, dryRun };

    return this.failEmpty('mineLoops', empty, async (): Promise<Result<MineLoopsReport, Error>> => {
      const detected = await detectLoops(this.loader, {
        maxLoops: options.maxLoops ?? this.config.loops.maxLoops,
        maxCycleLength: options.maxCycleLength ?? this.config.loops.maxCycleLength,
      });
      if (!detected.ok) return detected;
      if (dryRun) return Ok({ ...empty, loops: detected.value });

      const persisted = await persistDetectedLoops(this.store, detected.value);
      if (!persisted.ok) return persisted;
      await invalidateCache(this.cache);

      logInfo('Mined feedback loops', { detected: detected.value.length, ...persisted.value });
      return Ok({ loops: detected.value, ...persisted.value, dryRun });
    });
  }

  private async failEmpty<T>(
    operation: string,
    fallback: T,
    fn: () => Promise<Result<T, Error>>,
  ): Promise<T> {
    const outcome = await safeAsync(fn);
    const result = outcome.ok ? outcome.value : outcome;
    if (result.ok) return result.value;

    logWarning(`${operation} failed; returning empty result`, { error: result.error.message, name: result.error.name });
    return fallback;
  }
}

export function createWorldModelEngine(
  store: WorldModelStore,
  config?: WorldModelConfigOverrides,
): WorldModelEngine {
  return new WorldModelEngine({ store, config });
}
