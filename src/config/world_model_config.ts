/**
 * @fileoverview World model configuration
 *
 * Every numeric constant used by loop detection, scoring, planning and
 * simulation lives here as a default. Callers override per instance, and the
 * process environment can override a subset through `WORLD_MODEL_*` variables.
 *
 * Precedence: defaults < environment < explicit overrides.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CacheConfig {
  loopsTtlMs: number;
  statsTtlMs: number;
  queryTtlMs: number;
}

export interface LoopConfig {
  /** Loops kept after detection or persisted-loop load. */
  maxLoops: number;
  /** Per-path edge cap for the bounded cycle search. */
  maxCycleLength: number;
}

/**
 * Coefficients of the evidence-based confidence formula:
 * `base + min(spanCap, spans * perSpan) + min(diversityCap, chunks * perChunk)`.
 */
export interface ConfidenceConfig {
  base: number;
  perSpan: number;
  spanCap: number;
  perChunk: number;
  diversityCap: number;
  directQuoteBonus: number;
  min: number;
  max: number;
}

export interface RelevanceConfig {
  evidencePerSpan: number;
  evidenceCap: number;
  defaultTopK: number;
}

export interface PlannerConfig {
  maxDepth: number;
  maxSteps: number;
  /** Below this many steps the plan is backfilled from loops touching the goal. */
  minSteps: number;
  maxImpactsPerStep: number;
  backfillLoopCount: number;
}

export interface SimulationConfig {
  defaultNodeValue: number;
  dampingFactor: number;
  minDeltaThreshold: number;
  maxSteps: number;
}

export interface PlanBuilderConfig {
  targetLoopCount: number;
  targetInterventionCount: number;
}

export interface WorldModelConfig {
  cache: CacheConfig;
  loops: LoopConfig;
  confidence: ConfidenceConfig;
  relevance: RelevanceConfig;
  planner: PlannerConfig;
  simulation: SimulationConfig;
  planBuilder: PlanBuilderConfig;
}

export type WorldModelConfigOverrides = {
  [K in keyof WorldModelConfig]?: Partial<WorldModelConfig[K]>;
};

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_WORLD_MODEL_CONFIG: WorldModelConfig = {
  cache: {
    loopsTtlMs: 300_000,
    statsTtlMs: 600_000,
    queryTtlMs: 60_000,
  },
  loops: {
    maxLoops: 20,
    maxCycleLength: 8,
  },
  confidence: {
    base: 0.1,
    perSpan: 0.1,
    spanCap: 0.2,
    perChunk: 0.05,
    diversityCap: 0.15,
    directQuoteBonus: 0.1,
    min: 0.1,
    max: 0.95,
  },
  relevance: {
    evidencePerSpan: 0.05,
    evidenceCap: 0.3,
    defaultTopK: 5,
  },
  planner: {
    maxDepth: 4,
    maxSteps: 7,
    minSteps: 3,
    maxImpactsPerStep: 3,
    backfillLoopCount: 2,
  },
  simulation: {
    defaultNodeValue: 0.5,
    dampingFactor: 0.7,
    minDeltaThreshold: 0.01,
    maxSteps: 5,
  },
  planBuilder: {
    targetLoopCount: 2,
    targetInterventionCount: 1,
  },
};

// ============================================================================
// SCHEMAS
// ============================================================================

const positiveInt = z.number().int().positive();
const unitInterval = z.number().min(0).max(1);

const WorldModelConfigSchema = z.object({
  cache: z.object({
    loopsTtlMs: positiveInt,
    statsTtlMs: positiveInt,
    queryTtlMs: positiveInt,
  }),
  loops: z.object({
    maxLoops: positiveInt,
    maxCycleLength: z.number().int().min(2),
  }),
  confidence: z.object({
    base: unitInterval,
    perSpan: unitInterval,
    spanCap: unitInterval,
    perChunk: unitInterval,
    diversityCap: unitInterval,
    directQuoteBonus: unitInterval,
    min: unitInterval,
    max: unitInterval,
  }).refine((value) => value.min <= value.max, {
    message: 'min must not exceed max',
    path: ['min'],
  }),
  relevance: z.object({
    evidencePerSpan: unitInterval,
    evidenceCap: unitInterval,
    defaultTopK: positiveInt,
  }),
  planner: z.object({
    maxDepth: positiveInt,
    maxSteps: positiveInt,
    minSteps: z.number().int().min(0),
    maxImpactsPerStep: z.number().int().min(0),
    backfillLoopCount: z.number().int().min(0),
  }),
  simulation: z.object({
    defaultNodeValue: unitInterval,
    dampingFactor: unitInterval,
    minDeltaThreshold: unitInterval,
    maxSteps: positiveInt,
  }),
  planBuilder: z.object({
    targetLoopCount: z.number().int().min(0),
    targetInterventionCount: z.number().int().min(0),
  }),
});

const optionalNumber = z.coerce.number().finite().optional();

/** Environment variables read by {@link resolveWorldModelConfig}. TTLs are in seconds. */
const EnvSchema = z.object({
  WORLD_MODEL_LOOP_CACHE_TTL_S: optionalNumber,
  WORLD_MODEL_STATS_CACHE_TTL_S: optionalNumber,
  WORLD_MODEL_QUERY_CACHE_TTL_S: optionalNumber,
  WORLD_MODEL_MAX_LOOPS: optionalNumber,
  WORLD_MODEL_MAX_CYCLE_LENGTH: optionalNumber,
  WORLD_MODEL_DAMPING_FACTOR: optionalNumber,
  WORLD_MODEL_MIN_DELTA_THRESHOLD: optionalNumber,
  WORLD_MODEL_SIMULATION_MAX_STEPS: optionalNumber,
  WORLD_MODEL_PLANNER_MAX_DEPTH: optionalNumber,
});

type EnvOverrides = z.infer<typeof EnvSchema>;

// ============================================================================
// RESOLUTION
// ============================================================================

const secondsToMs = (seconds: number | undefined): number | undefined =>
  seconds === undefined ? undefined : Math.round(seconds * 1000);

function definedOnly<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value) as Array<keyof T>) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function envToOverrides(env: EnvOverrides): WorldModelConfigOverrides {
  return {
    cache: definedOnly({
      loopsTtlMs: secondsToMs(env.WORLD_MODEL_LOOP_CACHE_TTL_S),
      statsTtlMs: secondsToMs(env.WORLD_MODEL_STATS_CACHE_TTL_S),
      queryTtlMs: secondsToMs(env.WORLD_MODEL_QUERY_CACHE_TTL_S),
    }),
    loops: definedOnly({
      maxLoops: env.WORLD_MODEL_MAX_LOOPS,
      maxCycleLength: env.WORLD_MODEL_MAX_CYCLE_LENGTH,
    }),
    simulation: definedOnly({
      dampingFactor: env.WORLD_MODEL_DAMPING_FACTOR,
      minDeltaThreshold: env.WORLD_MODEL_MIN_DELTA_THRESHOLD,
      maxSteps: env.WORLD_MODEL_SIMULATION_MAX_STEPS,
    }),
    planner: definedOnly({
      maxDepth: env.WORLD_MODEL_PLANNER_MAX_DEPTH,
    }),
  };
}

export function mergeWorldModelConfig(
  base: WorldModelConfig,
  overrides: WorldModelConfigOverrides,
): WorldModelConfig {
  return {
    cache: { ...base.cache, ...overrides.cache },
    loops: { ...base.loops, ...overrides.loops },
    confidence: { ...base.confidence, ...overrides.confidence },
    relevance: { ...base.relevance, ...overrides.relevance },
    planner: { ...base.planner, ...overrides.planner },
    simulation: { ...base.simulation, ...overrides.simulation },
    planBuilder: { ...base.planBuilder, ...overrides.planBuilder },
  };
}

function formatIssue(issue: z.ZodIssue): ConfigurationError {
  const key = issue.path.length > 0 ? issue.path.join('.') : 'config';
  return new ConfigurationError(key, issue.message);
}

/**
 * Resolve the effective configuration.
 *
 * @throws ConfigurationError when an environment variable or override is invalid
 */
export function resolveWorldModelConfig(
  overrides: WorldModelConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): WorldModelConfig {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw formatIssue(parsedEnv.error.issues[0]);
  }

  const merged = mergeWorldModelConfig(
    mergeWorldModelConfig(DEFAULT_WORLD_MODEL_CONFIG, envToOverrides(parsedEnv.data)),
    overrides,
  );

  const validated = WorldModelConfigSchema.safeParse(merged);
  if (!validated.success) {
    throw formatIssue(validated.error.issues[0]);
  }
  return merged;
}
