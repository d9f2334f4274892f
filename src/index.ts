/**
 * @fileoverview World model reasoning engine
 *
 * Causal reasoning over a mechanism graph layered on the wellbeing framework:
 * feedback loop detection and ranking, evidence-bound intervention planning,
 * and damped what-if simulation.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createSqliteWorldModelStore, WorldModelEngine } from 'world-model-engine';
 *
 * const store = createSqliteWorldModelStore('.world-model/world-model.sqlite');
 * await store.initialize();
 * const engine = new WorldModelEngine({ store });
 *
 * const loops = await engine.retrieveRelevantLoops([], ['P001']);
 * const plan = await engine.computeInterventionPlan({ goal: 'steadfast patience' });
 * ```
 *
 * Engine methods never throw on load failures; they log a warning and return
 * an empty result.
 *
 * @packageDocumentation
 */

// ============================================================================
// ENGINE FACADE
// ============================================================================

export {
  WorldModelEngine,
  createWorldModelEngine,
  EMPTY_GRAPH_STATS,
} from './world_model/engine.js';
export type {
  WorldModelEngineOptions,
  MineLoopsOptions,
  MineLoopsReport,
  SimulateOptions,
} from './world_model/engine.js';

// ============================================================================
// REASONING CORE
// ============================================================================

export { GraphLoader } from './world_model/graph_loader.js';
export type { GraphResult } from './world_model/graph_loader.js';
export { MechanismGraphSnapshot } from './world_model/graph_snapshot.js';

export {
  findCycles,
  detectLoops,
  buildDetectedLoop,
  computeLoopId,
  persistDetectedLoops,
  loadPersistedLoops,
  getLoopsForPillars,
  summarizeLoop,
} from './world_model/loop_detector.js';
export type { CycleSearchOptions } from './world_model/loop_detector.js';

export {
  computeLoopType,
  getDefaultPolarity,
  parseRelationType,
  polarityForRelationName,
} from './world_model/polarity.js';
export { computeEdgeConfidence, computeEvidenceBase } from './world_model/confidence.js';
export { computeLoopRelevanceScore, retrieveRelevantLoops } from './world_model/relevance.js';

export {
  WorldModelCache,
  getCachedLoops,
  getCachedStats,
  invalidateOnEdgeInsert,
} from './world_model/cache.js';
export type { CachedQuery, WorldModelCacheOptions } from './world_model/cache.js';

export {
  computeInterventionPlan,
  draftInterventionPlan,
  finalizeInterventionPlan,
  validateInterventionPlan,
  acceptedSteps,
  GOAL_NOT_FOUND,
} from './world_model/intervention_planner.js';
export type { InterventionRequest, InterventionDraft } from './world_model/intervention_planner.js';
export { validateNoMedicalClaims, FORBIDDEN_CLAIMS } from './world_model/claims_gate.js';
export { normalizeArabicText } from './world_model/text_normalize.js';

export {
  propagateChange,
  simulateChange,
  simulateWhatIf,
  summarizeSimulation,
  computeEdgeWeight,
  SIMULATION_LABEL,
} from './world_model/simulator.js';
export type { SimulationSummaryEntry } from './world_model/simulator.js';

export {
  buildWorldModelPlan,
  checkWorldModelPlanRequirements,
  PILLAR_COUNT,
} from './world_model/plan_builder.js';
export type { WorldModelPlanInput } from './world_model/plan_builder.js';

export * from './world_model/types.js';

// ============================================================================
// STORAGE
// ============================================================================

export { SqliteWorldModelStore, createSqliteWorldModelStore } from './storage/sqlite_store.js';
export type {
  WorldModelStore,
  EdgeLoadOptions,
  MechanismEdgeInput,
  StoreWriteResult,
} from './storage/types.js';

// ============================================================================
// CONFIGURATION, ERRORS, LOGGING
// ============================================================================

export {
  DEFAULT_WORLD_MODEL_CONFIG,
  resolveWorldModelConfig,
  mergeWorldModelConfig,
} from './config/world_model_config.js';
export type { WorldModelConfig, WorldModelConfigOverrides } from './config/world_model_config.js';

export {
  WorldModelError,
  StorageError,
  GraphLoadError,
  ValidationError,
  AnchorValidationError,
  SchemaError,
  ConfigurationError,
  Errors,
  isWorldModelError,
  isRetryableError,
} from './core/errors.js';
export { Ok, Err } from './core/result.js';
export type { Result } from './core/result.js';
export { setLogLevel, getLogLevel } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';

// ============================================================================
// VERSION
// ============================================================================

export const WORLD_MODEL_VERSION = '0.1.0';
