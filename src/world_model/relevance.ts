/**
 * @fileoverview Loop relevance scoring against the entities and pillars
 * detected in a question
 */

import { DEFAULT_WORLD_MODEL_CONFIG } from '../config/world_model_config.js';
import type { RelevanceConfig } from '../config/world_model_config.js';
import { formatNodeRef, parseNodeRef } from './types.js';
import type { DetectedLoop, EntityRef } from './types.js';

const round3 = (value: number): number => Math.round(value * 1000) / 1000;

function relevantIdentifiers(entities: readonly EntityRef[], pillars: readonly string[]): Set<string> {
  const ids = new Set<string>();
  for (const pillar of pillars) {
    ids.add(formatNodeRef('pillar', pillar));
    ids.add(pillar);
  }
  for (const entity of entities) {
    if (!entity.refKind || !entity.refId) continue;
    ids.add(formatNodeRef(entity.refKind, entity.refId));
    ids.add(entity.refId);
  }
  return ids;
}

/**
 * Relevance of a loop to a question in [0, 1]: the share of loop nodes named
 * by the detected entities or pillars, plus a capped bonus per evidence span.
 * A node counts once whether it matches by `kind:refId` or by bare refId.
 */
export function computeLoopRelevanceScore(
  loop: DetectedLoop,
  entities: readonly EntityRef[],
  pillars: readonly string[],
  config: RelevanceConfig = DEFAULT_WORLD_MODEL_CONFIG.relevance,
): number {
  if (loop.nodes.length === 0) return 0;

  const relevant = relevantIdentifiers(entities, pillars);
  const matched = loop.nodes.filter((ref) => {
    if (relevant.has(ref)) return true;
    const parsed = parseNodeRef(ref);
    return parsed !== null && relevant.has(parsed.refId);
  }).length;

  const nodeMatchRatio = matched / loop.nodes.length;
  const evidenceBonus = Math.min(config.evidenceCap, loop.evidenceSpans.length * config.evidencePerSpan);
  return round3(Math.min(1, nodeMatchRatio + evidenceBonus));
}

/**
 * Top `topK` loops by descending relevance; shorter loops win ties, then
 * input order.
 */
export function retrieveRelevantLoops(
  loops: readonly DetectedLoop[],
  entities: readonly EntityRef[],
  pillars: readonly string[],
  topK: number = DEFAULT_WORLD_MODEL_CONFIG.relevance.defaultTopK,
  config: RelevanceConfig = DEFAULT_WORLD_MODEL_CONFIG.relevance,
): DetectedLoop[] {
  return loops
    .map((loop) => ({ loop, score: computeLoopRelevanceScore(loop, entities, pillars, config) }))
    .sort((a, b) => b.score - a.score || a.loop.edgeIds.length - b.loop.edgeIds.length)
    .slice(0, Math.max(0, topK))
    .map(({ loop }) => loop);
}
