/**
 * @fileoverview Evidence-based edge confidence
 *
 * Confidence grows with the number of supporting spans and with the number of
 * distinct corpus chunks they come from. Both contributions are capped.
 */

import { DEFAULT_WORLD_MODEL_CONFIG } from '../config/world_model_config.js';
import type { ConfidenceConfig } from '../config/world_model_config.js';

const round3 = (value: number): number => Math.round(value * 1000) / 1000;

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/**
 * Uncapped evidence weight of an edge. The simulator reuses this value as the
 * magnitude of an edge's propagation weight.
 */
export function computeEvidenceBase(
  spanCount: number,
  chunkDiversity: number,
  config: ConfidenceConfig = DEFAULT_WORLD_MODEL_CONFIG.confidence,
): number {
  const spans = Math.max(0, spanCount);
  const chunks = Math.max(0, chunkDiversity);
  return config.base
    + Math.min(config.spanCap, spans * config.perSpan)
    + Math.min(config.diversityCap, chunks * config.perChunk);
}

/**
 * Confidence in [config.min, config.max] (defaults 0.1 and 0.95), rounded to
 * three decimals. A direct quote adds a fixed bonus.
 */
export function computeEdgeConfidence(
  spanCount: number,
  chunkDiversity: number,
  isDirectQuote: boolean,
  config: ConfidenceConfig = DEFAULT_WORLD_MODEL_CONFIG.confidence,
): number {
  const quoteBonus = isDirectQuote ? config.directQuoteBonus : 0;
  const raw = computeEvidenceBase(spanCount, chunkDiversity, config) + quoteBonus;
  return round3(clamp(raw, config.min, config.max));
}
