/**
 * @fileoverview Relation polarity and loop classification
 */

import { isRelationType } from './types.js';
import type { LoopType, Polarity, RelationType } from './types.js';

/**
 * Default sign of a relation: +1 when the source increases its target,
 * -1 when it decreases it.
 */
export function getDefaultPolarity(relationType: RelationType): Polarity {
  switch (relationType) {
    case 'ENABLES':
    case 'REINFORCES':
    case 'COMPLEMENTS':
    case 'CONDITIONAL_ON':
    case 'RESOLVES_WITH':
      return 1;
    case 'INHIBITS':
    case 'TENSION_WITH':
      return -1;
  }
}

/** Case-insensitive parse of an untyped relation name. */
export function parseRelationType(value: string): RelationType | null {
  const normalized = value.trim().toUpperCase();
  return isRelationType(normalized) ? normalized : null;
}

/** Polarity for an untyped relation name; unknown names default to +1. */
export function polarityForRelationName(value: string): Polarity {
  const relationType = parseRelationType(value);
  return relationType ? getDefaultPolarity(relationType) : 1;
}

export function toPolarity(value: number): Polarity | null {
  if (value === 1) return 1;
  if (value === -1) return -1;
  return null;
}

/**
 * Sign-product classification: an even number of negative links (zero
 * included) makes the loop self-amplifying.
 */
export function computeLoopType(polarities: readonly Polarity[]): LoopType {
  const negatives = polarities.filter((polarity) => polarity === -1).length;
  return negatives % 2 === 0 ? 'reinforcing' : 'balancing';
}
