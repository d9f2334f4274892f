import { describe, it, expect } from 'vitest';
import { computeLoopRelevanceScore, retrieveRelevantLoops } from '../relevance.js';
import { makeLoop, makeSpan } from './fixtures.js';

describe('computeLoopRelevanceScore', () => {
  it('is the matched node share plus the evidence bonus', () => {
    const loop = makeLoop('l1', ['pillar:P1', 'core_value:CV1'], {
      evidenceSpans: [makeSpan('l1-e1', 'one')],
    });
    expect(computeLoopRelevanceScore(loop, [], ['P1'])).toBe(0.55);
  });

  it('matches by bare ref id as well as by kind and id', () => {
    const loop = makeLoop('l1', ['mechanism:M1', 'outcome:O1']);
    expect(computeLoopRelevanceScore(loop, [{ refKind: 'mechanism', refId: 'M1' }], [])).toBe(0.5);
    expect(computeLoopRelevanceScore(loop, [{ refKind: 'mechanism', refId: 'M1' }], ['O1'])).toBe(1);
  });

  it('counts a node once when several identifiers name it', () => {
    const loop = makeLoop('l1', ['pillar:P1', 'core_value:CV1', 'mechanism:M1']);
    expect(computeLoopRelevanceScore(loop, [{ refKind: 'pillar', refId: 'P1' }], ['P1'])).toBe(0.333);
  });

  it('caps the evidence bonus and the total', () => {
    const evidenceSpans = Array.from({ length: 10 }, (_, index) => makeSpan('l1-e1', `quote ${index}`));
    expect(computeLoopRelevanceScore(makeLoop('l1', ['mechanism:M1']), [], [])).toBe(0);
    expect(computeLoopRelevanceScore(makeLoop('l1', ['mechanism:M1'], { evidenceSpans }), [], [])).toBe(0.3);
    expect(computeLoopRelevanceScore(makeLoop('l1', ['pillar:P1'], { evidenceSpans }), [], ['P1'])).toBe(1);
  });

  it('scores a loop without nodes as zero', () => {
    expect(computeLoopRelevanceScore(makeLoop('l1', []), [], ['P1'])).toBe(0);
  });
});

describe('retrieveRelevantLoops', () => {
  it('ranks a fully matched, evidenced loop above an unmatched one', () => {
    const x = makeLoop('x', ['pillar:P1', 'pillar:P2'], {
      evidenceSpans: [makeSpan('x-e1', 'first'), makeSpan('x-e2', 'second')],
    });
    const y = makeLoop('y', ['mechanism:M1', 'mechanism:M2', 'outcome:O1']);

    expect(retrieveRelevantLoops([y, x], [], ['P1', 'P2'], 2)).toEqual([x, y]);
    expect(retrieveRelevantLoops([x, y], [], ['P1', 'P2'], 2)).toEqual([x, y]);
  });

  it('prefers shorter loops on equal scores, then keeps input order', () => {
    const long = makeLoop('long', ['mechanism:M1', 'mechanism:M2', 'mechanism:M3']);
    const short = makeLoop('short', ['mechanism:M4', 'mechanism:M5']);
    const twin = makeLoop('twin', ['mechanism:M6', 'mechanism:M7']);

    const ranked = retrieveRelevantLoops([long, short, twin], [], [], 5);
    expect(ranked.map((loop) => loop.loopId)).toEqual(['short', 'twin', 'long']);
  });

  it('returns at most topK loops', () => {
    const loops = [makeLoop('a', ['pillar:P1']), makeLoop('b', ['pillar:P2']), makeLoop('c', ['pillar:P3'])];
    expect(retrieveRelevantLoops(loops, [], ['P3'], 1).map((loop) => loop.loopId)).toEqual(['c']);
    expect(retrieveRelevantLoops(loops, [], ['P3'], 0)).toEqual([]);
  });
});
