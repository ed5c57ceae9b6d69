/**
 * Bayesian Estimator Tests
 */

import { beforeEach, describe, expect, test } from 'vitest';
import { GameContext } from '../context/gameContext.js';
import { BayesianEstimator } from './bayesian.js';
import { extractFeatures } from './features.js';

describe('BayesianEstimator', () => {
  let context: GameContext;
  let estimator: BayesianEstimator;

  beforeEach(() => {
    context = new GameContext({ selfId: 'p1', role: 'villager', players: ['p1', 'p2', 'p3', 'p4', 'p5', 'p6'] });
    estimator = new BayesianEstimator();
  });

  test('should extract neutral features for a fresh player', () => {
    const features = extractFeatures(context.observe('p2'), context);
    expect(features.trust).toBe(0.5);
    expect(features.voteAccuracy).toBe(0.5);
    expect(features.speechQuality).toBe(0.5);
    expect(features.resolvedVotes).toBe(0);
    expect(features.hasClaim).toBe(0);
  });

  test('should return the prior without evidence', () => {
    expect(estimator.predict(extractFeatures(context.observe('p2'), context))).toBeCloseTo(0.33, 10);
  });

  test('should raise the probability after an injection', () => {
    context.observe('p2').evidence.injectionCount = 1;
    // odds 0.33/0.67 × 7
    expect(estimator.predict(extractFeatures(context.observe('p2'), context))).toBeCloseTo(0.7752, 3);
  });

  test('should cap contradictions in the likelihood ratio', () => {
    context.observe('p2').evidence.contradictionCount = 7;
    expect(estimator.likelihoodRatio(extractFeatures(context.observe('p2'), context))).toBeCloseTo(7.59375, 10);
  });

  test('should stay within the ceiling', () => {
    const evidence = context.observe('p2').evidence;
    evidence.injectionCount = 2;
    evidence.falseQuoteCount = 1;
    evidence.fakeSeerClaim = true;
    expect(estimator.predict(extractFeatures(context.observe('p2'), context))).toBe(0.99);
  });

  test('should stay within the floor', () => {
    const unlikely = new BayesianEstimator({ prior: 0.001 });
    context.observe('p2').evidence.voteHistory.push({ round: 1, target: 'p3', targetWasHostile: true });
    expect(unlikely.predict(extractFeatures(context.observe('p2'), context))).toBe(0.01);
  });
});
