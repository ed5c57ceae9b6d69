/**
 * Adaptive Threshold Optimizer Tests
 */

import { beforeEach, describe, expect, test } from 'vitest';
import { ThresholdOptimizer } from './thresholdOptimizer.js';

describe('ThresholdOptimizer', () => {
  let optimizer: ThresholdOptimizer;

  beforeEach(() => {
    optimizer = new ThresholdOptimizer();
  });

  describe('Adjustment', () => {
    test('should lower thresholds after a run of successes', () => {
      for (let i = 0; i < 10; i++) optimizer.record('vote', 40, true);
      const thresholds = optimizer.thresholds('vote');
      expect(thresholds.minScore).toBe(28);
      expect(thresholds.minConfidence).toBeCloseTo(0.15, 10);
    });

    test('should raise thresholds after a run of failures', () => {
      for (let i = 0; i < 10; i++) optimizer.record('vote', 40, false);
      const thresholds = optimizer.thresholds('vote');
      expect(thresholds.minScore).toBe(32);
      expect(thresholds.minConfidence).toBeCloseTo(0.25, 10);
    });

    test('should hold thresholds for a middling success rate', () => {
      for (let i = 0; i < 10; i++) optimizer.record('vote', 40, i < 6);
      expect(optimizer.thresholds('vote').minScore).toBe(30);
    });

    test('should not adjust before enough samples arrive', () => {
      for (let i = 0; i < 9; i++) optimizer.record('vote', 40, true);
      expect(optimizer.thresholds('vote').minScore).toBe(30);
    });

    test('should never leave the configured bounds', () => {
      for (let i = 0; i < 100; i++) optimizer.record('vote', 40, true);
      const thresholds = optimizer.thresholds('vote');
      expect(thresholds.minScore).toBe(25);
      expect(thresholds.minConfidence).toBeCloseTo(0.1, 10);
    });

    test('should keep actions independent', () => {
      for (let i = 0; i < 10; i++) optimizer.record('poison', 80, false);
      expect(optimizer.thresholds('vote').minScore).toBe(30);
      expect(optimizer.thresholds('poison').minScore).toBe(72);
    });

    test('should bound the rolling window', () => {
      const small = new ThresholdOptimizer(undefined, { window: 5 });
      for (let i = 0; i < 8; i++) small.record('kill', 10, true);
      expect(small.getState().samples).toBe(5);
    });
  });

  describe('Feedback Channel', () => {
    test('should resolve tracked decisions by id', () => {
      optimizer.track('d1', 'g1', 'vote', 'p3', 42);
      expect(optimizer.resolve('d1', true)).toBe(true);
      expect(optimizer.resolve('d1', true)).toBe(false);
      expect(optimizer.resolve('unknown', false)).toBe(false);
      expect(optimizer.successRate('vote')).toBe(1);
    });

    test('should settle every decision aimed at a revealed target', () => {
      optimizer.track('d1', 'g1', 'vote', 'p3', 42);
      optimizer.track('d2', 'g1', 'antidote', 'p3', 50);
      optimizer.track('d3', 'g1', 'vote', 'p4', 31);

      expect(optimizer.resolveTarget('g1', 'p3', 'hostile')).toBe(2);
      expect(optimizer.successRate('vote')).toBe(1);
      expect(optimizer.successRate('antidote')).toBe(0);
      expect(optimizer.getPending().map((p) => p.decisionId)).toEqual(['d3']);
    });

    test('should only settle decisions from the revealing session', () => {
      optimizer.track('d1', 'g1', 'vote', 'p5', 42);
      optimizer.track('d2', 'g2', 'vote', 'p5', 42);

      expect(optimizer.resolveTarget('g2', 'p5', 'ally')).toBe(1);
      expect(optimizer.getPending().map((p) => p.decisionId)).toEqual(['d1']);
      expect(optimizer.successRate('vote')).toBe(0);
    });

    test('should drop the oldest pending decision beyond the limit', () => {
      const small = new ThresholdOptimizer(undefined, { maxPending: 2 });
      small.track('d1', 'g1', 'vote', 'p2', 30);
      small.track('d2', 'g1', 'vote', 'p3', 30);
      small.track('d3', 'g1', 'vote', 'p4', 30);
      expect(small.getPending().map((p) => p.decisionId)).toEqual(['d2', 'd3']);
    });

    test('should report no success rate without samples', () => {
      expect(optimizer.successRate('shoot')).toBeNull();
    });
  });
});
