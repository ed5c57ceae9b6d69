/**
 * Multi-Dimensional Scorer Tests
 */

import { describe, expect, test } from 'vitest';
import type { RoleName } from '@wolfpack/shared';
import { resolveEngineConfig, type EngineConfigOverrides } from '../config.js';
import { GameContext } from '../context/gameContext.js';
import { TrustScoreEngine } from '../trust/trustEngine.js';
import { MultiDimensionalScorer } from './scorer.js';

const PLAYERS = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7', 'p8', 'p9', 'p10', 'p11', 'p12'];

function setup(role: RoleName = 'villager', overrides?: EngineConfigOverrides) {
  const scorer = new MultiDimensionalScorer(resolveEngineConfig(role, overrides), new TrustScoreEngine());
  const context = new GameContext({ selfId: 'p1', role, players: PLAYERS });
  return { scorer, context };
}

describe('MultiDimensionalScorer', () => {
  describe('Suspicion', () => {
    test('should score only the trust group for entities without evidence', () => {
      const { scorer, context } = setup();
      const breakdown = scorer.explain(context.observe('p2'), context, 'vote');

      expect(breakdown.phase).toBe('early');
      expect(breakdown.dimensions).toEqual({ trustLevel: 20 });
      expect(breakdown.total).toBe(15);
    });

    test('should add anomaly dimensions once evidence exists', () => {
      const { scorer, context } = setup();
      context.observe('p2').evidence.injectionCount = 2;
      const breakdown = scorer.explain(context.observe('p2'), context, 'vote');

      expect(breakdown.dimensions).toEqual({ trustLevel: 20, injection: 70 });
      expect(breakdown.total).toBe(67.5);
    });

    test('should apply the late-game multiplier', () => {
      const { scorer, context } = setup();
      context.advanceRound(6);
      expect(scorer.score(context.observe('p2'), context, 'vote')).toBeCloseTo(28, 10);
    });

    test('should skip disabled dimensions', () => {
      const { scorer, context } = setup('villager', {
        dimensions: { suspicion: { injection: { enabled: false } } }
      });
      context.observe('p2').evidence.injectionCount = 2;
      expect(scorer.score(context.observe('p2'), context, 'vote')).toBe(15);
    });

    test('should apply role weights from the profile', () => {
      const { scorer, context } = setup('seer');
      const entity = context.observe('p2');
      entity.evidence.voteHistory.push({ round: 1, target: 'p3', targetWasHostile: true });

      // accuracy 1.0 → -35 × 1.2
      expect(scorer.explain(entity, context, 'vote').dimensions.voteAccuracy).toBeCloseTo(-42, 10);
    });
  });

  describe('Oracle Override', () => {
    test('should put verified hostiles at or above the oracle score', () => {
      const { scorer, context } = setup('villager', {
        dimensions: { suspicion: { trustLevel: { enabled: false } } }
      });
      const entity = context.observe('p2');
      entity.evidence.speechSamples.push({ logic: 90, information: 90, persuasion: 90, strategy: 90, overall: 90 });
      context.verify('p2', 'hostile');

      const breakdown = scorer.explain(entity, context, 'vote');
      expect(breakdown.subtotal).toBe(-70);
      expect(breakdown.total).toBe(150);
    });

    test('should add positive evidence on top of the hostile oracle', () => {
      const { scorer, context } = setup();
      context.verify('p2', 'hostile');
      // trust 0 → +100; (200 + 100) × 0.75
      expect(scorer.score(context.observe('p2'), context, 'vote')).toBe(225);
    });

    test('should keep verified allies far below any unverified score', () => {
      const { scorer, context } = setup();
      context.verify('p2', 'ally');
      // trust 100 → -50; (-150 - 50) × 0.75
      expect(scorer.score(context.observe('p2'), context, 'vote')).toBe(-150);
    });
  });

  describe('Threat & Protection', () => {
    test('should value a credible seer claim for wolves', () => {
      const { scorer, context } = setup('wolf');
      context.observe('p2').evidence.claimedRole = 'seer';
      const breakdown = scorer.explain(context.observe('p2'), context, 'kill');

      expect(breakdown.perspective).toBe('threat');
      expect(breakdown.dimensions).toEqual({ roleValue: 50 });
      expect(breakdown.total).toBe(37.5);
    });

    test('should value a credible seer claim for protection', () => {
      const { scorer, context } = setup('witch');
      context.observe('p2').evidence.claimedRole = 'seer';
      const breakdown = scorer.explain(context.observe('p2'), context, 'antidote');

      expect(breakdown.perspective).toBe('protection');
      expect(breakdown.dimensions).toEqual({ keyRoleClaim: 60 });
      expect(breakdown.total).toBe(45);
    });

    test('should ignore a conflicted claim for protection', () => {
      const { scorer, context } = setup('witch');
      const evidence = context.observe('p2').evidence;
      evidence.claimedRole = 'seer';
      evidence.roleConflict = true;
      expect(scorer.score(context.observe('p2'), context, 'antidote')).toBe(0);
    });
  });
});
