/**
 * Evidence Ingestion Tests
 */

import { beforeEach, describe, expect, test } from 'vitest';
import type { EvidenceRecord } from '@wolfpack/shared';
import { DEFAULT_EVIDENCE } from '../config.js';
import { GameContext } from '../context/gameContext.js';
import { TrustScoreEngine } from '../trust/trustEngine.js';
import { EvidenceIngestor } from './ingest.js';

const PLAYERS = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7', 'p8', 'p9', 'p10', 'p11', 'p12'];

function record(overrides: Partial<EvidenceRecord> & { speaker: string }): EvidenceRecord {
  return { round: 1, source: 'smart', supports: [], suspects: [], degraded: false, ...overrides };
}

describe('EvidenceIngestor', () => {
  let ingestor: EvidenceIngestor;
  let context: GameContext;

  beforeEach(() => {
    ingestor = new EvidenceIngestor(new TrustScoreEngine(), DEFAULT_EVIDENCE);
    context = new GameContext({ selfId: 'p1', role: 'villager', players: PLAYERS });
  });

  describe('Trust Updates', () => {
    test('should penalize a detected injection', () => {
      const summary = ingestor.ingest(
        context,
        record({ speaker: 'p2', injection: { kind: 'system_fake', confidence: 0.9 } })
      );

      // -40 * 0.9 * 1.0, decayed by 0.5
      expect(context.observe('p2').trust).toBeCloseTo(32, 10);
      expect(context.observe('p2').evidence.injectionCount).toBe(1);
      expect(summary.applied.map((a) => a.reason)).toEqual(['injection:system_fake']);
    });

    test('should ignore low-confidence false quotes', () => {
      ingestor.ingest(context, record({ speaker: 'p2', falseQuote: { confidence: 0.5 } }));
      expect(context.observe('p2').evidence.falseQuoteCount).toBe(0);
      expect(context.observe('p2').trust).toBe(50);
    });

    test('should weight rule-based evidence by its reliability', () => {
      ingestor.ingest(context, record({ speaker: 'p2', source: 'rules', contradiction: true }));
      // -15 * 1 * 0.7, decayed by 0.5
      expect(context.observe('p2').trust).toBeCloseTo(44.75, 10);
    });

    test('should reward logical speech and keep the sample', () => {
      ingestor.ingest(
        context,
        record({
          speaker: 'p2',
          speech: { logic: 80, information: 80, persuasion: 80, strategy: 80, overall: 80 }
        })
      );
      expect(context.observe('p2').trust).toBeCloseTo(55, 10);
      expect(context.observe('p2').evidence.speechSamples.length).toBe(1);
    });

    test('should ignore records about the agent itself', () => {
      const summary = ingestor.ingest(
        context,
        record({ speaker: 'p1', injection: { kind: 'other', confidence: 1 } })
      );
      expect(summary.applied).toEqual([]);
      expect(context.observe('p1').evidence.injectionCount).toBe(0);
    });
  });

  describe('Claims', () => {
    test('should flag both players claiming the same exclusive role', () => {
      ingestor.ingest(context, record({ speaker: 'p2', claimedRole: 'seer' }));
      ingestor.ingest(context, record({ speaker: 'p3', claimedRole: 'seer' }));

      expect(context.observe('p2').evidence.roleConflict).toBe(true);
      expect(context.observe('p3').evidence.roleConflict).toBe(true);
    });

    test('should flag a claim of the agent\'s own exclusive role', () => {
      const seer = new GameContext({ selfId: 'p1', role: 'seer', players: PLAYERS });
      ingestor.ingest(seer, record({ speaker: 'p2', claimedRole: 'seer' }));
      expect(seer.observe('p2').evidence.fakeRoleClaim).toBe(true);
    });

    test('should expose a claimed check that contradicts what the agent knows', () => {
      ingestor.ingest(context, record({ speaker: 'p2', claimedCheck: { target: 'p1', result: 'wolf' } }));

      const evidence = context.observe('p2').evidence;
      expect(evidence.claimedRole).toBe('seer');
      expect(evidence.fakeSeerClaim).toBe(true);
      expect(evidence.claimedChecks).toEqual([{ round: 1, target: 'p1', result: 'wolf' }]);
    });
  });

  describe('Social Graph', () => {
    test('should count a flip from support to suspicion as an attitude change', () => {
      ingestor.ingest(context, record({ speaker: 'p2', supports: ['p4'] }));
      ingestor.ingest(context, record({ speaker: 'p2', suspects: ['p4'] }));

      const speaker = context.observe('p2').evidence;
      const target = context.observe('p4').evidence;
      expect(speaker.attitudeChanges).toBe(1);
      expect(speaker.supports).toEqual([]);
      expect(speaker.suspects).toEqual(['p4']);
      expect(target.accusedBy).toEqual(['p2']);
      expect(target.defendedBy).toEqual([]);
      expect(target.mentions).toBe(2);
    });
  });

  describe('Votes & Verification', () => {
    test('should reward voters once their target is verified hostile', () => {
      ingestor.applyBallots(context, 1, [
        { voter: 'p2', target: 'p4' },
        { voter: 'p3', target: 'p5' },
        { voter: 'p1', target: 'p4' }
      ]);
      ingestor.applyVerification(context, 'p4', 'hostile');

      // +15, decayed by (100-50)/100
      expect(context.observe('p2').trust).toBeCloseTo(57.5, 10);
      expect(context.observe('p3').trust).toBe(50);
      expect(context.observe('p1').trust).toBe(50);
      expect(context.observe('p2').evidence.voteHistory[0].targetWasHostile).toBe(true);
    });

    test('should penalize votes against an already verified ally', () => {
      ingestor.applyVerification(context, 'p4', 'ally');
      ingestor.applyBallots(context, 1, [{ voter: 'p2', target: 'p4' }]);
      // -15, decayed by 50/100
      expect(context.observe('p2').trust).toBeCloseTo(42.5, 10);
    });
  });
});
