/**
 * Evidence Ingestion
 * Folds classifier records into entity evidence and turns them into trust updates
 */

import { logger } from '@elizaos/core';
import type { Alignment, Entity, EvidenceRecord, RoleName } from '@wolfpack/shared';
import { EXCLUSIVE_ROLES } from '@wolfpack/shared';
import type { EvidenceConfig } from '../config.js';
import type { Ballot, GameContext, ResolvedVote } from '../context/gameContext.js';
import type { TrustScoreEngine } from '../trust/trustEngine.js';

const MAX_SPEECH_SAMPLES = 20;

export interface AppliedDelta {
  reason: string;
  rawDelta: number;
  trust: number;
}

export interface IngestSummary {
  speaker: string;
  applied: AppliedDelta[];
}

export class EvidenceIngestor {
  constructor(
    private readonly trust: TrustScoreEngine,
    private readonly config: EvidenceConfig
  ) {}

  // ============================================================================
  // Speech Evidence
  // ============================================================================

  ingest(context: GameContext, record: EvidenceRecord): IngestSummary {
    const summary: IngestSummary = { speaker: record.speaker, applied: [] };
    if (record.speaker === context.selfId) return summary;

    const entity = context.observe(record.speaker);
    const evidence = entity.evidence;
    const reliability = this.config.sourceReliability[record.source];
    const apply = (reason: string, rawDelta: number, confidence: number): void => {
      const trust = this.trust.update(entity, rawDelta, confidence, reliability);
      summary.applied.push({ reason, rawDelta, trust });
    };

    if (record.injection) {
      evidence.injectionCount += 1;
      apply(`injection:${record.injection.kind}`, this.config.injection[record.injection.kind], record.injection.confidence);
    }

    if (record.falseQuote && record.falseQuote.confidence > this.config.falseQuoteMinConfidence) {
      evidence.falseQuoteCount += 1;
      apply('false-quote', this.config.falseQuote, record.falseQuote.confidence);
    }

    if (record.speech) {
      evidence.speechSamples.push(record.speech);
      if (evidence.speechSamples.length > MAX_SPEECH_SAMPLES) evidence.speechSamples.shift();

      if (record.speech.overall >= this.config.logicalSpeechMinOverall) {
        apply('logical-speech', this.config.logicalSpeech, 1);
      } else if (record.speech.overall < this.config.weakSpeechMaxOverall) {
        apply('weak-speech', this.config.weakSpeech, 1);
      }
    }

    if (record.contradiction) {
      evidence.contradictionCount += 1;
      apply('contradiction', this.config.contradiction, 1);
    }

    if (record.claimedCheck) {
      this.registerClaim(context, entity, 'seer');
      evidence.claimedChecks.push({ round: record.round, ...record.claimedCheck });
      context.observe(record.claimedCheck.target).evidence.mentions += 1;
      this.settleClaimedCheck(context, entity, record.claimedCheck.target);
    } else if (record.claimedRole) {
      this.registerClaim(context, entity, record.claimedRole);
    }

    for (const target of record.supports) this.link(context, entity, target, 'supports');
    for (const target of record.suspects) this.link(context, entity, target, 'suspects');

    if (record.voteIntention && record.voteIntention !== record.speaker) {
      context.observe(record.voteIntention).evidence.mentions += 1;
    }

    if (summary.applied.length > 0) {
      logger.debug(
        `[Evidence] ${record.speaker}: ${summary.applied.map((a) => `${a.reason}→${a.trust.toFixed(1)}`).join(', ')}`
      );
    }
    return summary;
  }

  // ============================================================================
  // Votes & Verification
  // ============================================================================

  applyBallots(context: GameContext, round: number, ballots: Ballot[]): void {
    this.applyVoteOutcomes(context, context.recordBallots(round, ballots));
  }

  /**
   * Record an oracle label and reward or penalize everyone who voted for the entity
   */
  applyVerification(context: GameContext, id: string, alignment: Alignment): void {
    this.applyVoteOutcomes(context, context.verify(id, alignment));
  }

  private applyVoteOutcomes(context: GameContext, outcomes: ResolvedVote[]): void {
    for (const outcome of outcomes) {
      if (outcome.voter === context.selfId) continue;
      const delta = outcome.correct ? this.config.accurateVote : this.config.inaccurateVote;
      this.trust.update(context.observe(outcome.voter), delta, 1, 1);
    }
  }

  // ============================================================================
  // Claims & Social Graph
  // ============================================================================

  private registerClaim(context: GameContext, entity: Entity, role: RoleName): void {
    const evidence = entity.evidence;
    if (evidence.claimedRole === role) return;
    if (evidence.claimedRole !== null) evidence.attitudeChanges += 1;
    evidence.claimedRole = role;

    if (!EXCLUSIVE_ROLES.includes(role)) return;

    if (role === context.role) {
      evidence.fakeRoleClaim = true;
      logger.info(`[Evidence] ${entity.id} claims our own role ${role}`);
    }

    for (const other of context.others()) {
      if (other.id === entity.id || other.evidence.claimedRole !== role) continue;
      if (!context.isAlive(other.id)) continue;
      other.evidence.roleConflict = true;
      evidence.roleConflict = true;
    }
  }

  private settleClaimedCheck(context: GameContext, claimant: Entity, targetId: string): void {
    const label: Alignment | undefined =
      targetId === context.selfId ? 'ally' : context.entity(targetId)?.verifiedAlignment;
    if (!label) return;

    const hostile = label === 'hostile';
    const isWolf = context.team === 'village' ? hostile : !hostile;
    for (const check of claimant.evidence.claimedChecks) {
      if (check.target !== targetId) continue;
      if ((check.result === 'wolf') === isWolf) {
        claimant.evidence.claimProven = true;
      } else {
        claimant.evidence.fakeSeerClaim = true;
      }
    }
  }

  private link(context: GameContext, speaker: Entity, targetId: string, relation: 'supports' | 'suspects'): void {
    if (targetId === speaker.id) return;
    const evidence = speaker.evidence;
    const opposite = relation === 'supports' ? evidence.suspects : evidence.supports;
    const same = relation === 'supports' ? evidence.supports : evidence.suspects;

    const flipped = opposite.indexOf(targetId);
    if (flipped >= 0) {
      opposite.splice(flipped, 1);
      evidence.attitudeChanges += 1;
    }
    if (!same.includes(targetId)) same.push(targetId);

    const target = context.observe(targetId);
    target.evidence.mentions += 1;
    const incoming = relation === 'supports' ? target.evidence.defendedBy : target.evidence.accusedBy;
    const stale = relation === 'supports' ? target.evidence.accusedBy : target.evidence.defendedBy;
    const staleIndex = stale.indexOf(speaker.id);
    if (staleIndex >= 0) stale.splice(staleIndex, 1);
    if (!incoming.includes(speaker.id)) incoming.push(speaker.id);
  }
}
