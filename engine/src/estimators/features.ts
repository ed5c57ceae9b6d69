/**
 * Feature extraction for external probability estimators
 */

import type { Entity } from '@wolfpack/shared';
import type { GameContext } from '../context/gameContext.js';
import { clamp } from '../trust/trustEngine.js';

/**
 * Normalized [0,1] signals plus a few raw counts the likelihood model needs
 */
export interface PlayerFeatures {
  trust: number;
  trustTrend: number;
  voteAccuracy: number;
  resolvedVotes: number;
  contradictionRate: number;
  contradictions: number;
  injectionRate: number;
  injections: number;
  falseQuoteRate: number;
  falseQuotes: number;
  speechQuality: number;
  speechSamples: number;
  speechShare: number;
  mentionRate: number;
  nightSurvival: number;
  allianceStrength: number;
  voteDiversity: number;
  followVoteRate: number;
  votedAgainst: number;
  attitudeChanges: number;
  keyVoteMistakes: number;
  hasClaim: number;
  fakeRoleClaim: number;
  roleConflict: number;
}

export interface ExternalProbabilityEstimator {
  readonly name: string;
  /** Probability in [0,1] that the entity is hostile, or null when unknown */
  predict(features: PlayerFeatures): number | null;
}

export function extractFeatures(entity: Entity, context: GameContext): PlayerFeatures {
  const e = entity.evidence;
  const trust = Number.isFinite(entity.trust) ? entity.trust : 50;
  const trend = entity.trustHistory.slice(-3).reduce((a, b) => a + b, 0);

  const resolved = e.voteHistory.filter((v) => v.targetWasHostile !== null);
  const accuracy = resolved.length > 0 ? resolved.filter((v) => v.targetWasHostile).length / resolved.length : 0.5;

  const samples = e.speechSamples;
  const quality = samples.length > 0 ? samples.reduce((sum, s) => sum + s.overall, 0) / samples.length / 100 : 0.5;

  const totalSpeeches = context.others().reduce((sum, other) => sum + other.evidence.speechCount, 0);
  const nights = Math.max(1, context.round - 1);
  const others = Math.max(1, context.aliveCount - 1);
  const targets = new Set(e.voteHistory.map((v) => v.target));

  return {
    trust: trust / 100,
    trustTrend: clamp((trend + 50) / 100, 0, 1),
    voteAccuracy: accuracy,
    resolvedVotes: resolved.length,
    contradictionRate: clamp(e.contradictionCount / 5, 0, 1),
    contradictions: e.contradictionCount,
    injectionRate: clamp(e.injectionCount / 3, 0, 1),
    injections: e.injectionCount,
    falseQuoteRate: clamp(e.falseQuoteCount / 3, 0, 1),
    falseQuotes: e.falseQuoteCount,
    speechQuality: clamp(quality, 0, 1),
    speechSamples: samples.length,
    speechShare: totalSpeeches > 0 ? e.speechCount / totalSpeeches : 0,
    mentionRate: clamp(e.mentions / 10, 0, 1),
    nightSurvival: clamp(e.nightsSurvived / nights, 0, 1),
    allianceStrength: clamp(e.supports.length / others, 0, 1),
    voteDiversity: e.voteHistory.length > 0 ? targets.size / e.voteHistory.length : 0,
    followVoteRate: e.voteHistory.length > 0 ? e.followVotes / e.voteHistory.length : 0,
    votedAgainst: clamp(e.timesVotedAgainst / 10, 0, 1),
    attitudeChanges: clamp(e.attitudeChanges / 5, 0, 1),
    keyVoteMistakes: clamp(e.keyVoteMistakes / 3, 0, 1),
    hasClaim: e.claimedRole !== null ? 1 : 0,
    fakeRoleClaim: e.fakeRoleClaim || e.fakeSeerClaim ? 1 : 0,
    roleConflict: e.roleConflict ? 1 : 0
  };
}
