/**
 * Scoring Dimensions
 * The catalogue of independently weighted signals for each scoring perspective.
 * Bands, ladders and points come from configuration; this file only measures.
 */

import type { Entity, SpeechQuality } from '@wolfpack/shared';
import { EXCLUSIVE_ROLES } from '@wolfpack/shared';
import type { Band, DimensionSpec, PolicyConfig, Perspective } from '../config.js';
import type { GameContext } from '../context/gameContext.js';

export type DimensionGroup = 'trust' | 'history' | 'speech' | 'anomaly' | 'identity' | 'social' | 'voting' | 'timing';

export interface DimensionInput {
  entity: Entity;
  context: GameContext;
  trend: number;
  params: Record<string, number>;
  values: Record<string, number>;
  policy: PolicyConfig;
}

interface DimensionBase {
  name: string;
  group: DimensionGroup;
}

/**
 * bands: first matching band of a measured value
 * ladder: indexed by a count, saturating at the last step
 * perItem: points per counted item, capped
 * flag: fixed points when the condition holds
 * value: the measure itself
 */
export type Dimension =
  | (DimensionBase & { mode: 'bands' | 'value'; measure: (input: DimensionInput) => number | null })
  | (DimensionBase & { mode: 'ladder' | 'perItem'; measure: (input: DimensionInput) => number })
  | (DimensionBase & { mode: 'flag'; measure: (input: DimensionInput) => boolean });

// ============================================================================
// Evaluation
// ============================================================================

export function matchBand(bands: Band[], value: number): number {
  for (const band of bands) {
    const hit =
      (band.op === 'lt' && value < band.value) ||
      (band.op === 'lte' && value <= band.value) ||
      (band.op === 'gt' && value > band.value) ||
      (band.op === 'gte' && value >= band.value);
    if (hit) return band.points;
  }
  return 0;
}

export function evaluateDimension(dimension: Dimension, spec: DimensionSpec, input: DimensionInput): number {
  let points = 0;
  switch (dimension.mode) {
    case 'bands': {
      const value = dimension.measure(input);
      points = value === null ? 0 : matchBand(spec.bands, value);
      break;
    }
    case 'value':
      points = dimension.measure(input) ?? 0;
      break;
    case 'ladder': {
      const count = Math.floor(dimension.measure(input));
      points = count > 0 && spec.ladder.length > 0 ? spec.ladder[Math.min(count, spec.ladder.length) - 1] : 0;
      break;
    }
    case 'perItem': {
      const total = dimension.measure(input) * spec.points;
      points = spec.cap === undefined ? total : Math.sign(total) * Math.min(Math.abs(total), spec.cap);
      break;
    }
    case 'flag':
      points = dimension.measure(input) ? spec.points : 0;
      break;
  }
  return points * spec.weight;
}

// ============================================================================
// Measures
// ============================================================================

function trustOf(entity: Entity | undefined): number {
  return entity && Number.isFinite(entity.trust) ? entity.trust : 50;
}

function averageSpeech(entity: Entity, key: keyof SpeechQuality): number | null {
  const samples = entity.evidence.speechSamples;
  if (samples.length === 0) return null;
  return samples.reduce((sum, s) => sum + s[key], 0) / samples.length;
}

function voteAccuracy(entity: Entity): number | null {
  const resolved = entity.evidence.voteHistory.filter((v) => v.targetWasHostile !== null);
  if (resolved.length === 0) return null;
  return resolved.filter((v) => v.targetWasHostile === true).length / resolved.length;
}

function countWhere(ids: string[], context: GameContext, predicate: (trust: number) => boolean): number {
  return ids.filter((id) => predicate(trustOf(context.entity(id)))).length;
}

function credibleClaim(entity: Entity): boolean {
  const e = entity.evidence;
  return e.claimedRole !== null && !e.fakeRoleClaim && !e.fakeSeerClaim && !e.roleConflict;
}

function coVotesWithSuspicious({ entity, context, policy }: DimensionInput): number {
  let count = 0;
  for (const vote of entity.evidence.voteHistory) {
    const partners = context
      .ballotsFor(vote.round)
      .filter((b) => b.voter !== entity.id && b.target === vote.target)
      .some((b) => trustOf(context.entity(b.voter)) < policy.suspiciousTrust);
    if (partners) count += 1;
  }
  return count;
}

function votesAgainstAllies({ entity, context }: DimensionInput): number | null {
  const votes = entity.evidence.voteHistory;
  if (votes.length === 0) return null;
  const against = votes.filter(
    (v) => v.targetWasHostile === false || context.entity(v.target)?.verifiedAlignment === 'ally'
  );
  return against.length / votes.length;
}

function threatRoleValue({ entity, params, values }: DimensionInput): number | null {
  const e = entity.evidence;
  const baseline = params.baseline ?? 50;
  let key: string;

  if (e.claimedRole !== null && e.claimedRole !== 'villager' && credibleClaim(entity)) {
    key = e.claimedRole;
  } else if (e.claimedChecks.length >= (params.likelySeerChecks ?? 1)) {
    key = 'likely_seer';
  } else {
    const overall = averageSpeech(entity, 'overall');
    key = overall !== null && overall >= (params.strongSpeech ?? 70) ? 'strong_villager' : 'weak_villager';
  }

  const value = values[key];
  return value === undefined ? null : value - baseline;
}

// ============================================================================
// Catalogue
// ============================================================================

const speechBand = (name: string, key: keyof SpeechQuality): Dimension => ({
  name,
  group: 'speech',
  mode: 'bands',
  measure: ({ entity }) => averageSpeech(entity, key)
});

const SUSPICION: Dimension[] = [
  { name: 'trustLevel', group: 'trust', mode: 'bands', measure: ({ entity }) => trustOf(entity) },
  { name: 'trustTrend', group: 'trust', mode: 'bands', measure: ({ trend }) => trend },
  { name: 'voteAccuracy', group: 'history', mode: 'bands', measure: ({ entity }) => voteAccuracy(entity) },
  { name: 'timesVotedAgainst', group: 'history', mode: 'ladder', measure: ({ entity }) => entity.evidence.timesVotedAgainst },
  {
    name: 'lateSurvival',
    group: 'timing',
    mode: 'flag',
    measure: ({ entity, context, params }) =>
      context.isAlive(entity.id) &&
      context.round >= (params.minRound ?? 4) &&
      context.aliveCount <= (params.maxAlive ?? 7)
  },
  speechBand('speechLogic', 'logic'),
  speechBand('speechInformation', 'information'),
  speechBand('speechPersuasion', 'persuasion'),
  speechBand('speechStrategy', 'strategy'),
  {
    name: 'speechFrequency',
    group: 'speech',
    mode: 'bands',
    measure: ({ entity, context }) => {
      const count = entity.evidence.speechCount;
      const average = context.averageSpeechCount();
      return count > 0 && average > 0 ? count / average : null;
    }
  },
  { name: 'injection', group: 'anomaly', mode: 'ladder', measure: ({ entity }) => entity.evidence.injectionCount },
  { name: 'falseQuote', group: 'anomaly', mode: 'ladder', measure: ({ entity }) => entity.evidence.falseQuoteCount },
  { name: 'contradiction', group: 'anomaly', mode: 'ladder', measure: ({ entity }) => entity.evidence.contradictionCount },
  { name: 'attitudeChanges', group: 'anomaly', mode: 'bands', measure: ({ entity }) => entity.evidence.attitudeChanges },
  {
    name: 'bandwagon',
    group: 'anomaly',
    mode: 'bands',
    measure: ({ entity, params }) => {
      const votes = entity.evidence.voteHistory.length;
      return votes >= (params.minVotes ?? 1) ? entity.evidence.followVotes / votes : null;
    }
  },
  { name: 'fakeRoleClaim', group: 'identity', mode: 'flag', measure: ({ entity }) => entity.evidence.fakeRoleClaim },
  { name: 'roleConflict', group: 'identity', mode: 'flag', measure: ({ entity }) => entity.evidence.roleConflict },
  {
    name: 'unprovenClaim',
    group: 'identity',
    mode: 'flag',
    measure: ({ entity, context, params }) => {
      const e = entity.evidence;
      return (
        e.claimedRole !== null &&
        EXCLUSIVE_ROLES.includes(e.claimedRole) &&
        !e.claimProven &&
        context.round >= (params.minRound ?? 3)
      );
    }
  },
  { name: 'fakeSeerClaim', group: 'identity', mode: 'flag', measure: ({ entity }) => entity.evidence.fakeSeerClaim },
  { name: 'mentions', group: 'social', mode: 'bands', measure: ({ entity }) => entity.evidence.mentions },
  {
    name: 'defendedBySuspicious',
    group: 'social',
    mode: 'perItem',
    measure: ({ entity, context, policy }) =>
      countWhere(entity.evidence.defendedBy, context, (t) => t < policy.suspiciousTrust)
  },
  {
    name: 'accusedByTrusted',
    group: 'social',
    mode: 'perItem',
    measure: ({ entity, context, policy }) =>
      countWhere(entity.evidence.accusedBy, context, (t) => t > policy.trustedTrust)
  },
  {
    name: 'protectsSuspicious',
    group: 'social',
    mode: 'ladder',
    measure: ({ entity, context, policy }) =>
      countWhere(entity.evidence.supports, context, (t) => t < policy.suspiciousTrust)
  },
  { name: 'coVoteWithSuspicious', group: 'social', mode: 'ladder', measure: coVotesWithSuspicious },
  { name: 'votesAgainstAllies', group: 'voting', mode: 'bands', measure: votesAgainstAllies },
  { name: 'keyVoteMistakes', group: 'voting', mode: 'ladder', measure: ({ entity }) => entity.evidence.keyVoteMistakes },
  { name: 'voteHesitation', group: 'voting', mode: 'ladder', measure: ({ entity }) => entity.evidence.voteHesitations },
  {
    name: 'nightSurvival',
    group: 'timing',
    mode: 'flag',
    measure: ({ entity, context, params }) => {
      if (context.round < (params.minRound ?? 4)) return false;
      return entity.evidence.nightsSurvived / (context.round - 1) > (params.minRate ?? 0.8);
    }
  },
  { name: 'criticalSpeeches', group: 'timing', mode: 'bands', measure: ({ entity }) => entity.evidence.criticalSpeeches },
  {
    name: 'suspiciousSkillTiming',
    group: 'timing',
    mode: 'flag',
    measure: ({ entity }) => entity.evidence.suspiciousSkillTiming
  }
];

const THREAT: Dimension[] = [
  { name: 'trustInfluence', group: 'trust', mode: 'bands', measure: ({ entity }) => trustOf(entity) },
  { name: 'roleValue', group: 'identity', mode: 'value', measure: threatRoleValue },
  { name: 'speechStrength', group: 'speech', mode: 'bands', measure: ({ entity }) => averageSpeech(entity, 'overall') },
  {
    name: 'accusesTeammates',
    group: 'social',
    mode: 'perItem',
    measure: ({ entity, context }) =>
      entity.evidence.suspects.filter((id) => context.entity(id)?.verifiedAlignment === 'ally').length
  },
  {
    name: 'checkedTeammate',
    group: 'identity',
    mode: 'flag',
    measure: ({ entity, context }) =>
      entity.evidence.claimedChecks.some(
        (c) => c.result === 'wolf' && (c.target === context.selfId || context.entity(c.target)?.verifiedAlignment === 'ally')
      )
  }
];

const PROTECTION: Dimension[] = [
  { name: 'trustLevel', group: 'trust', mode: 'bands', measure: ({ entity }) => trustOf(entity) },
  {
    name: 'keyRoleClaim',
    group: 'identity',
    mode: 'value',
    measure: ({ entity, values }) => {
      const role = entity.evidence.claimedRole;
      if (role === null || !credibleClaim(entity)) return null;
      return values[role] ?? null;
    }
  },
  {
    name: 'targetedBySuspicious',
    group: 'social',
    mode: 'perItem',
    measure: ({ entity, context, policy }) =>
      countWhere(entity.evidence.accusedBy, context, (t) => t < policy.suspiciousTrust)
  },
  { name: 'logicalSpeech', group: 'speech', mode: 'bands', measure: ({ entity }) => averageSpeech(entity, 'overall') },
  { name: 'injection', group: 'anomaly', mode: 'ladder', measure: ({ entity }) => entity.evidence.injectionCount }
];

export const DIMENSIONS: Record<Perspective, Dimension[]> = {
  suspicion: SUSPICION,
  threat: THREAT,
  protection: PROTECTION
};

export { credibleClaim, trustOf };
