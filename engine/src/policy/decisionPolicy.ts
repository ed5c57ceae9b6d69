/**
 * Decision Policy
 * Shared target-selection algorithm: filter, overrides, score, fuse, argmax,
 * thresholds. Every path returns a Decision; nothing here throws on bad input.
 */

import { logger } from '@elizaos/core';
import { v4 as uuidv4 } from 'uuid';
import type {
  AbstainCause,
  ActionType,
  CandidateScore,
  Decision,
  Entity,
  OverrideKind,
  ResourceKey
} from '@wolfpack/shared';
import type { EngineConfig } from '../config.js';
import type { GameContext } from '../context/gameContext.js';
import { extractFeatures, type ExternalProbabilityEstimator } from '../estimators/features.js';
import { fusionContextFor, usableProbability, type ProbabilisticFusionEngine } from '../fusion/fusionEngine.js';
import type { ThresholdOptimizer } from '../optimizer/thresholdOptimizer.js';
import { credibleClaim, matchBand, trustOf } from '../scoring/dimensions.js';
import type { MultiDimensionalScorer } from '../scoring/scorer.js';

export interface PolicyDependencies {
  config: EngineConfig;
  scorer: MultiDimensionalScorer;
  fusion: ProbabilisticFusionEngine;
  optimizer: ThresholdOptimizer;
  estimator?: ExternalProbabilityEstimator;
}

export interface PolicyTraits {
  action: ActionType;
  /** Hostile actions never target allies; protective ones never target verified hostiles */
  hostile: boolean;
  resource?: ResourceKey;
  /** Target the vote leader when the agent itself was voted out */
  revenge?: boolean;
}

export interface OverrideChoice {
  target: string;
  kind: OverrideKind;
  reason: string;
}

interface ScoringPass {
  scores: Record<string, CandidateScore>;
  degraded: boolean;
}

const TIE_EPSILON = 1e-9;

export abstract class DecisionPolicy {
  readonly action: ActionType;
  protected readonly config: EngineConfig;
  protected readonly scorer: MultiDimensionalScorer;
  protected readonly fusion: ProbabilisticFusionEngine;
  protected readonly optimizer: ThresholdOptimizer;
  protected readonly estimator?: ExternalProbabilityEstimator;

  protected constructor(
    protected readonly traits: PolicyTraits,
    deps: PolicyDependencies
  ) {
    this.action = traits.action;
    this.config = deps.config;
    this.scorer = deps.scorer;
    this.fusion = deps.fusion;
    this.optimizer = deps.optimizer;
    this.estimator = deps.estimator;
  }

  // ============================================================================
  // Main Entry Point
  // ============================================================================

  decide(candidates: string[], context: GameContext): Decision {
    const decisionId = uuidv4();
    const warnings: string[] = [];
    const unique = [...new Set(candidates)];

    if (unique.length === 0) {
      return this.abstain(decisionId, context, 'no-candidates', 'No candidates offered', {}, 0, false, warnings);
    }
    if (this.traits.resource && !context.hasResource(this.traits.resource)) {
      return this.abstain(
        decisionId,
        context,
        'resource-spent',
        `${this.traits.resource} already used`,
        {},
        0,
        false,
        warnings
      );
    }

    const eligible = unique.filter((id) => {
      const reason = this.exclusionReason(id, context);
      if (reason) logger.debug(`[Policy:${this.action}] Skipping ${id}: ${reason}`);
      return reason === null;
    });
    if (eligible.length === 0) {
      return this.abstain(
        decisionId,
        context,
        'no-candidates',
        `All ${unique.length} candidates are ineligible`,
        {},
        0,
        false,
        warnings
      );
    }

    const forced = this.applyOverrides(eligible, context);
    const { scores, degraded } = this.scoreAll(eligible, context, warnings);
    const confidence = this.fusion.confidence(Object.values(scores).map((s) => s.fused));

    if (forced) {
      return this.target(decisionId, context, forced.target, forced.reason, scores, confidence, degraded, warnings, forced.kind);
    }

    const best = this.pickBest(eligible, scores, context);
    const thresholds = this.optimizer.thresholds(this.action);
    const top = scores[best].fused;

    if (top < thresholds.minScore) {
      return this.abstain(
        decisionId,
        context,
        'threshold-miss',
        `Best candidate ${best} scored ${top.toFixed(1)}, below ${thresholds.minScore}`,
        scores,
        confidence,
        degraded,
        warnings
      );
    }
    if (confidence < thresholds.minConfidence) {
      return this.abstain(
        decisionId,
        context,
        'threshold-miss',
        `Confidence ${confidence.toFixed(2)} below ${thresholds.minConfidence.toFixed(2)}`,
        scores,
        confidence,
        degraded,
        warnings
      );
    }

    return this.target(
      decisionId,
      context,
      best,
      `Highest ${this.scorer.perspectiveFor(this.action)} score ${top.toFixed(1)}`,
      scores,
      confidence,
      degraded,
      warnings
    );
  }

  // ============================================================================
  // Hooks
  // ============================================================================

  /**
   * Reason a candidate may not be targeted, or null when eligible
   */
  protected exclusionReason(id: string, context: GameContext): string | null {
    if (id === context.selfId) return 'self';
    const entity = context.entity(id);
    if (!entity) return 'unknown';
    if (context.isEliminated(id)) return 'eliminated';
    if (this.traits.hostile) {
      if (entity.verifiedAlignment === 'ally') return 'ally';
    } else if (entity.verifiedAlignment === 'hostile') {
      return 'verified hostile';
    }
    return null;
  }

  protected applyOverrides(eligible: string[], context: GameContext): OverrideChoice | null {
    if (this.traits.hostile) {
      const exposed = eligible.find((id) => context.entity(id)?.verifiedAlignment === 'hostile');
      if (exposed) {
        return { target: exposed, kind: 'oracle-hostile', reason: `${exposed} is verified hostile` };
      }
    }

    if (this.traits.revenge && context.eliminationOf(context.selfId)?.cause === 'vote') {
      const leader = context.voteLeaderAgainst(context.selfId);
      if (leader && eligible.includes(leader)) {
        return { target: leader, kind: 'vote-leader-revenge', reason: `${leader} led the vote against us` };
      }
    }

    return null;
  }

  /**
   * Score subtracted for a credible claim that makes acting on the entity costly
   */
  protected riskPenalty(entity: Entity): number {
    const settings = this.config.scoring.riskPenalty;
    const roles = settings.roles[this.action];
    const role = entity.evidence.claimedRole;
    if (!roles || role === null || !credibleClaim(entity)) return 0;

    const base = roles[role];
    if (base === undefined) return 0;
    return Math.min(settings.cap, base + matchBand(settings.trustBands, trustOf(entity)));
  }

  // ============================================================================
  // Scoring
  // ============================================================================

  private scoreAll(eligible: string[], context: GameContext, warnings: string[]): ScoringPass {
    const scores: Record<string, CandidateScore> = {};
    const useEstimator = this.estimator !== undefined && this.scorer.perspectiveFor(this.action) === 'suspicion';
    let degraded = false;

    for (const id of eligible) {
      const entity = context.observe(id);
      const rule = this.scorer.score(entity, context, this.action);
      const risk = this.riskPenalty(entity);
      const adjusted = rule - risk;

      let probability: number | null = null;
      if (useEstimator) {
        probability = this.estimate(entity, context, warnings);
        if (probability === null) degraded = true;
      }

      const fused = this.fusion.fuse(adjusted, probability, fusionContextFor(entity, context.round));
      scores[id] = { id, rule, risk, probability, fused };
    }

    return { scores, degraded };
  }

  private estimate(entity: Entity, context: GameContext, warnings: string[]): number | null {
    if (!this.estimator) return null;
    try {
      const value = usableProbability(this.estimator.predict(extractFeatures(entity, context)));
      if (value === null) warnings.push(`${this.estimator.name} gave no estimate for ${entity.id}`);
      return value;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`${this.estimator.name} failed for ${entity.id}: ${message}`);
      logger.warn(`[Policy:${this.action}] Estimator ${this.estimator.name} failed: ${message}`);
      return null;
    }
  }

  private pickBest(eligible: string[], scores: Record<string, CandidateScore>, context: GameContext): string {
    let best = eligible[0];
    for (const id of eligible.slice(1)) {
      const diff = scores[id].fused - scores[best].fused;
      if (diff > TIE_EPSILON) {
        best = id;
      } else if (Math.abs(diff) <= TIE_EPSILON && trustOf(context.entity(id)) < trustOf(context.entity(best))) {
        best = id;
      }
    }
    return best;
  }

  // ============================================================================
  // Results
  // ============================================================================

  private target(
    decisionId: string,
    context: GameContext,
    target: string,
    reason: string,
    scores: Record<string, CandidateScore>,
    confidence: number,
    degraded: boolean,
    warnings: string[],
    override?: OverrideKind
  ): Decision {
    if (this.traits.resource) context.consume(this.traits.resource);
    context.recordTarget(this.action, target);
    context.log('decision', `${this.action} → ${target}: ${reason}`);
    this.optimizer.track(decisionId, context.sessionId, this.action, target, scores[target]?.fused ?? 0);
    logger.info(`[Policy:${this.action}] → ${target} (${reason}, confidence ${confidence.toFixed(2)})`);

    return {
      kind: 'target',
      decisionId,
      action: this.action,
      target,
      reason,
      scores,
      confidence,
      degraded,
      warnings,
      ...(override ? { override } : {})
    };
  }

  private abstain(
    decisionId: string,
    context: GameContext,
    cause: AbstainCause,
    reason: string,
    scores: Record<string, CandidateScore>,
    confidence: number,
    degraded: boolean,
    warnings: string[]
  ): Decision {
    context.log('decision', `${this.action} abstain (${cause}): ${reason}`);
    logger.info(`[Policy:${this.action}] Abstain (${cause}): ${reason}`);
    return {
      kind: 'abstain',
      decisionId,
      action: this.action,
      target: null,
      cause,
      reason,
      scores,
      confidence,
      degraded,
      warnings
    };
  }
}
