/**
 * Probabilistic Fusion Engine
 * Blends the rule-based score with an optional external probability and
 * rates how decisive a set of fused candidate scores is
 */

import type { Entity } from '@wolfpack/shared';
import { DEFAULT_CONFIDENCE, DEFAULT_FUSION, type ConfidenceConfig, type FusionConfig } from '../config.js';
import { clamp } from '../trust/trustEngine.js';

export interface FusionContext {
  round: number;
  /** injections + false quotes + contradictions observed for the entity */
  strongAnomalies: number;
}

export function fusionContextFor(entity: Entity, round: number): FusionContext {
  const e = entity.evidence;
  return { round, strongAnomalies: e.injectionCount + e.falseQuoteCount + e.contradictionCount };
}

/**
 * A usable probability, or null when the estimate is missing or not a number
 */
export function usableProbability(value: number | null | undefined): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  return clamp(value, 0, 1);
}

export class ProbabilisticFusionEngine {
  private fusion: FusionConfig;
  private confidenceWeights: ConfidenceConfig;

  constructor(fusion: Partial<FusionConfig> = {}, confidence: Partial<ConfidenceConfig> = {}) {
    this.fusion = { ...DEFAULT_FUSION, ...fusion };
    this.confidenceWeights = { ...DEFAULT_CONFIDENCE, ...confidence };
  }

  /**
   * Weight given to the external estimate, always within [minRatio, maxRatio]
   */
  fusionRatio(ruleScore: number, probability: number, ctx: FusionContext): number {
    const f = this.fusion;
    let ratio = f.baseRatio;

    if (ctx.round <= f.earlyRound) ratio *= f.earlyFactor;
    else if (ctx.round >= f.lateRound) ratio *= f.lateFactor;

    if (ctx.strongAnomalies >= f.anomalyThreshold) ratio *= f.anomalyFactor;
    if (Math.abs(ruleScore - probability * 100) > f.disagreementThreshold) ratio *= f.disagreementFactor;

    return clamp(ratio, f.minRatio, f.maxRatio);
  }

  fuse(ruleScore: number, externalProbability: number | null | undefined, ctx: FusionContext): number {
    const probability = usableProbability(externalProbability);
    if (probability === null) return ruleScore;

    const ratio = this.fusionRatio(ruleScore, probability, ctx);
    return ruleScore * (1 - ratio) + probability * 100 * ratio;
  }

  /**
   * Decision confidence in [0,1] from the top score, the gap to the runner-up
   * and the spread of all scores
   */
  confidence(scores: Iterable<number>): number {
    const values = [...scores].filter((v) => Number.isFinite(v)).sort((a, b) => b - a);
    if (values.length === 0) return 0;

    const w = this.confidenceWeights;
    const top = clamp(values[0] / w.topScale, 0, 1);

    let gap = 1;
    let spread = 0.5;
    if (values.length > 1) {
      gap = clamp((values[0] - values[1]) / w.gapScale, 0, 1);
      const mean = values.reduce((a, b) => a + b, 0) / values.length;
      const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
      spread = clamp(Math.sqrt(variance) / w.spreadScale, 0, 1);
    }

    return clamp(w.topWeight * top + w.gapWeight * gap + w.spreadWeight * spread, 0, 1);
  }
}
