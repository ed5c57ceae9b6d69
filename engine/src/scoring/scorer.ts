/**
 * Multi-Dimensional Scorer
 * Sums weighted dimension scores for one entity and one action, applies the
 * oracle override and the phase multiplier. Higher means "act on this entity".
 */

import type { ActionType, Entity, GamePhase } from '@wolfpack/shared';
import type { EngineConfig, Perspective } from '../config.js';
import { hasEvidence, type GameContext } from '../context/gameContext.js';
import type { TrustScoreEngine } from '../trust/trustEngine.js';
import { DIMENSIONS, evaluateDimension } from './dimensions.js';

export interface ScoreBreakdown {
  entityId: string;
  action: ActionType;
  perspective: Perspective;
  phase: GamePhase;
  multiplier: number;
  /** Non-zero dimension contributions before the oracle and phase multiplier */
  dimensions: Record<string, number>;
  subtotal: number;
  oracle: number;
  total: number;
}

export class MultiDimensionalScorer {
  constructor(
    private readonly config: EngineConfig,
    private readonly trust: TrustScoreEngine
  ) {}

  perspectiveFor(action: ActionType): Perspective {
    return this.config.perspectives[action];
  }

  score(entity: Entity, context: GameContext, action: ActionType): number {
    return this.explain(entity, context, action).total;
  }

  explain(entity: Entity, context: GameContext, action: ActionType): ScoreBreakdown {
    const perspective = this.perspectiveFor(action);
    const settings = this.config.scoring.perspectives[perspective];
    const evidenced = hasEvidence(entity);
    const trend = this.trust.trend(entity);

    const dimensions: Record<string, number> = {};
    let subtotal = 0;

    for (const dimension of DIMENSIONS[perspective]) {
      const spec = settings.dimensions[dimension.name];
      if (!spec || !spec.enabled) continue;
      // without evidence only the trust group speaks
      if (!evidenced && dimension.group !== 'trust') continue;

      const points = evaluateDimension(dimension, spec, {
        entity,
        context,
        trend,
        params: spec.params,
        values: spec.values,
        policy: this.config.policy
      });
      if (points !== 0) {
        dimensions[dimension.name] = points;
        subtotal += points;
      }
    }

    let oracle = 0;
    let combined = subtotal;
    if (entity.verifiedAlignment) {
      oracle = settings.oracle[entity.verifiedAlignment];
      combined = oracle > 0 ? oracle + Math.max(0, subtotal) : oracle + Math.min(0, subtotal);
    }

    const phase = context.phase;
    const multiplier = this.config.scoring.phaseMultipliers[phase];

    return {
      entityId: entity.id,
      action,
      perspective,
      phase,
      multiplier,
      dimensions,
      subtotal,
      oracle,
      total: combined * multiplier
    };
  }
}
