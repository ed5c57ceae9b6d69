/**
 * Trust Score Engine
 * Confidence-weighted, non-linearly decaying trust updates per entity
 */

import { logger } from '@elizaos/core';
import type { Entity } from '@wolfpack/shared';
import { DEFAULT_TRUST, type TrustConfig } from '../config.js';

export const TRUST_MIN = 0;
export const TRUST_MAX = 100;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export class TrustScoreEngine {
  private config: TrustConfig;

  constructor(config: Partial<TrustConfig> = {}) {
    this.config = { ...DEFAULT_TRUST, ...config };
  }

  // ============================================================================
  // Update
  // ============================================================================

  /**
   * Apply one piece of evidence to an entity's trust. Mutates the entity.
   * Verified entities are pinned at 0 or 100 and keep no history.
   */
  update(entity: Entity, rawDelta: number, confidence: number, sourceReliability: number): number {
    if (entity.verifiedAlignment === 'hostile') {
      entity.trust = TRUST_MIN;
      return entity.trust;
    }
    if (entity.verifiedAlignment === 'ally') {
      entity.trust = TRUST_MAX;
      return entity.trust;
    }

    const delta = this.sanitizeDelta(entity.id, rawDelta);
    const conf = this.sanitizeUnit(entity.id, 'confidence', confidence);
    const reliability = this.sanitizeUnit(entity.id, 'sourceReliability', sourceReliability);
    const current = Number.isFinite(entity.trust) ? clamp(entity.trust, TRUST_MIN, TRUST_MAX) : this.config.initial;

    const weighted = delta * conf * reliability;
    const decay =
      weighted > 0
        ? Math.max(this.config.decayFloor, (TRUST_MAX - current) / TRUST_MAX)
        : Math.max(this.config.decayFloor, current / TRUST_MAX);
    let adjusted = weighted * decay;

    const recent = entity.trustHistory.slice(-this.config.trendWindow);
    if (recent.length > 0 && adjusted !== 0) {
      const mean = recent.reduce((sum, d) => sum + d, 0) / recent.length;
      if (mean !== 0 && Math.sign(mean) !== Math.sign(adjusted)) {
        adjusted *= this.config.reversalDamping;
      }
    }

    entity.trust = clamp(current + adjusted, TRUST_MIN, TRUST_MAX);
    entity.trustHistory.push(adjusted);
    if (entity.trustHistory.length > this.config.historyLength) {
      entity.trustHistory.splice(0, entity.trustHistory.length - this.config.historyLength);
    }

    return entity.trust;
  }

  /**
   * Sum of the most recent deltas (trend window)
   */
  trend(entity: Entity): number {
    return entity.trustHistory.slice(-this.config.trendWindow).reduce((sum, d) => sum + d, 0);
  }

  /**
   * One-line-per-entity trust listing, most suspicious first
   */
  summary(entities: Iterable<Entity>, topN: number = 5): string {
    const sorted = [...entities].sort((a, b) => a.trust - b.trust || a.id.localeCompare(b.id));
    if (sorted.length === 0) return 'No players tracked yet';

    return sorted
      .slice(0, topN)
      .map((e) => {
        const label = e.verifiedAlignment ? ` [verified ${e.verifiedAlignment}]` : '';
        const trend = this.trend(e);
        const arrow = trend > 0 ? '↑' : trend < 0 ? '↓' : '→';
        return `${e.id}: trust ${e.trust.toFixed(1)} ${arrow}${label}`;
      })
      .join('\n');
  }

  // ============================================================================
  // Input Sanitizing
  // ============================================================================

  private sanitizeDelta(id: string, value: number): number {
    if (Number.isFinite(value)) return value;
    logger.warn(`[Trust] Non-finite delta for ${id}, treating as 0`);
    return 0;
  }

  private sanitizeUnit(id: string, name: string, value: number): number {
    if (!Number.isFinite(value)) {
      logger.warn(`[Trust] Non-finite ${name} for ${id}, treating as 1.0`);
      return 1;
    }
    if (value < 0 || value > 1) {
      logger.warn(`[Trust] ${name}=${value} for ${id} outside [0,1], clamping`);
      return clamp(value, 0, 1);
    }
    return value;
  }
}
