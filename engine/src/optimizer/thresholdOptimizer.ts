/**
 * Adaptive Threshold Optimizer
 * Nudges per-action minimum score and confidence from a rolling window of
 * decision outcomes. Outcomes arrive later than decisions, keyed by decision id
 * or settled in bulk when a target's alignment is revealed in the same session.
 * Only the thresholds are shared between sessions.
 */

import { logger } from '@elizaos/core';
import type { ActionType, Alignment, Thresholds } from '@wolfpack/shared';
import { DEFAULT_OPTIMIZER, DEFAULT_THRESHOLDS, type OptimizerConfig, type ThresholdSpec } from '../config.js';
import { clamp } from '../trust/trustEngine.js';

export interface OutcomeSample {
  action: ActionType;
  score: number;
  success: boolean;
}

export interface PendingDecision {
  decisionId: string;
  /** Game context the decision was made in; player ids repeat across games */
  sessionId: string;
  action: ActionType;
  target: string;
  score: number;
  createdAt: number;
}

/** Actions that succeed when the target turns out hostile */
const HOSTILE_ACTIONS: ReadonlySet<ActionType> = new Set(['vote', 'kill', 'poison', 'shoot', 'check']);

export class ThresholdOptimizer {
  private config: OptimizerConfig;
  private specs: Record<ActionType, ThresholdSpec>;
  private current: Record<ActionType, Thresholds>;
  private samples: OutcomeSample[] = [];
  private sampleCounts: Map<ActionType, number> = new Map();
  private pending: Map<string, PendingDecision> = new Map();

  constructor(
    thresholds: Record<ActionType, ThresholdSpec> = DEFAULT_THRESHOLDS,
    config: Partial<OptimizerConfig> = {}
  ) {
    this.config = { ...DEFAULT_OPTIMIZER, ...config };
    this.specs = thresholds;
    this.current = {
      vote: this.initial('vote'),
      kill: this.initial('kill'),
      poison: this.initial('poison'),
      antidote: this.initial('antidote'),
      shoot: this.initial('shoot'),
      check: this.initial('check'),
      protect: this.initial('protect')
    };
  }

  private initial(action: ActionType): Thresholds {
    const spec = this.specs[action];
    return { minScore: spec.minScore, minConfidence: spec.minConfidence };
  }

  thresholds(action: ActionType): Thresholds {
    return { ...this.current[action] };
  }

  // ============================================================================
  // Feedback Channel
  // ============================================================================

  /**
   * Register a decision whose outcome is not known yet
   */
  track(decisionId: string, sessionId: string, action: ActionType, target: string, score: number): void {
    this.pending.set(decisionId, { decisionId, sessionId, action, target, score, createdAt: Date.now() });
    if (this.pending.size > this.config.maxPending) {
      const oldest = this.pending.keys().next();
      if (!oldest.done) this.pending.delete(oldest.value);
    }
  }

  getPending(): PendingDecision[] {
    return [...this.pending.values()];
  }

  /**
   * Settle one tracked decision. Returns false for unknown ids.
   */
  resolve(decisionId: string, success: boolean): boolean {
    const decision = this.pending.get(decisionId);
    if (!decision) return false;
    this.pending.delete(decisionId);
    this.record(decision.action, decision.score, success);
    return true;
  }

  /**
   * Settle every decision of one session aimed at `target` once its alignment is known
   */
  resolveTarget(sessionId: string, target: string, alignment: Alignment): number {
    let settled = 0;
    for (const decision of [...this.pending.values()]) {
      if (decision.sessionId !== sessionId || decision.target !== target) continue;
      const success = HOSTILE_ACTIONS.has(decision.action) ? alignment === 'hostile' : alignment === 'ally';
      this.resolve(decision.decisionId, success);
      settled += 1;
    }
    return settled;
  }

  // ============================================================================
  // Rolling Window
  // ============================================================================

  record(action: ActionType, score: number, success: boolean): void {
    this.samples.push({ action, score, success });
    if (this.samples.length > this.config.window) this.samples.shift();

    const count = (this.sampleCounts.get(action) ?? 0) + 1;
    this.sampleCounts.set(action, count);
    if (count % this.config.adjustEvery === 0) this.adjust(action);
  }

  successRate(action: ActionType): number | null {
    const relevant = this.samples.filter((s) => s.action === action);
    if (relevant.length === 0) return null;
    return relevant.filter((s) => s.success).length / relevant.length;
  }

  private adjust(action: ActionType): void {
    const rate = this.successRate(action);
    if (rate === null) return;

    const spec = this.specs[action];
    const before = this.current[action];
    let direction = 0;
    if (rate >= this.config.lowerAtRate) direction = -1;
    else if (rate <= this.config.raiseAtRate) direction = 1;
    if (direction === 0) return;

    const next: Thresholds = {
      minScore: clamp(before.minScore + direction * spec.scoreStep, spec.scoreBounds[0], spec.scoreBounds[1]),
      minConfidence: clamp(
        before.minConfidence + direction * spec.confidenceStep,
        spec.confidenceBounds[0],
        spec.confidenceBounds[1]
      )
    };
    this.current[action] = next;

    logger.info(
      `[Optimizer] ${action}: success ${(rate * 100).toFixed(0)}% → minScore ${before.minScore}→${next.minScore}, ` +
        `minConfidence ${before.minConfidence.toFixed(2)}→${next.minConfidence.toFixed(2)}`
    );
  }

  getState(): { thresholds: Record<ActionType, Thresholds>; samples: number; pending: number } {
    return {
      thresholds: structuredClone(this.current),
      samples: this.samples.length,
      pending: this.pending.size
    };
  }
}
