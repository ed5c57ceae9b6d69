/**
 * Decision Engine
 * One parameterized engine per role: wires the trust engine, evidence
 * ingestion, scorer, fusion, optimizer and the role's action policies
 */

import { logger } from '@elizaos/core';
import { v4 as uuidv4 } from 'uuid';
import type { ActionType, Alignment, Decision, EvidenceRecord, RoleName } from '@wolfpack/shared';
import { teamOf } from '@wolfpack/shared';
import { resolveEngineConfig, ROLE_PROFILES, type EngineConfig, type EngineConfigOverrides } from './config.js';
import { GameContext, type Ballot, type GameContextOptions } from './context/gameContext.js';
import { BayesianEstimator } from './estimators/bayesian.js';
import type { ExternalProbabilityEstimator } from './estimators/features.js';
import { EvidenceIngestor, type IngestSummary } from './evidence/ingest.js';
import { ProbabilisticFusionEngine } from './fusion/fusionEngine.js';
import { ThresholdOptimizer } from './optimizer/thresholdOptimizer.js';
import { CheckPolicy } from './policy/check.js';
import type { DecisionPolicy, PolicyDependencies } from './policy/decisionPolicy.js';
import { KillPolicy } from './policy/kill.js';
import { AntidotePolicy, PoisonPolicy } from './policy/potion.js';
import { ProtectPolicy } from './policy/protect.js';
import { ShootPolicy } from './policy/shoot.js';
import { VotePolicy } from './policy/vote.js';
import { MultiDimensionalScorer, type ScoreBreakdown } from './scoring/scorer.js';
import { TrustScoreEngine } from './trust/trustEngine.js';

export interface DecisionEngineOptions {
  role: RoleName;
  overrides?: EngineConfigOverrides;
  /** Share one optimizer across sessions so thresholds learn from every game */
  optimizer?: ThresholdOptimizer;
  /** Defaults to the Bayesian estimator; null runs on rule scores alone */
  estimator?: ExternalProbabilityEstimator | null;
}

const POLICY_FACTORIES: Record<ActionType, (deps: PolicyDependencies) => DecisionPolicy> = {
  vote: (deps) => new VotePolicy(deps),
  kill: (deps) => new KillPolicy(deps),
  poison: (deps) => new PoisonPolicy(deps),
  antidote: (deps) => new AntidotePolicy(deps),
  shoot: (deps) => new ShootPolicy(deps),
  check: (deps) => new CheckPolicy(deps),
  protect: (deps) => new ProtectPolicy(deps)
};

export class DecisionEngine {
  readonly role: RoleName;
  readonly config: EngineConfig;
  readonly trust: TrustScoreEngine;
  readonly ingestor: EvidenceIngestor;
  readonly scorer: MultiDimensionalScorer;
  readonly fusion: ProbabilisticFusionEngine;
  readonly optimizer: ThresholdOptimizer;
  private policies: Map<ActionType, DecisionPolicy> = new Map();

  constructor(options: DecisionEngineOptions) {
    this.role = options.role;
    this.config = resolveEngineConfig(options.role, options.overrides);
    this.trust = new TrustScoreEngine(this.config.trust);
    this.ingestor = new EvidenceIngestor(this.trust, this.config.evidence);
    this.scorer = new MultiDimensionalScorer(this.config, this.trust);
    this.fusion = new ProbabilisticFusionEngine(this.config.fusion, this.config.confidence);
    this.optimizer = options.optimizer ?? new ThresholdOptimizer(this.config.thresholds, this.config.optimizer);

    const deps: PolicyDependencies = {
      config: this.config,
      scorer: this.scorer,
      fusion: this.fusion,
      optimizer: this.optimizer,
      estimator: options.estimator === null ? undefined : (options.estimator ?? new BayesianEstimator())
    };
    for (const action of ROLE_PROFILES[options.role].actions) {
      this.policies.set(action, POLICY_FACTORIES[action](deps));
    }
  }

  createContext(options: Omit<GameContextOptions, 'role' | 'initialTrust'>): GameContext {
    return new GameContext({ ...options, role: this.role, initialTrust: this.config.trust.initial });
  }

  supports(action: ActionType): boolean {
    return this.policies.has(action);
  }

  // ============================================================================
  // Decisions
  // ============================================================================

  decide(action: ActionType, candidates: string[], context: GameContext): Decision {
    const policy = this.policies.get(action);
    if (!policy) {
      logger.warn(`[Engine] ${this.role} has no ${action} action`);
      return {
        kind: 'abstain',
        decisionId: uuidv4(),
        action,
        target: null,
        cause: 'hold',
        reason: `${this.role} cannot ${action}`,
        scores: {},
        confidence: 0,
        degraded: false,
        warnings: []
      };
    }
    return policy.decide(candidates, context);
  }

  explain(id: string, context: GameContext, action: ActionType): ScoreBreakdown {
    return this.scorer.explain(context.observe(id), context, action);
  }

  // ============================================================================
  // Evidence
  // ============================================================================

  ingest(context: GameContext, record: EvidenceRecord): IngestSummary {
    return this.ingestor.ingest(context, record);
  }

  recordBallots(context: GameContext, round: number, ballots: Ballot[]): void {
    this.ingestor.applyBallots(context, round, ballots);
  }

  /**
   * Apply an oracle label and settle pending decisions aimed at the entity
   */
  verify(context: GameContext, id: string, alignment: Alignment): void {
    this.ingestor.applyVerification(context, id, alignment);
    this.optimizer.resolveTarget(context.sessionId, id, alignment);
  }

  /**
   * End-of-game reveal: every role becomes known and every pending decision settles
   */
  revealRoles(context: GameContext, roles: Record<string, RoleName>): void {
    for (const [id, role] of Object.entries(roles)) {
      if (id === context.selfId) continue;
      const alignment: Alignment = teamOf(role) === context.team ? 'ally' : 'hostile';
      const known = context.entity(id)?.verifiedAlignment;
      if (known === alignment) {
        this.optimizer.resolveTarget(context.sessionId, id, alignment);
        continue;
      }
      this.verify(context, id, alignment);
    }
  }
}
