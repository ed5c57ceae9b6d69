/**
 * Werewolf decision core
 */

export { DecisionEngine } from './engine.js';
export type { DecisionEngineOptions } from './engine.js';

export {
  DEFAULT_THRESHOLDS,
  PERSPECTIVES,
  ROLE_PROFILES,
  loadEngineEnv,
  loadScoringDefaults,
  resolveEngineConfig
} from './config.js';
export type { EngineConfig, EngineConfigOverrides, Perspective, RoleProfile, ThresholdSpec } from './config.js';

export { GameContext, createEntity, emptyEvidence, hasEvidence } from './context/gameContext.js';
export type {
  Ballot,
  EliminationRecord,
  GameContextOptions,
  HistoryEntry,
  HistoryKind,
  ResolvedVote,
  SpeechLine
} from './context/gameContext.js';

export { TrustScoreEngine, clamp } from './trust/trustEngine.js';
export { EvidenceIngestor } from './evidence/ingest.js';
export type { IngestSummary } from './evidence/ingest.js';
export { MultiDimensionalScorer } from './scoring/scorer.js';
export type { ScoreBreakdown } from './scoring/scorer.js';
export { ProbabilisticFusionEngine } from './fusion/fusionEngine.js';
export type { FusionContext } from './fusion/fusionEngine.js';
export { BayesianEstimator } from './estimators/bayesian.js';
export { extractFeatures } from './estimators/features.js';
export type { ExternalProbabilityEstimator, PlayerFeatures } from './estimators/features.js';
export { ThresholdOptimizer } from './optimizer/thresholdOptimizer.js';

export { DecisionPolicy } from './policy/decisionPolicy.js';
export type { PolicyDependencies } from './policy/decisionPolicy.js';
export { VotePolicy } from './policy/vote.js';
export { KillPolicy } from './policy/kill.js';
export { AntidotePolicy, PoisonPolicy } from './policy/potion.js';
export { ShootPolicy } from './policy/shoot.js';
export { CheckPolicy } from './policy/check.js';
export { ProtectPolicy } from './policy/protect.js';

export { EngineConfigError, InvariantViolationError, WolfpackError } from './errors.js';
