/**
 * Engine Configuration
 * Defaults, per-role profiles and environment overrides for the decision core.
 * Scoring bands live in config/scoring.json so they can be tuned without code changes.
 */

import { readFileSync } from 'fs';
import { logger } from '@elizaos/core';
import { z } from 'zod';
import type { ActionType, GamePhase, RoleName, Team } from '@wolfpack/shared';
import { EngineConfigError } from './errors.js';

// ============================================================================
// Schemas
// ============================================================================

export const bandSchema = z.object({
  op: z.enum(['lt', 'lte', 'gt', 'gte']),
  value: z.number(),
  points: z.number()
});

export const dimensionSchema = z.object({
  enabled: z.boolean().default(true),
  weight: z.number().min(0).default(1),
  bands: z.array(bandSchema).default([]),
  ladder: z.array(z.number()).default([]),
  points: z.number().default(0),
  cap: z.number().optional(),
  values: z.record(z.string(), z.number()).default({}),
  params: z.record(z.string(), z.number()).default({})
});

const perspectiveSchema = z.object({
  oracle: z.object({ hostile: z.number(), ally: z.number() }),
  dimensions: z.record(z.string(), dimensionSchema)
});

const phaseMultipliersSchema = z.object({
  early: z.number().positive(),
  mid: z.number().positive(),
  late: z.number().positive(),
  critical: z.number().positive()
});

const scoringSchema = z.object({
  phaseMultipliers: phaseMultipliersSchema,
  perspectives: z.object({
    suspicion: perspectiveSchema,
    threat: perspectiveSchema,
    protection: perspectiveSchema
  }),
  riskPenalty: z.object({
    cap: z.number().min(0),
    trustBands: z.array(bandSchema),
    roles: z.record(z.string(), z.record(z.string(), z.number()))
  })
});

const thresholdSpecSchema = z.object({
  minScore: z.number(),
  minConfidence: z.number().min(0).max(1),
  scoreStep: z.number().min(0),
  confidenceStep: z.number().min(0),
  scoreBounds: z.tuple([z.number(), z.number()]),
  confidenceBounds: z.tuple([z.number().min(0), z.number().max(1)])
});

const fusionSchema = z.object({
  baseRatio: z.number().min(0).max(1),
  earlyRound: z.number().int(),
  earlyFactor: z.number().positive(),
  lateRound: z.number().int(),
  lateFactor: z.number().positive(),
  anomalyThreshold: z.number().int().min(1),
  anomalyFactor: z.number().positive(),
  disagreementThreshold: z.number().min(0),
  disagreementFactor: z.number().positive(),
  minRatio: z.number().min(0).max(1),
  maxRatio: z.number().min(0).max(1)
});

const confidenceSchema = z.object({
  topWeight: z.number().min(0),
  gapWeight: z.number().min(0),
  spreadWeight: z.number().min(0),
  topScale: z.number().positive(),
  gapScale: z.number().positive(),
  spreadScale: z.number().positive()
});

const trustSchema = z.object({
  initial: z.number().min(0).max(100),
  historyLength: z.number().int().min(1),
  trendWindow: z.number().int().min(1),
  decayFloor: z.number().min(0).max(1),
  reversalDamping: z.number().min(0).max(1)
});

const evidenceSchema = z.object({
  injection: z.object({
    system_fake: z.number(),
    status_fake: z.number(),
    role_fake: z.number(),
    other: z.number()
  }),
  falseQuote: z.number(),
  falseQuoteMinConfidence: z.number().min(0).max(1),
  logicalSpeech: z.number(),
  logicalSpeechMinOverall: z.number(),
  weakSpeech: z.number(),
  weakSpeechMaxOverall: z.number(),
  contradiction: z.number(),
  accurateVote: z.number(),
  inaccurateVote: z.number(),
  sourceReliability: z.object({ smart: z.number().min(0).max(1), rules: z.number().min(0).max(1) })
});

const optimizerSchema = z.object({
  window: z.number().int().min(1),
  adjustEvery: z.number().int().min(1),
  lowerAtRate: z.number().min(0).max(1),
  raiseAtRate: z.number().min(0).max(1),
  maxPending: z.number().int().min(1)
});

const policySchema = z.object({
  suspiciousTrust: z.number(),
  trustedTrust: z.number(),
  antidoteMinTrust: z.number()
});

const actionRecord = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({
    vote: schema,
    kill: schema,
    poison: schema,
    antidote: schema,
    shoot: schema,
    check: schema,
    protect: schema
  });

export const PERSPECTIVES = ['suspicion', 'threat', 'protection'] as const;
export type Perspective = (typeof PERSPECTIVES)[number];

export const engineConfigSchema = z.object({
  scoring: scoringSchema,
  perspectives: actionRecord(z.enum(PERSPECTIVES)),
  thresholds: actionRecord(thresholdSpecSchema),
  fusion: fusionSchema,
  confidence: confidenceSchema,
  trust: trustSchema,
  evidence: evidenceSchema,
  optimizer: optimizerSchema,
  policy: policySchema
});

export type Band = z.infer<typeof bandSchema>;
export type DimensionSpec = z.infer<typeof dimensionSchema>;
export type ScoringConfig = z.infer<typeof scoringSchema>;
export type ThresholdSpec = z.infer<typeof thresholdSpecSchema>;
export type FusionConfig = z.infer<typeof fusionSchema>;
export type ConfidenceConfig = z.infer<typeof confidenceSchema>;
export type TrustConfig = z.infer<typeof trustSchema>;
export type EvidenceConfig = z.infer<typeof evidenceSchema>;
export type OptimizerConfig = z.infer<typeof optimizerSchema>;
export type PolicyConfig = z.infer<typeof policySchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_FUSION: FusionConfig = {
  baseRatio: 0.6,
  earlyRound: 2,
  earlyFactor: 0.6,
  lateRound: 5,
  lateFactor: 1.2,
  anomalyThreshold: 3,
  anomalyFactor: 0.7,
  disagreementThreshold: 40,
  disagreementFactor: 0.8,
  minRatio: 0.2,
  maxRatio: 0.9
};

export const DEFAULT_CONFIDENCE: ConfidenceConfig = {
  topWeight: 0.4,
  gapWeight: 0.4,
  spreadWeight: 0.2,
  topScale: 100,
  gapScale: 50,
  spreadScale: 30
};

export const DEFAULT_TRUST: TrustConfig = {
  initial: 50,
  historyLength: 10,
  trendWindow: 3,
  decayFloor: 0.1,
  reversalDamping: 0.5
};

export const DEFAULT_EVIDENCE: EvidenceConfig = {
  injection: { system_fake: -40, status_fake: -35, role_fake: -30, other: -20 },
  falseQuote: -20,
  falseQuoteMinConfidence: 0.6,
  logicalSpeech: 10,
  logicalSpeechMinOverall: 70,
  weakSpeech: -5,
  weakSpeechMaxOverall: 30,
  contradiction: -15,
  accurateVote: 15,
  inaccurateVote: -15,
  sourceReliability: { smart: 1.0, rules: 0.7 }
};

export const DEFAULT_OPTIMIZER: OptimizerConfig = {
  window: 100,
  adjustEvery: 10,
  lowerAtRate: 0.8,
  raiseAtRate: 0.5,
  maxPending: 200
};

export const DEFAULT_POLICY: PolicyConfig = {
  suspiciousTrust: 35,
  trustedTrust: 70,
  antidoteMinTrust: 15
};

export const DEFAULT_THRESHOLDS: Record<ActionType, ThresholdSpec> = {
  vote: { minScore: 30, minConfidence: 0.2, scoreStep: 2, confidenceStep: 0.05, scoreBounds: [25, 40], confidenceBounds: [0.1, 0.5] },
  kill: { minScore: 0, minConfidence: 0, scoreStep: 2, confidenceStep: 0.05, scoreBounds: [-10, 20], confidenceBounds: [0, 0.3] },
  poison: { minScore: 70, minConfidence: 0.7, scoreStep: 2, confidenceStep: 0.05, scoreBounds: [60, 85], confidenceBounds: [0.5, 0.85] },
  antidote: { minScore: 45, minConfidence: 0, scoreStep: 2, confidenceStep: 0.05, scoreBounds: [35, 60], confidenceBounds: [0, 0.3] },
  shoot: { minScore: 35, minConfidence: 0.4, scoreStep: 2, confidenceStep: 0.05, scoreBounds: [30, 50], confidenceBounds: [0.3, 0.6] },
  check: { minScore: -100, minConfidence: 0, scoreStep: 2, confidenceStep: 0.05, scoreBounds: [-100, 0], confidenceBounds: [0, 0.2] },
  protect: { minScore: 0, minConfidence: 0, scoreStep: 2, confidenceStep: 0.05, scoreBounds: [-20, 20], confidenceBounds: [0, 0.3] }
};

export const DEFAULT_PERSPECTIVES: Record<ActionType, Perspective> = {
  vote: 'suspicion',
  kill: 'threat',
  poison: 'suspicion',
  antidote: 'protection',
  shoot: 'suspicion',
  check: 'suspicion',
  protect: 'protection'
};

// ============================================================================
// Role Profiles
// ============================================================================

export interface RoleProfile {
  team: Team;
  actions: ActionType[];
  perspectives?: Partial<Record<ActionType, Perspective>>;
  dimensionWeights?: Partial<Record<Perspective, Record<string, number>>>;
}

export const ROLE_PROFILES: Record<RoleName, RoleProfile> = {
  villager: { team: 'village', actions: ['vote'] },
  seer: {
    team: 'village',
    actions: ['vote', 'check'],
    dimensionWeights: { suspicion: { voteAccuracy: 1.2, fakeSeerClaim: 1.2 } }
  },
  witch: { team: 'village', actions: ['vote', 'antidote', 'poison'] },
  guard: {
    team: 'village',
    actions: ['vote', 'protect'],
    dimensionWeights: { protection: { keyRoleClaim: 1.2 } }
  },
  hunter: {
    team: 'village',
    actions: ['vote', 'shoot'],
    dimensionWeights: { suspicion: { suspiciousSkillTiming: 1.2 } }
  },
  wolf: {
    team: 'wolves',
    actions: ['vote', 'kill'],
    perspectives: { vote: 'threat' }
  },
  wolf_king: {
    team: 'wolves',
    actions: ['vote', 'kill', 'shoot'],
    perspectives: { vote: 'threat', shoot: 'threat' }
  }
};

// ============================================================================
// Loading & Merging
// ============================================================================

const SCORING_PATH = new URL('../config/scoring.json', import.meta.url);

let scoringDefaults: ScoringConfig | null = null;

/**
 * Read and validate the scoring bands shipped with the engine.
 * The parsed file is cached; callers always receive a private copy.
 */
export function loadScoringDefaults(): ScoringConfig {
  if (!scoringDefaults) {
    const raw: unknown = JSON.parse(readFileSync(SCORING_PATH, 'utf-8'));
    const parsed = scoringSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EngineConfigError(
        'Invalid scoring configuration',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    scoringDefaults = parsed.data;
  }
  return structuredClone(scoringDefaults);
}

export interface EngineConfigOverrides {
  fusion?: Partial<FusionConfig>;
  confidence?: Partial<ConfidenceConfig>;
  trust?: Partial<TrustConfig>;
  evidence?: Partial<EvidenceConfig>;
  optimizer?: Partial<OptimizerConfig>;
  policy?: Partial<PolicyConfig>;
  thresholds?: Partial<Record<ActionType, Partial<ThresholdSpec>>>;
  perspectives?: Partial<Record<ActionType, Perspective>>;
  phaseMultipliers?: Partial<Record<GamePhase, number>>;
  dimensions?: Partial<Record<Perspective, Record<string, Partial<DimensionSpec>>>>;
}

function mergeThresholds(
  overrides: Partial<Record<ActionType, Partial<ThresholdSpec>>> = {}
): Record<ActionType, ThresholdSpec> {
  return {
    vote: { ...DEFAULT_THRESHOLDS.vote, ...overrides.vote },
    kill: { ...DEFAULT_THRESHOLDS.kill, ...overrides.kill },
    poison: { ...DEFAULT_THRESHOLDS.poison, ...overrides.poison },
    antidote: { ...DEFAULT_THRESHOLDS.antidote, ...overrides.antidote },
    shoot: { ...DEFAULT_THRESHOLDS.shoot, ...overrides.shoot },
    check: { ...DEFAULT_THRESHOLDS.check, ...overrides.check },
    protect: { ...DEFAULT_THRESHOLDS.protect, ...overrides.protect }
  };
}

function applyDimensionOverrides(
  scoring: ScoringConfig,
  perspective: Perspective,
  overrides: Record<string, Partial<DimensionSpec>>
): void {
  const dimensions = scoring.perspectives[perspective].dimensions;
  for (const [name, override] of Object.entries(overrides)) {
    const current = dimensions[name];
    if (!current) {
      logger.warn(`[Config] Unknown ${perspective} dimension "${name}" ignored`);
      continue;
    }
    dimensions[name] = { ...current, ...override };
  }
}

/**
 * Build the full configuration for one role.
 * Role profile weights are applied first, explicit overrides last.
 */
export function resolveEngineConfig(role: RoleName, overrides: EngineConfigOverrides = {}): EngineConfig {
  const profile = ROLE_PROFILES[role];
  const scoring = loadScoringDefaults();

  for (const perspective of PERSPECTIVES) {
    const weights = profile.dimensionWeights?.[perspective];
    if (weights) {
      applyDimensionOverrides(
        scoring,
        perspective,
        Object.fromEntries(Object.entries(weights).map(([name, weight]) => [name, { weight }]))
      );
    }
    const explicit = overrides.dimensions?.[perspective];
    if (explicit) applyDimensionOverrides(scoring, perspective, explicit);
  }
  scoring.phaseMultipliers = { ...scoring.phaseMultipliers, ...overrides.phaseMultipliers };

  const candidate = {
    scoring,
    perspectives: { ...DEFAULT_PERSPECTIVES, ...profile.perspectives, ...overrides.perspectives },
    thresholds: mergeThresholds(overrides.thresholds),
    fusion: { ...DEFAULT_FUSION, ...overrides.fusion },
    confidence: { ...DEFAULT_CONFIDENCE, ...overrides.confidence },
    trust: { ...DEFAULT_TRUST, ...overrides.trust },
    evidence: { ...DEFAULT_EVIDENCE, ...overrides.evidence },
    optimizer: { ...DEFAULT_OPTIMIZER, ...overrides.optimizer },
    policy: { ...DEFAULT_POLICY, ...overrides.policy }
  };

  const parsed = engineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new EngineConfigError(
      `Invalid engine configuration for role ${role}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

// ============================================================================
// Environment
// ============================================================================

const envSchema = z.object({
  ML_FUSION_RATIO: z.coerce.number().min(0).max(1).optional(),
  TRUST_HISTORY_LENGTH: z.coerce.number().int().min(1).optional(),
  OPTIMIZER_WINDOW: z.coerce.number().int().min(1).optional()
});

/**
 * Read engine overrides from the environment.
 * Invalid values are logged and ignored.
 */
export function loadEngineEnv(env: NodeJS.ProcessEnv = process.env): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {};

  for (const key of ['ML_FUSION_RATIO', 'TRUST_HISTORY_LENGTH', 'OPTIMIZER_WINDOW'] as const) {
    const value = env[key];
    if (value === undefined || value === '') continue;

    const parsed = envSchema.shape[key].safeParse(value);
    if (!parsed.success || parsed.data === undefined) {
      logger.warn(`[Config] Ignoring invalid ${key}=${value}`);
      continue;
    }

    switch (key) {
      case 'ML_FUSION_RATIO':
        overrides.fusion = { baseRatio: parsed.data };
        break;
      case 'TRUST_HISTORY_LENGTH':
        overrides.trust = { historyLength: parsed.data };
        break;
      case 'OPTIMIZER_WINDOW':
        overrides.optimizer = { window: parsed.data };
        break;
    }
  }

  return overrides;
}
