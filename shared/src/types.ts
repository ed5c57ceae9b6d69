/**
 * Shared types for the Werewolf decision core
 * Used by both the engine and the role agents
 */

// ============================================================================
// Roles & Game Phases
// ============================================================================

export type RoleName = 'villager' | 'seer' | 'witch' | 'guard' | 'hunter' | 'wolf' | 'wolf_king';

export type Team = 'village' | 'wolves';

/** Ground-truth label relative to the observing agent's own team */
export type Alignment = 'hostile' | 'ally';

export type GamePhase = 'early' | 'mid' | 'late' | 'critical';

export type ActionType = 'vote' | 'kill' | 'poison' | 'antidote' | 'shoot' | 'check' | 'protect';

export type ResourceKey = 'antidote' | 'poison' | 'shoot';

export type EliminationCause = 'vote' | 'night' | 'shot';

export const ROLE_NAMES = [
  'villager',
  'seer',
  'witch',
  'guard',
  'hunter',
  'wolf',
  'wolf_king'
] as const satisfies readonly RoleName[];

export const ACTION_TYPES = [
  'vote',
  'kill',
  'poison',
  'antidote',
  'shoot',
  'check',
  'protect'
] as const satisfies readonly ActionType[];

export const WOLF_ROLES: readonly RoleName[] = ['wolf', 'wolf_king'];

/** Roles only one living player can truthfully hold */
export const EXCLUSIVE_ROLES: readonly RoleName[] = ['seer', 'witch', 'guard', 'hunter'];

export function teamOf(role: RoleName): Team {
  return WOLF_ROLES.includes(role) ? 'wolves' : 'village';
}

// ============================================================================
// Entity & Evidence
// ============================================================================

export interface VoteRecord {
  round: number;
  target: string;
  /** null until the target's alignment becomes known */
  targetWasHostile: boolean | null;
}

export interface SpeechQuality {
  logic: number;
  information: number;
  persuasion: number;
  strategy: number;
  overall: number;
}

export interface ClaimedCheck {
  round: number;
  target: string;
  result: 'wolf' | 'good';
}

export interface EntityEvidence {
  injectionCount: number;
  falseQuoteCount: number;
  contradictionCount: number;
  attitudeChanges: number;
  claimedRole: RoleName | null;
  claimProven: boolean;
  fakeRoleClaim: boolean;
  fakeSeerClaim: boolean;
  roleConflict: boolean;
  claimedChecks: ClaimedCheck[];
  voteHistory: VoteRecord[];
  speechSamples: SpeechQuality[];
  speechCount: number;
  criticalSpeeches: number;
  mentions: number;
  timesVotedAgainst: number;
  followVotes: number;
  keyVoteMistakes: number;
  voteHesitations: number;
  nightsSurvived: number;
  suspiciousSkillTiming: boolean;
  /** Players this entity spoke up for, most recent last */
  supports: string[];
  /** Players this entity accused, most recent last */
  suspects: string[];
  defendedBy: string[];
  accusedBy: string[];
}

export interface Entity {
  id: string;
  trust: number;
  trustHistory: number[];
  evidence: EntityEvidence;
  verifiedAlignment?: Alignment;
}

// ============================================================================
// Classifier Output
// ============================================================================

export type InjectionKind = 'system_fake' | 'status_fake' | 'role_fake' | 'other';

export type EvidenceSource = 'smart' | 'rules';

export interface EvidenceRecord {
  speaker: string;
  round: number;
  source: EvidenceSource;
  injection?: {
    kind: InjectionKind;
    confidence: number;
    reason?: string;
  };
  falseQuote?: {
    confidence: number;
    quoted?: string;
    reason?: string;
  };
  speech?: SpeechQuality;
  contradiction?: boolean;
  claimedRole?: RoleName;
  claimedCheck?: Omit<ClaimedCheck, 'round'>;
  supports: string[];
  suspects: string[];
  voteIntention?: string;
  /** True when part of the record came from a fallback path */
  degraded: boolean;
}

// ============================================================================
// Decisions
// ============================================================================

export type AbstainCause = 'no-candidates' | 'threshold-miss' | 'resource-spent' | 'hold';

export type OverrideKind = 'oracle-hostile' | 'vote-leader-revenge' | 'first-antidote';

export interface CandidateScore {
  id: string;
  rule: number;
  risk: number;
  probability: number | null;
  fused: number;
}

interface DecisionBase {
  decisionId: string;
  action: ActionType;
  reason: string;
  scores: Record<string, CandidateScore>;
  confidence: number;
  /** Set when the external estimate was unavailable or unusable */
  degraded: boolean;
  warnings: string[];
}

export interface TargetDecision extends DecisionBase {
  kind: 'target';
  target: string;
  override?: OverrideKind;
}

export interface AbstainDecision extends DecisionBase {
  kind: 'abstain';
  target: null;
  cause: AbstainCause;
}

export type Decision = TargetDecision | AbstainDecision;

export interface Thresholds {
  minScore: number;
  minConfidence: number;
}

// ============================================================================
// Agent Protocol
// ============================================================================

export type CheckVerdict = 'wolf' | 'good';

export interface StartEvent {
  type: 'start';
  selfId: string;
  role: RoleName;
  players: string[];
  teammates?: string[];
  round?: number;
}

export interface NightEvent {
  type: 'night';
  round: number;
}

export interface NightInfoEvent {
  type: 'night-info';
  round: number;
  deaths: string[];
}

export interface SpeechEvent {
  type: 'speech';
  round: number;
  speaker: string;
  text: string;
}

export interface VoteResultEvent {
  type: 'vote-result';
  round: number;
  ballots: Array<{ voter: string; target: string | null }>;
  eliminated?: string | null;
}

export interface CheckResultEvent {
  type: 'check-result';
  target: string;
  alignment: CheckVerdict;
}

export interface SkillResultEvent {
  type: 'skill-result';
  action: ActionType;
  target?: string;
  success?: boolean;
}

export interface ShotEvent {
  type: 'shot';
  shooter: string;
  target: string;
}

export interface GameEndEvent {
  type: 'game-end';
  winner?: Team;
  roles?: Record<string, RoleName>;
}

export type PerceiveEvent =
  | StartEvent
  | NightEvent
  | NightInfoEvent
  | SpeechEvent
  | VoteResultEvent
  | CheckResultEvent
  | SkillResultEvent
  | ShotEvent
  | GameEndEvent;

export type InteractRequest =
  | { type: 'speak'; round?: number }
  | { type: 'vote'; candidates: string[] }
  | { type: 'night-action'; candidates: string[]; victim?: string | null }
  | { type: 'shoot'; candidates: string[] };

export interface InteractResponse {
  success: boolean;
  action: InteractRequest['type'];
  target: string | null;
  text?: string;
  reason: string;
  decision?: Decision;
  error?: string;
}
