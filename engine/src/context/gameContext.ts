/**
 * Game Context Store
 * Per-session state: tracked entities, alive/eliminated sets, round counter,
 * one-shot resources, ballots and a bounded history log
 */

import { logger } from '@elizaos/core';
import { v4 as uuidv4 } from 'uuid';
import type {
  ActionType,
  Alignment,
  EliminationCause,
  Entity,
  EntityEvidence,
  GamePhase,
  ResourceKey,
  RoleName,
  Team
} from '@wolfpack/shared';
import { teamOf } from '@wolfpack/shared';
import { InvariantViolationError } from '../errors.js';

export type HistoryKind = 'speech' | 'vote' | 'night' | 'elimination' | 'verification' | 'decision' | 'system';

export interface HistoryEntry {
  round: number;
  kind: HistoryKind;
  text: string;
  timestamp: number;
}

export interface Ballot {
  voter: string;
  /** null for an abstaining voter */
  target: string | null;
}

export interface EliminationRecord {
  id: string;
  round: number;
  cause: EliminationCause;
}

export interface SpeechLine {
  speaker: string;
  round: number;
  text: string;
}

export interface ResolvedVote {
  voter: string;
  round: number;
  correct: boolean;
}

export interface GameContextOptions {
  selfId: string;
  role: RoleName;
  players?: string[];
  teammates?: string[];
  round?: number;
  initialTrust?: number;
  historyLimit?: number;
  speechLimit?: number;
  strictInvariants?: boolean;
}

export function emptyEvidence(): EntityEvidence {
  return {
    injectionCount: 0,
    falseQuoteCount: 0,
    contradictionCount: 0,
    attitudeChanges: 0,
    claimedRole: null,
    claimProven: false,
    fakeRoleClaim: false,
    fakeSeerClaim: false,
    roleConflict: false,
    claimedChecks: [],
    voteHistory: [],
    speechSamples: [],
    speechCount: 0,
    criticalSpeeches: 0,
    mentions: 0,
    timesVotedAgainst: 0,
    followVotes: 0,
    keyVoteMistakes: 0,
    voteHesitations: 0,
    nightsSurvived: 0,
    suspiciousSkillTiming: false,
    supports: [],
    suspects: [],
    defendedBy: [],
    accusedBy: []
  };
}

export function createEntity(id: string, trust: number = 50): Entity {
  return { id, trust, trustHistory: [], evidence: emptyEvidence() };
}

/**
 * True when anything beyond the default record has been observed
 */
export function hasEvidence(entity: Entity): boolean {
  const e = entity.evidence;
  return (
    e.injectionCount > 0 ||
    e.falseQuoteCount > 0 ||
    e.contradictionCount > 0 ||
    e.attitudeChanges > 0 ||
    e.claimedRole !== null ||
    e.claimedChecks.length > 0 ||
    e.voteHistory.length > 0 ||
    e.speechSamples.length > 0 ||
    e.speechCount > 0 ||
    e.mentions > 0 ||
    e.timesVotedAgainst > 0 ||
    e.voteHesitations > 0 ||
    e.suspiciousSkillTiming ||
    e.supports.length > 0 ||
    e.suspects.length > 0 ||
    e.defendedBy.length > 0 ||
    e.accusedBy.length > 0
  );
}

const RESOURCES_BY_ROLE: Partial<Record<RoleName, ResourceKey[]>> = {
  witch: ['antidote', 'poison'],
  hunter: ['shoot'],
  wolf_king: ['shoot']
};

export class GameContext {
  readonly sessionId: string;
  readonly selfId: string;
  readonly role: RoleName;
  readonly team: Team;

  private currentRound: number;
  private entityMap: Map<string, Entity> = new Map();
  private alive: Set<string> = new Set();
  private eliminated: Set<string> = new Set();
  private resources: Record<ResourceKey, boolean>;
  private history: HistoryEntry[] = [];
  private speeches: SpeechLine[] = [];
  private ballots: Map<number, Ballot[]> = new Map();
  private eliminations: EliminationRecord[] = [];
  private protectedIds: Set<string> = new Set();
  private opportunities: Map<ActionType, number> = new Map();
  private lastTargets: Map<ActionType, string> = new Map();
  private readonly initialTrust: number;
  private readonly historyLimit: number;
  private readonly speechLimit: number;
  private readonly strictInvariants: boolean;

  constructor(options: GameContextOptions) {
    this.sessionId = uuidv4();
    this.selfId = options.selfId;
    this.role = options.role;
    this.team = teamOf(options.role);
    this.currentRound = Math.max(1, Math.floor(options.round ?? 1));
    this.initialTrust = options.initialTrust ?? 50;
    this.historyLimit = options.historyLimit ?? 200;
    this.speechLimit = options.speechLimit ?? 120;
    this.strictInvariants = options.strictInvariants ?? process.env.NODE_ENV !== 'production';

    const owned = RESOURCES_BY_ROLE[options.role] ?? [];
    this.resources = {
      antidote: owned.includes('antidote'),
      poison: owned.includes('poison'),
      shoot: owned.includes('shoot')
    };

    this.observe(options.selfId);
    for (const id of options.players ?? []) this.observe(id);
    for (const id of options.teammates ?? []) {
      if (id !== options.selfId) this.verify(id, 'ally');
    }
  }

  // ============================================================================
  // Derived State
  // ============================================================================

  get round(): number {
    return this.currentRound;
  }

  get aliveCount(): number {
    return this.alive.size;
  }

  get phase(): GamePhase {
    if (this.alive.size <= 5) return 'critical';
    if (this.currentRound >= 6) return 'late';
    if (this.currentRound >= 3) return 'mid';
    return 'early';
  }

  // ============================================================================
  // Entities
  // ============================================================================

  /**
   * Return the entity, creating it on first observation
   */
  observe(id: string): Entity {
    let entity = this.entityMap.get(id);
    if (!entity) {
      entity = createEntity(id, this.initialTrust);
      this.entityMap.set(id, entity);
      if (!this.eliminated.has(id)) this.alive.add(id);
    }
    return entity;
  }

  entity(id: string): Entity | undefined {
    return this.entityMap.get(id);
  }

  has(id: string): boolean {
    return this.entityMap.has(id);
  }

  isAlive(id: string): boolean {
    return this.alive.has(id);
  }

  isEliminated(id: string): boolean {
    return this.eliminated.has(id);
  }

  /** Every tracked entity except the agent itself */
  others(): Entity[] {
    return [...this.entityMap.values()].filter((e) => e.id !== this.selfId);
  }

  aliveIds(): string[] {
    return [...this.alive];
  }

  aliveOthers(): string[] {
    return [...this.alive].filter((id) => id !== this.selfId);
  }

  averageSpeechCount(): number {
    const counts = this.aliveOthers().map((id) => this.observe(id).evidence.speechCount);
    if (counts.length === 0) return 0;
    return counts.reduce((a, b) => a + b, 0) / counts.length;
  }

  // ============================================================================
  // Rounds & Eliminations
  // ============================================================================

  advanceRound(round: number): void {
    if (!Number.isFinite(round) || round < this.currentRound) {
      logger.warn(`[Context] Ignoring round ${round}; current round is ${this.currentRound}`);
      return;
    }
    const next = Math.floor(round);
    const nights = next - this.currentRound;
    if (nights === 0) return;

    for (const id of this.alive) {
      this.observe(id).evidence.nightsSurvived += nights;
    }
    this.currentRound = next;
    this.protectedIds.clear();
    this.log('system', `Round ${next} begins`);
  }

  eliminate(id: string, cause: EliminationCause): void {
    this.observe(id);
    if (this.eliminated.has(id)) {
      logger.debug(`[Context] ${id} already eliminated`);
      return;
    }
    this.alive.delete(id);
    this.eliminated.add(id);
    this.eliminations.push({ id, round: this.currentRound, cause });
    this.log('elimination', `${id} eliminated (${cause})`);
  }

  eliminationOf(id: string): EliminationRecord | undefined {
    return this.eliminations.find((e) => e.id === id);
  }

  getEliminations(): EliminationRecord[] {
    return [...this.eliminations];
  }

  // ============================================================================
  // Speech & Ballots
  // ============================================================================

  recordSpeech(speaker: string, text: string): void {
    const entity = this.observe(speaker);
    entity.evidence.speechCount += 1;
    if (this.phase === 'critical') entity.evidence.criticalSpeeches += 1;

    this.speeches.push({ speaker, round: this.currentRound, text });
    if (this.speeches.length > this.speechLimit) {
      this.speeches.splice(0, this.speeches.length - this.speechLimit);
    }
    this.log('speech', `${speaker}: ${text}`);
  }

  speechLines(limit?: number): SpeechLine[] {
    return limit === undefined ? [...this.speeches] : this.speeches.slice(-limit);
  }

  /**
   * Fold one round of ballots into voter and target evidence.
   * Returns the votes whose target alignment is already known.
   */
  recordBallots(round: number, ballots: Ballot[]): ResolvedVote[] {
    const resolved: ResolvedVote[] = [];
    const tally = new Map<string, number>();

    for (const ballot of ballots) {
      const voter = this.observe(ballot.voter);
      if (ballot.target === null) {
        voter.evidence.voteHesitations += 1;
        continue;
      }
      const target = this.observe(ballot.target);
      target.evidence.timesVotedAgainst += 1;
      tally.set(ballot.target, (tally.get(ballot.target) ?? 0) + 1);

      const known = target.verifiedAlignment;
      voter.evidence.voteHistory.push({
        round,
        target: ballot.target,
        targetWasHostile: known ? known === 'hostile' : null
      });
      if (known) resolved.push({ voter: ballot.voter, round, correct: known === 'hostile' });
    }

    let plurality: string | null = null;
    let top = 0;
    for (const [target, count] of tally) {
      if (count > top) {
        plurality = target;
        top = count;
      }
    }
    if (plurality !== null && top >= 2) {
      for (const ballot of ballots) {
        if (ballot.target === plurality) this.observe(ballot.voter).evidence.followVotes += 1;
      }
    }

    const existing = this.ballots.get(round) ?? [];
    this.ballots.set(round, [...existing, ...ballots]);
    this.log('vote', ballots.map((b) => `${b.voter}->${b.target ?? 'abstain'}`).join(', '));
    return resolved;
  }

  ballotsFor(round: number): Ballot[] {
    return [...(this.ballots.get(round) ?? [])];
  }

  /**
   * The voter who cast the most ballots against `id` over the game.
   * Ties go to the most recent voter, then to ballot order.
   */
  voteLeaderAgainst(id: string): string | null {
    const stats = new Map<string, { count: number; lastRound: number; order: number }>();
    let order = 0;
    const rounds = [...this.ballots.keys()].sort((a, b) => a - b);

    for (const round of rounds) {
      for (const ballot of this.ballots.get(round) ?? []) {
        if (ballot.target !== id || ballot.voter === id) continue;
        const current = stats.get(ballot.voter);
        if (current) {
          current.count += 1;
          current.lastRound = round;
        } else {
          stats.set(ballot.voter, { count: 1, lastRound: round, order: order++ });
        }
      }
    }

    let leader: string | null = null;
    let best: { count: number; lastRound: number; order: number } | null = null;
    for (const [voter, s] of stats) {
      const better =
        !best ||
        s.count > best.count ||
        (s.count === best.count && s.lastRound > best.lastRound) ||
        (s.count === best.count && s.lastRound === best.lastRound && s.order < best.order);
      if (better) {
        leader = voter;
        best = s;
      }
    }
    return leader;
  }

  // ============================================================================
  // Verification
  // ============================================================================

  /**
   * Record an oracle label. Pins trust, back-fills vote records that targeted
   * the entity and settles claimed seer checks about it.
   */
  verify(id: string, alignment: Alignment): ResolvedVote[] {
    const target = this.observe(id);
    target.verifiedAlignment = alignment;
    target.trust = alignment === 'hostile' ? 0 : 100;

    const hostile = alignment === 'hostile';
    const isWolf = this.team === 'village' ? hostile : !hostile;
    const votedOut = this.eliminations.find((e) => e.id === id && e.cause === 'vote');
    const resolved: ResolvedVote[] = [];

    for (const entity of this.entityMap.values()) {
      for (const record of entity.evidence.voteHistory) {
        if (record.target !== id || record.targetWasHostile !== null) continue;
        record.targetWasHostile = hostile;
        resolved.push({ voter: entity.id, round: record.round, correct: hostile });
        if (!hostile && votedOut && votedOut.round === record.round) {
          entity.evidence.keyVoteMistakes += 1;
        }
      }

      for (const check of entity.evidence.claimedChecks) {
        if (check.target !== id) continue;
        const consistent = (check.result === 'wolf') === isWolf;
        if (consistent && entity.evidence.claimedRole === 'seer') {
          entity.evidence.claimProven = true;
        } else if (!consistent) {
          entity.evidence.fakeSeerClaim = true;
        }
      }
    }

    this.log('verification', `${id} verified ${alignment}`);
    return resolved;
  }

  // ============================================================================
  // Resources & Action Bookkeeping
  // ============================================================================

  hasResource(resource: ResourceKey): boolean {
    return this.resources[resource];
  }

  /**
   * Spend a one-shot resource. Returns false when it was already spent.
   */
  consume(resource: ResourceKey): boolean {
    if (!this.resources[resource]) return false;
    this.resources[resource] = false;
    this.log('system', `${resource} used`);
    return true;
  }

  getResources(): Record<ResourceKey, boolean> {
    return { ...this.resources };
  }

  protect(id: string): void {
    this.protectedIds.add(id);
  }

  isProtected(id: string): boolean {
    return this.protectedIds.has(id);
  }

  /**
   * Count an opportunity for an action and return how many came before it
   */
  markOpportunity(action: ActionType): number {
    const seen = this.opportunities.get(action) ?? 0;
    this.opportunities.set(action, seen + 1);
    return seen;
  }

  opportunitiesSeen(action: ActionType): number {
    return this.opportunities.get(action) ?? 0;
  }

  recordTarget(action: ActionType, id: string): void {
    this.lastTargets.set(action, id);
  }

  lastTarget(action: ActionType): string | undefined {
    return this.lastTargets.get(action);
  }

  // ============================================================================
  // History
  // ============================================================================

  log(kind: HistoryKind, text: string): void {
    this.history.push({ round: this.currentRound, kind, text, timestamp: Date.now() });
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }

  recentHistory(count: number = 10): HistoryEntry[] {
    return this.history.slice(-count);
  }

  // ============================================================================
  // Invariants
  // ============================================================================

  /**
   * Check structural invariants. Throws outside production, logs inside it.
   */
  assertInvariants(): boolean {
    const violations: Array<[string, string]> = [];

    for (const id of this.alive) {
      if (this.eliminated.has(id)) violations.push(['alive-eliminated-disjoint', `${id} is both alive and eliminated`]);
    }
    for (const id of this.entityMap.keys()) {
      if (!this.alive.has(id) && !this.eliminated.has(id)) {
        violations.push(['entities-partitioned', `${id} is neither alive nor eliminated`]);
      }
    }
    for (const id of [...this.alive, ...this.eliminated]) {
      if (!this.entityMap.has(id)) violations.push(['entities-partitioned', `${id} has no entity record`]);
    }
    for (const entity of this.entityMap.values()) {
      if (!(entity.trust >= 0 && entity.trust <= 100)) {
        violations.push(['trust-bounds', `${entity.id} trust ${entity.trust} outside [0,100]`]);
      }
    }
    if (this.currentRound < 1) violations.push(['round-positive', `round ${this.currentRound} below 1`]);

    if (violations.length === 0) return true;

    const [invariant, message] = violations[0];
    if (this.strictInvariants) {
      throw new InvariantViolationError(message, invariant);
    }
    logger.error(`[Context] Invariant violated (${invariant}): ${message}`);
    return false;
  }
}
