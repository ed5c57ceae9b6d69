/**
 * Role Agent
 * One parameterized agent for every role. Perceive events feed the game
 * context and the trust engine; interact requests turn into engine decisions
 * or generated speech.
 */

import { logger } from '@elizaos/core';
import type { DecisionEngine, GameContext } from '@wolfpack/engine';
import type {
  ActionType,
  Alignment,
  CheckVerdict,
  Decision,
  EvidenceRecord,
  InteractRequest,
  InteractResponse,
  PerceiveEvent,
  RoleName,
  SpeechEvent
} from '@wolfpack/shared';
import type { EvidenceClassifier } from '../classifiers/types.js';
import { ClassifierError, errorMessage } from '../errors.js';
import type { TextGenerator } from '../llm/generator.js';
import type { PerformanceMonitor } from '../performance.js';
import { buildSpeechPrompt } from './prompts.js';

/** Night actions in the order a role tries them; the first to pick a target wins */
export const NIGHT_ACTIONS: Record<RoleName, ActionType[]> = {
  villager: [],
  hunter: [],
  seer: ['check'],
  guard: ['protect'],
  witch: ['antidote', 'poison'],
  wolf: ['kill'],
  wolf_king: ['kill']
};

const SUMMARY_SIZE = 5;
const RECENT_SPEECHES = 8;

export interface RoleAgentOptions {
  engine: DecisionEngine;
  context: GameContext;
  classifier: EvidenceClassifier;
  generator?: TextGenerator;
  monitor?: PerformanceMonitor;
  speechMaxLength: number;
}

export class RoleAgent {
  readonly engine: DecisionEngine;
  readonly context: GameContext;
  private classifier: EvidenceClassifier;
  private generator?: TextGenerator;
  private monitor?: PerformanceMonitor;
  private speechMaxLength: number;
  private finished = false;

  constructor(options: RoleAgentOptions) {
    this.engine = options.engine;
    this.context = options.context;
    this.classifier = options.classifier;
    this.generator = options.generator;
    this.monitor = options.monitor;
    this.speechMaxLength = options.speechMaxLength;
  }

  get role(): RoleName {
    return this.context.role;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  // ============================================================================
  // Perceive
  // ============================================================================

  async perceive(event: PerceiveEvent): Promise<void> {
    const { context } = this;

    switch (event.type) {
      case 'start':
        logger.debug(`[Werewolf] ${context.selfId} already started as ${context.role}`);
        return;

      case 'night':
        context.advanceRound(event.round);
        context.log('night', `Night ${event.round} begins`);
        return;

      case 'night-info':
        context.advanceRound(event.round);
        for (const id of event.deaths) context.eliminate(id, 'night');
        context.log('night', event.deaths.length ? `Died overnight: ${event.deaths.join(', ')}` : 'Nobody died overnight');
        return;

      case 'speech':
        await this.hearSpeech(event);
        return;

      case 'vote-result':
        context.advanceRound(event.round);
        this.engine.recordBallots(context, event.round, event.ballots);
        if (event.eliminated) context.eliminate(event.eliminated, 'vote');
        return;

      case 'check-result':
        this.engine.verify(context, event.target, this.alignmentOf(event.alignment));
        return;

      case 'skill-result': {
        const resolved = event.success !== false;
        if (event.action === 'protect' && event.target && resolved) {
          context.protect(event.target);
        }
        const on = event.target ? ` on ${event.target}` : '';
        context.log('system', `${event.action} ${resolved ? 'resolved' : 'failed'}${on}`);
        return;
      }

      case 'shot':
        context.observe(event.shooter);
        context.eliminate(event.target, 'shot');
        return;

      case 'game-end':
        if (event.roles) this.engine.revealRoles(context, event.roles);
        this.finished = true;
        logger.info(`[Werewolf] Game over for ${context.selfId}${event.winner ? `, ${event.winner} won` : ''}`);
        return;
    }
  }

  private async hearSpeech(event: SpeechEvent): Promise<void> {
    const { context } = this;
    context.advanceRound(event.round);
    const history = context.speechLines();
    context.recordSpeech(event.speaker, event.text);
    if (event.speaker === context.selfId) return;

    const input = {
      speaker: event.speaker,
      round: event.round,
      text: event.text,
      history,
      players: context.others().map((e) => e.id).concat(context.selfId)
    };
    const analyze = () => this.classifier.analyze(input);
    let record: EvidenceRecord;
    try {
      record = this.monitor ? await this.monitor.measure(`classify.${this.classifier.source}`, analyze) : await analyze();
    } catch (error) {
      throw new ClassifierError(
        `${this.classifier.source} classifier rejected: ${errorMessage(error)}`,
        event.speaker,
        error instanceof Error ? error : undefined
      );
    }

    const summary = this.engine.ingest(context, record);
    logger.debug(`[Werewolf] ${event.speaker}: ${summary.applied.length} trust updates${record.degraded ? ' (degraded)' : ''}`);
  }

  private alignmentOf(verdict: CheckVerdict): Alignment {
    const wolf = verdict === 'wolf';
    const onWolfTeam = this.context.team === 'wolves';
    return wolf === onWolfTeam ? 'ally' : 'hostile';
  }

  // ============================================================================
  // Interact
  // ============================================================================

  async interact(request: InteractRequest): Promise<InteractResponse> {
    switch (request.type) {
      case 'speak':
        return this.speak();
      case 'vote':
        return this.respond('vote', this.decide('vote', request.candidates));
      case 'shoot':
        return this.respond('shoot', this.decide('shoot', request.candidates));
      case 'night-action':
        return this.nightAction(request.candidates, request.victim ?? null);
    }
  }

  private decide(action: ActionType, candidates: string[]): Decision {
    const run = () => this.engine.decide(action, candidates, this.context);
    return this.monitor ? this.monitor.measureSync(`decision.${action}`, run) : run();
  }

  private nightAction(candidates: string[], victim: string | null): InteractResponse {
    const actions = NIGHT_ACTIONS[this.role];
    if (actions.length === 0) {
      return { success: true, action: 'night-action', target: null, reason: `${this.role} has no night action` };
    }

    let last: Decision | null = null;
    for (const action of actions) {
      const pool = action === 'antidote' ? (victim ? [victim] : []) : candidates;
      if (pool.length === 0) continue;
      last = this.decide(action, pool);
      if (last.kind === 'target') break;
    }

    if (!last) {
      return { success: true, action: 'night-action', target: null, reason: 'No candidates offered' };
    }
    return this.respond('night-action', last);
  }

  private respond(action: InteractRequest['type'], decision: Decision): InteractResponse {
    return {
      success: true,
      action,
      target: decision.target,
      reason: decision.reason,
      decision
    };
  }

  // ============================================================================
  // Speech
  // ============================================================================

  private async speak(): Promise<InteractResponse> {
    let text: string;
    if (this.generator) {
      try {
        text = await this.generator.generate(this.speechPrompt(), { temperature: 0.7, operation: 'speech.generate' });
      } catch (error) {
        logger.warn(`[Werewolf] Speech generation failed for ${this.context.selfId}: ${errorMessage(error)}`);
        text = this.fallbackSpeech();
      }
    } else {
      text = this.fallbackSpeech();
    }

    const speech = this.truncate(text.trim());
    return { success: true, action: 'speak', target: null, text: speech, reason: 'speech' };
  }

  private speechPrompt(): string {
    const { context } = this;
    const others = context.others();
    return buildSpeechPrompt({
      selfId: context.selfId,
      role: context.role,
      round: context.round,
      phase: context.phase,
      alive: context.aliveIds(),
      teammates: others.filter((e) => context.team === 'wolves' && e.verifiedAlignment === 'ally').map((e) => e.id),
      trustSummary: this.engine.trust.summary(
        others.filter((e) => context.isAlive(e.id)),
        SUMMARY_SIZE
      ),
      recentSpeeches: context.speechLines(RECENT_SPEECHES).map((line) => `${line.speaker}: ${line.text}`),
      knownResults: others
        .filter((e) => e.verifiedAlignment !== undefined && !(context.team === 'wolves' && e.verifiedAlignment === 'ally'))
        .map((e) => `${e.id} is ${e.verifiedAlignment === 'hostile' ? 'against you' : 'on your side'}`),
      maxLength: this.speechMaxLength
    });
  }

  private fallbackSpeech(): string {
    const { context } = this;
    const suspect = context
      .others()
      .filter((e) => context.isAlive(e.id) && e.verifiedAlignment !== 'ally')
      .sort((a, b) => a.trust - b.trust || a.id.localeCompare(b.id))[0];
    return suspect
      ? `I don't trust ${suspect.id} yet. I want to hear them explain their votes.`
      : 'Nothing stands out to me yet. I will listen before I vote.';
  }

  private truncate(text: string): string {
    if (text.length <= this.speechMaxLength) return text;
    return text.slice(0, this.speechMaxLength).trimEnd();
  }
}
