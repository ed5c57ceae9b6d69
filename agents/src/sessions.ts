/**
 * Agent Sessions Manager
 * One role agent per game id. Every session shares a single threshold
 * optimizer so outcomes from finished games keep tuning later ones.
 */

import { logger } from '@elizaos/core';
import {
  DecisionEngine,
  ThresholdOptimizer,
  resolveEngineConfig,
  type EngineConfigOverrides,
  type ExternalProbabilityEstimator
} from '@wolfpack/engine';
import type { InteractRequest, InteractResponse, PerceiveEvent, RoleName, StartEvent } from '@wolfpack/shared';
import type { EvidenceClassifier } from './classifiers/types.js';
import { SessionNotFoundError } from './errors.js';
import type { TextGenerator } from './llm/generator.js';
import type { PerformanceMonitor } from './performance.js';
import { RoleAgent } from './roles/roleAgent.js';

export interface SessionSummary {
  gameId: string;
  selfId: string;
  role: RoleName;
  round: number;
  alive: number;
}

export interface AgentSessionsOptions {
  classifier: EvidenceClassifier;
  speechMaxLength: number;
  generator?: TextGenerator;
  monitor?: PerformanceMonitor;
  overrides?: EngineConfigOverrides;
  /** Passed to every engine; undefined keeps the built-in estimator */
  estimator?: ExternalProbabilityEstimator | null;
  strictInvariants?: boolean;
  onSessionCreated?: (gameId: string, agent: RoleAgent) => void;
}

export class AgentSessionsManager {
  readonly optimizer: ThresholdOptimizer;
  private sessions: Map<string, RoleAgent> = new Map();

  constructor(private readonly options: AgentSessionsOptions) {
    const base = resolveEngineConfig('villager', options.overrides);
    this.optimizer = new ThresholdOptimizer(base.thresholds, base.optimizer);
  }

  createSession(gameId: string, start: StartEvent): RoleAgent {
    if (this.sessions.has(gameId)) {
      logger.warn(`[Sessions] Replacing existing session for game ${gameId}`);
    }

    const engine = new DecisionEngine({
      role: start.role,
      overrides: this.options.overrides,
      optimizer: this.optimizer,
      estimator: this.options.estimator
    });
    const context = engine.createContext({
      selfId: start.selfId,
      players: start.players,
      teammates: start.teammates,
      round: start.round,
      strictInvariants: this.options.strictInvariants
    });
    const agent = new RoleAgent({
      engine,
      context,
      classifier: this.options.classifier,
      generator: this.options.generator,
      monitor: this.options.monitor,
      speechMaxLength: this.options.speechMaxLength
    });

    this.sessions.set(gameId, agent);
    this.options.onSessionCreated?.(gameId, agent);
    logger.info(`[Sessions] Game ${gameId}: ${start.selfId} plays ${start.role} with ${start.players.length} players`);
    return agent;
  }

  getSession(gameId: string): RoleAgent | undefined {
    return this.sessions.get(gameId);
  }

  requireSession(gameId: string): RoleAgent {
    const agent = this.sessions.get(gameId);
    if (!agent) throw new SessionNotFoundError(gameId);
    return agent;
  }

  async perceive(gameId: string, event: PerceiveEvent): Promise<void> {
    if (event.type === 'start') {
      this.createSession(gameId, event);
      return;
    }

    const agent = this.requireSession(gameId);
    await agent.perceive(event);
    if (agent.isFinished) this.endSession(gameId);
  }

  async interact(gameId: string, request: InteractRequest): Promise<InteractResponse> {
    return this.requireSession(gameId).interact(request);
  }

  endSession(gameId: string): boolean {
    const removed = this.sessions.delete(gameId);
    if (removed) logger.info(`[Sessions] Game ${gameId} closed`);
    return removed;
  }

  listSessions(): SessionSummary[] {
    return [...this.sessions.entries()].map(([gameId, agent]) => ({
      gameId,
      selfId: agent.context.selfId,
      role: agent.role,
      round: agent.context.round,
      alive: agent.context.aliveCount
    }));
  }

  get size(): number {
    return this.sessions.size;
  }
}
