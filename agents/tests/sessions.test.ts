/**
 * Role agent and sessions manager tests
 * Drives whole games through the perceive/interact protocol
 */

import { describe, test, expect, beforeEach } from 'vitest';
import type { EvidenceRecord, PerceiveEvent } from '@wolfpack/shared';
import { RuleBasedClassifier } from '../src/classifiers/rules.js';
import type { EvidenceClassifier } from '../src/classifiers/types.js';
import { ClassifierError, GenerationError, SessionNotFoundError } from '../src/errors.js';
import type { TextGenerator } from '../src/llm/generator.js';
import { PerformanceMonitor } from '../src/performance.js';
import { AgentSessionsManager } from '../src/sessions.js';

const PLAYERS = Array.from({ length: 12 }, (_, i) => `p${i + 1}`);

function start(role: 'seer' | 'witch' | 'villager' | 'hunter' | 'wolf'): PerceiveEvent {
  return { type: 'start', selfId: 'p1', role, players: PLAYERS, teammates: role === 'wolf' ? ['p9'] : undefined };
}

class ScriptedGenerator implements TextGenerator {
  prompts: string[] = [];

  constructor(private reply: string | Error) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

describe('AgentSessionsManager', () => {
  let manager: AgentSessionsManager;

  beforeEach(() => {
    manager = new AgentSessionsManager({
      classifier: new RuleBasedClassifier(),
      speechMaxLength: 200,
      estimator: null
    });
  });

  test('should create a session on start', async () => {
    await manager.perceive('g1', start('seer'));

    expect(manager.size).toBe(1);
    expect(manager.listSessions()).toEqual([{ gameId: 'g1', selfId: 'p1', role: 'seer', round: 1, alive: 12 }]);
  });

  test('should reject events for unknown games', async () => {
    await expect(manager.perceive('nope', { type: 'night', round: 2 })).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(manager.interact('nope', { type: 'vote', candidates: ['p2'] })).rejects.toThrow(
      'No session for game nope'
    );
  });

  test('should share one optimizer across sessions', async () => {
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g2', start('witch'));

    expect(manager.getSession('g1')?.engine.optimizer).toBe(manager.optimizer);
    expect(manager.getSession('g2')?.engine.optimizer).toBe(manager.optimizer);
  });

  test('should vote out a player the seer checked as a wolf', async () => {
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g1', { type: 'check-result', target: 'p5', alignment: 'wolf' });

    const response = await manager.interact('g1', { type: 'vote', candidates: ['p2', 'p5', 'p7'] });

    expect(response.success).toBe(true);
    expect(response.target).toBe('p5');
    expect(response.reason).toBe('p5 is verified hostile');
    expect(response.decision?.kind === 'target' && response.decision.override).toBe('oracle-hostile');
  });

  test('should not re-check a verified player at night', async () => {
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g1', { type: 'check-result', target: 'p5', alignment: 'good' });

    const response = await manager.interact('g1', { type: 'night-action', candidates: ['p2', 'p5', 'p7'] });

    expect(response.action).toBe('night-action');
    expect(response.decision?.action).toBe('check');
    expect(Object.keys(response.decision?.scores ?? {})).toEqual(['p2', 'p7']);
  });

  test('should hold at night for roles without a night skill', async () => {
    await manager.perceive('g1', start('villager'));

    const response = await manager.interact('g1', { type: 'night-action', candidates: ['p2', 'p3'] });

    expect(response).toEqual({
      success: true,
      action: 'night-action',
      target: null,
      reason: 'villager has no night action'
    });
  });

  test('should spend the antidote on the first victim', async () => {
    await manager.perceive('g1', start('witch'));

    const response = await manager.interact('g1', {
      type: 'night-action',
      candidates: ['p2', 'p3', 'p4'],
      victim: 'p3'
    });

    expect(response.target).toBe('p3');
    expect(response.decision?.action).toBe('antidote');
    expect(manager.getSession('g1')?.context.hasResource('antidote')).toBe(false);
    expect(manager.getSession('g1')?.context.hasResource('poison')).toBe(true);
  });

  test('should shoot the player who led the vote against the hunter', async () => {
    await manager.perceive('g1', start('hunter'));
    await manager.perceive('g1', {
      type: 'vote-result',
      round: 1,
      ballots: [
        { voter: 'p2', target: 'p1' },
        { voter: 'p3', target: 'p1' },
        { voter: 'p4', target: 'p2' }
      ],
      eliminated: 'p1'
    });

    const agent = manager.getSession('g1');
    expect(agent?.context.isAlive('p1')).toBe(false);

    const response = await manager.interact('g1', { type: 'shoot', candidates: ['p2', 'p3', 'p4'] });
    expect(response.target).toBe('p2');
    expect(response.reason).toBe('p2 led the vote against us');
  });

  test('should treat a wolf check as an ally for the wolf team', async () => {
    await manager.perceive('g1', start('wolf'));
    await manager.perceive('g1', { type: 'check-result', target: 'p4', alignment: 'wolf' });

    const context = manager.getSession('g1')?.context;
    expect(context?.entity('p4')?.verifiedAlignment).toBe('ally');
    expect(context?.entity('p9')?.verifiedAlignment).toBe('ally');
  });

  test('should track deaths, shots and protection', async () => {
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g1', { type: 'night-info', round: 2, deaths: ['p6'] });
    await manager.perceive('g1', { type: 'shot', shooter: 'p6', target: 'p7' });
    await manager.perceive('g1', { type: 'skill-result', action: 'protect', target: 'p8', success: true });

    const context = manager.getSession('g1')?.context;
    expect(context?.round).toBe(2);
    expect(context?.eliminationOf('p6')?.cause).toBe('night');
    expect(context?.eliminationOf('p7')?.cause).toBe('shot');
    expect(context?.isProtected('p8')).toBe(true);
    expect(context?.aliveCount).toBe(10);
  });

  test('should classify and ingest speeches from other players', async () => {
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g1', { type: 'speech', round: 1, speaker: 'p2', text: 'I suspect No.3 and will vote for No.3' });
    await manager.perceive('g1', { type: 'speech', round: 1, speaker: 'p1', text: 'I am listening' });

    const context = manager.getSession('g1')?.context;
    expect(context?.speechLines().map((l) => l.speaker)).toEqual(['p2', 'p1']);
    expect(context?.entity('p2')?.evidence.speechCount).toBe(1);
    expect(context?.entity('p3')?.evidence.accusedBy).toEqual(['p2']);
  });

  test('should keep pending decisions apart between games with the same player ids', async () => {
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g1', { type: 'check-result', target: 'p5', alignment: 'wolf' });
    await manager.interact('g1', { type: 'vote', candidates: ['p5'] });
    expect(manager.optimizer.getPending()).toHaveLength(1);

    await manager.perceive('g2', start('seer'));
    await manager.perceive('g2', { type: 'check-result', target: 'p5', alignment: 'good' });

    expect(manager.optimizer.getPending()).toHaveLength(1);
    expect(manager.optimizer.successRate('vote')).toBeNull();
  });

  test('should settle pending decisions and close the session at game end', async () => {
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g1', { type: 'check-result', target: 'p5', alignment: 'wolf' });
    await manager.interact('g1', { type: 'vote', candidates: ['p5'] });

    await manager.perceive('g1', { type: 'game-end', winner: 'village', roles: { p1: 'seer', p5: 'wolf' } });

    expect(manager.size).toBe(0);
    expect(manager.optimizer.successRate('vote')).toBe(1);
    await expect(manager.perceive('g1', { type: 'night', round: 3 })).rejects.toBeInstanceOf(SessionNotFoundError);
  });
});

describe('RoleAgent speech', () => {
  test('should speak from the model and cut the text to length', async () => {
    const generator = new ScriptedGenerator('p5 is a wolf, I checked them last night. Vote p5 now please.');
    const manager = new AgentSessionsManager({
      classifier: new RuleBasedClassifier(),
      generator,
      speechMaxLength: 40,
      estimator: null
    });
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g1', { type: 'check-result', target: 'p5', alignment: 'wolf' });

    const response = await manager.interact('g1', { type: 'speak' });

    expect(response.text).toBe('p5 is a wolf, I checked them last night.');
    expect(generator.prompts[0]).toContain('You are the SEER');
    expect(generator.prompts[0]).toContain('p5: trust 0.0 → [verified hostile]');
    expect(generator.prompts[0]).toContain('- p5 is against you');
  });

  test('should fall back to a plain speech when generation fails', async () => {
    const manager = new AgentSessionsManager({
      classifier: new RuleBasedClassifier(),
      generator: new ScriptedGenerator(new GenerationError('Model call failed after 2 attempts', 2)),
      speechMaxLength: 200,
      estimator: null
    });
    await manager.perceive('g1', start('seer'));
    await manager.perceive('g1', { type: 'check-result', target: 'p5', alignment: 'wolf' });

    const response = await manager.interact('g1', { type: 'speak' });

    expect(response.success).toBe(true);
    expect(response.text).toBe("I don't trust p5 yet. I want to hear them explain their votes.");
  });

  test('should surface a rejecting classifier as a classifier error', async () => {
    const broken: EvidenceClassifier = {
      source: 'smart',
      analyze: async (): Promise<EvidenceRecord> => {
        throw new Error('boom');
      }
    };
    const monitor = new PerformanceMonitor();
    const manager = new AgentSessionsManager({ classifier: broken, monitor, speechMaxLength: 200, estimator: null });
    await manager.perceive('g1', start('seer'));

    const error = await manager
      .perceive('g1', { type: 'speech', round: 1, speaker: 'p2', text: 'hello' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ClassifierError);
    expect(error instanceof ClassifierError && error.speaker).toBe('p2');
    expect(manager.getSession('g1')?.context.speechLines()).toHaveLength(1);
    expect(monitor.getStats('classify.smart')?.successRate).toBe(0);
  });
});
