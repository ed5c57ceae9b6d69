/**
 * Decision Engine Tests
 */

import { describe, expect, test } from 'vitest';
import { DecisionEngine } from './engine.js';
import { ThresholdOptimizer } from './optimizer/thresholdOptimizer.js';

const PLAYERS = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7', 'p8', 'p9', 'p10', 'p11', 'p12'];

describe('DecisionEngine', () => {
  test('should expose only the actions of its role', () => {
    const engine = new DecisionEngine({ role: 'villager', estimator: null });
    const context = engine.createContext({ selfId: 'p1', players: PLAYERS });

    expect(engine.supports('vote')).toBe(true);
    expect(engine.supports('poison')).toBe(false);

    const decision = engine.decide('poison', ['p2'], context);
    if (decision.kind !== 'abstain') throw new Error('expected abstain');
    expect(decision.cause).toBe('hold');
  });

  test('should settle pending decisions when roles are revealed', () => {
    const engine = new DecisionEngine({ role: 'villager', estimator: null });
    const context = engine.createContext({ selfId: 'p1', players: PLAYERS });
    engine.ingest(context, {
      speaker: 'p2',
      round: 1,
      source: 'smart',
      injection: { kind: 'system_fake', confidence: 0.9 },
      supports: [],
      suspects: [],
      degraded: false
    });

    expect(engine.decide('vote', ['p2', 'p3'], context).target).toBe('p2');
    expect(engine.optimizer.getPending().length).toBe(1);

    engine.revealRoles(context, { p1: 'villager', p2: 'wolf', p3: 'seer' });

    expect(engine.optimizer.getPending()).toEqual([]);
    expect(engine.optimizer.successRate('vote')).toBe(1);
    expect(context.observe('p2').verifiedAlignment).toBe('hostile');
    expect(context.observe('p3').verifiedAlignment).toBe('ally');
    expect(context.observe('p1').verifiedAlignment).toBeUndefined();
  });

  test('should judge wolf kills from the wolf side', () => {
    const engine = new DecisionEngine({ role: 'wolf', estimator: null });
    const context = engine.createContext({ selfId: 'p1', players: PLAYERS, teammates: ['p2'] });

    expect(engine.decide('kill', ['p3'], context).target).toBe('p3');
    engine.revealRoles(context, { p2: 'wolf', p3: 'villager' });

    expect(engine.optimizer.successRate('kill')).toBe(1);
    expect(context.observe('p3').verifiedAlignment).toBe('hostile');
  });

  test('should share an optimizer across engines', () => {
    const optimizer = new ThresholdOptimizer();
    const first = new DecisionEngine({ role: 'villager', optimizer });
    const second = new DecisionEngine({ role: 'seer', optimizer });
    expect(first.optimizer).toBe(second.optimizer);
  });

  test('should explain a score', () => {
    const engine = new DecisionEngine({ role: 'villager' });
    const context = engine.createContext({ selfId: 'p1', players: PLAYERS });
    const breakdown = engine.explain('p2', context, 'vote');
    expect(breakdown.perspective).toBe('suspicion');
    expect(breakdown.total).toBe(15);
  });
});
