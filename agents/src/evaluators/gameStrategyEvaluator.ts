/**
 * Game Strategy Evaluator
 * Reviews settled decisions and reports how well each action has been doing
 */

import type { Evaluator, IAgentRuntime, Memory, State } from '@elizaos/core';
import { ACTION_TYPES } from '@wolfpack/shared';
import type { WerewolfService } from '../services/werewolfService.js';

export const gameStrategyEvaluator: Evaluator = {
  name: 'WEREWOLF_STRATEGY',
  similes: ['STRATEGY', 'REVIEW_DECISIONS', 'THRESHOLDS'],
  description: 'Summarizes decision outcomes and the thresholds the optimizer has settled on',

  validate: async (runtime: IAgentRuntime, _message: Memory, _state?: State): Promise<boolean> => {
    const service = runtime.getService<WerewolfService>('werewolf');
    return service?.getActiveAgent() != null;
  },

  handler: async (runtime: IAgentRuntime, _message: Memory) => {
    const service = runtime.getService<WerewolfService>('werewolf');
    const active = service?.getActiveAgent();
    if (!service || !active) {
      return {
        success: false,
        text: 'No werewolf game in progress'
      };
    }

    const { optimizer } = service.getSessions();
    const { agent } = active;
    const actions = ACTION_TYPES.filter((action) => agent.engine.supports(action));

    const lines = actions.map((action) => {
      const { minScore, minConfidence } = optimizer.thresholds(action);
      const rate = optimizer.successRate(action);
      const record = rate === null ? 'no settled decisions' : `${Math.round(rate * 100)}% correct`;
      return `- ${action}: min score ${minScore.toFixed(1)}, min confidence ${minConfidence.toFixed(2)}, ${record}`;
    });

    let strategyPrompt = `
You are ${agent.context.selfId}, playing ${agent.role} in round ${agent.context.round}.
Decision record so far:
${lines.join('\n')}
`;

    if (agent.context.team === 'wolves') {
      strategyPrompt += `
Keep suspicion away from your teammates and push votes onto trusted villagers.
`;
    } else {
      strategyPrompt += `
Lean on verified results first, then on voting records and contradictions.
`;
    }

    return {
      success: true,
      text: strategyPrompt,
      data: {
        role: agent.role,
        pending: optimizer.getPending().length,
        thresholds: Object.fromEntries(actions.map((action) => [action, optimizer.thresholds(action)]))
      }
    };
  },

  examples: []
};
