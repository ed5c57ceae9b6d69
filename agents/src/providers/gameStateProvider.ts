/**
 * Game State Provider
 * Puts the agent's role, round and trust read of the table into LLM context
 */

import type { Provider, IAgentRuntime, Memory, State } from '@elizaos/core';
import type { WerewolfService } from '../services/werewolfService.js';

export const gameStateProvider: Provider = {
  name: 'WEREWOLF_STATE',
  description: 'Provides the current werewolf game state and trust scores',

  get: async (runtime: IAgentRuntime, _message: Memory, _state?: State) => {
    const service = runtime.getService<WerewolfService>('werewolf');
    const active = service?.getActiveAgent();

    if (!active) {
      return {
        text: 'No werewolf game in progress',
        data: {},
        values: { inGame: false }
      };
    }

    const { agent, gameId } = active;
    const { context } = agent;
    const resources = context.getResources();
    const owned = Object.entries(resources)
      .filter(([, available]) => available)
      .map(([name]) => name);
    const trust = agent.engine.trust.summary(
      context.others().filter((e) => context.isAlive(e.id)),
      5
    );

    const stateDescription = `
Current Werewolf Game:
- You are ${context.selfId}, the ${context.role}
- Round: ${context.round} (${context.phase})
- Alive: ${context.aliveIds().join(', ')}
- Unused skills: ${owned.length ? owned.join(', ') : 'none'}

Least trusted players:
${trust}
`;

    return {
      text: stateDescription,
      data: {
        gameId,
        selfId: context.selfId,
        role: context.role,
        round: context.round,
        phase: context.phase,
        alive: context.aliveIds(),
        resources
      },
      values: {
        inGame: true,
        isWolf: context.team === 'wolves',
        isAlive: context.isAlive(context.selfId),
        canShoot: resources.shoot
      }
    };
  }
};
