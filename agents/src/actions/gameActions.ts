/**
 * Game Actions
 * Chat-facing entry points for the decisions the role agent can make
 */

import type { Action, ActionResult, Content, HandlerCallback, IAgentRuntime, Memory } from '@elizaos/core';
import type { InteractRequest } from '@wolfpack/shared';
import type { WerewolfService } from '../services/werewolfService.js';

type DecisionRequestType = Exclude<InteractRequest['type'], 'speak'>;

function requestFor(type: DecisionRequestType, candidates: string[]): InteractRequest {
  switch (type) {
    case 'vote':
      return { type: 'vote', candidates };
    case 'shoot':
      return { type: 'shoot', candidates };
    case 'night-action':
      return { type: 'night-action', candidates };
  }
}

function hasActiveGame(runtime: IAgentRuntime): boolean {
  const service = runtime.getService<WerewolfService>('werewolf');
  return service?.getActiveAgent() != null;
}

function mentions(message: Memory, words: string[]): boolean {
  const text = (message.content.text || '').toLowerCase();
  return words.some((word) => text.includes(word));
}

// Helper to run one decision against the active game
async function executeDecision(
  type: DecisionRequestType,
  runtime: IAgentRuntime,
  message: Memory,
  callback?: HandlerCallback
): Promise<ActionResult> {
  const service = runtime.getService<WerewolfService>('werewolf');
  const active = service?.getActiveAgent();

  if (!active) {
    return {
      success: false,
      text: 'No werewolf game in progress',
      error: new Error('NO_ACTIVE_GAME')
    };
  }

  const { agent } = active;
  const response = await agent.interact(requestFor(type, agent.context.aliveOthers()));
  const text = response.target
    ? `${type === 'night-action' ? (response.decision?.action ?? type) : type}: ${response.target} (${response.reason})`
    : `No target: ${response.reason}`;

  const responseContent: Content = {
    text,
    action: type,
    source: message.content.source
  };

  if (callback) {
    await callback(responseContent);
  }

  return {
    success: response.success,
    text,
    data: {
      gameId: active.gameId,
      target: response.target,
      reason: response.reason,
      confidence: response.decision?.confidence ?? 0
    }
  };
}

export const castVoteAction: Action = {
  name: 'CAST_VOTE',
  similes: ['VOTE', 'VOTE_OUT', 'ELIMINATE'],
  description: 'Pick the player to vote out this round',
  validate: async (runtime, message) => hasActiveGame(runtime) && mentions(message, ['vote', 'eliminate']),
  handler: async (runtime, message, _state, _options, callback) => {
    return await executeDecision('vote', runtime, message, callback);
  },
  examples: [[
    { name: 'User', content: { text: 'Who do you vote for?' } },
    { name: 'Agent', content: { text: 'vote: p7 (Highest suspicion score 62.5)' } }
  ]]
};

export const nightAction: Action = {
  name: 'NIGHT_ACTION',
  similes: ['KILL', 'CHECK', 'PROTECT', 'POISON', 'SAVE'],
  description: "Use the role's night skill",
  validate: async (runtime, message) =>
    hasActiveGame(runtime) && mentions(message, ['night', 'kill', 'check', 'protect', 'poison', 'save']),
  handler: async (runtime, message, _state, _options, callback) => {
    return await executeDecision('night-action', runtime, message, callback);
  },
  examples: [[
    { name: 'User', content: { text: 'Night falls, use your skill' } },
    { name: 'Agent', content: { text: 'check: p4 (Highest suspicion score 40.0)' } }
  ]]
};

export const shootAction: Action = {
  name: 'SHOOT',
  similes: ['REVENGE', 'TAKE_DOWN'],
  description: 'Shoot a player on death (hunter or wolf king)',
  validate: async (runtime, message) => hasActiveGame(runtime) && mentions(message, ['shoot', 'revenge']),
  handler: async (runtime, message, _state, _options, callback) => {
    return await executeDecision('shoot', runtime, message, callback);
  },
  examples: [[
    { name: 'User', content: { text: 'You died, shoot someone' } },
    { name: 'Agent', content: { text: 'shoot: p9 (p9 led the vote against us)' } }
  ]]
};

export const allGameActions: Action[] = [castVoteAction, nightAction, shootAction];
