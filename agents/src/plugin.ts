/**
 * Werewolf Plugin for ElizaOS
 *
 * - Classifies every public speech into trust evidence
 * - Scores, fuses and thresholds candidates for votes and night skills
 * - Answers the game host over a small JSON protocol
 */

import type { Plugin } from '@elizaos/core';
import { logger } from '@elizaos/core';
import { allGameActions } from './actions/gameActions.js';
import { configSchema, resolvePluginConfig } from './config.js';
import { gameStrategyEvaluator } from './evaluators/gameStrategyEvaluator.js';
import { gameStateProvider } from './providers/gameStateProvider.js';
import { WerewolfService } from './services/werewolfService.js';

export { configSchema };

const werewolfPlugin: Plugin = {
  name: 'werewolf',
  description: 'Trust-scoring Werewolf player: speech classification, multi-dimensional scoring and role decisions',

  async init(config: Record<string, string>) {
    logger.info('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    logger.info('🐺 Werewolf Plugin Initializing');
    logger.info('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');

    // Environment variables take precedence over plugin config
    const validatedConfig = resolvePluginConfig(config);

    logger.info(`✅ Classifier: ${validatedConfig.WEREWOLF_CLASSIFIER}`);
    logger.info(
      `✅ Protocol endpoint: ${
        validatedConfig.WEREWOLF_PROTOCOL_PORT === undefined ? 'disabled' : `port ${validatedConfig.WEREWOLF_PROTOCOL_PORT}`
      }`
    );
    logger.info(`✅ Speech limit: ${validatedConfig.WEREWOLF_SPEECH_MAX_LENGTH} characters`);
    logger.info('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n');
  },

  services: [WerewolfService],

  actions: allGameActions,

  providers: [gameStateProvider],

  evaluators: [gameStrategyEvaluator]
};

export default werewolfPlugin;
