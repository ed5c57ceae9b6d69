/**
 * Werewolf Agent Entry Point
 * Creates and runs an AgentRuntime for the werewolf character
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { AgentRuntime, logger, type Character, type Plugin } from '@elizaos/core';
import bootstrapPlugin from '@elizaos/plugin-bootstrap';
import openaiPlugin from '@elizaos/plugin-openai';
import sqlPlugin from '@elizaos/plugin-sql';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import werewolfPlugin from './plugin.js';

const CHARACTER_PATH = new URL('../characters/werewolf.json', import.meta.url);

const characterSchema = z.object({
  name: z.string().min(1),
  username: z.string().optional(),
  bio: z.union([z.string(), z.array(z.string())]),
  system: z.string().optional(),
  topics: z.array(z.string()).optional(),
  adjectives: z.array(z.string()).optional(),
  style: z
    .object({
      all: z.array(z.string()).optional(),
      chat: z.array(z.string()).optional(),
      post: z.array(z.string()).optional()
    })
    .optional(),
  plugins: z.array(z.string()).optional(),
  settings: z.record(z.union([z.string(), z.number(), z.boolean()])).optional()
});

export function loadCharacter(path: URL = CHARACTER_PATH): Character {
  const result = characterSchema.safeParse(JSON.parse(readFileSync(path, 'utf8')));
  if (!result.success) {
    throw new ConfigurationError(`Invalid character file ${fileURLToPath(path)}: ${result.error.issues[0]?.message}`);
  }
  return result.data;
}

// Store active runtimes
const activeRuntimes: Map<string, AgentRuntime> = new Map();

const createAgentRuntime = async (character: Character): Promise<AgentRuntime> => {
  const characterWithSettings: Character = {
    ...character,
    settings: {
      secrets: {
        OPENAI_API_KEY: process.env.OPENAI_API_KEY || ''
      },
      ...character.settings
    }
  };

  logger.info(`[Werewolf] Creating runtime for ${character.name}`);

  // SQL plugin must be first for the database adapter
  const runtime = new AgentRuntime({
    character: characterWithSettings,
    plugins: [sqlPlugin as Plugin, bootstrapPlugin as Plugin, openaiPlugin as Plugin, werewolfPlugin]
  });

  await runtime.initialize();
  logger.info(`[Werewolf] ✅ ${character.name} runtime initialized`);
  return runtime;
};

async function startAgents(): Promise<void> {
  const character = loadCharacter();
  const runtime = await createAgentRuntime(character);
  activeRuntimes.set(character.name, runtime);
  logger.info(`[Werewolf] Agent ${character.name} running (ID: ${runtime.agentId}). Press Ctrl+C to stop.`);
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`[Werewolf] ${signal} received, stopping agents`);
  for (const [name, runtime] of activeRuntimes) {
    logger.info(`[Werewolf] Stopping ${name}`);
    await runtime.stop();
  }
  activeRuntimes.clear();
  process.exit(0);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error(`[Werewolf] Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  }

  startAgents().catch((error) => {
    logger.error(`[Werewolf] Failed to start agents: ${errorMessage(error)}`);
    process.exit(1);
  });
}

export { activeRuntimes, createAgentRuntime, startAgents };
export { werewolfPlugin };
export { configSchema, engineOverrides, resolvePluginConfig } from './config.js';
export type { WerewolfConfig } from './config.js';

export { WerewolfService } from './services/werewolfService.js';
export { AgentSessionsManager } from './sessions.js';
export type { AgentSessionsOptions, SessionSummary } from './sessions.js';
export { RoleAgent, NIGHT_ACTIONS } from './roles/roleAgent.js';
export type { RoleAgentOptions } from './roles/roleAgent.js';
export { ProtocolServer } from './http/protocolServer.js';
export { parseInteractRequest, parsePerceiveEvent } from './protocol/schema.js';

export { createClassifier, RuleBasedClassifier, SmartEvidenceClassifier } from './classifiers/index.js';
export type { ClassifierInput, ClassifierKind, EvidenceClassifier } from './classifiers/index.js';
export { RuntimeTextGenerator, parseJsonReply } from './llm/generator.js';
export type { GenerateOptions, TextGenerator } from './llm/generator.js';

export { PerformanceMonitor } from './performance.js';
export type { PerformanceMetric, PerformanceStats } from './performance.js';

export {
  ClassifierError,
  ConfigurationError,
  GenerationError,
  ProtocolError,
  ServiceNotAvailableError,
  SessionNotFoundError,
  WerewolfPluginError
} from './errors.js';
