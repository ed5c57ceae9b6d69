/**
 * Werewolf Service
 * Owns the sessions manager, the text generator and the optional protocol endpoint
 */

import { Service, type IAgentRuntime, logger } from '@elizaos/core';
import { createClassifier } from '../classifiers/index.js';
import { CONFIG_KEYS, engineOverrides, resolvePluginConfig, type WerewolfConfig } from '../config.js';
import { ServiceNotAvailableError } from '../errors.js';
import { ProtocolServer } from '../http/protocolServer.js';
import { RuntimeTextGenerator } from '../llm/generator.js';
import { PerformanceMonitor } from '../performance.js';
import type { RoleAgent } from '../roles/roleAgent.js';
import { AgentSessionsManager } from '../sessions.js';

export function readSettings(runtime: IAgentRuntime): Partial<Record<string, string>> {
  const settings: Partial<Record<string, string>> = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = runtime.getSetting(key);
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      settings[key] = String(value);
    }
  }
  return settings;
}

export class WerewolfService extends Service {
  static serviceType = 'werewolf';
  capabilityDescription = 'Plays Werewolf: classifies speeches, tracks trust and picks votes and night targets';

  readonly monitor = new PerformanceMonitor();
  private sessions: AgentSessionsManager | null = null;
  private server: ProtocolServer | null = null;
  private settings: WerewolfConfig | null = null;
  private latestGame: string | null = null;

  async initialize(runtime: IAgentRuntime): Promise<void> {
    logger.info('[Werewolf] Initializing werewolf service');

    const settings = resolvePluginConfig(readSettings(runtime));
    this.settings = settings;

    const generator = new RuntimeTextGenerator(runtime, {
      timeoutMs: settings.WEREWOLF_LLM_TIMEOUT_MS,
      monitor: this.monitor
    });

    this.sessions = new AgentSessionsManager({
      classifier: createClassifier(settings.WEREWOLF_CLASSIFIER, generator),
      generator,
      monitor: this.monitor,
      speechMaxLength: settings.WEREWOLF_SPEECH_MAX_LENGTH,
      overrides: engineOverrides(settings),
      onSessionCreated: (gameId) => {
        this.latestGame = gameId;
      }
    });

    if (settings.WEREWOLF_PROTOCOL_PORT !== undefined) {
      this.server = new ProtocolServer(this.sessions);
      await this.server.listen(settings.WEREWOLF_PROTOCOL_PORT);
    }

    logger.info(`[Werewolf] ✅ Ready (classifier: ${settings.WEREWOLF_CLASSIFIER})`);
  }

  getSessions(): AgentSessionsManager {
    if (!this.sessions) {
      throw new ServiceNotAvailableError('Werewolf service is not initialized', WerewolfService.serviceType);
    }
    return this.sessions;
  }

  getSettings(): WerewolfConfig | null {
    return this.settings;
  }

  /**
   * Most recently started game that is still running
   */
  getActiveAgent(): { gameId: string; agent: RoleAgent } | null {
    if (!this.sessions || !this.latestGame) return null;
    const agent = this.sessions.getSession(this.latestGame);
    return agent ? { gameId: this.latestGame, agent } : null;
  }

  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
    this.monitor.logMetrics();
    logger.info('[Werewolf] Service stopped');
  }

  // ElizaOS Service interface
  static async start(runtime: IAgentRuntime): Promise<Service> {
    const service = new WerewolfService();
    await service.initialize(runtime);
    return service;
  }
}
