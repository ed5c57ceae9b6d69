/**
 * Plugin configuration
 * Environment variables take precedence over character or runtime settings
 */

import { z } from 'zod';
import { loadEngineEnv, type EngineConfigOverrides } from '@wolfpack/engine';
import { ConfigurationError } from './errors.js';

export const configSchema = z.object({
  WEREWOLF_CLASSIFIER: z
    .enum(['smart', 'rules'])
    .default('smart')
    .describe('Speech classifier: model-backed with rule fallback, or rules only'),

  WEREWOLF_PROTOCOL_PORT: z.coerce
    .number()
    .int()
    .min(0)
    .max(65535)
    .optional()
    .describe('Port of the protocol HTTP endpoint; unset disables it'),

  WEREWOLF_SPEECH_MAX_LENGTH: z.coerce
    .number()
    .int()
    .min(20)
    .default(400)
    .describe('Generated speeches are cut to this many characters'),

  WEREWOLF_LLM_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(15000)
    .describe('Timeout of a single model call'),

  ML_FUSION_RATIO: z.coerce
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe('Weight of the probability estimate against the rule score')
});

export type WerewolfConfig = z.infer<typeof configSchema>;

export const CONFIG_KEYS = [
  'WEREWOLF_CLASSIFIER',
  'WEREWOLF_PROTOCOL_PORT',
  'WEREWOLF_SPEECH_MAX_LENGTH',
  'WEREWOLF_LLM_TIMEOUT_MS',
  'ML_FUSION_RATIO'
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

function present(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function resolvePluginConfig(
  settings: Partial<Record<string, string>>,
  env: NodeJS.ProcessEnv = process.env
): WerewolfConfig {
  const merged = Object.fromEntries(CONFIG_KEYS.map((key) => [key, present(env[key]) ?? present(settings[key])]));

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path[0];
    throw new ConfigurationError(
      `Invalid werewolf configuration: ${issue ? `${String(key)}: ${issue.message}` : 'unknown issue'}`,
      key === undefined ? undefined : String(key)
    );
  }
  return result.data;
}

/**
 * Engine overrides from the environment, with the plugin's fusion ratio on top
 */
export function engineOverrides(config: WerewolfConfig, env: NodeJS.ProcessEnv = process.env): EngineConfigOverrides {
  const overrides = loadEngineEnv(env);
  if (config.ML_FUSION_RATIO !== undefined) {
    overrides.fusion = { ...overrides.fusion, baseRatio: config.ML_FUSION_RATIO };
  }
  return overrides;
}
