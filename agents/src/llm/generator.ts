/**
 * Text Generation
 * Thin wrapper over the runtime's small text model with a timeout and retries
 */

import { logger, ModelType, type IAgentRuntime } from '@elizaos/core';
import { GenerationError, errorMessage } from '../errors.js';
import type { PerformanceMonitor } from '../performance.js';

export interface GenerateOptions {
  temperature?: number;
  /** Operation name recorded by the performance monitor */
  operation?: string;
}

export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface RuntimeTextGeneratorOptions {
  timeoutMs: number;
  retries?: number;
  monitor?: PerformanceMonitor;
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new GenerationError(`Model call timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export class RuntimeTextGenerator implements TextGenerator {
  private timeoutMs: number;
  private retries: number;
  private monitor?: PerformanceMonitor;

  constructor(
    private readonly runtime: IAgentRuntime,
    options: RuntimeTextGeneratorOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    this.retries = options.retries ?? 1;
    this.monitor = options.monitor;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const operation = options.operation ?? 'llm.generate';
    const call = () => this.attempt(prompt, options.temperature ?? 0.7);
    return this.monitor ? this.monitor.measure(operation, call) : call();
  }

  private async attempt(prompt: string, temperature: number): Promise<string> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.retries + 1; attempt++) {
      try {
        const reply: unknown = await withTimeout(
          this.runtime.useModel(ModelType.TEXT_SMALL, { prompt, temperature }),
          this.timeoutMs
        );
        if (typeof reply !== 'string' || reply.trim() === '') {
          throw new GenerationError('Model returned an empty reply', attempt);
        }
        return reply;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn(`[LLM] Attempt ${attempt} failed: ${errorMessage(error)}`);
      }
    }

    throw new GenerationError(
      `Model call failed after ${this.retries + 1} attempts: ${lastError?.message ?? 'unknown error'}`,
      this.retries + 1,
      lastError
    );
  }
}

/**
 * Parse a JSON object out of a model reply: the whole text first, then the
 * outermost {...} span. Returns null when neither parses.
 */
export function parseJsonReply(text: string): unknown {
  const trimmed = text.trim();
  const candidates = [trimmed];
  const span = trimmed.match(/\{[\s\S]*\}/);
  if (span && span[0] !== trimmed) candidates.push(span[0]);

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      logger.debug('[LLM] Reply is not bare JSON, trying the embedded object');
    }
  }
  return null;
}
