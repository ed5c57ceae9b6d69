/**
 * Smart Classifier
 * Asks the language model for a structured reading of one speech and
 * validates the reply with zod. Any field the model gets wrong falls back to
 * the rule-based reading; the record is then marked degraded.
 */

import { logger } from '@elizaos/core';
import { z } from 'zod';
import type { EvidenceRecord } from '@wolfpack/shared';
import { errorMessage } from '../errors.js';
import { parseJsonReply, type TextGenerator } from '../llm/generator.js';
import { buildClassifierPrompt } from '../roles/prompts.js';
import { RuleBasedClassifier } from './rules.js';
import type { ClassifierInput, EvidenceClassifier } from './types.js';

const score = z.number().min(0).max(100);
const unit = z.number().min(0).max(1);

const injectionSchema = z.object({
  detected: z.boolean(),
  kind: z.enum(['system_fake', 'status_fake', 'role_fake', 'other']).default('other'),
  confidence: unit,
  reason: z.string().optional()
});

const falseQuoteSchema = z.object({
  detected: z.boolean(),
  confidence: unit,
  quoted: z.string().nullish(),
  reason: z.string().optional()
});

const speechSchema = z.object({
  logic: score,
  information: score,
  persuasion: score,
  strategy: score,
  overall: score
});

const claimSchema = z.enum(['villager', 'seer', 'witch', 'guard', 'hunter']).nullable();
const checkSchema = z.object({ target: z.string(), result: z.enum(['wolf', 'good']) }).nullable();
const idListSchema = z.array(z.string());

export class SmartEvidenceClassifier implements EvidenceClassifier {
  readonly source = 'smart' as const;
  private rules = new RuleBasedClassifier();

  constructor(private readonly generator: TextGenerator) {}

  async analyze(input: ClassifierInput): Promise<EvidenceRecord> {
    const fallback = this.rules.classify(input);

    let reply: string;
    try {
      reply = await this.generator.generate(buildClassifierPrompt(input), {
        temperature: 0,
        operation: 'classifier.smart'
      });
    } catch (error) {
      logger.warn(`[Classifier] Model unavailable for ${input.speaker}, using rules: ${errorMessage(error)}`);
      return { ...fallback, degraded: true };
    }

    const parsed = parseJsonReply(reply);
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      logger.warn(`[Classifier] Unparseable reply for ${input.speaker}, using rules`);
      return { ...fallback, degraded: true };
    }

    return this.merge(input, new Map(Object.entries(parsed)), fallback);
  }

  private merge(input: ClassifierInput, raw: Map<string, unknown>, fallback: EvidenceRecord): EvidenceRecord {
    const failed: string[] = [];
    const known = (id: string): boolean => input.players.includes(id) && id !== input.speaker;

    // each field is validated on its own so one bad field does not sink the rest
    const field = <T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined => {
      const result = schema.safeParse(raw.get(name));
      if (result.success) return result.data;
      failed.push(name);
      return undefined;
    };

    const record: EvidenceRecord = {
      speaker: input.speaker,
      round: input.round,
      source: this.source,
      supports: [],
      suspects: [],
      degraded: false
    };

    const injection = field('injection', injectionSchema);
    if (injection === undefined) {
      if (fallback.injection) record.injection = fallback.injection;
    } else if (injection.detected) {
      record.injection = { kind: injection.kind, confidence: injection.confidence, reason: injection.reason };
    }

    const falseQuote = field('falseQuote', falseQuoteSchema);
    if (falseQuote === undefined) {
      if (fallback.falseQuote) record.falseQuote = fallback.falseQuote;
    } else if (falseQuote.detected) {
      record.falseQuote = {
        confidence: falseQuote.confidence,
        quoted: falseQuote.quoted ?? undefined,
        reason: falseQuote.reason
      };
    }

    record.speech = field('speech', speechSchema) ?? fallback.speech;

    const contradiction = field('contradiction', z.boolean());
    const contradicted = contradiction ?? fallback.contradiction;
    if (contradicted) record.contradiction = true;

    const claimedRole = field('claimedRole', claimSchema);
    const role = claimedRole === undefined ? fallback.claimedRole : claimedRole;
    if (role) record.claimedRole = role;

    const claimedCheck = field('claimedCheck', checkSchema);
    if (claimedCheck === undefined) {
      if (fallback.claimedCheck) record.claimedCheck = fallback.claimedCheck;
    } else if (claimedCheck && input.players.includes(claimedCheck.target)) {
      record.claimedCheck = claimedCheck;
    }

    record.supports = (field('supports', idListSchema) ?? fallback.supports).filter(known);
    record.suspects = (field('suspects', idListSchema) ?? fallback.suspects).filter(known);

    const voteIntention = field('voteIntention', z.string().nullable());
    const vote = voteIntention === undefined ? fallback.voteIntention : voteIntention;
    if (vote && known(vote)) record.voteIntention = vote;

    if (failed.length > 0) {
      record.degraded = true;
      logger.debug(`[Classifier] ${input.speaker}: fell back to rules for ${failed.join(', ')}`);
    }
    return record;
  }
}
