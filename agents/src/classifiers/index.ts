import { logger } from '@elizaos/core';
import type { TextGenerator } from '../llm/generator.js';
import { RuleBasedClassifier } from './rules.js';
import { SmartEvidenceClassifier } from './smart.js';
import type { ClassifierKind, EvidenceClassifier } from './types.js';

export { RuleBasedClassifier, detectInjection, findFalseQuote, scoreSpeech } from './rules.js';
export { SmartEvidenceClassifier } from './smart.js';
export type { ClassifierInput, ClassifierKind, EvidenceClassifier } from './types.js';

/**
 * Pick the classifier variant once, at construction. The smart variant
 * needs a generator; without one the rules take over.
 */
export function createClassifier(kind: ClassifierKind, generator?: TextGenerator): EvidenceClassifier {
  if (kind === 'smart') {
    if (generator) return new SmartEvidenceClassifier(generator);
    logger.warn('[Classifier] No text generator available, using rule-based classifier');
  }
  return new RuleBasedClassifier();
}
