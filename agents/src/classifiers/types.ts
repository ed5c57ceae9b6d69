/**
 * Evidence Classifier contract
 */

import type { SpeechLine } from '@wolfpack/engine';
import type { EvidenceRecord, EvidenceSource } from '@wolfpack/shared';

export interface ClassifierInput {
  speaker: string;
  round: number;
  text: string;
  /** Earlier speeches, oldest first */
  history: SpeechLine[];
  /** Every known player id, used to resolve references like "No.3" */
  players: string[];
}

/**
 * Turns one public speech into an evidence record. Implementations never
 * reject: failures degrade to a partial or empty record.
 */
export interface EvidenceClassifier {
  readonly source: EvidenceSource;
  analyze(input: ClassifierInput): Promise<EvidenceRecord>;
}

export type ClassifierKind = 'smart' | 'rules';
