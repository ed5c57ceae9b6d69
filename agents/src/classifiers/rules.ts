/**
 * Rule-Based Classifier
 * Regex and keyword heuristics. Always available; also the per-field
 * fallback for the model-backed classifier.
 */

import type { EvidenceRecord, InjectionKind, RoleName, SpeechQuality } from '@wolfpack/shared';
import type { ClassifierInput, EvidenceClassifier } from './types.js';

// ============================================================================
// Patterns
// ============================================================================

const INJECTION_PATTERNS: Array<{ pattern: RegExp; kind: InjectionKind }> = [
  { pattern: /ignore.*instruction/i, kind: 'system_fake' },
  { pattern: /you are.*assistant/i, kind: 'system_fake' },
  { pattern: /system.*prompt/i, kind: 'system_fake' },
  { pattern: /\[(?:system|host|moderator)\]/i, kind: 'status_fake' },
  { pattern: /\b(?:host|moderator|judge)\s+(?:announces|notice|says)\b/i, kind: 'status_fake' },
  { pattern: /play.*role/i, kind: 'role_fake' },
  { pattern: /role.*setting/i, kind: 'role_fake' }
];

const REF = String.raw`(?:No\.\s?|player\s*)(\d+)\b`;

const QUOTE_PATTERN = new RegExp(
  String.raw`\b${REF}\s+(?:said|says|claimed|stated|mentioned)\s+(?:that\s+)?["']?([^."'!?]{5,80})`,
  'gi'
);
const CLAIM_PATTERN = /\bi(?:'m| am)\s+(?:the\s+|a\s+)?(seer|witch|guard|hunter|villager)\b/i;
const CHECK_PATTERN = new RegExp(
  String.raw`\bi\s+(?:checked|verified|inspected)\s+${REF}[^.!?]*?\b(wolf|werewolf|good|innocent|villager)\b`,
  'i'
);
const SUSPECT_PATTERN = new RegExp(String.raw`\b(?:suspect|vote out|vote for|eliminate|accuse)\s+${REF}`, 'gi');
const SUPPORT_PATTERN = new RegExp(String.raw`\b(?:trust|believe|support|defend)\s+${REF}`, 'gi');
const VOTE_PATTERN = new RegExp(String.raw`\bvote\s+(?:for\s+|out\s+)?${REF}`, 'i');

const LOGIC_WORDS = /\b(because|therefore|so|but|however|first|second|finally|since|thus)\b/gi;
const INFO_PATTERNS = [
  new RegExp(String.raw`\b${REF}`, 'i'),
  /\b(?:day|round|night)\s*\d+\b/i,
  /\bvot(?:e|ed|ing)\b/i,
  /\b(?:said|speech|claimed)\b/i
];

const RULE_QUOTE_CONFIDENCE = 0.7;
const SIMILARITY_THRESHOLD = 0.6;

// ============================================================================
// Detectors
// ============================================================================

export interface InjectionMatch {
  kind: InjectionKind;
  confidence: number;
  reason: string;
}

export function detectInjection(text: string): InjectionMatch | null {
  const hits = INJECTION_PATTERNS.filter(({ pattern }) => pattern.test(text));
  if (hits.length === 0) return null;
  return {
    kind: hits[0].kind,
    confidence: Math.min(hits.length * 0.3, 1),
    reason: `matched ${hits.map((h) => h.pattern.source).join(', ')}`
  };
}

/**
 * Map a spoken seat number to a known player id by its digits
 */
export function resolvePlayer(seat: string, players: string[]): string | null {
  return players.find((id) => id.replace(/\D+/g, '') === seat) ?? null;
}

/**
 * Jaccard similarity of the character sets of two strings
 */
export function characterSimilarity(a: string, b: string): number {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size === 0 || right.size === 0) return 0;
  let shared = 0;
  for (const ch of left) if (right.has(ch)) shared += 1;
  return shared / (left.size + right.size - shared);
}

export interface QuoteCheck {
  quoted: string;
  content: string;
}

/**
 * First quotation attributed to a player that matches nothing they said
 */
export function findFalseQuote(input: ClassifierInput): QuoteCheck | null {
  for (const match of input.text.matchAll(QUOTE_PATTERN)) {
    const quoted = resolvePlayer(match[1], input.players);
    if (!quoted || quoted === input.speaker) continue;

    const content = match[2].trim().toLowerCase();
    const said = input.history.filter((line) => line.speaker === quoted).map((line) => line.text.toLowerCase());
    const genuine = said.some(
      (line) => line.includes(content) || characterSimilarity(content, line) >= SIMILARITY_THRESHOLD
    );
    if (!genuine) return { quoted, content };
  }
  return null;
}

function scoreLength(text: string): number {
  const length = text.length;
  if (length < 20) return 0.2;
  if (length < 50) return 0.5;
  if (length < 200) return 1.0;
  return 0.8;
}

export function scoreSpeech(text: string): SpeechQuality {
  const length = scoreLength(text);
  const logicWords = new Set([...text.matchAll(LOGIC_WORDS)].map((m) => m[1].toLowerCase()));
  const logic = Math.min(logicWords.size * 0.25, 1);
  const info = Math.min(INFO_PATTERNS.filter((p) => p.test(text)).length * 0.3, 1);

  return {
    logic: Math.round(logic * 100),
    information: Math.round(info * 100),
    persuasion: Math.round(length * 100),
    strategy: Math.round(((logic + info) / 2) * 100),
    overall: Math.round(((length + logic + info) / 3) * 100)
  };
}

function claimedRoleOf(text: string): RoleName | null {
  const match = text.match(CLAIM_PATTERN);
  if (!match) return null;
  const role = match[1].toLowerCase();
  return role === 'seer' || role === 'witch' || role === 'guard' || role === 'hunter' || role === 'villager'
    ? role
    : null;
}

function references(text: string, pattern: RegExp, players: string[], speaker: string): string[] {
  const ids = new Set<string>();
  for (const match of text.matchAll(pattern)) {
    const id = resolvePlayer(match[1], players);
    if (id && id !== speaker) ids.add(id);
  }
  return [...ids];
}

// ============================================================================
// Classifier
// ============================================================================

export class RuleBasedClassifier implements EvidenceClassifier {
  readonly source = 'rules' as const;

  async analyze(input: ClassifierInput): Promise<EvidenceRecord> {
    return this.classify(input);
  }

  classify(input: ClassifierInput): EvidenceRecord {
    const { text, players, speaker } = input;
    const record: EvidenceRecord = {
      speaker,
      round: input.round,
      source: this.source,
      speech: scoreSpeech(text),
      supports: references(text, SUPPORT_PATTERN, players, speaker),
      suspects: references(text, SUSPECT_PATTERN, players, speaker),
      degraded: false
    };

    const injection = detectInjection(text);
    if (injection) record.injection = injection;

    const quote = findFalseQuote(input);
    if (quote) {
      record.falseQuote = {
        confidence: RULE_QUOTE_CONFIDENCE,
        quoted: quote.quoted,
        reason: `"${quote.content}" not found in ${quote.quoted}'s speeches`
      };
    }

    const check = text.match(CHECK_PATTERN);
    const checkTarget = check ? resolvePlayer(check[1], players) : null;
    if (check && checkTarget) {
      const verdict = check[2].toLowerCase();
      record.claimedCheck = { target: checkTarget, result: verdict === 'wolf' || verdict === 'werewolf' ? 'wolf' : 'good' };
    }

    const role = claimedRoleOf(text);
    if (role) {
      record.claimedRole = role;
      const earlier = input.history
        .filter((line) => line.speaker === speaker)
        .map((line) => claimedRoleOf(line.text))
        .find((r) => r !== null && r !== role);
      if (earlier) record.contradiction = true;
    }

    const vote = text.match(VOTE_PATTERN);
    const voteTarget = vote ? resolvePlayer(vote[1], players) : null;
    if (voteTarget && voteTarget !== speaker) record.voteIntention = voteTarget;

    return record;
  }
}
