/**
 * Keyword Intent Classifier
 * Maps a student message to exactly one intent from an ordered trigger table
 */

import { InvalidInputError } from '@stem-tutor/shared';
import { findTerm, termPattern } from './matching.js';
import type {
  IntentClassification,
  IntentClassifier,
  KeywordIntentClassifierConfig,
  TriggeredIntent,
} from './types.js';

/**
 * Precedence when several intents match; the first one wins
 */
export const INTENT_PRECEDENCE: readonly TriggeredIntent[] = [
  'MemoryQuery',
  'RequestQuiz',
  'LookupFact',
  'ExplainConcept',
];

/**
 * Built-in trigger phrases per intent
 */
const DEFAULT_INTENT_TRIGGERS: Record<TriggeredIntent, string[]> = {
  MemoryQuery: [
    'what did we', 'what have we', 'remember', 'recap', 'last time',
    'we talked about', 'our conversation', 'my progress', 'how am i doing',
  ],
  RequestQuiz: [
    'quiz', 'test me', 'practice questions', 'practice problems', 'quiz me',
  ],
  LookupFact: [
    'who', 'when', 'where', 'how many', 'how much', 'how far', 'what year',
    'latest', 'news', 'look up', 'search', 'find out', 'speed of',
  ],
  ExplainConcept: [
    'explain', 'what is', "what's", 'what are', 'how does', 'how do', 'why',
    'describe', 'define', 'teach me', 'help me understand', 'difference between',
  ],
};

/**
 * Classifies student intent by trigger phrases
 */
export class KeywordIntentClassifier implements IntentClassifier {
  private triggers: Map<TriggeredIntent, Array<{ phrase: string; pattern: RegExp }>>;

  constructor(config: KeywordIntentClassifierConfig = {}) {
    this.triggers = new Map();
    for (const intent of INTENT_PRECEDENCE) {
      const phrases = config.customTriggers?.[intent] ?? DEFAULT_INTENT_TRIGGERS[intent];
      this.triggers.set(
        intent,
        phrases.map((phrase) => ({ phrase, pattern: termPattern(phrase) }))
      );
    }
  }

  async classify(text: string): Promise<IntentClassification> {
    return this.classifySync(text);
  }

  /**
   * Synchronous variant for callers outside the request path
   */
  classifySync(text: string): IntentClassification {
    const input = text.trim();
    if (input === '') {
      throw new InvalidInputError('message text is empty');
    }

    for (const intent of INTENT_PRECEDENCE) {
      const matched = (this.triggers.get(intent) ?? [])
        .filter(({ pattern }) => findTerm(input, pattern) >= 0)
        .map(({ phrase }) => phrase);

      if (matched.length > 0) {
        return {
          intent,
          confidence: this.calculateConfidence(input, matched),
          reason: `intent matched: ${intent} (${matched.join(', ')})`,
        };
      }
    }

    return { intent: 'GeneralChat', confidence: 0, reason: 'no specific intent detected' };
  }

  /**
   * Confidence grows with the number of matched triggers and message length
   */
  private calculateConfidence(input: string, matched: string[]): number {
    let confidence = Math.min(0.6 + (matched.length - 1) * 0.15, 0.9);

    const wordCount = input.split(/\s+/).length;
    if (wordCount > 5) {
      confidence += 0.1;
    }

    return Math.min(confidence, 1.0);
  }
}
