// ============================================================================
// Classifier Types
// ============================================================================

import type { Intent, Logger, Subject } from '@stem-tutor/shared';

export interface IntentClassification {
  intent: Intent;

  /** 0..1 */
  confidence: number;

  /** Human-readable explanation, for logs */
  reason: string;

  /** The message reads as an answer to an open quiz */
  quizAnswer?: boolean;
}

export interface SubjectClassification {
  subject: Subject;
  topic?: string;
  confidence: number;
}

/**
 * Assigns exactly one Intent to a message.
 * Empty text fails with InvalidInputError; backend failures with
 * ClassificationUnavailableError.
 */
export interface IntentClassifier {
  classify(text: string): Promise<IntentClassification>;
}

/**
 * Assigns exactly one Subject to a message. Low confidence yields
 * 'Unclassified', never an error.
 */
export interface SubjectClassifier {
  classify(text: string): Promise<SubjectClassification>;
}

/**
 * Intents reachable through trigger words; GeneralChat is the fallback
 */
export type TriggeredIntent = Exclude<Intent, 'GeneralChat'>;

export interface KeywordIntentClassifierConfig {
  /** Replace the built-in triggers for an intent */
  customTriggers?: Partial<Record<TriggeredIntent, string[]>>;
}

/**
 * Keyword lists per classified subject
 */
export type SubjectKeywordTable = Record<Exclude<Subject, 'Unclassified'>, string[]>;

export interface ProviderClassifierOptions {
  logger?: Logger;

  /** Below this the subject is reported as Unclassified (default 0.5) */
  minConfidence?: number;
}
