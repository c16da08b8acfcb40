// ============================================================================
// Routing - intent to capability mapping
// ============================================================================

import { AmbiguousRoutingError, CAPABILITIES, isClassifiedSubject } from '@stem-tutor/shared';
import type { Intent, Subject } from '@stem-tutor/shared';
import type { RoutePlan } from './types.js';

export const DEFAULT_QUESTION_COUNT = 5;
export const MAX_QUESTION_COUNT = 20;

/** Replies this short are read as quiz answers while a quiz is open */
export const QUIZ_REPLY_MAX_LENGTH = 3;

const NUMBER_WORDS: Record<string, number> = {
  one: 1, two: 2, three: 3, four: 4, five: 5,
  six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
};

/**
 * A bare option letter or similarly short reply, e.g. "b" or "42"
 */
export function isQuizReply(text: string): boolean {
  return text.trim().length <= QUIZ_REPLY_MAX_LENGTH;
}

/**
 * Decide how a classified message is served.
 * @throws AmbiguousRoutingError for a quiz without a subject
 */
export function selectRoute(intent: Intent, subject: Subject): RoutePlan {
  const classified = isClassifiedSubject(subject) ? subject : null;

  switch (intent) {
    case 'MemoryQuery':
      return { kind: 'memory' };
    case 'RequestQuiz':
      if (!classified) {
        throw new AmbiguousRoutingError('quiz requested without a subject');
      }
      return { kind: 'quiz', subject: classified };
    case 'LookupFact':
      return { kind: 'search-explain', subject: classified };
    case 'ExplainConcept':
      return { kind: 'explain', subject: classified, mode: 'explain' };
    case 'GeneralChat':
      return { kind: 'explain', subject: null, mode: 'chat' };
  }
}

/**
 * Capabilities a plan invokes, in call order
 */
export function capabilitiesFor(plan: RoutePlan): string[] {
  switch (plan.kind) {
    case 'memory':
      return [];
    case 'explain':
      return [CAPABILITIES.CONCEPT_EXPLAINER];
    case 'quiz':
      return [CAPABILITIES.QUIZ_GENERATOR];
    case 'search-explain':
      return [CAPABILITIES.WEB_SEARCH, CAPABILITIES.CONCEPT_EXPLAINER];
  }
}

/**
 * Requested quiz length: "5-question", "10 questions", "three questions"
 */
export function parseQuestionCount(text: string, fallback: number = DEFAULT_QUESTION_COUNT): number {
  const match = /\b(\d{1,3}|one|two|three|four|five|six|seven|eight|nine|ten)[\s-]*questions?\b/i.exec(text);
  if (!match) {
    return fallback;
  }

  const token = match[1].toLowerCase();
  const count = NUMBER_WORDS[token] ?? parseInt(token, 10);
  if (!Number.isFinite(count) || count < 1) {
    return fallback;
  }
  return Math.min(count, MAX_QUESTION_COUNT);
}
