// ============================================================================
// Provider-backed Classifiers
// Delegate classification to the intent/subject classifier capabilities
// ============================================================================

import { z } from 'zod';
import {
  CAPABILITIES,
  ClassificationUnavailableError,
  InvalidInputError,
  errorMessage,
  noopLogger,
} from '@stem-tutor/shared';
import type { Intent, Logger, Subject } from '@stem-tutor/shared';
import type { ProviderInvoker } from '@stem-tutor/providers';
import type {
  IntentClassification,
  IntentClassifier,
  ProviderClassifierOptions,
  SubjectClassification,
  SubjectClassifier,
} from './types.js';

export const DEFAULT_MIN_SUBJECT_CONFIDENCE = 0.5;

/**
 * Intent labels a classifier service may answer with, normalised to
 * lowercase letters only
 */
const INTENT_LABELS: Record<string, Intent> = {
  greeting: 'GeneralChat',
  smalltalk: 'GeneralChat',
  offtopic: 'GeneralChat',
  generalchat: 'GeneralChat',
  requestquiz: 'RequestQuiz',
  academicquestion: 'ExplainConcept',
  explainconcept: 'ExplainConcept',
  lookupfact: 'LookupFact',
  memoryquery: 'MemoryQuery',
};

const SUBJECT_LABELS: Record<string, Subject> = {
  math: 'Math',
  maths: 'Math',
  mathematics: 'Math',
  physics: 'Physics',
  chemistry: 'Chemistry',
  chem: 'Chemistry',
  biology: 'Biology',
  bio: 'Biology',
  unclassified: 'Unclassified',
  none: 'Unclassified',
  other: 'Unclassified',
  unknown: 'Unclassified',
};

/** Replies to an open quiz; graded when a quiz is active, chat otherwise */
const QUIZ_ANSWER_LABEL = 'quizanswer';

const labelField = z.string().catch('');
const confidenceField = z
  .number()
  .finite()
  .catch(1)
  .transform((value) => Math.min(1, Math.max(0, value)));

const IntentReplySchema = z.object({ intent: labelField, confidence: confidenceField });

const SubjectReplySchema = z.object({
  subject: labelField,
  confidence: confidenceField,
  topic: z
    .string()
    .catch('')
    .transform((value) => value.trim() || undefined),
});

const JsonObjectSchema = z.record(z.unknown());

function normaliseLabel(value: string): string {
  return value.toLowerCase().replace(/[^a-z]/g, '');
}

/**
 * Parse a JSON object from model output, tolerating a ```json fence or
 * surrounding prose
 */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const candidates = [fenced ? fenced[1] : text];

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    try {
      const parsed = JsonObjectSchema.safeParse(JSON.parse(candidate.trim()));
      if (parsed.success) {
        return parsed.data;
      }
    } catch {
      continue;
    }
  }
  return null;
}

async function invokeClassifier(
  invoker: ProviderInvoker,
  capability: string,
  classifier: 'intent' | 'subject',
  text: string
): Promise<Record<string, unknown>> {
  let output: string;
  try {
    const response = await invoker.invoke({
      capability,
      subject: null,
      priorContext: [],
      payload: { text },
    });
    output = response.text;
  } catch (error) {
    throw new ClassificationUnavailableError(classifier, errorMessage(error));
  }

  const parsed = parseJsonObject(output);
  if (!parsed) {
    throw new ClassificationUnavailableError(classifier, 'classifier output is not a JSON object');
  }
  return parsed;
}

// ============================================================================
// Intent
// ============================================================================

export class ProviderIntentClassifier implements IntentClassifier {
  private invoker: ProviderInvoker;
  private logger: Logger;

  constructor(invoker: ProviderInvoker, options: ProviderClassifierOptions = {}) {
    this.invoker = invoker;
    this.logger = options.logger ?? noopLogger;
  }

  async classify(text: string): Promise<IntentClassification> {
    if (text.trim() === '') {
      throw new InvalidInputError('message text is empty');
    }

    const parsed = await invokeClassifier(
      this.invoker,
      CAPABILITIES.INTENT_CLASSIFIER,
      'intent',
      text
    );

    const reply = IntentReplySchema.parse(parsed);
    const normalised = normaliseLabel(reply.intent);
    if (normalised === QUIZ_ANSWER_LABEL) {
      return {
        intent: 'GeneralChat',
        confidence: reply.confidence,
        reason: `classifier label: ${reply.intent}`,
        quizAnswer: true,
      };
    }

    const intent = INTENT_LABELS[normalised];
    if (!intent) {
      this.logger.warn('Intent classifier returned an unknown label', { label: reply.intent });
      throw new ClassificationUnavailableError('intent', `unknown intent label '${reply.intent}'`);
    }

    return {
      intent,
      confidence: reply.confidence,
      reason: `classifier label: ${reply.intent}`,
    };
  }
}

// ============================================================================
// Subject
// ============================================================================

export class ProviderSubjectClassifier implements SubjectClassifier {
  private invoker: ProviderInvoker;
  private logger: Logger;
  private minConfidence: number;

  constructor(invoker: ProviderInvoker, options: ProviderClassifierOptions = {}) {
    this.invoker = invoker;
    this.logger = options.logger ?? noopLogger;
    this.minConfidence = options.minConfidence ?? DEFAULT_MIN_SUBJECT_CONFIDENCE;
  }

  async classify(text: string): Promise<SubjectClassification> {
    if (text.trim() === '') {
      throw new InvalidInputError('message text is empty');
    }

    const parsed = await invokeClassifier(
      this.invoker,
      CAPABILITIES.SUBJECT_CLASSIFIER,
      'subject',
      text
    );

    const { subject: label, confidence, topic } = SubjectReplySchema.parse(parsed);
    const subject = SUBJECT_LABELS[normaliseLabel(label)];

    if (!subject) {
      this.logger.debug('Unknown subject label, treating as unclassified', { label });
      return { subject: 'Unclassified', confidence };
    }

    if (subject === 'Unclassified' || confidence < this.minConfidence) {
      return { subject: 'Unclassified', confidence };
    }

    return { subject, topic, confidence };
  }
}
