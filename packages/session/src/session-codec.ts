// ============================================================================
// Session JSON codec
// Dates are stored as ISO strings and revived on read
// ============================================================================

import { z } from 'zod';
import { ERROR_KINDS, INTENTS, SUBJECTS } from '@stem-tutor/shared';
import type { Session } from '@stem-tutor/shared';

export const SESSION_FORMAT_VERSION = '1.0';

export class SessionDecodeError extends Error {
  constructor(public readonly path: string, reason: string) {
    super(`Invalid session data at ${path}: ${reason}`);
    this.name = 'SessionDecodeError';
  }
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Serialise a session to a JSON-safe object
 */
export function encodeSession(session: Session): Record<string, unknown> {
  return {
    version: SESSION_FORMAT_VERSION,
    studentId: session.studentId,
    createdAt: session.createdAt.toISOString(),
    lastActiveAt: session.lastActiveAt.toISOString(),
    currentSubject: session.currentSubject,
    currentTopic: session.currentTopic,
    proficiency: session.proficiency,
    turns: session.turns.map((turn) => ({
      message: {
        id: turn.message.id,
        studentId: turn.message.studentId,
        text: turn.message.text,
        timestamp: turn.message.timestamp.toISOString(),
      },
      intent: turn.intent,
      subject: turn.subject,
      topic: turn.topic,
      response: turn.response,
      timestamp: turn.timestamp.toISOString(),
      quizOutcome: turn.quizOutcome,
    })),
  };
}

// ============================================================================
// Decoding
// ============================================================================

const finite = z.number().finite();
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);
const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const classifiedSubject = z.enum(SUBJECTS).exclude(['Unclassified']);

const MessageSchema = z.object({
  id: z.string(),
  studentId: z.string(),
  text: z.string(),
  timestamp: isoDate,
});

const CitationSchema = z.object({
  source: z.string(),
  snippet: z.string(),
  title: optionalText,
  url: optionalText,
});

const QuizItemSchema = z.object({
  question: z.string(),
  options: z.record(z.string()).optional(),
  answer: optionalText,
});

const QuizSchema = z.object({
  subject: classifiedSubject,
  topic: optionalText,
  difficulty: z.enum(['easy', 'medium', 'hard']),
  proficiency: finite,
  numQuestions: finite,
  items: z.array(QuizItemSchema),
  quizId: optionalText,
  completed: z.boolean().optional(),
});

const ResponseMetadataSchema = z.object({
  providers: z.array(z.string()),
  citations: z.array(CitationSchema).optional(),
  quiz: QuizSchema.optional(),
  quizOutcome: finite.optional(),
  degraded: z.boolean().default(false),
  degradedReason: z.enum(ERROR_KINDS).optional(),
});

const TurnSchema = z.object({
  message: MessageSchema,
  intent: z.enum(INTENTS),
  subject: z.enum(SUBJECTS),
  topic: optionalText,
  response: z.object({
    text: z.string(),
    metadata: ResponseMetadataSchema,
  }),
  timestamp: isoDate,
  quizOutcome: finite.optional(),
});

const ProficiencySchema = z.object({
  Math: finite.optional(),
  Physics: finite.optional(),
  Chemistry: finite.optional(),
  Biology: finite.optional(),
});

const SessionDocumentSchema = z.object({
  studentId: z.string(),
  createdAt: isoDate,
  lastActiveAt: isoDate,
  currentSubject: classifiedSubject.optional().catch(undefined),
  currentTopic: optionalText,
  proficiency: ProficiencySchema.default({}),
  turns: z.array(TurnSchema),
});

function issuePath(path: Array<string | number>): string {
  return path.reduce<string>(
    (acc, key) => (typeof key === 'number' ? `${acc}[${key}]` : `${acc}.${key}`),
    'session'
  );
}

/**
 * Parse a session previously produced by encodeSession
 * @throws SessionDecodeError naming the first invalid field
 */
export function decodeSession(value: unknown): Session {
  const result = SessionDocumentSchema.safeParse(value);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new SessionDecodeError(issuePath(issue.path), issue.message);
  }

  return result.data;
}
