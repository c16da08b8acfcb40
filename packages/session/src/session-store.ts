// ============================================================================
// STEM Tutor Session Store - per-student conversation state and history
// ============================================================================

import {
  InvalidInputError,
  PersistenceFailureError,
  errorMessage,
  isClassifiedSubject,
  noopLogger,
} from '@stem-tutor/shared';
import type { ClassifiedSubject, Logger, NewTurn, Session, Turn } from '@stem-tutor/shared';
import { KeyedLock } from './keyed-lock.js';
import { applyProficiencyUpdate, DEFAULT_ALPHA } from './proficiency.js';
import { renderTranscript } from './transcript.js';
import type { SessionStore, SessionStoreOptions, TranscriptFormat } from './types.js';

// ============================================================================
// Base Implementation
// ============================================================================

/**
 * Shared session logic. Subclasses supply the persistence medium through
 * readSession / writeSession; every mutation goes through the per-student
 * lock and is copy-on-write, so a failed write leaves the cached session as
 * it was.
 */
export abstract class BaseSessionStore implements SessionStore {
  protected readonly logger: Logger;
  protected readonly alpha: number;
  protected readonly now: () => Date;
  private readonly cache: Map<string, Session> = new Map();
  private readonly lock = new KeyedLock();

  constructor(options: SessionStoreOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.alpha = options.alpha ?? DEFAULT_ALPHA;
    this.now = options.now ?? (() => new Date());

    if (!(this.alpha > 0 && this.alpha <= 1)) {
      throw new RangeError(`Proficiency alpha must be in (0, 1], got ${this.alpha}`);
    }
  }

  // ============================================================================
  // Persistence hooks
  // ============================================================================

  protected abstract readSession(studentId: string): Promise<Session | null>;

  protected abstract writeSession(session: Session): Promise<void>;

  abstract listStudents(): Promise<string[]>;

  // ============================================================================
  // SessionStore
  // ============================================================================

  async getSession(studentId: string): Promise<Session> {
    this.assertStudentId(studentId);
    const session = await this.lock.run(studentId, () => this.loadOrCreate(studentId));
    return structuredClone(session);
  }

  async appendTurn(studentId: string, turn: NewTurn): Promise<Turn> {
    this.assertStudentId(studentId);
    if (turn.message.studentId !== studentId) {
      throw new InvalidInputError(
        `turn belongs to '${turn.message.studentId}', not '${studentId}'`
      );
    }

    return this.lock.run(studentId, async () => {
      const current = await this.loadOrCreate(studentId);
      const previous = current.turns[current.turns.length - 1];

      // Never earlier than the turn before it
      let timestamp = this.now();
      if (previous && timestamp.getTime() < previous.timestamp.getTime()) {
        timestamp = new Date(previous.timestamp.getTime());
      }

      const stamped: Turn = Object.freeze({ ...structuredClone(turn), timestamp });

      const next: Session = {
        ...current,
        turns: [...current.turns, stamped],
        lastActiveAt: timestamp,
      };

      if (isClassifiedSubject(turn.subject)) {
        next.currentSubject = turn.subject;
        next.currentTopic = turn.topic;
      }

      if (turn.quizOutcome !== undefined) {
        if (!isClassifiedSubject(turn.subject)) {
          throw new InvalidInputError('a quiz outcome needs a classified subject');
        }
        next.proficiency = {
          ...current.proficiency,
          [turn.subject]: applyProficiencyUpdate(
            current.proficiency[turn.subject],
            turn.quizOutcome,
            this.alpha
          ),
        };
      }

      await this.commit(next);

      this.logger.debug(`Appended turn for ${studentId}`, {
        messageId: turn.message.id,
        intent: turn.intent,
        subject: turn.subject,
        turnCount: next.turns.length,
      });

      return structuredClone(stamped);
    });
  }

  async updateProficiency(
    studentId: string,
    subject: ClassifiedSubject,
    outcome: number
  ): Promise<number> {
    this.assertStudentId(studentId);
    if (!isClassifiedSubject(subject)) {
      throw new InvalidInputError(`cannot track proficiency for '${String(subject)}'`);
    }

    return this.lock.run(studentId, async () => {
      const current = await this.loadOrCreate(studentId);
      const estimate = applyProficiencyUpdate(current.proficiency[subject], outcome, this.alpha);

      await this.commit({
        ...current,
        proficiency: { ...current.proficiency, [subject]: estimate },
        lastActiveAt: this.now(),
      });

      this.logger.info(`Updated proficiency for ${studentId}`, { subject, outcome, estimate });
      return estimate;
    });
  }

  async exportTranscript(studentId: string, format: TranscriptFormat): Promise<string> {
    const session = await this.getSession(studentId);
    return renderTranscript(session, format);
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  /**
   * Must be called while holding the student's lock
   */
  private async loadOrCreate(studentId: string): Promise<Session> {
    const cached = this.cache.get(studentId);
    if (cached) {
      return cached;
    }

    let stored: Session | null;
    try {
      stored = await this.readSession(studentId);
    } catch (error) {
      this.logger.error('Failed to read session', { studentId, error: errorMessage(error) });
      throw new PersistenceFailureError(studentId, `read failed: ${errorMessage(error)}`);
    }

    if (stored) {
      this.cache.set(studentId, stored);
      return stored;
    }

    const createdAt = this.now();
    const session: Session = {
      studentId,
      turns: [],
      proficiency: {},
      createdAt,
      lastActiveAt: createdAt,
    };
    await this.commit(session);

    this.logger.info(`Created new session`, { studentId });
    return session;
  }

  private async commit(session: Session): Promise<void> {
    try {
      await this.writeSession(session);
    } catch (error) {
      this.logger.error('Failed to write session', {
        studentId: session.studentId,
        error: errorMessage(error),
      });
      throw new PersistenceFailureError(session.studentId, errorMessage(error));
    }
    this.cache.set(session.studentId, session);
  }

  private assertStudentId(studentId: string): void {
    if (typeof studentId !== 'string' || studentId.trim() === '') {
      throw new InvalidInputError('student id is empty');
    }
  }
}

// ============================================================================
// In-memory Store
// ============================================================================

/**
 * Session store kept entirely in process memory
 */
export class InMemorySessionStore extends BaseSessionStore {
  private readonly sessions: Map<string, Session> = new Map();

  protected async readSession(studentId: string): Promise<Session | null> {
    return this.sessions.get(studentId) ?? null;
  }

  protected async writeSession(session: Session): Promise<void> {
    this.sessions.set(session.studentId, session);
  }

  async listStudents(): Promise<string[]> {
    return [...this.sessions.keys()];
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new in-memory SessionStore instance
 */
export function createInMemorySessionStore(options?: SessionStoreOptions): InMemorySessionStore {
  return new InMemorySessionStore(options);
}
