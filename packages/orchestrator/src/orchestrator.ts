// ============================================================================
// STEM Tutor Orchestrator - message routing and response merging
// ============================================================================

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  CAPABILITIES,
  ClassificationUnavailableError,
  InvalidInputError,
  ProviderUnavailableError,
  errorMessage,
  isIntent,
  isSubject,
  isTutorError,
} from '@stem-tutor/shared';
import type {
  Intent,
  Logger,
  Message,
  NewTurn,
  ProviderRequest,
  ProviderResponse,
  QuizMetadata,
  Session,
  Subject,
  Turn,
  TurnResponse,
  TutorError,
} from '@stem-tutor/shared';
import { BASELINE_PROFICIENCY, difficultyFor } from '@stem-tutor/session';
import type { SessionStore } from '@stem-tutor/session';
import type { ProviderInvoker } from '@stem-tutor/providers';
import type { IntentClassifier, SubjectClassifier } from '@stem-tutor/classifier';
import {
  DEFAULT_CONTEXT_TURNS,
  DEFAULT_MEMORY_SUMMARY_TURNS,
  buildMemorySummary,
  buildPriorContext,
  fallbackGreeting,
} from './context.js';
import { RequestLifecycle } from './lifecycle.js';
import { extractCitations, extractGrade, extractQuizItems } from './merge.js';
import { RetryHandler } from './retry-handler.js';
import {
  DEFAULT_QUESTION_COUNT,
  capabilitiesFor,
  isQuizReply,
  parseQuestionCount,
  selectRoute,
} from './routing.js';
import type {
  OrchestratorConfig,
  OrchestratorEvent,
  QuizAnswerRequest,
  RoutePlan,
  TutorReply,
  TutorRequest,
  WelcomeReply,
} from './types.js';

export const MAX_MESSAGE_LENGTH = 4000;

interface Classification {
  intent: Intent;
  subject: Subject;
  topic?: string;
  quizAnswer?: boolean;
}

/**
 * Latest quiz on record, unless the quiz generator reported it finished
 */
export function findActiveQuiz(session: Session): QuizMetadata | undefined {
  for (let i = session.turns.length - 1; i >= 0; i--) {
    const turn = session.turns[i];
    const quiz = turn.response.metadata.quiz;
    if (turn.intent === 'RequestQuiz' && quiz) {
      return quiz.completed ? undefined : quiz;
    }
  }
  return undefined;
}

/**
 * Orchestrator routes each student message through classification, the
 * matching capability providers and the session store.
 *
 * Key principles:
 * - Intent and subject classification run concurrently
 * - Search-then-explain runs strictly in sequence
 * - A reply is returned only after its turn is persisted
 * - Retryable failures are retried once, then answered with a degraded turn
 */
export class Orchestrator extends EventEmitter {
  private readonly logger: Logger;
  private readonly store: SessionStore;
  private readonly invoker: ProviderInvoker;
  private readonly intentClassifier: IntentClassifier;
  private readonly subjectClassifier: SubjectClassifier;
  private readonly retry: RetryHandler;
  private readonly contextTurns: number;
  private readonly memorySummaryTurns: number;
  private readonly defaultQuestionCount: number;
  private readonly generateId: () => string;

  /** Students with a quiz answer being graded */
  private readonly grading = new Set<string>();

  constructor(config: OrchestratorConfig) {
    super();
    this.logger = config.logger;
    this.store = config.store;
    this.invoker = config.invoker;
    this.intentClassifier = config.intentClassifier;
    this.subjectClassifier = config.subjectClassifier;
    this.retry = new RetryHandler(config.retry ?? {}, config.logger);
    this.contextTurns = config.contextTurns ?? DEFAULT_CONTEXT_TURNS;
    this.memorySummaryTurns = config.memorySummaryTurns ?? DEFAULT_MEMORY_SUMMARY_TURNS;
    this.defaultQuestionCount = config.defaultQuestionCount ?? DEFAULT_QUESTION_COUNT;
    this.generateId = config.generateId ?? (() => uuidv4());

    this.logger.debug('Orchestrator created', {
      contextTurns: this.contextTurns,
      memorySummaryTurns: this.memorySummaryTurns,
    });
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Answer one student message. While a quiz is open, short replies and
   * messages classified as quiz answers are graded against it.
   */
  async handleMessage(request: TutorRequest): Promise<TutorReply> {
    const requestId = this.generateId();
    const lifecycle = this.createLifecycle(requestId, request.studentId);
    const startTime = Date.now();

    try {
      const message = this.createMessage(requestId, request.studentId, request.text);

      if (isQuizReply(message.text) && (await this.hasActiveQuiz(message.studentId))) {
        return await this.gradeAnswer(lifecycle, message, startTime);
      }

      let classification: Classification;
      try {
        classification = await this.classify(message.text, requestId);
      } catch (error) {
        if (!(error instanceof ClassificationUnavailableError)) throw error;
        lifecycle.transition('Merged');
        return await this.persist(
          lifecycle,
          this.degradedTurn(message, { intent: 'GeneralChat', subject: 'Unclassified' }, error),
          startTime
        );
      }

      if (classification.quizAnswer && (await this.hasActiveQuiz(message.studentId))) {
        return await this.gradeAnswer(lifecycle, message, startTime);
      }
      lifecycle.transition('Classified');

      const plan = selectRoute(classification.intent, classification.subject);
      lifecycle.transition('ProviderSelected');
      this.logger.debug('Route selected', {
        requestId,
        intent: classification.intent,
        subject: classification.subject,
        capabilities: capabilitiesFor(plan),
      });

      const session = await this.store.getSession(message.studentId);

      let response: TurnResponse;
      try {
        response = await this.executePlan(plan, message, classification, session, lifecycle);
      } catch (error) {
        if (!(error instanceof ProviderUnavailableError)) throw error;
        lifecycle.transition('Merged');
        return await this.persist(lifecycle, this.degradedTurn(message, classification, error), startTime);
      }
      lifecycle.transition('Merged');

      return await this.persist(
        lifecycle,
        {
          message,
          intent: classification.intent,
          subject: classification.subject,
          topic: classification.topic,
          response,
        },
        startTime
      );
    } catch (error) {
      this.fail(lifecycle, error);
      throw error;
    }
  }

  /**
   * Grade an answer against the student's active quiz
   */
  async submitQuizAnswer(request: QuizAnswerRequest): Promise<TutorReply> {
    const requestId = this.generateId();
    const lifecycle = this.createLifecycle(requestId, request.studentId);
    const startTime = Date.now();

    try {
      const message = this.createMessage(requestId, request.studentId, request.answer);
      return await this.gradeAnswer(lifecycle, message, startTime);
    } catch (error) {
      this.fail(lifecycle, error);
      throw error;
    }
  }

  /**
   * Greet a new or returning student. Nothing is recorded.
   */
  async welcome(studentId: string): Promise<WelcomeReply> {
    const requestId = this.generateId();
    if (typeof studentId !== 'string' || studentId.trim() === '') {
      throw new InvalidInputError('student id is empty');
    }

    const session = await this.store.getSession(studentId);
    const returning = session.turns.length > 0;

    const payload: Record<string, unknown> = { mode: 'welcome', returning };
    if (returning) {
      payload.summary = buildMemorySummary(session, this.memorySummaryTurns);
    }

    try {
      const { result } = await this.retry.executeWithRetry(
        () =>
          this.invoker.invoke({
            capability: CAPABILITIES.CONCEPT_EXPLAINER,
            subject: session.currentSubject ?? null,
            priorContext: buildPriorContext(session, this.contextTurns),
            payload,
          }),
        { requestId, step: 'welcome' }
      );
      return { text: result.text, returning, degraded: false };
    } catch (error) {
      if (!(error instanceof ProviderUnavailableError)) throw error;
      this.logger.warn('Welcome provider unavailable, using fixed greeting', {
        requestId,
        studentId,
        error: error.message,
      });
      return { text: fallbackGreeting(session), returning, degraded: true };
    }
  }

  /**
   * Snapshot of a student's session
   */
  async getSession(studentId: string): Promise<Session> {
    return this.store.getSession(studentId);
  }

  // ============================================================================
  // Pipeline steps
  // ============================================================================

  /**
   * One grading per student at a time. The claim is taken before the
   * session is read, so a second answer never sees a quiz the first is
   * about to close.
   */
  private async gradeAnswer(lifecycle: RequestLifecycle, message: Message, startTime: number): Promise<TutorReply> {
    const { studentId } = message;
    if (this.grading.has(studentId)) {
      throw new InvalidInputError(
        'quiz answer already being graded',
        "I'm still checking your last answer. Give me a moment!"
      );
    }

    this.grading.add(studentId);
    try {
      const session = await this.store.getSession(studentId);
      const quiz = findActiveQuiz(session);
      if (!quiz) {
        throw new InvalidInputError(
          'no active quiz',
          "There's no quiz waiting for an answer. Ask me for a quiz first!"
        );
      }

      const classification: Classification = {
        intent: 'RequestQuiz',
        subject: quiz.subject,
        topic: quiz.topic,
      };
      lifecycle.transition('Classified');
      lifecycle.transition('ProviderSelected');

      const payload: Record<string, unknown> = { action: 'grade', answer: message.text, items: quiz.items };
      if (quiz.quizId) payload.quizId = quiz.quizId;

      let graded: ProviderResponse;
      try {
        graded = await this.invoke(
          lifecycle,
          {
            capability: CAPABILITIES.QUIZ_GENERATOR,
            subject: quiz.subject,
            priorContext: buildPriorContext(session, this.contextTurns),
            payload,
          },
          extractGrade
        );
      } catch (error) {
        if (!(error instanceof ProviderUnavailableError)) throw error;
        lifecycle.transition('Merged');
        return await this.persist(lifecycle, this.degradedTurn(message, classification, error), startTime);
      }

      const { outcome, completed } = extractGrade(graded);
      lifecycle.transition('Merged');

      return await this.persist(
        lifecycle,
        {
          message,
          intent: classification.intent,
          subject: classification.subject,
          topic: classification.topic,
          response: {
            text: graded.text,
            metadata: {
              providers: [CAPABILITIES.QUIZ_GENERATOR],
              quiz: { ...quiz, completed },
              quizOutcome: outcome,
              degraded: false,
            },
          },
          quizOutcome: outcome,
        },
        startTime
      );
    } finally {
      this.grading.delete(studentId);
    }
  }

  private async hasActiveQuiz(studentId: string): Promise<boolean> {
    return findActiveQuiz(await this.store.getSession(studentId)) !== undefined;
  }

  private createMessage(id: string, studentId: string, text: string): Message {
    if (typeof studentId !== 'string' || studentId.trim() === '') {
      throw new InvalidInputError('student id is empty');
    }
    if (typeof text !== 'string' || text.trim() === '') {
      throw new InvalidInputError('message text is empty');
    }
    if (text.length > MAX_MESSAGE_LENGTH) {
      throw new InvalidInputError(
        `message is longer than ${MAX_MESSAGE_LENGTH} characters`,
        `That message is a bit long for me. Could you keep it under ${MAX_MESSAGE_LENGTH} characters?`
      );
    }
    return Object.freeze({ id, studentId, text: text.trim(), timestamp: new Date() });
  }

  private async classify(text: string, requestId: string): Promise<Classification> {
    const [intentResult, subjectResult] = await Promise.all([
      this.retry.executeWithRetry(() => this.intentClassifier.classify(text), {
        requestId,
        step: 'intent classification',
      }),
      this.retry.executeWithRetry(() => this.subjectClassifier.classify(text), {
        requestId,
        step: 'subject classification',
      }),
    ]);

    const { intent, quizAnswer } = intentResult.result;
    const { subject, topic } = subjectResult.result;
    if (!isIntent(intent)) {
      throw new ClassificationUnavailableError('intent', `unknown intent '${String(intent)}'`);
    }
    if (!isSubject(subject)) {
      throw new ClassificationUnavailableError('subject', `unknown subject '${String(subject)}'`);
    }

    return { intent, subject, topic, quizAnswer };
  }

  private async executePlan(
    plan: RoutePlan,
    message: Message,
    classification: Classification,
    session: Session,
    lifecycle: RequestLifecycle
  ): Promise<TurnResponse> {
    const priorContext = buildPriorContext(session, this.contextTurns);
    const { topic } = classification;

    switch (plan.kind) {
      case 'memory':
        return {
          text: buildMemorySummary(session, this.memorySummaryTurns),
          metadata: { providers: [], degraded: false },
        };

      case 'explain': {
        const explained = await this.invoke(lifecycle, {
          capability: CAPABILITIES.CONCEPT_EXPLAINER,
          subject: plan.subject,
          priorContext,
          payload: { mode: plan.mode, question: message.text, topic },
        });
        return {
          text: explained.text,
          metadata: { providers: [CAPABILITIES.CONCEPT_EXPLAINER], degraded: false },
        };
      }

      case 'quiz': {
        const proficiency = session.proficiency[plan.subject] ?? BASELINE_PROFICIENCY;
        const difficulty = difficultyFor(proficiency);
        const numQuestions = parseQuestionCount(message.text, this.defaultQuestionCount);

        const generated = await this.invoke(lifecycle, {
          capability: CAPABILITIES.QUIZ_GENERATOR,
          subject: plan.subject,
          priorContext,
          payload: { action: 'generate', question: message.text, topic, difficulty, proficiency, numQuestions },
        });

        const quiz: QuizMetadata = {
          subject: plan.subject,
          difficulty,
          proficiency,
          numQuestions,
          items: extractQuizItems(generated),
          completed: false,
        };
        if (topic) quiz.topic = topic;
        if (typeof generated.metadata.quizId === 'string') quiz.quizId = generated.metadata.quizId;

        return {
          text: generated.text,
          metadata: { providers: [CAPABILITIES.QUIZ_GENERATOR], quiz, degraded: false },
        };
      }

      case 'search-explain': {
        const search = await this.invoke(lifecycle, {
          capability: CAPABILITIES.WEB_SEARCH,
          subject: plan.subject,
          priorContext,
          payload: { query: message.text },
        });
        const citations = extractCitations(search);

        // The explainer's text is the answer; search output only feeds it
        const explained = await this.invoke(lifecycle, {
          capability: CAPABILITIES.CONCEPT_EXPLAINER,
          subject: plan.subject,
          priorContext,
          payload: { mode: 'explain', question: message.text, topic, context: search.text },
        });

        return {
          text: explained.text,
          metadata: {
            providers: [CAPABILITIES.WEB_SEARCH, CAPABILITIES.CONCEPT_EXPLAINER],
            citations,
            degraded: false,
          },
        };
      }
    }
  }

  /**
   * Invoke one capability with retry. `check` runs inside the retried
   * operation, so an unusable response counts as a failed attempt.
   */
  private async invoke(
    lifecycle: RequestLifecycle,
    request: ProviderRequest,
    check?: (response: ProviderResponse) => void
  ): Promise<ProviderResponse> {
    const startTime = Date.now();
    const { result, retryCount } = await this.retry.executeWithRetry(
      async () => {
        const response = await this.invoker.invoke(request);
        check?.(response);
        return response;
      },
      { requestId: lifecycle.requestId, step: request.capability }
    );

    lifecycle.transition('ProviderInvoked');
    this.notify({
      type: 'provider:invoked',
      requestId: lifecycle.requestId,
      capability: request.capability,
      durationMs: Date.now() - startTime,
      retryCount,
    });

    return result;
  }

  /**
   * Write-then-return: the reply exists only once the turn is stored
   */
  private async persist(lifecycle: RequestLifecycle, turn: NewTurn, startTime: number): Promise<TutorReply> {
    const stored = await this.store.appendTurn(turn.message.studentId, turn);
    lifecycle.transition('Persisted');

    const reply = this.toReply(stored);
    lifecycle.transition('Completed');

    const { degradedReason } = reply.metadata;
    if (reply.degraded && degradedReason) {
      this.notify({
        type: 'request:degraded',
        requestId: lifecycle.requestId,
        studentId: lifecycle.studentId,
        reason: degradedReason,
      });
    }
    this.notify({
      type: 'request:completed',
      requestId: lifecycle.requestId,
      studentId: lifecycle.studentId,
      reply,
    });

    this.logger.info('Request completed', {
      requestId: lifecycle.requestId,
      studentId: lifecycle.studentId,
      intent: reply.intent,
      subject: reply.subject,
      providers: reply.metadata.providers,
      degraded: reply.degraded,
      durationMs: Date.now() - startTime,
    });

    return reply;
  }

  private degradedTurn(message: Message, classification: Classification, error: TutorError): NewTurn {
    return {
      message,
      intent: classification.intent,
      subject: classification.subject,
      topic: classification.topic,
      response: {
        text: error.userMessage,
        metadata: { providers: [], degraded: true, degradedReason: error.kind },
      },
    };
  }

  private toReply(turn: Turn): TutorReply {
    return {
      messageId: turn.message.id,
      text: turn.response.text,
      metadata: turn.response.metadata,
      intent: turn.intent,
      subject: turn.subject,
      topic: turn.topic,
      degraded: turn.response.metadata.degraded,
    };
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  private createLifecycle(requestId: string, studentId: string): RequestLifecycle {
    return new RequestLifecycle(requestId, studentId, (from, to) => {
      this.notify({ type: 'request:transition', requestId, studentId, from, to });
    });
  }

  /**
   * Listeners observe requests; a throwing listener is logged and the
   * request carries on
   */
  private notify(event: OrchestratorEvent): void {
    try {
      this.emit('event', event);
    } catch (error) {
      this.logger.warn('Event listener failed', {
        requestId: event.requestId,
        type: event.type,
        error: errorMessage(error),
      });
    }
  }

  private fail(lifecycle: RequestLifecycle, error: unknown): void {
    const reason = isTutorError(error) ? error.kind : 'Unexpected';
    lifecycle.fail(reason);

    this.notify({
      type: 'request:failed',
      requestId: lifecycle.requestId,
      studentId: lifecycle.studentId,
      reason,
      error: errorMessage(error),
    });

    const meta = { requestId: lifecycle.requestId, studentId: lifecycle.studentId, reason, error: errorMessage(error) };
    if (reason === 'InvalidInput' || reason === 'AmbiguousRouting') {
      this.logger.warn('Request rejected', meta);
    } else {
      this.logger.error('Request failed', meta);
    }
  }
}

/**
 * Factory function to create an Orchestrator instance
 */
export function createOrchestrator(config: OrchestratorConfig): Orchestrator {
  return new Orchestrator(config);
}
