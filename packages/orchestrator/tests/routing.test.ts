import { describe, it, expect } from 'vitest';
import { AmbiguousRoutingError, ProviderUnavailableError } from '@stem-tutor/shared';
import type { Intent, QuizMetadata, Session, Subject, Turn } from '@stem-tutor/shared';
import { capabilitiesFor, isQuizReply, parseQuestionCount, selectRoute } from '../src/routing.js';
import { buildMemorySummary, buildPriorContext, fallbackGreeting } from '../src/context.js';
import { extractCitations, extractGrade, extractQuizItems } from '../src/merge.js';
import { findActiveQuiz } from '../src/orchestrator.js';

const AT = new Date('2024-03-01T10:00:00.000Z');

function turn(text: string, intent: Intent, subject: Subject, quiz?: QuizMetadata): Turn {
  return {
    message: { id: `msg-${text}`, studentId: 'student-1', text, timestamp: AT },
    intent,
    subject,
    response: { text: `re: ${text}`, metadata: { providers: [], quiz, degraded: false } },
    timestamp: AT,
  };
}

function session(turns: Turn[], extra: Partial<Session> = {}): Session {
  return { studentId: 'student-1', turns, proficiency: {}, createdAt: AT, lastActiveAt: AT, ...extra };
}

const algebraQuiz: QuizMetadata = {
  subject: 'Math',
  topic: 'algebra',
  difficulty: 'medium',
  proficiency: 0.5,
  numQuestions: 5,
  items: [],
  completed: false,
};

describe('selectRoute', () => {
  it('should map each intent to its plan', () => {
    expect(selectRoute('MemoryQuery', 'Unclassified')).toEqual({ kind: 'memory' });
    expect(selectRoute('RequestQuiz', 'Chemistry')).toEqual({ kind: 'quiz', subject: 'Chemistry' });
    expect(selectRoute('LookupFact', 'Unclassified')).toEqual({ kind: 'search-explain', subject: null });
    expect(selectRoute('ExplainConcept', 'Physics')).toEqual({ kind: 'explain', subject: 'Physics', mode: 'explain' });
    expect(selectRoute('GeneralChat', 'Biology')).toEqual({ kind: 'explain', subject: null, mode: 'chat' });
  });

  it('should refuse a quiz without a subject', () => {
    expect(() => selectRoute('RequestQuiz', 'Unclassified')).toThrow(AmbiguousRoutingError);
  });

  it('should list capabilities in call order', () => {
    expect(capabilitiesFor({ kind: 'search-explain', subject: null })).toEqual(['web-search', 'concept-explainer']);
    expect(capabilitiesFor({ kind: 'memory' })).toEqual([]);
  });
});

describe('isQuizReply', () => {
  it('should accept option letters and other short replies', () => {
    expect(isQuizReply('b')).toBe(true);
    expect(isQuizReply(' 42 ')).toBe(true);
    expect(isQuizReply('a c')).toBe(true);
  });

  it('should leave longer messages to the classifiers', () => {
    expect(isQuizReply('abcd')).toBe(false);
    expect(isQuizReply('Explain atoms')).toBe(false);
  });
});

describe('parseQuestionCount', () => {
  it('should read digits and number words', () => {
    expect(parseQuestionCount('Give me a 5-question algebra quiz')).toBe(5);
    expect(parseQuestionCount('quiz me with three questions on cells')).toBe(3);
    expect(parseQuestionCount('12 Questions about acids please')).toBe(12);
  });

  it('should fall back and clamp', () => {
    expect(parseQuestionCount('quiz me on algebra')).toBe(5);
    expect(parseQuestionCount('quiz me on algebra', 8)).toBe(8);
    expect(parseQuestionCount('0 questions')).toBe(5);
    expect(parseQuestionCount('a 50 question marathon')).toBe(20);
  });
});

describe('session context', () => {
  it('should keep the most recent turns for providers', () => {
    const s = session([
      turn('one', 'GeneralChat', 'Unclassified'),
      turn('two', 'ExplainConcept', 'Physics'),
      turn('three', 'LookupFact', 'Biology'),
    ]);

    expect(buildPriorContext(s, 2)).toEqual([
      { text: 'two', intent: 'ExplainConcept', subject: 'Physics', response: 're: two' },
      { text: 'three', intent: 'LookupFact', subject: 'Biology', response: 're: three' },
    ]);
    expect(buildPriorContext(s, 0)).toEqual([]);
  });

  it('should summarise proficiency in subject order', () => {
    const s = session([turn('What is an ion?', 'ExplainConcept', 'Chemistry')], {
      proficiency: { Chemistry: 0.35, Math: 0.8 },
    });

    expect(buildMemorySummary(s)).toBe(
      [
        'Summary of recent interactions:',
        '- [ExplainConcept/Chemistry] What is an ion?',
        'Proficiency estimates:',
        '- Math: 0.80',
        '- Chemistry: 0.35',
      ].join('\n')
    );
  });

  it('should greet by last subject', () => {
    const s = session([turn('Explain photosynthesis', 'ExplainConcept', 'Biology')], {
      currentSubject: 'Biology',
      currentTopic: 'photosynthesis',
    });

    expect(fallbackGreeting(s)).toBe(
      'Welcome back! Last time we were working on Biology (photosynthesis). Shall we pick up where we left off?'
    );
    expect(fallbackGreeting(session([turn('hi', 'GeneralChat', 'Unclassified')]))).toBe(
      'Welcome back! What would you like to work on today?'
    );
  });
});

describe('findActiveQuiz', () => {
  it('should find the latest open quiz', () => {
    const s = session([
      turn('algebra quiz', 'RequestQuiz', 'Math', algebraQuiz),
      turn('x = 3', 'GeneralChat', 'Unclassified'),
    ]);

    expect(findActiveQuiz(s)).toEqual(algebraQuiz);
  });

  it('should treat a completed quiz as closed', () => {
    const s = session([
      turn('algebra quiz', 'RequestQuiz', 'Math', algebraQuiz),
      turn('a', 'RequestQuiz', 'Math', { ...algebraQuiz, completed: true }),
    ]);

    expect(findActiveQuiz(s)).toBeUndefined();
    expect(findActiveQuiz(session([]))).toBeUndefined();
  });
});

describe('merge helpers', () => {
  it('should fall back to the search text as a citation', () => {
    expect(extractCitations({ text: '  Light travels at about 300,000 km/s. ', metadata: {} })).toEqual([
      { source: 'web-search', snippet: 'Light travels at about 300,000 km/s.' },
    ]);
    expect(extractCitations({ text: '', metadata: {} })).toEqual([]);
  });

  it('should skip citations without content', () => {
    const citations = extractCitations({
      text: 'ignored',
      metadata: {
        citations: [{ title: 'No snippet' }, { content: 'Water boils at 100 C at sea level', source: 'encyclopedia' }],
      },
    });

    expect(citations).toEqual([{ source: 'encyclopedia', snippet: 'Water boils at 100 C at sea level' }]);
  });

  it('should read quiz items from either key', () => {
    expect(
      extractQuizItems({
        text: '',
        metadata: { questions: [{ question: 'What is H2O?', options: { a: 'water', b: 7 } }, 'junk'] },
      })
    ).toEqual([{ question: 'What is H2O?', options: { a: 'water' } }]);
  });

  it('should drop malformed quiz fields but keep the question', () => {
    expect(
      extractQuizItems({
        text: '',
        metadata: { items: [{ question: 'Name a noble gas', options: 'a) neon', answer: '  ' }, { answer: 'a' }] },
      })
    ).toEqual([{ question: 'Name a noble gas' }]);
    expect(extractQuizItems({ text: '', metadata: { items: 'not a list' } })).toEqual([]);
  });

  it('should require a grading outcome in range', () => {
    expect(extractGrade({ text: '', metadata: { outcome: 0.5 } })).toEqual({ outcome: 0.5, completed: true });
    expect(extractGrade({ text: '', metadata: { outcome: 0, completed: false } })).toEqual({
      outcome: 0,
      completed: false,
    });
    expect(() => extractGrade({ text: '', metadata: { outcome: 1.5 } })).toThrow(ProviderUnavailableError);
    expect(() => extractGrade({ text: '', metadata: { outcome: '1' } })).toThrow(
      "Provider 'quiz-generator' unavailable: grading response has no outcome in [0, 1]"
    );
  });
});
