// ============================================================================
// STEM Tutor CLI - Demo providers
// Canned in-process capability providers for trying the tutor offline
// ============================================================================

import { CAPABILITIES } from '@stem-tutor/shared';
import type { ClassifiedSubject, ProviderRequest, ProviderResponse, QuizItem } from '@stem-tutor/shared';
import { StaticCapabilityProvider } from '@stem-tutor/providers';
import type { ProviderRegistry } from '@stem-tutor/providers';

const QUESTION_BANK: Record<ClassifiedSubject, QuizItem[]> = {
  Math: [
    { question: 'Solve for x: x + 2 = 5', options: { a: '3', b: '7', c: '2.5' }, answer: 'a' },
    { question: 'What is the area of a 3 by 4 rectangle?', options: { a: '7', b: '12', c: '14' }, answer: 'b' },
  ],
  Physics: [
    { question: 'What is the SI unit of force?', options: { a: 'joule', b: 'watt', c: 'newton' }, answer: 'c' },
    { question: 'Which quantity is a vector?', options: { a: 'speed', b: 'velocity', c: 'mass' }, answer: 'b' },
  ],
  Chemistry: [
    { question: 'What is the chemical symbol for sodium?', options: { a: 'Na', b: 'So', c: 'S' }, answer: 'a' },
    { question: 'What is the pH of pure water at 25 C?', options: { a: '1', b: '7', c: '14' }, answer: 'b' },
  ],
  Biology: [
    { question: 'Which organelle makes ATP?', options: { a: 'ribosome', b: 'nucleus', c: 'mitochondrion' }, answer: 'c' },
    { question: 'What carries oxygen in red blood cells?', options: { a: 'haemoglobin', b: 'insulin', c: 'keratin' }, answer: 'a' },
  ],
};

function text(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function demoExplain(request: ProviderRequest): ProviderResponse {
  const { payload, subject } = request;

  switch (payload.mode) {
    case 'welcome': {
      const summary = text(payload.summary);
      return {
        text: payload.returning === true && summary
          ? `Welcome back! Here's what we've done so far:\n${summary}`
          : "Hi! I'm the demo tutor. Ask me to explain a concept or to quiz you on a subject.",
        metadata: {},
      };
    }
    case 'chat':
      return {
        text: 'I only have canned answers in demo mode. Try asking me to explain a STEM concept.',
        metadata: {},
      };
    default: {
      const about = text(payload.topic) ?? text(payload.question) ?? 'that';
      const lines = [`Here's a short demo explanation of ${about}${subject ? ` (${subject})` : ''}.`];
      const context = text(payload.context);
      if (context) lines.push(`Background: ${context}`);
      return { text: lines.join('\n'), metadata: {} };
    }
  }
}

function readItems(value: unknown): QuizItem[] {
  if (!Array.isArray(value)) return [];
  const items: QuizItem[] = [];
  for (const entry of value) {
    if (typeof entry === 'object' && entry !== null && 'question' in entry && typeof entry.question === 'string') {
      const answer = 'answer' in entry && typeof entry.answer === 'string' ? entry.answer : undefined;
      items.push({ question: entry.question, answer });
    }
  }
  return items;
}

/**
 * Quiz handler: generates from the bank, grades space- or comma-separated
 * answers in question order
 */
export function createDemoQuiz(): (request: ProviderRequest) => ProviderResponse {
  let generated = 0;

  return (request) => {
    const { payload, subject } = request;

    if (payload.action === 'grade') {
      const items = readItems(payload.items);
      const answers = String(payload.answer ?? '').toLowerCase().split(/[\s,]+/).filter(Boolean);
      const correct = items.filter((item, i) => item.answer !== undefined && answers[i] === item.answer).length;
      const outcome = items.length > 0 ? correct / items.length : 0;
      return {
        text: `You got ${correct} of ${items.length} right.`,
        metadata: { outcome, completed: true },
      };
    }

    const bank = subject && subject !== 'Unclassified' ? QUESTION_BANK[subject] : [];
    const requested = typeof payload.numQuestions === 'number' ? payload.numQuestions : bank.length;
    const items = bank.slice(0, Math.max(1, requested));
    generated++;

    const lines = [`Here's a ${text(payload.difficulty) ?? 'medium'} ${subject ?? 'STEM'} quiz:`];
    items.forEach((item, i) => {
      const options = Object.entries(item.options ?? {})
        .map(([key, value]) => `${key}) ${value}`)
        .join('  ');
      lines.push(`${i + 1}. ${item.question}  ${options}`);
    });

    return {
      text: lines.join('\n'),
      metadata: { quizId: `demo-quiz-${generated}`, items },
    };
  };
}

export function demoSearch(request: ProviderRequest): ProviderResponse {
  const query = text(request.payload.query) ?? '';
  return {
    text: `No live search in demo mode; "${query}" was not looked up.`,
    metadata: {
      results: [{ source: 'demo-search', title: 'Offline result', snippet: `Placeholder result for "${query}"` }],
    },
  };
}

/**
 * Register the demo explainer, quiz generator and search. Classifier
 * capabilities are left out so keyword classification applies.
 */
export function registerDemoProviders(registry: ProviderRegistry): ProviderRegistry {
  return registry
    .register(CAPABILITIES.CONCEPT_EXPLAINER, new StaticCapabilityProvider('demo-explainer', demoExplain))
    .register(CAPABILITIES.QUIZ_GENERATOR, new StaticCapabilityProvider('demo-quiz', createDemoQuiz()))
    .register(CAPABILITIES.WEB_SEARCH, new StaticCapabilityProvider('demo-search', demoSearch));
}
