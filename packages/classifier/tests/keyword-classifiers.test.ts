// ============================================================================
// Keyword Classifier Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { INTENTS, InvalidInputError, SUBJECTS } from '@stem-tutor/shared';
import { KeywordIntentClassifier } from '../src/keyword-intent-classifier.js';
import { KeywordSubjectClassifier, loadSubjectKeywords } from '../src/keyword-subject-classifier.js';

describe('KeywordIntentClassifier', () => {
  const classifier = new KeywordIntentClassifier();

  it('should classify explanation requests', async () => {
    const result = await classifier.classify('Explain Pythagoras theorem');
    expect(result.intent).toBe('ExplainConcept');
    expect(result.reason).toBe('intent matched: ExplainConcept (explain)');
  });

  it('should classify quiz requests', async () => {
    expect((await classifier.classify('Give me a 5-question algebra quiz')).intent).toBe('RequestQuiz');
  });

  it('should classify fact lookups', async () => {
    expect((await classifier.classify('Who discovered penicillin?')).intent).toBe('LookupFact');
    expect((await classifier.classify('What is the speed of light?')).intent).toBe('LookupFact');
  });

  it('should classify memory queries', async () => {
    expect((await classifier.classify('What did we cover last time?')).intent).toBe('MemoryQuery');
  });

  it('should apply first-match precedence', async () => {
    // Both a memory phrase and a quiz phrase; memory wins
    const result = await classifier.classify('Can you recap the quiz we did?');
    expect(result.intent).toBe('MemoryQuery');
  });

  it('should fall back to general chat', async () => {
    const result = await classifier.classify('hello there!');
    expect(result).toEqual({ intent: 'GeneralChat', confidence: 0, reason: 'no specific intent detected' });
  });

  it('should match triggers on word boundaries only', async () => {
    // "whole" must not trigger "who"
    expect((await classifier.classify('whole numbers are fun')).intent).toBe('GeneralChat');
  });

  it('should always yield exactly one known intent', async () => {
    const messages = ['hi', 'quiz me', 'explain mitosis', 'when did Newton live', 'remember me?'];
    for (const message of messages) {
      const result = await classifier.classify(message);
      expect(INTENTS).toContain(result.intent);
      expect(result.confidence).toBeGreaterThanOrEqual(0);
      expect(result.confidence).toBeLessThanOrEqual(1);
    }
  });

  it('should honour custom triggers', async () => {
    const custom = new KeywordIntentClassifier({ customTriggers: { RequestQuiz: ['flashcards'] } });
    expect((await custom.classify('make me flashcards')).intent).toBe('RequestQuiz');
    expect((await custom.classify('a short quiz')).intent).toBe('GeneralChat');
  });

  it('should reject empty text', async () => {
    await expect(classifier.classify('   ')).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe('KeywordSubjectClassifier', () => {
  const classifier = new KeywordSubjectClassifier();

  it('should classify the Pythagoras question as Math', async () => {
    expect(await classifier.classify('Explain Pythagoras theorem')).toEqual({
      subject: 'Math',
      topic: 'pythagoras',
      confidence: 1,
    });
  });

  it('should classify the algebra quiz as Math', async () => {
    const result = await classifier.classify('Give me a 5-question algebra quiz');
    expect(result.subject).toBe('Math');
    expect(result.topic).toBe('algebra');
  });

  it('should accept plural keywords', async () => {
    const result = await classifier.classify('How do cells divide during mitosis?');
    expect(result.subject).toBe('Biology');
    expect(result.topic).toBe('cell');
  });

  it('should return Unclassified without keyword hits', async () => {
    expect(await classifier.classify('hello there')).toEqual({ subject: 'Unclassified', confidence: 0 });
  });

  it('should return Unclassified on a tie', async () => {
    const tied = new KeywordSubjectClassifier({
      Math: ['graph'],
      Physics: ['motion'],
      Chemistry: [],
      Biology: [],
    });
    expect((await tied.classify('a graph of motion')).subject).toBe('Unclassified');
  });

  it('should report the winning share as confidence', async () => {
    const table = { Math: ['graph', 'slope'], Physics: ['motion'], Chemistry: [], Biology: [] };
    const result = await new KeywordSubjectClassifier(table).classify('the slope of a motion graph');

    expect(result.subject).toBe('Math');
    expect(result.topic).toBe('slope');
    expect(result.confidence).toBeCloseTo(2 / 3, 10);
  });

  it('should only yield known subjects', async () => {
    for (const text of ['atoms and bonds', 'newton and gravity', 'random words']) {
      expect(SUBJECTS).toContain((await classifier.classify(text)).subject);
    }
  });

  it('should reject empty text', async () => {
    await expect(classifier.classify('')).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe('loadSubjectKeywords', () => {
  it('should load the bundled keyword table', () => {
    const table = loadSubjectKeywords();
    expect(table.Math).toContain('algebra');
    expect(table.Biology).toContain('photosynthesis');
  });

  it('should reject a table missing a subject', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stem-tutor-keywords-'));
    const file = path.join(dir, 'keywords.json');
    await fs.writeFile(file, JSON.stringify({ Math: ['algebra'], Physics: [], Chemistry: [] }), 'utf-8');

    try {
      expect(() => loadSubjectKeywords(file)).toThrow("'Biology' must be a list of strings");
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should reject non-string keywords', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stem-tutor-keywords-'));
    const file = path.join(dir, 'keywords.json');
    await fs.writeFile(
      file,
      JSON.stringify({ Math: ['algebra'], Physics: [], Chemistry: [42], Biology: [] }),
      'utf-8'
    );

    try {
      expect(() => loadSubjectKeywords(file)).toThrow(`Subject keyword file ${file}: 'Chemistry' must be a list of strings`);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
