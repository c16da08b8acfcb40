// ============================================================================
// Keyword Subject Classifier
// Scores each subject by distinct keyword hits; a unique top scorer wins
// ============================================================================

import { readFileSync } from 'fs';
import { z } from 'zod';
import { InvalidInputError, SUBJECTS } from '@stem-tutor/shared';
import type { ClassifiedSubject } from '@stem-tutor/shared';
import { findTerm, termPattern } from './matching.js';
import type { SubjectClassification, SubjectClassifier, SubjectKeywordTable } from './types.js';

const DEFAULT_KEYWORDS_URL = new URL('../data/subject-keywords.json', import.meta.url);

const CLASSIFIED_SUBJECTS = SUBJECTS.filter(
  (s): s is ClassifiedSubject => s !== 'Unclassified'
);

const keywordList = (subject: ClassifiedSubject) =>
  z.array(z.string(), {
    required_error: `'${subject}' must be a list of strings`,
    invalid_type_error: `'${subject}' must be a list of strings`,
  });

const SubjectKeywordTableSchema = z.object(
  {
    Math: keywordList('Math'),
    Physics: keywordList('Physics'),
    Chemistry: keywordList('Chemistry'),
    Biology: keywordList('Biology'),
  },
  { invalid_type_error: 'must contain an object' }
);

/**
 * Load and validate a keyword table from a JSON file
 */
export function loadSubjectKeywords(source: string | URL = DEFAULT_KEYWORDS_URL): SubjectKeywordTable {
  const parsed: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  const result = SubjectKeywordTableSchema.safeParse(parsed);
  if (!result.success) {
    const [issue] = result.error.issues;
    const subject = issue.path[0];
    const reason =
      typeof subject === 'string' && issue.path.length > 1
        ? `'${subject}' must be a list of strings`
        : issue.message;
    throw new Error(`Subject keyword file ${String(source)}: ${reason}`);
  }
  return result.data;
}

interface ScoredSubject {
  subject: ClassifiedSubject;
  score: number;
  firstHit?: { keyword: string; index: number };
}

export class KeywordSubjectClassifier implements SubjectClassifier {
  private keywords: Map<ClassifiedSubject, Array<{ keyword: string; pattern: RegExp }>>;

  constructor(table: SubjectKeywordTable = loadSubjectKeywords()) {
    this.keywords = new Map();
    for (const subject of CLASSIFIED_SUBJECTS) {
      const unique = [...new Set(table[subject].map((k) => k.trim().toLowerCase()))].filter(Boolean);
      this.keywords.set(
        subject,
        unique.map((keyword) => ({ keyword, pattern: termPattern(keyword, true) }))
      );
    }
  }

  async classify(text: string): Promise<SubjectClassification> {
    const input = text.trim();
    if (input === '') {
      throw new InvalidInputError('message text is empty');
    }

    const scored = CLASSIFIED_SUBJECTS.map((subject) => this.score(subject, input));
    const top = Math.max(...scored.map((s) => s.score));
    const leaders = scored.filter((s) => s.score === top);

    if (top === 0 || leaders.length > 1) {
      return { subject: 'Unclassified', confidence: 0 };
    }

    const [winner] = leaders;
    const total = scored.reduce((sum, s) => sum + s.score, 0);

    return {
      subject: winner.subject,
      topic: winner.firstHit?.keyword,
      confidence: winner.score / total,
    };
  }

  private score(subject: ClassifiedSubject, input: string): ScoredSubject {
    const result: ScoredSubject = { subject, score: 0 };

    for (const { keyword, pattern } of this.keywords.get(subject) ?? []) {
      const index = findTerm(input, pattern);
      if (index < 0) continue;

      result.score++;
      if (!result.firstHit || index < result.firstHit.index) {
        result.firstHit = { keyword, index };
      }
    }

    return result;
  }
}
