// ============================================================================
// Merge helpers - turn provider metadata into response metadata
// ============================================================================

import { z } from 'zod';
import { CAPABILITIES, ProviderUnavailableError } from '@stem-tutor/shared';
import type { Citation, ProviderResponse, QuizItem } from '@stem-tutor/shared';

const optionalText = z
  .string()
  .refine((value) => value.trim() !== '')
  .optional()
  .catch(undefined);

const entries = z.array(z.unknown()).catch([]);

const SearchResultSchema = z.object({
  snippet: optionalText,
  content: optionalText,
  source: optionalText,
  title: optionalText,
  url: optionalText,
});

const QuizItemSchema = z.object({
  question: z.string(),
  options: z
    .record(z.unknown())
    .transform((options) => {
      const strings: Record<string, string> = {};
      for (const [key, value] of Object.entries(options)) {
        if (typeof value === 'string') strings[key] = value;
      }
      return strings;
    })
    .optional()
    .catch(undefined),
  answer: optionalText,
});

const GradeSchema = z.object({
  outcome: z.number().finite().min(0).max(1),
  completed: z.boolean().catch(true),
});

/**
 * Citations from a search response. Structured results are read from
 * `metadata.results` (or `metadata.citations`); without any, the search text
 * itself becomes the single citation.
 */
export function extractCitations(search: ProviderResponse): Citation[] {
  const citations: Citation[] = [];

  for (const entry of entries.parse(search.metadata.results ?? search.metadata.citations)) {
    const result = SearchResultSchema.safeParse(entry);
    if (!result.success) continue;

    const { snippet, content, source, title, url } = result.data;
    const text = snippet ?? content;
    if (!text) continue;

    const citation: Citation = { source: source ?? CAPABILITIES.WEB_SEARCH, snippet: text };
    if (title) citation.title = title;
    if (url) citation.url = url;
    citations.push(citation);
  }

  if (citations.length === 0 && search.text.trim() !== '') {
    citations.push({ source: CAPABILITIES.WEB_SEARCH, snippet: search.text.trim() });
  }

  return citations;
}

/**
 * Quiz items from a quiz-generator response; malformed entries are skipped
 */
export function extractQuizItems(response: ProviderResponse): QuizItem[] {
  const items: QuizItem[] = [];

  for (const entry of entries.parse(response.metadata.items ?? response.metadata.questions)) {
    const result = QuizItemSchema.safeParse(entry);
    if (!result.success) continue;

    const { question, options, answer } = result.data;
    const item: QuizItem = { question };
    if (options) item.options = options;
    if (answer) item.answer = answer;
    items.push(item);
  }
  return items;
}

/**
 * Grading result from a quiz-generator response
 * @throws ProviderUnavailableError when no usable outcome is present
 */
export function extractGrade(response: ProviderResponse): { outcome: number; completed: boolean } {
  const result = GradeSchema.safeParse(response.metadata);
  if (!result.success) {
    throw new ProviderUnavailableError(
      CAPABILITIES.QUIZ_GENERATOR,
      'grading response has no outcome in [0, 1]'
    );
  }
  return result.data;
}
