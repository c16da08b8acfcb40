// ============================================================================
// Session context for providers and memory queries
// ============================================================================

import { SUBJECTS } from '@stem-tutor/shared';
import type { PriorContextEntry, Session } from '@stem-tutor/shared';

export const DEFAULT_CONTEXT_TURNS = 5;
export const DEFAULT_MEMORY_SUMMARY_TURNS = 10;

export const EMPTY_MEMORY_SUMMARY = 'No previous conversation found.';

/**
 * The last `count` turns, condensed for a provider request
 */
export function buildPriorContext(session: Session, count: number = DEFAULT_CONTEXT_TURNS): PriorContextEntry[] {
  if (count <= 0) return [];
  return session.turns.slice(-count).map((turn) => ({
    text: turn.message.text,
    intent: turn.intent,
    subject: turn.subject,
    response: turn.response.text,
  }));
}

/**
 * Plain-text recap of recent turns and proficiency estimates
 */
export function buildMemorySummary(
  session: Session,
  maxTurns: number = DEFAULT_MEMORY_SUMMARY_TURNS
): string {
  if (session.turns.length === 0) {
    return EMPTY_MEMORY_SUMMARY;
  }

  const lines = ['Summary of recent interactions:'];
  for (const turn of session.turns.slice(-maxTurns)) {
    lines.push(`- [${turn.intent}/${turn.subject}] ${turn.message.text}`);
  }

  const estimates: string[] = [];
  for (const subject of SUBJECTS) {
    if (subject === 'Unclassified') continue;
    const estimate = session.proficiency[subject];
    if (estimate !== undefined) {
      estimates.push(`- ${subject}: ${estimate.toFixed(2)}`);
    }
  }
  if (estimates.length > 0) {
    lines.push('Proficiency estimates:', ...estimates);
  }

  return lines.join('\n');
}

/**
 * Greeting used when the explainer cannot produce one
 */
export function fallbackGreeting(session: Session): string {
  if (session.turns.length === 0) {
    return "Hi! I'm your STEM tutor. Ask me about Math, Physics, Chemistry or Biology, or ask for a quiz to test yourself.";
  }
  if (session.currentSubject) {
    const topic = session.currentTopic ? ` (${session.currentTopic})` : '';
    return `Welcome back! Last time we were working on ${session.currentSubject}${topic}. Shall we pick up where we left off?`;
  }
  return 'Welcome back! What would you like to work on today?';
}
