// ============================================================================
// Session transcript export
// ============================================================================

import { SUBJECTS } from '@stem-tutor/shared';
import type { Session, Turn } from '@stem-tutor/shared';
import { encodeSession } from './session-codec.js';
import type { TranscriptFormat } from './types.js';

/**
 * Format proficiency estimates as "Math 0.65, Physics 0.40" in subject order
 */
export function formatProficiency(session: Session): string {
  const parts: string[] = [];
  for (const subject of SUBJECTS) {
    if (subject === 'Unclassified') continue;
    const estimate = session.proficiency[subject];
    if (estimate !== undefined) {
      parts.push(`${subject} ${estimate.toFixed(2)}`);
    }
  }
  return parts.join(', ');
}

function turnToMarkdown(turn: Turn): string[] {
  const lines: string[] = [];
  const { metadata } = turn.response;

  lines.push(`### Student`);
  lines.push(`<!-- ${turn.message.id} @ ${turn.message.timestamp.toISOString()} -->`);
  lines.push('');
  lines.push(turn.message.text);
  lines.push('');

  const tags = turn.topic ? `${turn.intent} / ${turn.subject} / ${turn.topic}` : `${turn.intent} / ${turn.subject}`;
  lines.push(`### Tutor (${tags})`);
  lines.push('');
  lines.push(turn.response.text);
  lines.push('');

  if (metadata.citations?.length) {
    lines.push('<details>');
    lines.push('<summary>Citations</summary>');
    lines.push('');
    for (const citation of metadata.citations) {
      const label = citation.url ? `[${citation.title ?? citation.url}](${citation.url})` : citation.source;
      lines.push(`- ${label}: ${citation.snippet}`);
    }
    lines.push('</details>');
    lines.push('');
  }

  if (turn.quizOutcome !== undefined) {
    lines.push(`> Quiz outcome: ${turn.quizOutcome.toFixed(2)}`);
    lines.push('');
  }

  if (metadata.degraded) {
    lines.push(`> Degraded response (${metadata.degradedReason ?? 'unknown'})`);
    lines.push('');
  }

  return lines;
}

function toMarkdown(session: Session): string {
  const lines: string[] = [];

  lines.push(`# Session: ${session.studentId}`);
  lines.push('');
  lines.push(`> Created: ${session.createdAt.toISOString()}`);
  lines.push(`> Last active: ${session.lastActiveAt.toISOString()}`);
  lines.push(`> Turns: ${session.turns.length}`);
  const proficiency = formatProficiency(session);
  if (proficiency) {
    lines.push(`> Proficiency: ${proficiency}`);
  }
  lines.push('');
  lines.push('---');
  lines.push('');

  for (const turn of session.turns) {
    lines.push(...turnToMarkdown(turn));
  }

  return lines.join('\n');
}

/**
 * Render a session in the requested format
 */
export function renderTranscript(session: Session, format: TranscriptFormat): string {
  switch (format) {
    case 'markdown':
      return toMarkdown(session);
    case 'json':
      return JSON.stringify(encodeSession(session), null, 2);
  }
}
