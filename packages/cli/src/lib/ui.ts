// ============================================================================
// STEM Tutor CLI - UI Utilities
// ============================================================================

import ora, { type Ora } from 'ora';
import figures from 'figures';
import chalk from 'chalk';
import type { Session } from '@stem-tutor/shared';
import { formatProficiency } from '@stem-tutor/session';
import type { TutorReply } from '@stem-tutor/orchestrator';

// ============================================================================
// Icons
// ============================================================================

export const icons = {
  success: chalk.green(figures.tick),
  error: chalk.red(figures.cross),
  warning: chalk.yellow(figures.warning),
  info: chalk.blue(figures.info),
  pointer: chalk.cyan(figures.pointer),
  bullet: figures.bullet,
};

// ============================================================================
// Spinners
// ============================================================================

export function createSpinner(text: string): Ora {
  return ora({
    text,
    spinner: 'dots',
    color: 'cyan',
  });
}

// ============================================================================
// Replies
// ============================================================================

/**
 * Render a tutor reply: text, sources, score and a routing tag
 */
export function formatReply(reply: TutorReply): string {
  const { metadata } = reply;
  const lines: string[] = [];

  if (reply.degraded) {
    lines.push(`${icons.warning} ${chalk.yellow(reply.text)}`);
  } else {
    lines.push(reply.text);
  }

  if (metadata.citations && metadata.citations.length > 0) {
    lines.push('', chalk.bold('Sources:'));
    for (const citation of metadata.citations) {
      const label = citation.title ?? citation.source;
      const url = citation.url ? chalk.gray(` (${citation.url})`) : '';
      lines.push(`  ${icons.bullet} ${label}${url}`);
    }
  }

  if (metadata.quizOutcome !== undefined) {
    lines.push('', `${icons.success} Score: ${Math.round(metadata.quizOutcome * 100)}%`);
  } else if (metadata.quiz && !metadata.quiz.completed) {
    lines.push('', chalk.gray('Answer with /quiz <your answers>'));
  }

  const tags = [reply.intent, reply.subject, reply.topic].filter(Boolean).join(' / ');
  lines.push(chalk.gray(`[${tags}]`));

  return lines.join('\n');
}

// ============================================================================
// Sessions
// ============================================================================

export function formatSessionSummary(session: Session): string {
  const current = session.currentSubject
    ? `${session.currentSubject}${session.currentTopic ? ` (${session.currentTopic})` : ''}`
    : 'none';

  return [
    `${chalk.bold('Student:')} ${session.studentId}`,
    `${chalk.bold('Turns:')} ${session.turns.length}`,
    `${chalk.bold('Current subject:')} ${current}`,
    `${chalk.bold('Proficiency:')} ${formatProficiency(session) || 'no estimates yet'}`,
    `${chalk.bold('Last active:')} ${session.lastActiveAt.toISOString()}`,
  ].join('\n');
}

export function errorBox(message: string, hints: string[] = []): string {
  const lines = [`${icons.error} ${chalk.red(message)}`];
  for (const hint of hints) {
    lines.push(chalk.gray(`  ${icons.bullet} ${hint}`));
  }
  return lines.join('\n');
}
