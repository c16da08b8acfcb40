// ============================================================================
// STEM Tutor Error Taxonomy
// ============================================================================

import type { ErrorKind } from './types.js';

/**
 * Base class for every error the tutor core surfaces.
 * `userMessage` is safe to show a student; `message` is for logs.
 */
export abstract class TutorError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly userMessage: string;

  /** Whether the orchestrator retries the failing step once */
  abstract readonly retryable: boolean;
}

/**
 * Malformed or empty message, rejected before classification
 */
export class InvalidInputError extends TutorError {
  readonly kind = 'InvalidInput' as const;
  readonly retryable = false;
  readonly userMessage: string;

  constructor(
    public readonly reason: string,
    userMessage?: string
  ) {
    super(`Invalid input: ${reason}`);
    this.name = 'InvalidInputError';
    this.userMessage = userMessage ?? "I didn't catch a question there. Could you type your message again?";
  }
}

/**
 * A classifier backend failed or returned something unusable
 */
export class ClassificationUnavailableError extends TutorError {
  readonly kind = 'ClassificationUnavailable' as const;
  readonly retryable = true;
  readonly userMessage =
    "I'm having trouble understanding requests right now. Please try again in a moment.";

  constructor(
    public readonly classifier: 'intent' | 'subject',
    public readonly reason: string
  ) {
    super(`${classifier} classification unavailable: ${reason}`);
    this.name = 'ClassificationUnavailableError';
  }
}

/**
 * A quiz was requested but no subject could be resolved
 */
export class AmbiguousRoutingError extends TutorError {
  readonly kind = 'AmbiguousRouting' as const;
  readonly retryable = false;
  readonly userMessage =
    'Which subject should the quiz cover? Try something like "quiz me on algebra" or "a chemistry quiz".';

  constructor(public readonly reason: string) {
    super(`Ambiguous routing: ${reason}`);
    this.name = 'AmbiguousRoutingError';
  }
}

/**
 * A capability provider timed out or failed
 */
export class ProviderUnavailableError extends TutorError {
  readonly kind = 'ProviderUnavailable' as const;
  readonly retryable = true;
  readonly userMessage =
    "My tutoring tools aren't responding right now. Let's try that again shortly.";

  constructor(
    public readonly capability: string,
    public readonly reason: string,
    public readonly timedOut: boolean = false
  ) {
    super(`Provider '${capability}' unavailable: ${reason}`);
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * The session store failed to record a turn
 */
export class PersistenceFailureError extends TutorError {
  readonly kind = 'PersistenceFailure' as const;
  readonly retryable = false;
  readonly userMessage =
    "I couldn't save our conversation, so that message wasn't recorded. Please send it again.";

  constructor(
    public readonly studentId: string,
    public readonly reason: string
  ) {
    super(`Failed to persist session for '${studentId}': ${reason}`);
    this.name = 'PersistenceFailureError';
  }
}

export function isTutorError(error: unknown): error is TutorError {
  return error instanceof TutorError;
}

/**
 * Map any thrown value to a message fit for a student
 */
export function describeError(error: unknown): string {
  if (isTutorError(error)) {
    return error.userMessage;
  }
  return 'Something went wrong on my side. Please try again.';
}

/**
 * Extract a log-friendly message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
