// ============================================================================
// Proficiency estimate
// ============================================================================

import { InvalidInputError } from '@stem-tutor/shared';
import type { Difficulty } from '@stem-tutor/shared';

/** Estimate assumed for a subject with no quiz history */
export const BASELINE_PROFICIENCY = 0.5;

export const DEFAULT_ALPHA = 0.3;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Exponentially weighted update: old + alpha * (outcome - old), clamped to [0,1]
 */
export function applyProficiencyUpdate(
  previous: number | undefined,
  outcome: number,
  alpha: number = DEFAULT_ALPHA
): number {
  if (!Number.isFinite(outcome) || outcome < 0 || outcome > 1) {
    throw new InvalidInputError(`quiz outcome must be within [0, 1], got ${outcome}`);
  }
  const old = previous ?? BASELINE_PROFICIENCY;
  return clamp01(old + alpha * (outcome - old));
}

/**
 * Quiz difficulty for a proficiency estimate
 */
export function difficultyFor(proficiency: number): Difficulty {
  if (proficiency < 0.4) return 'easy';
  if (proficiency < 0.75) return 'medium';
  return 'hard';
}
