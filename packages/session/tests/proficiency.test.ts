import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '@stem-tutor/shared';
import {
  applyProficiencyUpdate,
  BASELINE_PROFICIENCY,
  difficultyFor,
} from '../src/proficiency.js';

describe('applyProficiencyUpdate', () => {
  it('should start from the baseline', () => {
    expect(BASELINE_PROFICIENCY).toBe(0.5);
    expect(applyProficiencyUpdate(undefined, 1.0)).toBe(0.65);
  });

  it('should move toward a failed outcome', () => {
    expect(applyProficiencyUpdate(0.5, 0)).toBeCloseTo(0.35, 10);
  });

  it('should stay within [0, 1]', () => {
    expect(applyProficiencyUpdate(1, 1, 1)).toBe(1);
    expect(applyProficiencyUpdate(0, 0, 1)).toBe(0);
  });

  it('should reject outcomes that are not fractions', () => {
    expect(() => applyProficiencyUpdate(0.5, -0.1)).toThrow(InvalidInputError);
    expect(() => applyProficiencyUpdate(0.5, Infinity)).toThrow(InvalidInputError);
  });
});

describe('difficultyFor', () => {
  it('should map estimates to difficulty bands', () => {
    expect(difficultyFor(0)).toBe('easy');
    expect(difficultyFor(0.39)).toBe('easy');
    expect(difficultyFor(0.4)).toBe('medium');
    expect(difficultyFor(0.5)).toBe('medium');
    expect(difficultyFor(0.75)).toBe('hard');
    expect(difficultyFor(1)).toBe('hard');
  });
});
