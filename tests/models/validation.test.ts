/**
 * @file Tests for boundary validators
 */

import {
  assertValid,
  validateFeedback,
  validateHint,
  validateMilestone,
  validateUserSettings,
  validateVault,
  type VaultInput,
} from '../../src/models/validation';
import { deriveDefaults } from '../../src/models/vault';
import { ValidationError } from '../../src/utils/errors';

function fields(result: { isValid: boolean; errors: Array<{ field: string }> }): string[] {
  return result.errors.map((e) => e.field);
}

const baseVault: VaultInput = {
  userId: 'user-1',
  partnerName: 'Sam',
  interests: [{ category: 'Cooking', polarity: 'like' }],
  vibes: ['romantic'],
  loveLanguages: { primary: 'quality_time', secondary: 'acts_of_service' },
};

describe('deriveDefaults', () => {
  it('should map milestone types to budget tiers', () => {
    expect(deriveDefaults('birthday')).toBe('major_milestone');
    expect(deriveDefaults('anniversary')).toBe('major_milestone');
    expect(deriveDefaults('holiday')).toBe('minor_occasion');
    expect(deriveDefaults('custom')).toBeNull();
  });
});

describe('validateMilestone', () => {
  it('should derive the tier and trim the name', () => {
    const result = validateMilestone({ name: ' Birthday ', type: 'birthday', date: '1994-06-10', recurrence: 'yearly' });
    expect(assertValid(result)).toEqual({
      name: 'Birthday',
      type: 'birthday',
      date: '1994-06-10',
      recurrence: 'yearly',
      budgetTier: 'major_milestone',
    });
  });

  it('should reject impossible dates and unknown values', () => {
    const result = validateMilestone({ name: 'x', type: 'party', date: '2023-02-30', recurrence: 'monthly' });
    expect(fields(result)).toEqual(['milestone.date', 'milestone.recurrence', 'milestone.type']);
  });

  it('should reject an overlong name', () => {
    const result = validateMilestone({ name: 'a'.repeat(101), type: 'birthday', date: '1994-06-10', recurrence: 'yearly' });
    expect(fields(result)).toEqual(['milestone.name']);
  });
});

describe('validateVault', () => {
  it('should accept a minimal vault', () => {
    const draft = assertValid(validateVault(baseVault));
    expect(draft.location).toEqual({});
    expect(draft.budgets).toEqual([]);
  });

  it('should bound the number of vibes', () => {
    expect(fields(validateVault({ ...baseVault, vibes: [] }))).toEqual(['vibes']);
    expect(
      fields(validateVault({ ...baseVault, vibes: ['romantic', 'vintage', 'outdoorsy', 'bohemian', 'minimalist'] }))
    ).toEqual(['vibes']);
  });

  it('should require distinct love languages', () => {
    const result = validateVault({ ...baseVault, loveLanguages: { primary: 'quality_time', secondary: 'quality_time' } });
    expect(fields(result)).toEqual(['loveLanguages']);
  });

  it('should reject unknown categories and inverted budgets', () => {
    const result = validateVault({
      ...baseVault,
      interests: [{ category: 'Underwater Basketry', polarity: 'like' }],
      budgets: [{ tier: 'just_because', minAmount: 50, maxAmount: 10 }],
    });
    expect(fields(result)).toEqual(['interests', 'budgets']);
  });

  it('should prefix milestone errors with their index', () => {
    const result = validateVault({
      ...baseVault,
      milestones: [{ name: 'Trip', type: 'custom', date: '2025-09-01', recurrence: 'one_time' }],
    });
    expect(fields(result)).toEqual(['milestones[0].budgetTier']);
  });
});

describe('validateUserSettings', () => {
  it('should accept a partial patch', () => {
    expect(assertValid(validateUserSettings({ quietHoursStart: 23, timezone: null }))).toEqual({
      quietHoursStart: 23,
      timezone: null,
    });
  });

  it('should reject bad hours and zones', () => {
    const result = validateUserSettings({ quietHoursStart: 24, quietHoursEnd: 7.5, timezone: 'Nowhere/City' });
    expect(fields(result)).toEqual(['timezone', 'quietHoursStart', 'quietHoursEnd']);
  });
});

describe('validateFeedback', () => {
  it('should allow a rating only for rated feedback', () => {
    expect(validateFeedback({ recommendationId: 'r', userId: 'u', action: 'rated', rating: 5 }).isValid).toBe(true);
    expect(fields(validateFeedback({ recommendationId: 'r', userId: 'u', action: 'rated', rating: 6 }))).toEqual(['rating']);
    expect(fields(validateFeedback({ recommendationId: 'r', userId: 'u', action: 'saved', rating: 4 }))).toEqual(['rating']);
    expect(fields(validateFeedback({ recommendationId: 'r', userId: 'u', action: 'liked' }))).toEqual(['action']);
  });
});

describe('validateHint', () => {
  it('should bound hint length after trimming', () => {
    expect(fields(validateHint({ vaultId: 'v', text: '   ' }))).toEqual(['text']);
    expect(fields(validateHint({ vaultId: 'v', text: 'x'.repeat(501) }))).toEqual(['text']);
    expect(assertValid(validateHint({ vaultId: 'v', text: `  ${'x'.repeat(500)}  ` })).text).toHaveLength(500);
  });

  it('should throw a ValidationError through assertValid', () => {
    expect(() => assertValid(validateHint({ vaultId: 'v', text: 'ok', source: 'carrier_pigeon' }))).toThrow(
      ValidationError
    );
  });
});
