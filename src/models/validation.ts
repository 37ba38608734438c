/**
 * @file Boundary validators. Malformed dates, out-of-range hours and unknown
 * categorical values are rejected here and never reach core state.
 */

import type { FieldError } from '../utils/errors';
import { ValidationError } from '../utils/errors';
import { parseIsoDate } from '../utils/calendar';
import { isValidTimeZone } from '../utils/timezone';
import {
  BUDGET_TIERS,
  COHABITATION_STATUSES,
  INTEREST_CATEGORIES,
  LOVE_LANGUAGES,
  MILESTONE_TYPES,
  RECURRENCES,
  VIBE_TAGS,
  deriveDefaults,
  isMemberOf,
  type BudgetRange,
  type BudgetTier,
  type CohabitationStatus,
  type InterestEntry,
  type LoveLanguagePair,
  type MilestoneType,
  type Recurrence,
  type VaultLocation,
  type VibeTag,
} from './vault';
import { DEVICE_PLATFORMS, type DevicePlatform } from './user';
import { FEEDBACK_ACTIONS, type FeedbackAction } from './recommendation';

export type ValidationResult<T> =
  | { isValid: true; value: T; errors: [] }
  | { isValid: false; errors: FieldError[] };

export const MAX_HINT_LENGTH = 500;
export const MAX_MILESTONE_NAME_LENGTH = 100;
export const MAX_FEEDBACK_TEXT_LENGTH = 1000;
export const MAX_VIBES = 4;

const HINT_SOURCES = ['text_input', 'voice_transcription'] as const;
export type HintSource = (typeof HINT_SOURCES)[number];

// =============================================================================
// INPUT SHAPES (untrusted)
// =============================================================================

export interface MilestoneInput {
  name: string;
  type: string;
  date: string;
  recurrence: string;
  budgetTier?: string;
}

export interface VaultInput {
  userId: string;
  partnerName: string;
  relationshipTenureMonths?: number;
  cohabitationStatus?: string;
  location?: VaultLocation;
  interests: Array<{ category: string; polarity: string }>;
  vibes: string[];
  loveLanguages: { primary: string; secondary: string };
  budgets?: Array<{ tier: string; minAmount: number; maxAmount: number; currency?: string }>;
  milestones?: MilestoneInput[];
}

export interface UserSettingsInput {
  timezone?: string | null;
  quietHoursStart?: number;
  quietHoursEnd?: number;
  notificationsEnabled?: boolean;
  deviceToken?: string | null;
  devicePlatform?: string | null;
}

export interface FeedbackInput {
  recommendationId: string;
  userId: string;
  action: string;
  rating?: number;
  feedbackText?: string;
}

export interface HintInput {
  vaultId: string;
  text: string;
  source?: string;
}

// =============================================================================
// VALIDATED SHAPES
// =============================================================================

export interface MilestoneDraft {
  name: string;
  type: MilestoneType;
  date: string;
  recurrence: Recurrence;
  budgetTier: BudgetTier;
}

export interface VaultDraft {
  userId: string;
  partnerName: string;
  relationshipTenureMonths?: number;
  cohabitationStatus?: CohabitationStatus;
  location: VaultLocation;
  interests: InterestEntry[];
  vibes: VibeTag[];
  loveLanguages: LoveLanguagePair;
  budgets: BudgetRange[];
  milestones: MilestoneDraft[];
}

export interface UserSettingsPatch {
  timezone?: string | null;
  quietHoursStart?: number;
  quietHoursEnd?: number;
  notificationsEnabled?: boolean;
  deviceToken?: string | null;
  devicePlatform?: DevicePlatform | null;
}

export interface FeedbackDraft {
  recommendationId: string;
  userId: string;
  action: FeedbackAction;
  rating?: number;
  feedbackText?: string;
}

export interface HintDraft {
  vaultId: string;
  text: string;
  source: HintSource;
}

function result<T>(value: T, errors: FieldError[]): ValidationResult<T> {
  return errors.length === 0 ? { isValid: true, value, errors: [] } : { isValid: false, errors };
}

/**
 * Unwrap a validation result or throw ValidationError.
 */
export function assertValid<T>(validation: ValidationResult<T>): T {
  if (!validation.isValid) {
    throw new ValidationError(validation.errors);
  }
  return validation.value;
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

function isHour(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 23;
}

// =============================================================================
// VALIDATORS
// =============================================================================

export function validateMilestone(input: MilestoneInput, field = 'milestone'): ValidationResult<MilestoneDraft> {
  const errors: FieldError[] = [];

  if (isBlank(input.name)) {
    errors.push({ field: `${field}.name`, message: 'name is required' });
  } else if (input.name.trim().length > MAX_MILESTONE_NAME_LENGTH) {
    errors.push({ field: `${field}.name`, message: `name exceeds ${MAX_MILESTONE_NAME_LENGTH} characters` });
  }

  if (typeof input.date !== 'string' || parseIsoDate(input.date) === null) {
    errors.push({ field: `${field}.date`, message: 'date must be a real calendar date in YYYY-MM-DD form' });
  }

  if (!isMemberOf(RECURRENCES, input.recurrence)) {
    errors.push({ field: `${field}.recurrence`, message: `unknown recurrence: ${String(input.recurrence)}` });
  }

  let budgetTier: BudgetTier | null = null;
  if (!isMemberOf(MILESTONE_TYPES, input.type)) {
    errors.push({ field: `${field}.type`, message: `unknown milestone type: ${String(input.type)}` });
  } else if (input.budgetTier === undefined) {
    budgetTier = deriveDefaults(input.type);
    if (budgetTier === null) {
      errors.push({ field: `${field}.budgetTier`, message: 'custom milestones require an explicit budget tier' });
    }
  } else if (!isMemberOf(BUDGET_TIERS, input.budgetTier)) {
    errors.push({ field: `${field}.budgetTier`, message: `unknown budget tier: ${input.budgetTier}` });
  } else {
    budgetTier = input.budgetTier;
  }

  if (
    errors.length > 0 ||
    budgetTier === null ||
    !isMemberOf(MILESTONE_TYPES, input.type) ||
    !isMemberOf(RECURRENCES, input.recurrence)
  ) {
    return { isValid: false, errors };
  }

  return result(
    {
      name: input.name.trim(),
      type: input.type,
      date: input.date,
      recurrence: input.recurrence,
      budgetTier,
    },
    errors
  );
}

export function validateVault(input: VaultInput): ValidationResult<VaultDraft> {
  const errors: FieldError[] = [];

  if (isBlank(input.userId)) {
    errors.push({ field: 'userId', message: 'userId is required' });
  }
  if (isBlank(input.partnerName)) {
    errors.push({ field: 'partnerName', message: 'partnerName is required' });
  }
  if (
    input.relationshipTenureMonths !== undefined &&
    (!Number.isInteger(input.relationshipTenureMonths) || input.relationshipTenureMonths < 0)
  ) {
    errors.push({ field: 'relationshipTenureMonths', message: 'must be a non-negative integer' });
  }

  let cohabitationStatus: CohabitationStatus | undefined;
  if (input.cohabitationStatus !== undefined) {
    if (isMemberOf(COHABITATION_STATUSES, input.cohabitationStatus)) {
      cohabitationStatus = input.cohabitationStatus;
    } else {
      errors.push({ field: 'cohabitationStatus', message: `unknown status: ${input.cohabitationStatus}` });
    }
  }

  // Interests: closed categories, one polarity per category
  const interests: InterestEntry[] = [];
  const seenCategories = new Set<string>();
  for (const entry of input.interests ?? []) {
    if (!INTEREST_CATEGORIES.includes(entry.category)) {
      errors.push({ field: 'interests', message: `unknown interest category: ${entry.category}` });
      continue;
    }
    if (entry.polarity !== 'like' && entry.polarity !== 'dislike') {
      errors.push({ field: 'interests', message: `unknown polarity for ${entry.category}: ${entry.polarity}` });
      continue;
    }
    if (seenCategories.has(entry.category)) {
      errors.push({ field: 'interests', message: `${entry.category} appears more than once` });
      continue;
    }
    seenCategories.add(entry.category);
    interests.push({ category: entry.category, polarity: entry.polarity });
  }

  const vibes: VibeTag[] = [];
  for (const vibe of input.vibes ?? []) {
    if (!isMemberOf(VIBE_TAGS, vibe)) {
      errors.push({ field: 'vibes', message: `unknown vibe tag: ${vibe}` });
    } else if (vibes.includes(vibe)) {
      errors.push({ field: 'vibes', message: `${vibe} appears more than once` });
    } else {
      vibes.push(vibe);
    }
  }
  if (vibes.length === 0 || vibes.length > MAX_VIBES) {
    errors.push({ field: 'vibes', message: `between 1 and ${MAX_VIBES} vibes are required` });
  }

  const { primary, secondary } = input.loveLanguages ?? { primary: '', secondary: '' };
  let loveLanguages: LoveLanguagePair | null = null;
  if (!isMemberOf(LOVE_LANGUAGES, primary)) {
    errors.push({ field: 'loveLanguages.primary', message: `unknown love language: ${primary}` });
  } else if (!isMemberOf(LOVE_LANGUAGES, secondary)) {
    errors.push({ field: 'loveLanguages.secondary', message: `unknown love language: ${secondary}` });
  } else if (primary === secondary) {
    errors.push({ field: 'loveLanguages', message: 'primary and secondary love languages must differ' });
  } else {
    loveLanguages = { primary, secondary };
  }

  const budgets: BudgetRange[] = [];
  for (const budget of input.budgets ?? []) {
    if (!isMemberOf(BUDGET_TIERS, budget.tier)) {
      errors.push({ field: 'budgets', message: `unknown budget tier: ${budget.tier}` });
      continue;
    }
    if (budgets.some((b) => b.tier === budget.tier)) {
      errors.push({ field: 'budgets', message: `more than one budget for ${budget.tier}` });
      continue;
    }
    if (
      !Number.isInteger(budget.minAmount) ||
      !Number.isInteger(budget.maxAmount) ||
      budget.minAmount < 0 ||
      budget.maxAmount < budget.minAmount
    ) {
      errors.push({ field: 'budgets', message: `${budget.tier} requires max >= min >= 0` });
      continue;
    }
    budgets.push({
      tier: budget.tier,
      minAmount: budget.minAmount,
      maxAmount: budget.maxAmount,
      currency: budget.currency ?? 'USD',
    });
  }

  const milestones: MilestoneDraft[] = [];
  (input.milestones ?? []).forEach((milestone, index) => {
    const validated = validateMilestone(milestone, `milestones[${index}]`);
    if (validated.isValid) {
      milestones.push(validated.value);
    } else {
      errors.push(...validated.errors);
    }
  });

  if (errors.length > 0 || loveLanguages === null) {
    return { isValid: false, errors };
  }

  return result(
    {
      userId: input.userId,
      partnerName: input.partnerName.trim(),
      relationshipTenureMonths: input.relationshipTenureMonths,
      cohabitationStatus,
      location: input.location ?? {},
      interests,
      vibes,
      loveLanguages,
      budgets,
      milestones,
    },
    errors
  );
}

export function validateUserSettings(input: UserSettingsInput): ValidationResult<UserSettingsPatch> {
  const errors: FieldError[] = [];
  const patch: UserSettingsPatch = {};

  if (input.timezone !== undefined) {
    if (input.timezone === null || isValidTimeZone(input.timezone)) {
      patch.timezone = input.timezone;
    } else {
      errors.push({ field: 'timezone', message: `unknown IANA time zone: ${input.timezone}` });
    }
  }

  if (input.quietHoursStart !== undefined) {
    if (isHour(input.quietHoursStart)) {
      patch.quietHoursStart = input.quietHoursStart;
    } else {
      errors.push({ field: 'quietHoursStart', message: 'must be an integer hour between 0 and 23' });
    }
  }

  if (input.quietHoursEnd !== undefined) {
    if (isHour(input.quietHoursEnd)) {
      patch.quietHoursEnd = input.quietHoursEnd;
    } else {
      errors.push({ field: 'quietHoursEnd', message: 'must be an integer hour between 0 and 23' });
    }
  }

  if (input.notificationsEnabled !== undefined) {
    if (typeof input.notificationsEnabled === 'boolean') {
      patch.notificationsEnabled = input.notificationsEnabled;
    } else {
      errors.push({ field: 'notificationsEnabled', message: 'must be a boolean' });
    }
  }

  if (input.deviceToken !== undefined) {
    if (input.deviceToken === null || !isBlank(input.deviceToken)) {
      patch.deviceToken = input.deviceToken;
    } else {
      errors.push({ field: 'deviceToken', message: 'must be a non-empty string or null' });
    }
  }

  if (input.devicePlatform !== undefined) {
    if (input.devicePlatform === null || isMemberOf(DEVICE_PLATFORMS, input.devicePlatform)) {
      patch.devicePlatform = input.devicePlatform;
    } else {
      errors.push({ field: 'devicePlatform', message: `unknown platform: ${input.devicePlatform}` });
    }
  }

  if (patch.deviceToken && input.devicePlatform === undefined) {
    errors.push({ field: 'devicePlatform', message: 'devicePlatform is required with deviceToken' });
  }

  return result(patch, errors);
}

export function validateFeedback(input: FeedbackInput): ValidationResult<FeedbackDraft> {
  const errors: FieldError[] = [];

  if (isBlank(input.recommendationId)) {
    errors.push({ field: 'recommendationId', message: 'recommendationId is required' });
  }
  if (isBlank(input.userId)) {
    errors.push({ field: 'userId', message: 'userId is required' });
  }

  const action = input.action;
  if (!isMemberOf(FEEDBACK_ACTIONS, action)) {
    errors.push({ field: 'action', message: `unknown feedback action: ${String(action)}` });
    return { isValid: false, errors };
  }

  if (action === 'rated') {
    if (
      input.rating === undefined ||
      !Number.isInteger(input.rating) ||
      input.rating < 1 ||
      input.rating > 5
    ) {
      errors.push({ field: 'rating', message: 'rating between 1 and 5 is required for rated feedback' });
    }
  } else if (input.rating !== undefined) {
    errors.push({ field: 'rating', message: 'rating is only allowed for rated feedback' });
  }

  if (input.feedbackText !== undefined && input.feedbackText.length > MAX_FEEDBACK_TEXT_LENGTH) {
    errors.push({ field: 'feedbackText', message: `exceeds ${MAX_FEEDBACK_TEXT_LENGTH} characters` });
  }

  return result(
    {
      recommendationId: input.recommendationId,
      userId: input.userId,
      action,
      rating: input.rating,
      feedbackText: input.feedbackText,
    },
    errors
  );
}

export function validateHint(input: HintInput): ValidationResult<HintDraft> {
  const errors: FieldError[] = [];
  const text = typeof input.text === 'string' ? input.text.trim() : '';

  if (isBlank(input.vaultId)) {
    errors.push({ field: 'vaultId', message: 'vaultId is required' });
  }
  if (text.length === 0) {
    errors.push({ field: 'text', message: 'hint text is required' });
  } else if (text.length > MAX_HINT_LENGTH) {
    errors.push({ field: 'text', message: `hint text exceeds ${MAX_HINT_LENGTH} characters` });
  }

  let source: HintSource = 'text_input';
  if (input.source !== undefined) {
    if (isMemberOf(HINT_SOURCES, input.source)) {
      source = input.source;
    } else {
      errors.push({ field: 'source', message: `unknown hint source: ${input.source}` });
    }
  }

  return result({ vaultId: input.vaultId, text, source }, errors);
}
