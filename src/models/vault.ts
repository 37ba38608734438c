/**
 * @file Vault aggregate: one partner profile per user and everything it owns
 * by value (interests, vibes, love languages, budgets, milestones).
 */

import catalog from '../data/catalog.json';

// =============================================================================
// CLOSED ENUMERATIONS
// =============================================================================

export const INTEREST_CATEGORIES: readonly string[] = catalog.interestCategories;

export const VIBE_TAGS = [
  'quiet_luxury',
  'street_urban',
  'outdoorsy',
  'vintage',
  'minimalist',
  'bohemian',
  'romantic',
  'adventurous',
] as const;
export type VibeTag = (typeof VIBE_TAGS)[number];

export const LOVE_LANGUAGES = [
  'words_of_affirmation',
  'acts_of_service',
  'receiving_gifts',
  'quality_time',
  'physical_touch',
] as const;
export type LoveLanguage = (typeof LOVE_LANGUAGES)[number];

export const BUDGET_TIERS = ['just_because', 'minor_occasion', 'major_milestone'] as const;
export type BudgetTier = (typeof BUDGET_TIERS)[number];

export const MILESTONE_TYPES = ['birthday', 'anniversary', 'holiday', 'custom'] as const;
export type MilestoneType = (typeof MILESTONE_TYPES)[number];

export const RECURRENCES = ['yearly', 'one_time'] as const;
export type Recurrence = (typeof RECURRENCES)[number];

export const COHABITATION_STATUSES = ['living_together', 'separate', 'long_distance'] as const;
export type CohabitationStatus = (typeof COHABITATION_STATUSES)[number];

export type InterestPolarity = 'like' | 'dislike';

/**
 * Narrow a string to a member of a closed enumeration.
 */
export function isMemberOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some((member) => member === value);
}

// =============================================================================
// DOCUMENTS
// =============================================================================

export interface InterestEntry {
  category: string;
  polarity: InterestPolarity;
}

export interface BudgetRange {
  tier: BudgetTier;
  /** Whole currency units */
  minAmount: number;
  maxAmount: number;
  currency: string;
}

export interface LoveLanguagePair {
  primary: LoveLanguage;
  secondary: LoveLanguage;
}

export interface Milestone {
  milestoneId: string;
  name: string;
  type: MilestoneType;
  /** YYYY-MM-DD. For yearly milestones only month and day are significant. */
  date: string;
  recurrence: Recurrence;
  budgetTier: BudgetTier;
  /** Bumped whenever date, recurrence or name change; scopes notification keys. */
  revision: number;
  createdAt: string;
  updatedAt: string;
}

export interface VaultLocation {
  city?: string;
  state?: string;
  country?: string;
}

export interface VaultDocument {
  vaultId: string;
  /** Unique: exactly one vault per user */
  userId: string;
  partnerName: string;
  relationshipTenureMonths?: number;
  cohabitationStatus?: CohabitationStatus;
  location: VaultLocation;
  interests: InterestEntry[];
  vibes: VibeTag[];
  loveLanguages: LoveLanguagePair;
  budgets: BudgetRange[];
  milestones: Milestone[];
  /** Incremented on every write; replacements are conditional on it */
  version: number;
  createdAt: string;
  updatedAt: string;
}

// =============================================================================
// DERIVED VALUES
// =============================================================================

/**
 * Budget tier a milestone gets when none is given.
 * Custom milestones have no default and must name a tier.
 */
export function deriveDefaults(milestoneType: MilestoneType): BudgetTier | null {
  switch (milestoneType) {
    case 'birthday':
    case 'anniversary':
      return 'major_milestone';
    case 'holiday':
      return 'minor_occasion';
    case 'custom':
      return null;
  }
}

export function likesOf(vault: Pick<VaultDocument, 'interests'>): string[] {
  return vault.interests.filter((i) => i.polarity === 'like').map((i) => i.category);
}

export function dislikesOf(vault: Pick<VaultDocument, 'interests'>): string[] {
  return vault.interests.filter((i) => i.polarity === 'dislike').map((i) => i.category);
}

export function budgetFor(
  vault: Pick<VaultDocument, 'budgets'>,
  tier: BudgetTier
): BudgetRange | undefined {
  return vault.budgets.find((b) => b.tier === tier);
}
