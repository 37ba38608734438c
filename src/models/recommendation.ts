/**
 * @file Generated recommendations and the append-only feedback that refers to them.
 */

import type { LoveLanguage, VibeTag } from './vault';

export const RECOMMENDATION_TYPES = ['gift', 'experience', 'date', 'idea'] as const;
export type RecommendationType = (typeof RECOMMENDATION_TYPES)[number];

export const FEEDBACK_ACTIONS = [
  'selected',
  'refreshed',
  'saved',
  'shared',
  'rated',
  'handoff',
  'purchased',
] as const;
export type FeedbackAction = (typeof FEEDBACK_ACTIONS)[number];

export interface RecommendationScores {
  interest: number;
  vibe: number;
  loveLanguage: number;
  typeMultiplier: number;
  contextualBonus: number;
  final: number;
}

/**
 * Immutable after creation.
 */
export interface RecommendationDocument {
  recommendationId: string;
  vaultId: string;
  userId: string;
  milestoneId: string | null;
  notificationId: string | null;
  /** Catalog id of the candidate this was generated from */
  candidateId: string;
  type: RecommendationType;
  title: string;
  description?: string;
  externalUrl?: string;
  priceCents?: number;
  merchantName?: string;
  scores: RecommendationScores;
  matchedInterests: string[];
  matchedVibes: VibeTag[];
  matchedLoveLanguages: LoveLanguage[];
  /** Hints whose similarity boosted this recommendation */
  hintIds: string[];
  createdAt: string;
}

/**
 * Append-only.
 */
export interface FeedbackDocument {
  feedbackId: string;
  recommendationId: string;
  userId: string;
  action: FeedbackAction;
  /** 1-5, present only for `rated` */
  rating?: number;
  feedbackText?: string;
  createdAt: string;
}
