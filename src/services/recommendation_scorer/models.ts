/**
 * @file Scorer inputs, outputs and configuration.
 */

import type { RecommendationScores, RecommendationType } from '../../models/recommendation';
import type { BudgetTier, LoveLanguage, VibeTag } from '../../models/vault';

/**
 * A catalog item offered to the scorer. Attribute tags are optional; missing
 * tags are inferred from text.
 */
export interface Candidate {
  candidateId: string;
  type: RecommendationType;
  title: string;
  description?: string;
  externalUrl?: string;
  priceCents?: number;
  merchantName?: string;
  interests?: string[];
  vibes?: VibeTag[];
  loveLanguages?: LoveLanguage[];
  /** Embedding of the description, for contextual hint matching */
  embedding?: number[] | null;
}

export interface CandidateRequest {
  vaultId: string;
  milestoneId: string | null;
  limit: number;
  /** Candidate ids the caller already rejected */
  excludeCandidateIds?: string[];
}

/**
 * External catalog of recommendation candidates.
 */
export interface CandidateSource {
  candidatesFor(request: CandidateRequest): Promise<Candidate[]>;
}

export interface DimensionCoefficients {
  interest: number;
  vibe: number;
  loveLanguage: number;
}

export interface ScorerConfig {
  /** Must sum to 1 */
  coefficients: DimensionCoefficients;
  /** A hint boosts a candidate when similarity exceeds this */
  hintSimilarityThreshold: number;
  contextualBonus: number;
  /** Hints considered per candidate */
  hintsPerCandidate: number;
}

export const DEFAULT_SCORER_CONFIG: ScorerConfig = {
  coefficients: { interest: 0.5, vibe: 0.25, loveLanguage: 0.25 },
  hintSimilarityThreshold: 0.75,
  contextualBonus: 0.1,
  hintsPerCandidate: 5,
};

export interface ScoringOptions {
  /** Occasion tier whose budget range filters candidates by price */
  budgetTier?: BudgetTier | null;
  /** Replaces the vault vibes for this call only */
  vibeOverride?: VibeTag[];
}

export interface ScoredCandidate {
  candidate: Candidate;
  scores: RecommendationScores;
  matchedInterests: string[];
  matchedVibes: VibeTag[];
  matchedLoveLanguages: LoveLanguage[];
  /** Unused hints that earned the contextual bonus */
  hintIds: string[];
}

export type ExclusionReason = 'dislike' | 'budget';

export interface ExcludedCandidate {
  candidateId: string;
  reason: ExclusionReason;
}

export interface RankingResult {
  ranked: ScoredCandidate[];
  excluded: ExcludedCandidate[];
}
