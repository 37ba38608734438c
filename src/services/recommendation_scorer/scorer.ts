/**
 * @file Pure candidate scoring and ranking. No I/O and no side effects: the
 * same inputs always produce the same ranking.
 */

import { resolveAttributes } from '../../models/attributes';
import {
  budgetFor,
  dislikesOf,
  likesOf,
  type BudgetTier,
  type VaultDocument,
  type VibeTag,
} from '../../models/vault';
import type { WeightMap, PreferenceWeightsDocument } from '../weight_learner/models';
import { weightOf } from '../weight_learner/learner';
import type {
  Candidate,
  ExcludedCandidate,
  RankingResult,
  ScoredCandidate,
  ScorerConfig,
} from './models';

/** Love-language matches are out of a primary and a secondary. */
const MAX_LOVE_LANGUAGE_MATCHES = 2;

export type ScoringVault = Pick<VaultDocument, 'interests' | 'vibes' | 'loveLanguages' | 'budgets'>;

export interface ScoringContext {
  vault: ScoringVault;
  weights: PreferenceWeightsDocument | null;
  budgetTier?: BudgetTier | null;
  vibeOverride?: VibeTag[];
  /** candidateId -> ids of unused hints above the similarity threshold */
  hintMatches?: Map<string, string[]>;
}

/**
 * Sum of weights over matched values, divided by the number of values that
 * could have matched, capped at 1.
 */
export function dimensionScore(matched: readonly string[], maxMatches: number, weights?: WeightMap): number {
  if (maxMatches <= 0 || matched.length === 0) return 0;
  const total = matched.reduce((sum, value) => sum + weightOf(weights, value), 0);
  return Math.min(1, total / maxMatches);
}

function withinBudget(candidate: Candidate, context: ScoringContext): boolean {
  if (!context.budgetTier || candidate.priceCents === undefined) return true;
  const range = budgetFor(context.vault, context.budgetTier);
  if (!range) return true;
  return candidate.priceCents >= range.minAmount * 100 && candidate.priceCents <= range.maxAmount * 100;
}

export function scoreCandidate(
  candidate: Candidate,
  context: ScoringContext,
  config: ScorerConfig
): ScoredCandidate | ExcludedCandidate {
  const attributes = resolveAttributes(candidate);

  // Dislikes veto outright
  const dislikes = new Set(dislikesOf(context.vault));
  if (attributes.interests.some((interest) => dislikes.has(interest))) {
    return { candidateId: candidate.candidateId, reason: 'dislike' };
  }
  if (!withinBudget(candidate, context)) {
    return { candidateId: candidate.candidateId, reason: 'budget' };
  }

  const likes = likesOf(context.vault);
  const vibes = context.vibeOverride && context.vibeOverride.length > 0 ? context.vibeOverride : context.vault.vibes;
  const { primary, secondary } = context.vault.loveLanguages;

  const matchedInterests = attributes.interests.filter((interest) => likes.includes(interest));
  const matchedVibes = attributes.vibes.filter((vibe) => vibes.includes(vibe));
  const matchedLoveLanguages = attributes.loveLanguages.filter(
    (language) => language === primary || language === secondary
  );

  const weights = context.weights;
  const interest = dimensionScore(matchedInterests, likes.length, weights?.interestWeights);
  const vibe = dimensionScore(matchedVibes, vibes.length, weights?.vibeWeights);
  const loveLanguage = dimensionScore(
    matchedLoveLanguages,
    MAX_LOVE_LANGUAGE_MATCHES,
    weights?.loveLanguageWeights
  );

  const { coefficients } = config;
  const composite =
    coefficients.interest * interest + coefficients.vibe * vibe + coefficients.loveLanguage * loveLanguage;
  const typeMultiplier = weightOf(weights?.typeWeights, candidate.type);

  const hintIds = context.hintMatches?.get(candidate.candidateId) ?? [];
  const contextualBonus = hintIds.length > 0 ? config.contextualBonus : 0;

  return {
    candidate,
    scores: {
      interest,
      vibe,
      loveLanguage,
      typeMultiplier,
      contextualBonus,
      final: composite * typeMultiplier + contextualBonus,
    },
    matchedInterests,
    matchedVibes,
    matchedLoveLanguages,
    hintIds,
  };
}

function isExcluded(result: ScoredCandidate | ExcludedCandidate): result is ExcludedCandidate {
  return 'reason' in result;
}

/**
 * Final score descending, then love-language score descending, then candidate
 * id ascending.
 */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.scores.final !== b.scores.final) return b.scores.final - a.scores.final;
  if (a.scores.loveLanguage !== b.scores.loveLanguage) return b.scores.loveLanguage - a.scores.loveLanguage;
  const idA = a.candidate.candidateId;
  const idB = b.candidate.candidateId;
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}

export function rankCandidates(
  candidates: readonly Candidate[],
  context: ScoringContext,
  config: ScorerConfig
): RankingResult {
  const ranked: ScoredCandidate[] = [];
  const excluded: ExcludedCandidate[] = [];

  for (const candidate of candidates) {
    const result = scoreCandidate(candidate, context, config);
    if (isExcluded(result)) {
      excluded.push(result);
    } else {
      ranked.push(result);
    }
  }

  ranked.sort(compareScored);
  return { ranked, excluded };
}
