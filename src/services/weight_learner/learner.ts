/**
 * @file Pure weight computation: feedback history in, bounded multipliers out.
 *
 * Each run replaces the whole snapshot, so the result depends only on the
 * feedback given to it.
 */

import type { FeedbackDocument, RecommendationDocument } from '../../models/recommendation';
import { inferInterests, inferLoveLanguages, inferVibes } from '../../models/attributes';
import { InvariantViolationError } from '../../utils/errors';
import {
  MAX_MULTIPLIER,
  MIN_MULTIPLIER,
  NEUTRAL_MULTIPLIER,
  type LearnerConfig,
  type PreferenceWeightsDocument,
  type SignalCounts,
  type WeightDimension,
  type WeightMap,
} from './models';

export type Signal = 'positive' | 'negative';

const WEIGHT_DIMENSIONS: readonly WeightDimension[] = ['vibe', 'interest', 'type', 'loveLanguage'];

export interface FeedbackEvent {
  feedback: FeedbackDocument;
  recommendation: RecommendationDocument;
}

/**
 * selected/saved/shared/purchased and ratings of 4+ are positive; refreshed and
 * ratings of 2 or less are negative. handoff and a rating of 3 carry no signal.
 */
export function signalOf(feedback: Pick<FeedbackDocument, 'action' | 'rating'>): Signal | null {
  switch (feedback.action) {
    case 'selected':
    case 'saved':
    case 'shared':
    case 'purchased':
      return 'positive';
    case 'refreshed':
      return 'negative';
    case 'rated':
      if (feedback.rating === undefined) return null;
      if (feedback.rating >= 4) return 'positive';
      if (feedback.rating <= 2) return 'negative';
      return null;
    case 'handoff':
      return null;
  }
}

export function clampMultiplier(value: number): number {
  return Math.min(MAX_MULTIPLIER, Math.max(MIN_MULTIPLIER, value));
}

/**
 * 1 + k(p - n) / (p + n + smoothing), clamped to [0.5, 2.0].
 */
export function computeMultiplier(counts: SignalCounts, config: LearnerConfig): number {
  const { positive, negative } = counts;
  const denominator = positive + negative + config.smoothing;
  if (denominator <= 0) return NEUTRAL_MULTIPLIER;
  return clampMultiplier(1 + (config.sensitivity * (positive - negative)) / denominator);
}

/**
 * Dimension values a recommendation carries. Recommendations stored without
 * attached values fall back to keyword inference over their text.
 */
export function dimensionValues(recommendation: RecommendationDocument): Record<WeightDimension, string[]> {
  const text = `${recommendation.title} ${recommendation.description ?? ''}`;
  return {
    interest:
      recommendation.matchedInterests.length > 0 ? recommendation.matchedInterests : inferInterests(text),
    vibe: recommendation.matchedVibes.length > 0 ? recommendation.matchedVibes : inferVibes(text),
    loveLanguage:
      recommendation.matchedLoveLanguages.length > 0
        ? recommendation.matchedLoveLanguages
        : inferLoveLanguages(recommendation.type, text),
    type: [recommendation.type],
  };
}

function tally(events: FeedbackEvent[]): Record<WeightDimension, Map<string, SignalCounts>> {
  const counts: Record<WeightDimension, Map<string, SignalCounts>> = {
    vibe: new Map(),
    interest: new Map(),
    type: new Map(),
    loveLanguage: new Map(),
  };

  for (const { feedback, recommendation } of events) {
    const signal = signalOf(feedback);
    if (!signal) continue;

    const values = dimensionValues(recommendation);
    for (const dimension of WEIGHT_DIMENSIONS) {
      for (const value of new Set(values[dimension])) {
        const entry = counts[dimension].get(value) ?? { positive: 0, negative: 0 };
        entry[signal] += 1;
        counts[dimension].set(value, entry);
      }
    }
  }
  return counts;
}

function toWeightMap(counts: Map<string, SignalCounts>, config: LearnerConfig): WeightMap {
  const weights: WeightMap = {};
  const keys = Array.from(counts.keys()).sort();
  for (const key of keys) {
    const entry = counts.get(key);
    // Values never observed with a signal stay out of the map (neutral)
    if (!entry || entry.positive + entry.negative === 0) continue;

    const multiplier = computeMultiplier(entry, config);
    if (!Number.isFinite(multiplier) || multiplier < MIN_MULTIPLIER || multiplier > MAX_MULTIPLIER) {
      throw new InvariantViolationError(`Multiplier for ${key} out of bounds: ${multiplier}`);
    }
    weights[key] = multiplier;
  }
  return weights;
}

/**
 * Build a complete snapshot from one user's feedback history.
 */
export function learnWeights(
  userId: string,
  events: FeedbackEvent[],
  config: LearnerConfig,
  analyzedAt: Date
): PreferenceWeightsDocument {
  const counts = tally(events);
  return {
    userId,
    vibeWeights: toWeightMap(counts.vibe, config),
    interestWeights: toWeightMap(counts.interest, config),
    typeWeights: toWeightMap(counts.type, config),
    loveLanguageWeights: toWeightMap(counts.loveLanguage, config),
    feedbackCount: events.length,
    lastAnalyzedAt: analyzedAt.toISOString(),
  };
}

/**
 * Multiplier lookup where a missing value is neutral.
 */
export function weightOf(weights: WeightMap | undefined, value: string): number {
  return weights?.[value] ?? NEUTRAL_MULTIPLIER;
}
