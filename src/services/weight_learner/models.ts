/**
 * @file Preference weight snapshot and learner configuration.
 */

export type WeightMap = Record<string, number>;

export const MIN_MULTIPLIER = 0.5;
export const MAX_MULTIPLIER = 2.0;
export const NEUTRAL_MULTIPLIER = 1.0;

/**
 * One immutable snapshot per learner run. `lastAnalyzedAt` identifies it and
 * guards the replace-write.
 */
export interface PreferenceWeightsDocument {
  userId: string;
  vibeWeights: WeightMap;
  interestWeights: WeightMap;
  typeWeights: WeightMap;
  loveLanguageWeights: WeightMap;
  feedbackCount: number;
  lastAnalyzedAt: string;
}

export type WeightDimension = 'vibe' | 'interest' | 'type' | 'loveLanguage';

export interface SignalCounts {
  positive: number;
  negative: number;
}

export interface LearnerConfig {
  /** k in 1 + k * (p - n) / (p + n + smoothing) */
  sensitivity: number;
  smoothing: number;
}

export const DEFAULT_LEARNER_CONFIG: LearnerConfig = {
  sensitivity: 1.0,
  smoothing: 3,
};

export interface AnalysisResult {
  status: 'completed' | 'completed_with_errors' | 'no_feedback';
  usersAnalyzed: number;
  message: string;
}

export interface WeightStore {
  get(userId: string): Promise<PreferenceWeightsDocument | null>;
  /**
   * Replace the user's snapshot unless a newer one is stored.
   * Throws ConcurrencyConflictError when the write loses.
   */
  replace(snapshot: PreferenceWeightsDocument): Promise<void>;
  delete(userId: string): Promise<boolean>;
}
