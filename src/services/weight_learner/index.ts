/**
 * @file Preference Weight Learner
 *
 * Periodically folds each user's feedback history into a fresh snapshot of
 * per-dimension multipliers. The write is guarded by compare-and-swap on
 * `lastAnalyzedAt`, so of two concurrent runs for the same user only the newer
 * snapshot is kept. Scoring reads whatever snapshot is committed and never
 * waits on a run.
 */

import { EventEmitter } from 'events';
import { logger, errorMessage, shortId } from '../../utils/logger';
import { ConcurrencyConflictError } from '../../utils/errors';
import type { FeedbackStore, RecommendationStore } from '../recommendation_store/models';
import { learnWeights, type FeedbackEvent } from './learner';
import {
  DEFAULT_LEARNER_CONFIG,
  type AnalysisResult,
  type LearnerConfig,
  type PreferenceWeightsDocument,
  type WeightStore,
} from './models';

export * from './models';
export { computeMultiplier, signalOf, weightOf, learnWeights } from './learner';

export interface WeightLearnerDeps {
  weights: WeightStore;
  feedback: FeedbackStore;
  recommendations: RecommendationStore;
}

export class WeightLearner {
  readonly config: LearnerConfig;

  constructor(
    private readonly deps: WeightLearnerDeps,
    config: Partial<LearnerConfig> = {}
  ) {
    this.config = { ...DEFAULT_LEARNER_CONFIG, ...config };
  }

  /**
   * Latest committed snapshot, or null before the first run.
   */
  async getWeights(userId: string): Promise<PreferenceWeightsDocument | null> {
    return this.deps.weights.get(userId);
  }

  /**
   * Recompute and store one user's snapshot. Returns null when the user has no
   * feedback. Throws ConcurrencyConflictError when a newer snapshot won.
   */
  async analyzeUser(userId: string, now: Date = new Date()): Promise<PreferenceWeightsDocument | null> {
    const feedback = await this.deps.feedback.listByUser(userId);
    if (feedback.length === 0) {
      return null;
    }

    const recommendationIds = Array.from(new Set(feedback.map((f) => f.recommendationId)));
    const recommendations = new Map(
      (await this.deps.recommendations.findByIds(recommendationIds)).map((r) => [r.recommendationId, r])
    );

    const events: FeedbackEvent[] = [];
    for (const entry of feedback) {
      const recommendation = recommendations.get(entry.recommendationId);
      if (recommendation) {
        events.push({ feedback: entry, recommendation });
      }
    }
    if (events.length < feedback.length) {
      logger.debug(
        `[WeightLearner] ${feedback.length - events.length} feedback rows for ${shortId(userId)} reference missing recommendations`
      );
    }

    const snapshot = learnWeights(userId, events, this.config, now);
    await this.deps.weights.replace(snapshot);

    logger.info(
      `[WeightLearner] Updated weights for ${shortId(userId)} from ${snapshot.feedbackCount} feedback events`
    );
    return snapshot;
  }

  /**
   * Analyse one user, or every user with feedback. Failures for one user are
   * logged and counted without stopping the batch.
   */
  async runFeedbackAnalysis(targetUserId?: string): Promise<AnalysisResult> {
    const userIds = targetUserId ? [targetUserId] : await this.deps.feedback.usersWithFeedback();
    if (userIds.length === 0) {
      return { status: 'no_feedback', usersAnalyzed: 0, message: 'No feedback to analyze' };
    }

    let analyzed = 0;
    let failed = 0;
    for (const userId of userIds) {
      try {
        const snapshot = await this.analyzeUser(userId);
        if (snapshot) analyzed++;
      } catch (error) {
        if (error instanceof ConcurrencyConflictError) {
          logger.info(`[WeightLearner] Newer snapshot already stored for ${shortId(userId)}`);
          continue;
        }
        failed++;
        logger.error(`[WeightLearner] Analysis failed for ${shortId(userId)}: ${errorMessage(error)}`);
      }
    }

    if (analyzed === 0 && failed === 0) {
      return { status: 'no_feedback', usersAnalyzed: 0, message: 'No feedback to analyze' };
    }
    if (failed > 0) {
      return {
        status: 'completed_with_errors',
        usersAnalyzed: analyzed,
        message: `Analyzed ${analyzed} users, ${failed} failed`,
      };
    }
    return { status: 'completed', usersAnalyzed: analyzed, message: `Analyzed ${analyzed} users` };
  }
}

/**
 * Periodic wrapper around runFeedbackAnalysis. A run still in progress when the
 * next interval fires is not overlapped.
 */
export class FeedbackAnalysisJob extends EventEmitter {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly learner: WeightLearner,
    private readonly intervalMs: number
  ) {
    super();
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      logger.warn('[FeedbackAnalysisJob] Already running');
      return;
    }
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    logger.info(`[FeedbackAnalysisJob] Started, every ${Math.round(this.intervalMs / 3_600_000)}h`);
    this.emit('started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info('[FeedbackAnalysisJob] Stopped');
    this.emit('stopped');
  }

  /**
   * Returns null when a run was already in progress.
   */
  async runOnce(): Promise<AnalysisResult | null> {
    if (this.running) {
      logger.warn('[FeedbackAnalysisJob] Previous run still in progress, skipping');
      return null;
    }
    this.running = true;
    try {
      const result = await this.learner.runFeedbackAnalysis();
      this.emit('completed', result);
      return result;
    } catch (error) {
      logger.error(`[FeedbackAnalysisJob] Run failed: ${errorMessage(error)}`);
      this.emit('failed', error);
      return null;
    } finally {
      this.running = false;
    }
  }
}
