/**
 * @file Wires stores, collaborators and services from configuration.
 */

import type { Db } from 'mongodb';
import type { AppConfig } from './config';
import { collections, setupCoreDatabase } from './config/database';
import { logger, errorMessage } from './utils/logger';
import { EmbeddingStore } from './services/embedding_store';
import { MongoHintStore } from './services/embedding_store/hint_store';
import { EmbeddingServiceClient } from './services/embedding_store/embedding_client';
import { HintService } from './services/embedding_store/hint_service';
import { MongoFeedbackStore, MongoRecommendationStore } from './services/recommendation_store';
import { FeedbackAnalysisJob, WeightLearner } from './services/weight_learner';
import { MongoWeightStore } from './services/weight_learner/weight_store';
import { CatalogCandidateSource, RecommendationService } from './services/recommendation_scorer';
import {
  DeliveryWorker,
  MongoNotificationStore,
  NotificationScheduler,
  PushGatewayTransport,
} from './services/notification_scheduler';
import { MongoUserSettingsStore, MongoVaultStore, VaultService } from './services/vault_service';

export interface Core {
  embeddings: EmbeddingStore;
  hints: HintService;
  learner: WeightLearner;
  learnerJob: FeedbackAnalysisJob;
  recommendations: RecommendationService;
  scheduler: NotificationScheduler;
  worker: DeliveryWorker;
  vaults: VaultService;
}

/**
 * Ensure collections and indexes, then build every service.
 */
export async function initializeCore(config: AppConfig, db: Db): Promise<Core> {
  await setupCoreDatabase(db);

  const vaultStore = new MongoVaultStore(collections.vaults());
  const settingsStore = new MongoUserSettingsStore(collections.userSettings());
  const notificationStore = new MongoNotificationStore(collections.notifications());
  const recommendationStore = new MongoRecommendationStore(collections.recommendations());
  const feedbackStore = new MongoFeedbackStore(collections.feedback());
  const weightStore = new MongoWeightStore(collections.preferenceWeights());

  const embeddings = new EmbeddingStore(new MongoHintStore(collections.hints()), {
    dimension: config.embedding.dimension,
    ...config.ann,
  });
  const hints = new HintService(
    embeddings,
    new EmbeddingServiceClient({
      baseUrl: config.embedding.serviceUrl,
      timeoutMs: config.embedding.timeoutMs,
      dimension: config.embedding.dimension,
    })
  );

  const learner = new WeightLearner(
    { weights: weightStore, feedback: feedbackStore, recommendations: recommendationStore },
    { sensitivity: config.learner.sensitivity, smoothing: config.learner.smoothing }
  );
  const candidates = new CatalogCandidateSource();

  const recommendations = new RecommendationService(
    {
      vaults: vaultStore,
      weights: weightStore,
      embeddings,
      recommendations: recommendationStore,
      feedback: feedbackStore,
      candidates,
    },
    {
      hintSimilarityThreshold: config.scorer.hintSimilarityThreshold,
      contextualBonus: config.scorer.contextualBonus,
    }
  );

  const scheduler = new NotificationScheduler(
    {
      notifications: notificationStore,
      vaults: vaultStore,
      settings: settingsStore,
      recommendations: recommendationStore,
      transport: new PushGatewayTransport({ baseUrl: config.push.gatewayUrl, timeoutMs: config.push.timeoutMs }),
      recommender: recommendations,
      candidates,
    },
    {
      sendHour: config.scheduler.sendHour,
      defaultTimezone: config.scheduler.defaultTimezone,
      pushTimeoutMs: config.push.timeoutMs,
      claimTimeoutMs: config.scheduler.claimTimeoutMs,
    }
  );

  const worker = new DeliveryWorker(scheduler, {
    tickMs: config.scheduler.deliveryTickMs,
    schedulingPassMs: config.scheduler.schedulingPassMs,
    concurrency: config.scheduler.deliveryConcurrency,
  });

  const vaults = new VaultService({
    vaults: vaultStore,
    settings: settingsStore,
    scheduler,
    hints,
    embeddings,
    notifications: notificationStore,
    recommendations: recommendationStore,
    feedback: feedbackStore,
    weights: weightStore,
  });

  logger.info('[Startup] Core services initialized');
  return {
    embeddings,
    hints,
    learner,
    learnerJob: new FeedbackAnalysisJob(learner, config.learner.intervalMs),
    recommendations,
    scheduler,
    worker,
    vaults,
  };
}

/**
 * Start periodic work. The first scheduling pass and embedding backfill run
 * immediately.
 */
export async function startBackgroundWork(core: Core): Promise<void> {
  core.worker.start();
  core.learnerJob.start();

  await core.worker.schedulingPass();
  try {
    await core.hints.backfillEmbeddings();
  } catch (error) {
    logger.warn(`[Startup] Embedding backfill failed: ${errorMessage(error)}`);
  }
}

export function stopBackgroundWork(core: Core): void {
  core.worker.stop();
  core.learnerJob.stop();
}
