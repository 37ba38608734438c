/**
 * @file Persistence seams for generated recommendations and their feedback.
 */

import type { FeedbackDocument, RecommendationDocument } from '../../models/recommendation';

export interface RecommendationStore {
  insertMany(recommendations: RecommendationDocument[]): Promise<void>;
  findById(recommendationId: string): Promise<RecommendationDocument | null>;
  findByIds(recommendationIds: string[]): Promise<RecommendationDocument[]>;
  /** Linked recommendation count per notification id */
  countByNotification(notificationIds: string[]): Promise<Map<string, number>>;
  deleteByVault(vaultId: string): Promise<number>;
}

/**
 * Append-only: there is no update.
 */
export interface FeedbackStore {
  append(feedback: FeedbackDocument): Promise<void>;
  /** Oldest first */
  listByUser(userId: string): Promise<FeedbackDocument[]>;
  usersWithFeedback(): Promise<string[]>;
  deleteByUser(userId: string): Promise<number>;
}
