/**
 * @file MongoDB-backed recommendation and feedback stores.
 */

import type { Collection } from 'mongodb';
import type { FeedbackDocument, RecommendationDocument } from '../../models/recommendation';
import type { FeedbackStore, RecommendationStore } from './models';

export * from './models';

export class MongoRecommendationStore implements RecommendationStore {
  constructor(private readonly collection: Collection<RecommendationDocument>) {}

  async insertMany(recommendations: RecommendationDocument[]): Promise<void> {
    if (recommendations.length === 0) return;
    await this.collection.insertMany(recommendations.map((r) => ({ ...r })));
  }

  async findById(recommendationId: string): Promise<RecommendationDocument | null> {
    return this.collection.findOne({ recommendationId }, { projection: { _id: 0 } });
  }

  async findByIds(recommendationIds: string[]): Promise<RecommendationDocument[]> {
    if (recommendationIds.length === 0) return [];
    return this.collection
      .find({ recommendationId: { $in: recommendationIds } }, { projection: { _id: 0 } })
      .toArray();
  }

  async countByNotification(notificationIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    if (notificationIds.length === 0) return counts;

    const rows = await this.collection
      .aggregate<{ _id: string; count: number }>([
        { $match: { notificationId: { $in: notificationIds } } },
        { $group: { _id: '$notificationId', count: { $sum: 1 } } },
      ])
      .toArray();
    for (const row of rows) {
      counts.set(row._id, row.count);
    }
    return counts;
  }

  async deleteByVault(vaultId: string): Promise<number> {
    const result = await this.collection.deleteMany({ vaultId });
    return result.deletedCount;
  }
}

export class MongoFeedbackStore implements FeedbackStore {
  constructor(private readonly collection: Collection<FeedbackDocument>) {}

  async append(feedback: FeedbackDocument): Promise<void> {
    await this.collection.insertOne({ ...feedback });
  }

  async listByUser(userId: string): Promise<FeedbackDocument[]> {
    return this.collection
      .find({ userId }, { projection: { _id: 0 } })
      .sort({ createdAt: 1, feedbackId: 1 })
      .toArray();
  }

  async usersWithFeedback(): Promise<string[]> {
    return this.collection.distinct('userId');
  }

  async deleteByUser(userId: string): Promise<number> {
    const result = await this.collection.deleteMany({ userId });
    return result.deletedCount;
  }
}
