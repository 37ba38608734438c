/**
 * @file MongoDB-backed NotificationStore. Every state change is a conditional
 * update on the current status, so concurrent workers cannot both win.
 */

import type { Collection, Filter } from 'mongodb';
import { isDuplicateKeyError } from '../../utils/errors';
import type { NotificationDocument, NotificationStatus, NotificationStore } from './models';

export class MongoNotificationStore implements NotificationStore {
  constructor(private readonly collection: Collection<NotificationDocument>) {}

  async insert(notification: NotificationDocument): Promise<boolean> {
    try {
      await this.collection.insertOne({ ...notification });
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) return false;
      throw error;
    }
  }

  async findById(notificationId: string): Promise<NotificationDocument | null> {
    return this.collection.findOne({ notificationId }, { projection: { _id: 0 } });
  }

  async listForMilestone(userId: string, milestoneId: string): Promise<NotificationDocument[]> {
    return this.collection
      .find({ userId, milestoneId }, { projection: { _id: 0 } })
      .sort({ scheduledFor: 1 })
      .toArray();
  }

  async reschedule(notificationId: string, scheduledFor: string, now: string): Promise<boolean> {
    const result = await this.collection.updateOne(
      { notificationId, status: 'pending' },
      { $set: { scheduledFor, updatedAt: now } }
    );
    return result.modifiedCount === 1;
  }

  async cancelPending(
    scope: { milestoneId: string } | { vaultId: string } | { notificationId: string },
    reason: string,
    now: string
  ): Promise<number> {
    const filter: Filter<NotificationDocument> = { ...scope, status: 'pending' };
    const result = await this.collection.updateMany(filter, {
      $set: { status: 'cancelled', failureReason: reason, updatedAt: now },
    });
    return result.modifiedCount;
  }

  async due(now: string, limit: number): Promise<NotificationDocument[]> {
    return this.collection
      .find({ status: 'pending', scheduledFor: { $lte: now } }, { projection: { _id: 0 } })
      .sort({ scheduledFor: 1, notificationId: 1 })
      .limit(limit)
      .toArray();
  }

  async claim(notificationId: string, workerId: string, now: string): Promise<NotificationDocument | null> {
    return this.collection.findOneAndUpdate(
      { notificationId, status: 'pending' },
      { $set: { status: 'claimed', claimedBy: workerId, claimedAt: now, updatedAt: now } },
      { returnDocument: 'after', projection: { _id: 0 } }
    );
  }

  async transition(
    notificationId: string,
    from: NotificationStatus,
    to: NotificationStatus,
    fields: Partial<Pick<NotificationDocument, 'sentAt' | 'failureReason' | 'recommendationIds'>>,
    now: string
  ): Promise<boolean> {
    const result = await this.collection.updateOne(
      { notificationId, status: from },
      { $set: { ...fields, status: to, updatedAt: now } }
    );
    return result.modifiedCount === 1;
  }

  async staleClaims(claimedBefore: string): Promise<NotificationDocument[]> {
    return this.collection
      .find({ status: 'claimed', claimedAt: { $lt: claimedBefore } }, { projection: { _id: 0 } })
      .toArray();
  }

  async history(userId: string, options: { limit: number; offset: number }): Promise<NotificationDocument[]> {
    return this.collection
      .find({ userId }, { projection: { _id: 0 } })
      .sort({ scheduledFor: -1, notificationId: 1 })
      .skip(options.offset)
      .limit(options.limit)
      .toArray();
  }

  async markViewed(notificationId: string, userId: string, now: string): Promise<boolean> {
    const result = await this.collection.updateOne(
      { notificationId, userId, status: 'sent', viewedAt: null },
      { $set: { viewedAt: now, updatedAt: now } }
    );
    return result.modifiedCount === 1;
  }

  async deleteByVault(vaultId: string): Promise<number> {
    const result = await this.collection.deleteMany({ vaultId });
    return result.deletedCount;
  }
}
