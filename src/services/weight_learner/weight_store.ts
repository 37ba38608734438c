/**
 * @file MongoDB-backed WeightStore with a compare-and-swap replace.
 */

import type { Collection } from 'mongodb';
import { ConcurrencyConflictError, isDuplicateKeyError } from '../../utils/errors';
import type { PreferenceWeightsDocument, WeightStore } from './models';

export class MongoWeightStore implements WeightStore {
  constructor(private readonly collection: Collection<PreferenceWeightsDocument>) {}

  async get(userId: string): Promise<PreferenceWeightsDocument | null> {
    return this.collection.findOne({ userId }, { projection: { _id: 0 } });
  }

  /**
   * Matches only an older snapshot. When a newer (or equally new) one exists the
   * filter misses, the upsert collides with the unique userId index, and the
   * write is rejected.
   */
  async replace(snapshot: PreferenceWeightsDocument): Promise<void> {
    try {
      await this.collection.replaceOne(
        { userId: snapshot.userId, lastAnalyzedAt: { $lt: snapshot.lastAnalyzedAt } },
        { ...snapshot },
        { upsert: true }
      );
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConcurrencyConflictError(
          `Weights for ${snapshot.userId} already analyzed at or after ${snapshot.lastAnalyzedAt}`
        );
      }
      throw error;
    }
  }

  async delete(userId: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ userId });
    return result.deletedCount === 1;
  }
}
