/**
 * @file MongoDB-backed HintStore.
 */

import type { Collection } from 'mongodb';
import type { HintDocument, HintStore, PartitionFingerprint, Vector } from './models';

export class MongoHintStore implements HintStore {
  constructor(private readonly collection: Collection<HintDocument>) {}

  async insert(hint: HintDocument): Promise<void> {
    await this.collection.insertOne({ ...hint });
  }

  async findById(hintId: string): Promise<HintDocument | null> {
    return this.collection.findOne({ hintId }, { projection: { _id: 0 } });
  }

  async listByVault(
    vaultId: string,
    options: { includeUsed: boolean; limit?: number }
  ): Promise<HintDocument[]> {
    const cursor = this.collection
      .find(options.includeUsed ? { vaultId } : { vaultId, isUsed: false }, { projection: { _id: 0 } })
      .sort({ createdAt: -1, hintId: 1 });
    if (options.limit !== undefined) {
      cursor.limit(options.limit);
    }
    return cursor.toArray();
  }

  async listEmbedded(vaultId: string): Promise<HintDocument[]> {
    return this.collection
      .find({ vaultId, embedding: { $ne: null } }, { projection: { _id: 0 } })
      .toArray();
  }

  async embeddingFingerprint(vaultId: string): Promise<PartitionFingerprint> {
    const [summary] = await this.collection
      .aggregate<PartitionFingerprint>([
        { $match: { vaultId, embedding: { $ne: null } } },
        {
          $group: {
            _id: null,
            embedded: { $sum: 1 },
            used: { $sum: { $cond: ['$isUsed', 1, 0] } },
            latestEmbeddedAt: { $max: '$embeddedAt' },
          },
        },
        { $project: { _id: 0, embedded: 1, used: 1, latestEmbeddedAt: 1 } },
      ])
      .toArray();
    return summary ?? { embedded: 0, used: 0, latestEmbeddedAt: null };
  }

  async listMissingEmbeddings(limit: number): Promise<HintDocument[]> {
    return this.collection
      .find({ embedding: null }, { projection: { _id: 0 } })
      .sort({ createdAt: 1 })
      .limit(limit)
      .toArray();
  }

  async setEmbedding(hintId: string, embedding: Vector | null, embeddedAt: string): Promise<boolean> {
    const result = await this.collection.updateOne(
      { hintId },
      { $set: { embedding, embeddedAt: embedding ? embeddedAt : null } }
    );
    return result.matchedCount === 1;
  }

  async markUsed(hintIds: string[]): Promise<number> {
    const result = await this.collection.updateMany(
      { hintId: { $in: hintIds }, isUsed: false },
      { $set: { isUsed: true } }
    );
    return result.modifiedCount;
  }

  async deleteByVault(vaultId: string): Promise<number> {
    const result = await this.collection.deleteMany({ vaultId });
    return result.deletedCount;
  }
}
