/**
 * @file MongoDB-backed vault and user-settings stores.
 */

import type { Collection } from 'mongodb';
import type { VaultDocument } from '../../models/vault';
import type { UserSettings } from '../../models/user';
import { ConcurrencyConflictError, ConflictError, isDuplicateKeyError } from '../../utils/errors';
import type { UserSettingsStore, VaultStore } from './models';

export class MongoVaultStore implements VaultStore {
  constructor(private readonly collection: Collection<VaultDocument>) {}

  async insert(vault: VaultDocument): Promise<void> {
    try {
      await this.collection.insertOne({ ...vault });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(`User ${vault.userId} already has a vault`);
      }
      throw error;
    }
  }

  async findById(vaultId: string): Promise<VaultDocument | null> {
    return this.collection.findOne({ vaultId }, { projection: { _id: 0 } });
  }

  async findByUserId(userId: string): Promise<VaultDocument | null> {
    return this.collection.findOne({ userId }, { projection: { _id: 0 } });
  }

  async replace(vault: VaultDocument, expectedVersion: number): Promise<boolean> {
    const result = await this.collection.replaceOne(
      { vaultId: vault.vaultId, version: expectedVersion },
      { ...vault }
    );
    if (result.matchedCount === 1) return true;

    const exists = await this.collection.countDocuments({ vaultId: vault.vaultId }, { limit: 1 });
    if (exists === 0) return false;
    throw new ConcurrencyConflictError(`Vault ${vault.vaultId} changed since version ${expectedVersion}`);
  }

  async listVaultIds(): Promise<string[]> {
    return this.collection.distinct('vaultId');
  }

  async delete(vaultId: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ vaultId });
    return result.deletedCount === 1;
  }
}

export class MongoUserSettingsStore implements UserSettingsStore {
  constructor(private readonly collection: Collection<UserSettings>) {}

  async get(userId: string): Promise<UserSettings | null> {
    return this.collection.findOne({ userId }, { projection: { _id: 0 } });
  }

  async upsert(settings: UserSettings): Promise<void> {
    await this.collection.replaceOne({ userId: settings.userId }, { ...settings }, { upsert: true });
  }

  async delete(userId: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ userId });
    return result.deletedCount === 1;
  }
}
