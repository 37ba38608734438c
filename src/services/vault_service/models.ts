/**
 * @file Persistence seams for the vault aggregate and per-user settings.
 */

import type { VaultDocument } from '../../models/vault';
import type { UserSettings } from '../../models/user';

export interface VaultStore {
  /** Throws ConflictError when the user already owns a vault */
  insert(vault: VaultDocument): Promise<void>;
  findById(vaultId: string): Promise<VaultDocument | null>;
  findByUserId(userId: string): Promise<VaultDocument | null>;
  /**
   * Write `vault` only if the stored version is still `expectedVersion`.
   * Returns false when the vault no longer exists; throws
   * ConcurrencyConflictError when another write got there first.
   */
  replace(vault: VaultDocument, expectedVersion: number): Promise<boolean>;
  listVaultIds(): Promise<string[]>;
  delete(vaultId: string): Promise<boolean>;
}

export interface UserSettingsStore {
  get(userId: string): Promise<UserSettings | null>;
  upsert(settings: UserSettings): Promise<void>;
  delete(userId: string): Promise<boolean>;
}
