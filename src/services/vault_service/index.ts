/**
 * @file Vault Service
 *
 * Lifecycle of the vault aggregate and the per-user notification settings.
 * Every milestone change is followed by the matching scheduler call, and
 * deleting a vault cancels its pending notifications before the owned data is
 * removed.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger, shortId } from '../../utils/logger';
import { ConcurrencyConflictError, NotFoundError } from '../../utils/errors';
import {
  assertValid,
  validateHint,
  validateMilestone,
  validateUserSettings,
  validateVault,
  type HintInput,
  type MilestoneDraft,
  type MilestoneInput,
  type UserSettingsInput,
  type VaultInput,
} from '../../models/validation';
import type { Milestone, VaultDocument } from '../../models/vault';
import { defaultUserSettings, type UserSettings } from '../../models/user';
import type { EmbeddingStore, HintDocument } from '../embedding_store';
import type { HintService } from '../embedding_store/hint_service';
import type { NotificationScheduler } from '../notification_scheduler/scheduler';
import type { NotificationStore } from '../notification_scheduler/models';
import type { FeedbackStore, RecommendationStore } from '../recommendation_store/models';
import type { WeightStore } from '../weight_learner/models';
import type { UserSettingsStore, VaultStore } from './models';

export * from './models';
export { MongoVaultStore, MongoUserSettingsStore } from './stores';

export interface VaultServiceDeps {
  vaults: VaultStore;
  settings: UserSettingsStore;
  scheduler: NotificationScheduler;
  hints: HintService;
  embeddings: Pick<EmbeddingStore, 'deleteVault'>;
  notifications: Pick<NotificationStore, 'deleteByVault'>;
  recommendations: Pick<RecommendationStore, 'deleteByVault'>;
  feedback: Pick<FeedbackStore, 'deleteByUser'>;
  weights: Pick<WeightStore, 'delete'>;
}

export type VaultProfileInput = Partial<Omit<VaultInput, 'userId' | 'milestones'>>;

/** Read-edit-write attempts before a ConcurrencyConflictError reaches the caller */
const MAX_WRITE_ATTEMPTS = 5;

interface VaultEdit<T> {
  vault: VaultDocument;
  result: T;
}

function toMilestone(draft: MilestoneDraft, milestoneId: string, revision: number, createdAt: string, updatedAt: string): Milestone {
  return { milestoneId, ...draft, revision, createdAt, updatedAt };
}

function milestoneInput(milestone: Milestone): MilestoneInput {
  return {
    name: milestone.name,
    type: milestone.type,
    date: milestone.date,
    recurrence: milestone.recurrence,
    budgetTier: milestone.budgetTier,
  };
}

export class VaultService {
  constructor(private readonly deps: VaultServiceDeps) {}

  // ===========================================================================
  // Vault
  // ===========================================================================

  async createVault(input: VaultInput, now: Date = new Date()): Promise<VaultDocument> {
    const draft = assertValid(validateVault(input));
    const timestamp = now.toISOString();

    const vault: VaultDocument = {
      vaultId: uuidv4(),
      ...draft,
      milestones: draft.milestones.map((m) => toMilestone(m, uuidv4(), 1, timestamp, timestamp)),
      version: 1,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.deps.vaults.insert(vault);
    logger.info(`[VaultService] Created vault ${shortId(vault.vaultId)} for user ${shortId(vault.userId)}`);

    await this.deps.scheduler.scheduleVault(vault.vaultId, now);
    return vault;
  }

  async getVault(vaultId: string): Promise<VaultDocument> {
    const vault = await this.deps.vaults.findById(vaultId);
    if (!vault) {
      throw new NotFoundError('Vault', vaultId);
    }
    return vault;
  }

  async getVaultForUser(userId: string): Promise<VaultDocument | null> {
    return this.deps.vaults.findByUserId(userId);
  }

  /**
   * Replace profile facts. The merged vault is validated as a whole, so a
   * category can never end up both liked and disliked.
   */
  async updateVaultProfile(vaultId: string, patch: VaultProfileInput, now: Date = new Date()): Promise<VaultDocument> {
    const updated = await this.edit(vaultId, now, (current) => {
      const draft = assertValid(
        validateVault({
          userId: current.userId,
          partnerName: patch.partnerName ?? current.partnerName,
          relationshipTenureMonths: patch.relationshipTenureMonths ?? current.relationshipTenureMonths,
          cohabitationStatus: patch.cohabitationStatus ?? current.cohabitationStatus,
          location: patch.location ?? current.location,
          interests: patch.interests ?? current.interests,
          vibes: patch.vibes ?? current.vibes,
          loveLanguages: patch.loveLanguages ?? current.loveLanguages,
          budgets: patch.budgets ?? current.budgets,
        })
      );
      return { ...current, ...draft, milestones: current.milestones };
    });

    // The vault location can decide the user's zone
    if (patch.location !== undefined) {
      await this.deps.scheduler.scheduleVault(vaultId, now);
    }
    return updated;
  }

  /**
   * Remove the root, cancel its pending notifications, then delete everything
   * it owns.
   */
  async deleteVault(vaultId: string, now: Date = new Date()): Promise<void> {
    const vault = await this.getVault(vaultId);

    await this.deps.vaults.delete(vaultId);
    await this.deps.scheduler.cancelForVault(vaultId, 'vault_deleted', now);

    const hints = await this.deps.embeddings.deleteVault(vaultId);
    const notifications = await this.deps.notifications.deleteByVault(vaultId);
    const recommendations = await this.deps.recommendations.deleteByVault(vaultId);
    const feedback = await this.deps.feedback.deleteByUser(vault.userId);
    await this.deps.weights.delete(vault.userId);

    logger.info(
      `[VaultService] Deleted vault ${shortId(vaultId)}: ${hints} hints, ${notifications} notifications, ` +
        `${recommendations} recommendations, ${feedback} feedback`
    );
  }

  // ===========================================================================
  // Milestones
  // ===========================================================================

  async addMilestone(vaultId: string, input: MilestoneInput, now: Date = new Date()): Promise<Milestone> {
    const draft = assertValid(validateMilestone(input));
    const timestamp = now.toISOString();
    const milestone = toMilestone(draft, uuidv4(), 1, timestamp, timestamp);

    const vault = await this.edit(vaultId, now, (current) => ({
      ...current,
      milestones: [...current.milestones, milestone],
    }));
    await this.scheduleMilestone(vault, milestone, now);
    return milestone;
  }

  /**
   * A change to anything that moves the occurrence bumps the revision, which
   * supersedes the old schedule.
   */
  async updateMilestone(
    vaultId: string,
    milestoneId: string,
    patch: Partial<MilestoneInput>,
    now: Date = new Date()
  ): Promise<Milestone> {
    const timestamp = now.toISOString();
    const { vault, result } = await this.editWith(vaultId, now, (current) => {
      const existing = current.milestones.find((m) => m.milestoneId === milestoneId);
      if (!existing) {
        throw new NotFoundError('Milestone', milestoneId);
      }

      const merged = { ...milestoneInput(existing), ...patch };
      // A new type re-derives the tier unless one was given
      if (patch.type !== undefined && patch.type !== existing.type && patch.budgetTier === undefined) {
        delete merged.budgetTier;
      }
      const draft = assertValid(validateMilestone(merged));

      const moved =
        draft.date !== existing.date ||
        draft.recurrence !== existing.recurrence ||
        draft.name !== existing.name ||
        draft.type !== existing.type;
      const updated = toMilestone(
        draft,
        milestoneId,
        moved ? existing.revision + 1 : existing.revision,
        existing.createdAt,
        timestamp
      );

      return {
        vault: { ...current, milestones: current.milestones.map((m) => (m.milestoneId === milestoneId ? updated : m)) },
        result: { updated, moved },
      };
    });

    if (result.moved) {
      await this.deps.scheduler.cancelFor(milestoneId, 'milestone_changed', now);
      await this.scheduleMilestone(vault, result.updated, now);
    }
    return result.updated;
  }

  async deleteMilestone(vaultId: string, milestoneId: string, now: Date = new Date()): Promise<void> {
    await this.edit(vaultId, now, (current) => {
      if (!current.milestones.some((m) => m.milestoneId === milestoneId)) {
        throw new NotFoundError('Milestone', milestoneId);
      }
      return { ...current, milestones: current.milestones.filter((m) => m.milestoneId !== milestoneId) };
    });
    await this.deps.scheduler.cancelFor(milestoneId, 'milestone_deleted', now);
  }

  // ===========================================================================
  // Hints
  // ===========================================================================

  async addHint(vaultId: string, input: Omit<HintInput, 'vaultId'>): Promise<HintDocument> {
    await this.getVault(vaultId);
    const draft = assertValid(validateHint({ ...input, vaultId }));
    return this.deps.hints.addHint(draft);
  }

  // ===========================================================================
  // Settings
  // ===========================================================================

  async getSettings(userId: string, now: Date = new Date()): Promise<UserSettings> {
    return (await this.deps.settings.get(userId)) ?? defaultUserSettings(userId, now);
  }

  /**
   * Zone or quiet-hour changes move every still-pending future notification.
   */
  async updateSettings(userId: string, input: UserSettingsInput, now: Date = new Date()): Promise<UserSettings> {
    const patch = assertValid(validateUserSettings(input));
    const current = await this.getSettings(userId, now);
    const updated: UserSettings = { ...current, ...patch, updatedAt: now.toISOString() };

    await this.deps.settings.upsert(updated);

    const timingChanged =
      updated.timezone !== current.timezone ||
      updated.quietHoursStart !== current.quietHoursStart ||
      updated.quietHoursEnd !== current.quietHoursEnd;
    if (timingChanged) {
      await this.deps.scheduler.scheduleUser(userId, now);
    }
    return updated;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Apply `change` to the latest stored vault and write it back conditionally.
   * A lost write re-reads and re-applies the change, so concurrent edits of
   * one vault all land.
   */
  private async editWith<T>(
    vaultId: string,
    now: Date,
    change: (current: VaultDocument) => VaultEdit<T>
  ): Promise<VaultEdit<T>> {
    for (let attempt = 1; ; attempt++) {
      const current = await this.getVault(vaultId);
      const { vault, result } = change(current);
      const next: VaultDocument = { ...vault, version: current.version + 1, updatedAt: now.toISOString() };

      try {
        const saved = await this.deps.vaults.replace(next, current.version);
        if (!saved) {
          throw new NotFoundError('Vault', vaultId);
        }
        return { vault: next, result };
      } catch (error) {
        if (!(error instanceof ConcurrencyConflictError) || attempt >= MAX_WRITE_ATTEMPTS) {
          throw error;
        }
        logger.debug(`[VaultService] Write conflict on vault ${shortId(vaultId)}, retrying (${attempt})`);
      }
    }
  }

  private async edit(
    vaultId: string,
    now: Date,
    change: (current: VaultDocument) => VaultDocument
  ): Promise<VaultDocument> {
    const { vault } = await this.editWith(vaultId, now, (current) => ({ vault: change(current), result: null }));
    return vault;
  }

  private async scheduleMilestone(vault: VaultDocument, milestone: Milestone, now: Date): Promise<void> {
    const settings = await this.deps.settings.get(vault.userId);
    await this.deps.scheduler.scheduleFor(milestone, this.deps.scheduler.targetFor(vault, settings), now);
  }
}
