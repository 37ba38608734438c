/**
 * @file Milestone Notification Scheduler
 *
 * Plans one notification per lead time (14, 7 and 3 days) ahead of each
 * milestone occurrence at the send hour in the user's zone, deferred past quiet
 * hours, and drives each row through pending -> claimed -> sent | failed |
 * cancelled.
 *
 * Rows are keyed by (user, milestone, lead time, occurrence, milestone
 * revision). Planning only ever resolves to existing keys or inserts missing
 * ones, so repeated passes, DST changes and racing workers never duplicate a
 * row. A yearly milestone whose current occurrence has nothing left to deliver
 * is planned for the following year.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger, errorMessage, shortId } from '../../utils/logger';
import { withTimeout } from '../../utils/async';
import { formatIsoDate, type CalendarDate } from '../../utils/calendar';
import { localDate } from '../../utils/timezone';
import { NotFoundError } from '../../utils/errors';
import type { Milestone, VaultDocument } from '../../models/vault';
import type { UserSettings } from '../../models/user';
import { DEFAULT_QUIET_HOURS_END, DEFAULT_QUIET_HOURS_START } from '../../models/user';
import type { RecommendationStore } from '../recommendation_store/models';
import type { UserSettingsStore, VaultStore } from '../vault_service/models';
import type { CandidateSource } from '../recommendation_scorer/models';
import type { RecommendationService } from '../recommendation_scorer';
import { followingOccurrence, nextOccurrence } from './occurrence';
import { deliveryInstant, resolveTimezone } from './quiet_hours';
import { buildPayload } from './payload';
import {
  DEFAULT_SCHEDULER_CONFIG,
  LEAD_TIMES,
  TERMINAL_STATUSES,
  type DeliveryOutcome,
  type NotificationDocument,
  type NotificationHistoryItem,
  type NotificationKey,
  type NotificationStore,
  type PushResult,
  type PushTransport,
  type ScheduleResult,
  type SchedulerConfig,
} from './models';

export interface SchedulerDeps {
  notifications: NotificationStore;
  vaults: Pick<VaultStore, 'findById' | 'findByUserId' | 'listVaultIds'>;
  settings: Pick<UserSettingsStore, 'get'>;
  recommendations: Pick<RecommendationStore, 'countByNotification'>;
  transport: PushTransport;
  /** Without these two, notifications go out with no pre-attached recommendations */
  recommender?: Pick<RecommendationService, 'generate'>;
  candidates?: CandidateSource;
}

/**
 * Everything scheduling needs to know about the user.
 */
export interface ScheduleTarget {
  userId: string;
  vaultId: string;
  timeZone: string;
  quietHoursStart: number;
  quietHoursEnd: number;
}

interface PlannedLead {
  key: NotificationKey;
  /** null when the lead time can no longer be reached */
  instant: Date | null;
}

function emptyResult(): ScheduleResult {
  return { created: 0, updated: 0, cancelled: 0, unchanged: 0, skipped: 0 };
}

function addResults(total: ScheduleResult, part: ScheduleResult): ScheduleResult {
  return {
    created: total.created + part.created,
    updated: total.updated + part.updated,
    cancelled: total.cancelled + part.cancelled,
    unchanged: total.unchanged + part.unchanged,
    skipped: total.skipped + part.skipped,
  };
}

function sameKey(row: NotificationKey, key: NotificationKey): boolean {
  return (
    row.userId === key.userId &&
    row.milestoneId === key.milestoneId &&
    row.daysBefore === key.daysBefore &&
    row.occurrenceDate === key.occurrenceDate &&
    row.milestoneRevision === key.milestoneRevision
  );
}

export class NotificationScheduler {
  readonly config: SchedulerConfig;

  constructor(
    private readonly deps: SchedulerDeps,
    config: Partial<SchedulerConfig> = {}
  ) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
  }

  /**
   * Resolve zone and quiet hours for a vault's owner.
   */
  targetFor(vault: VaultDocument, settings: UserSettings | null): ScheduleTarget {
    return {
      userId: vault.userId,
      vaultId: vault.vaultId,
      timeZone: resolveTimezone(settings, vault.location, this.config.defaultTimezone),
      quietHoursStart: settings?.quietHoursStart ?? DEFAULT_QUIET_HOURS_START,
      quietHoursEnd: settings?.quietHoursEnd ?? DEFAULT_QUIET_HOURS_END,
    };
  }

  // ===========================================================================
  // Planning
  // ===========================================================================

  /**
   * Bring the milestone's rows in line with its current schedule. Idempotent:
   * an unchanged milestone produces no writes.
   */
  async scheduleFor(milestone: Milestone, target: ScheduleTarget, now: Date = new Date()): Promise<ScheduleResult> {
    const result = emptyResult();
    const nowIso = now.toISOString();
    const existing = await this.deps.notifications.listForMilestone(target.userId, milestone.milestoneId);

    let occurrence = nextOccurrence(milestone, localDate(now, target.timeZone));
    if (!occurrence) {
      result.cancelled += await this.cancelSuperseded(existing, [], nowIso);
      return result;
    }

    let plan = this.plan(milestone, target, occurrence, now);
    if (milestone.recurrence === 'yearly' && !this.hasLiveWork(plan, existing)) {
      occurrence = followingOccurrence(milestone, occurrence);
      plan = this.plan(milestone, target, occurrence, now);
    }

    for (const lead of plan) {
      const row = existing.find((r) => sameKey(r, lead.key));

      if (!row) {
        if (!lead.instant) {
          result.skipped++;
          continue;
        }
        const inserted = await this.deps.notifications.insert(
          this.newRow(lead.key, target.vaultId, lead.instant.toISOString(), nowIso)
        );
        if (inserted) result.created++;
        else result.unchanged++;
        continue;
      }

      // Terminal, claimed and already-due rows belong to the delivery path
      if (row.status !== 'pending' || row.scheduledFor <= nowIso) {
        result.unchanged++;
        continue;
      }

      if (!lead.instant) {
        result.cancelled += await this.deps.notifications.cancelPending(
          { notificationId: row.notificationId },
          'lead_time_unreachable',
          nowIso
        );
        continue;
      }

      const scheduledFor = lead.instant.toISOString();
      if (row.scheduledFor === scheduledFor) {
        result.unchanged++;
      } else if (await this.deps.notifications.reschedule(row.notificationId, scheduledFor, nowIso)) {
        result.updated++;
      } else {
        result.unchanged++;
      }
    }

    result.cancelled += await this.cancelSuperseded(
      existing,
      plan.map((p) => p.key),
      nowIso
    );

    if (result.created + result.updated + result.cancelled > 0) {
      logger.info(
        `[NotificationScheduler] ${shortId(milestone.milestoneId)} @ ${formatIsoDate(occurrence)}: ` +
          `${result.created} created, ${result.updated} updated, ${result.cancelled} cancelled`
      );
    }
    return result;
  }

  /**
   * Cancel every still-pending notification of a milestone.
   */
  async cancelFor(milestoneId: string, reason = 'milestone_changed', now: Date = new Date()): Promise<number> {
    const cancelled = await this.deps.notifications.cancelPending({ milestoneId }, reason, now.toISOString());
    if (cancelled > 0) {
      logger.info(`[NotificationScheduler] Cancelled ${cancelled} pending for milestone ${shortId(milestoneId)}`);
    }
    return cancelled;
  }

  async cancelForVault(vaultId: string, reason = 'vault_deleted', now: Date = new Date()): Promise<number> {
    const cancelled = await this.deps.notifications.cancelPending({ vaultId }, reason, now.toISOString());
    logger.info(`[NotificationScheduler] Cancelled ${cancelled} pending for vault ${shortId(vaultId)}`);
    return cancelled;
  }

  /**
   * Schedule every milestone of a vault. Returns null when the vault is gone.
   */
  async scheduleVault(vaultId: string, now: Date = new Date()): Promise<ScheduleResult | null> {
    const vault = await this.deps.vaults.findById(vaultId);
    if (!vault) return null;

    const target = this.targetFor(vault, await this.deps.settings.get(vault.userId));
    let total = emptyResult();
    for (const milestone of vault.milestones) {
      total = addResults(total, await this.scheduleFor(milestone, target, now));
    }
    return total;
  }

  async scheduleUser(userId: string, now: Date = new Date()): Promise<ScheduleResult | null> {
    const vault = await this.deps.vaults.findByUserId(userId);
    return vault ? this.scheduleVault(vault.vaultId, now) : null;
  }

  /**
   * Periodic pass over every vault. A failing vault is logged and skipped.
   */
  async runSchedulingPass(now: Date = new Date()): Promise<{ vaults: number; failed: number; result: ScheduleResult }> {
    const vaultIds = await this.deps.vaults.listVaultIds();
    let total = emptyResult();
    let failed = 0;

    for (const vaultId of vaultIds) {
      try {
        const result = await this.scheduleVault(vaultId, now);
        if (result) total = addResults(total, result);
      } catch (error) {
        failed++;
        logger.error(`[NotificationScheduler] Scheduling failed for vault ${shortId(vaultId)}: ${errorMessage(error)}`);
      }
    }

    logger.info(
      `[NotificationScheduler] Pass over ${vaultIds.length} vaults: ${total.created} created, ` +
        `${total.updated} updated, ${total.cancelled} cancelled, ${failed} failed`
    );
    return { vaults: vaultIds.length, failed, result: total };
  }

  // ===========================================================================
  // Delivery
  // ===========================================================================

  async dueNotifications(now: Date = new Date(), limit = 100): Promise<NotificationDocument[]> {
    return this.deps.notifications.due(now.toISOString(), limit);
  }

  /**
   * Exclusive claim. Only the caller that gets a row back may deliver it.
   */
  async claim(notificationId: string, workerId: string, now: Date = new Date()): Promise<NotificationDocument | null> {
    return this.deps.notifications.claim(notificationId, workerId, now.toISOString());
  }

  /**
   * Deliver a claimed notification. Transport failures and timeouts end in
   * `failed` and are not retried here.
   */
  async deliver(notification: NotificationDocument, now: Date = new Date()): Promise<DeliveryOutcome> {
    const nowIso = now.toISOString();
    const current = await this.deps.notifications.findById(notification.notificationId);
    if (!current || current.status !== 'claimed') {
      return 'skipped';
    }

    const vault = await this.deps.vaults.findById(current.vaultId);
    const milestone = vault?.milestones.find((m) => m.milestoneId === current.milestoneId);
    if (!vault || !milestone || milestone.revision !== current.milestoneRevision) {
      return this.finish(current, 'cancelled', { failureReason: 'milestone_removed' }, nowIso);
    }

    const settings = await this.deps.settings.get(current.userId);
    if (settings && !settings.notificationsEnabled) {
      return this.finish(current, 'cancelled', { failureReason: 'notifications_disabled' }, nowIso);
    }
    if (!settings?.deviceToken || !settings.devicePlatform) {
      const outcome = await this.finish(current, 'failed', { failureReason: 'no_device_token' }, nowIso);
      await this.rescheduleAfterDelivery(vault, milestone, settings, now);
      return outcome;
    }

    const recommendationIds = await this.attachRecommendations(vault, milestone, current, now);
    const payload = buildPayload({
      notificationId: current.notificationId,
      milestoneId: milestone.milestoneId,
      partnerName: vault.partnerName,
      milestoneName: milestone.name,
      daysBefore: current.daysBefore,
      recommendationIds,
      vibe: vault.vibes[0],
    });

    let result: PushResult;
    try {
      result = await withTimeout(
        this.deps.transport.send(settings.deviceToken, settings.devicePlatform, payload),
        this.config.pushTimeoutMs,
        'Push delivery'
      );
    } catch (error) {
      result = { success: false, reason: errorMessage(error) };
    }

    const outcome = result.success
      ? await this.finish(current, 'sent', { sentAt: nowIso, recommendationIds }, nowIso)
      : await this.finish(
          current,
          'failed',
          { failureReason: result.reason ?? 'transport_failure', recommendationIds },
          nowIso
        );

    await this.rescheduleAfterDelivery(vault, milestone, settings, now);
    return outcome;
  }

  /**
   * Fail claims held longer than the claim timeout (the worker holding them is
   * presumed dead mid-delivery).
   */
  async releaseStaleClaims(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.config.claimTimeoutMs).toISOString();
    const stale = await this.deps.notifications.staleClaims(cutoff);
    let released = 0;

    for (const row of stale) {
      const changed = await this.deps.notifications.transition(
        row.notificationId,
        'claimed',
        'failed',
        { failureReason: 'claim_timeout' },
        now.toISOString()
      );
      if (changed) {
        released++;
        logger.warn(`[NotificationScheduler] Claim on ${shortId(row.notificationId)} timed out`);
      }
    }
    return released;
  }

  // ===========================================================================
  // History
  // ===========================================================================

  /**
   * Rows joined with milestone display fields and linked recommendation count.
   * Milestone fields are null once the milestone is gone.
   */
  async history(
    userId: string,
    options: { limit?: number; offset?: number } = {}
  ): Promise<NotificationHistoryItem[]> {
    const rows = await this.deps.notifications.history(userId, {
      limit: options.limit ?? 50,
      offset: options.offset ?? 0,
    });
    if (rows.length === 0) return [];

    const vault = await this.deps.vaults.findByUserId(userId);
    const milestones = new Map((vault?.milestones ?? []).map((m) => [m.milestoneId, m]));
    const counts = await this.deps.recommendations.countByNotification(rows.map((r) => r.notificationId));

    return rows.map((row) => {
      const milestone = milestones.get(row.milestoneId);
      return {
        notificationId: row.notificationId,
        milestoneId: row.milestoneId,
        milestoneName: milestone?.name ?? null,
        milestoneType: milestone?.type ?? null,
        milestoneDate: milestone?.date ?? null,
        occurrenceDate: row.occurrenceDate,
        daysBefore: row.daysBefore,
        scheduledFor: row.scheduledFor,
        status: row.status,
        sentAt: row.sentAt,
        viewedAt: row.viewedAt,
        recommendationsCount: counts.get(row.notificationId) ?? 0,
      };
    });
  }

  /**
   * Stamp viewedAt on a sent notification. Returns false when it was already
   * viewed or has not been sent.
   */
  async markViewed(notificationId: string, userId: string, now: Date = new Date()): Promise<boolean> {
    const row = await this.deps.notifications.findById(notificationId);
    if (!row || row.userId !== userId) {
      throw new NotFoundError('Notification', notificationId);
    }
    return this.deps.notifications.markViewed(notificationId, userId, now.toISOString());
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private plan(milestone: Milestone, target: ScheduleTarget, occurrence: CalendarDate, now: Date): PlannedLead[] {
    const occurrenceDate = formatIsoDate(occurrence);
    return LEAD_TIMES.map((daysBefore) => {
      const { instant } = deliveryInstant(occurrence, daysBefore, {
        sendHour: this.config.sendHour,
        quietHoursStart: target.quietHoursStart,
        quietHoursEnd: target.quietHoursEnd,
        timeZone: target.timeZone,
      });
      return {
        key: {
          userId: target.userId,
          milestoneId: milestone.milestoneId,
          daysBefore,
          occurrenceDate,
          milestoneRevision: milestone.revision,
        },
        instant: instant.getTime() > now.getTime() ? instant : null,
      };
    });
  }

  /**
   * Something is still to be delivered for this occurrence.
   */
  private hasLiveWork(plan: PlannedLead[], existing: NotificationDocument[]): boolean {
    return plan.some((lead) => {
      const row = existing.find((r) => sameKey(r, lead.key));
      if (row) return !TERMINAL_STATUSES.includes(row.status);
      return lead.instant !== null;
    });
  }

  /**
   * Cancel future pending rows that no longer belong to the plan (older
   * revision, or an occurrence that moved).
   */
  private async cancelSuperseded(
    existing: NotificationDocument[],
    planned: NotificationKey[],
    nowIso: string
  ): Promise<number> {
    let cancelled = 0;
    for (const row of existing) {
      if (row.status !== 'pending' || row.scheduledFor <= nowIso) continue;
      if (planned.some((key) => sameKey(row, key))) continue;
      cancelled += await this.deps.notifications.cancelPending(
        { notificationId: row.notificationId },
        'superseded',
        nowIso
      );
    }
    return cancelled;
  }

  private newRow(key: NotificationKey, vaultId: string, scheduledFor: string, nowIso: string): NotificationDocument {
    return {
      ...key,
      notificationId: uuidv4(),
      vaultId,
      scheduledFor,
      status: 'pending',
      claimedBy: null,
      claimedAt: null,
      sentAt: null,
      viewedAt: null,
      failureReason: null,
      recommendationIds: [],
      createdAt: nowIso,
      updatedAt: nowIso,
    };
  }

  private async finish(
    row: NotificationDocument,
    to: 'sent' | 'failed' | 'cancelled',
    fields: Partial<Pick<NotificationDocument, 'sentAt' | 'failureReason' | 'recommendationIds'>>,
    nowIso: string
  ): Promise<DeliveryOutcome> {
    const changed = await this.deps.notifications.transition(row.notificationId, 'claimed', to, fields, nowIso);
    if (!changed) {
      logger.warn(`[NotificationScheduler] ${shortId(row.notificationId)} left claimed state before ${to}`);
      return 'skipped';
    }

    const detail = fields.failureReason ? ` (${fields.failureReason})` : '';
    const line = `[NotificationScheduler] ${shortId(row.notificationId)} ${row.daysBefore}d -> ${to}${detail}`;
    if (to === 'failed') logger.warn(line);
    else logger.info(line);
    return to;
  }

  /**
   * Pre-attach the top recommendations. Failures only cost the attachment.
   */
  private async attachRecommendations(
    vault: VaultDocument,
    milestone: Milestone,
    row: NotificationDocument,
    now: Date
  ): Promise<string[]> {
    const { recommender, candidates } = this.deps;
    if (!recommender || !candidates) return [];

    const limit = this.config.recommendationsPerNotification;
    try {
      const pool = await withTimeout(
        candidates.candidatesFor({ vaultId: vault.vaultId, milestoneId: milestone.milestoneId, limit: limit * 4 }),
        this.config.pushTimeoutMs,
        'Candidate lookup'
      );
      const generated = await recommender.generate(
        {
          vaultId: vault.vaultId,
          candidates: pool,
          milestoneId: milestone.milestoneId,
          notificationId: row.notificationId,
          budgetTier: milestone.budgetTier,
          limit,
        },
        now
      );
      return generated.map((r) => r.recommendationId);
    } catch (error) {
      logger.warn(
        `[NotificationScheduler] No recommendations for ${shortId(row.notificationId)}: ${errorMessage(error)}`
      );
      return [];
    }
  }

  /**
   * Re-enter planning so yearly milestones roll to the next occurrence.
   */
  private async rescheduleAfterDelivery(
    vault: VaultDocument,
    milestone: Milestone,
    settings: UserSettings | null,
    now: Date
  ): Promise<void> {
    try {
      await this.scheduleFor(milestone, this.targetFor(vault, settings), now);
    } catch (error) {
      logger.error(
        `[NotificationScheduler] Rescheduling ${shortId(milestone.milestoneId)} failed: ${errorMessage(error)}`
      );
    }
  }
}
