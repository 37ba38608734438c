/**
 * @file Notification rows, scheduler configuration and delivery collaborators.
 */

import type { DevicePlatform } from '../../models/user';

export const LEAD_TIMES = [14, 7, 3] as const;
export type LeadTime = (typeof LEAD_TIMES)[number];

/**
 * pending -> claimed -> sent | failed | cancelled
 * pending -> cancelled
 * sent, failed and cancelled are terminal.
 */
export const NOTIFICATION_STATUSES = ['pending', 'claimed', 'sent', 'failed', 'cancelled'] as const;
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

export const TERMINAL_STATUSES: readonly NotificationStatus[] = ['sent', 'failed', 'cancelled'];

/**
 * Uniquely identifies one delivery of one lead time for one occurrence of one
 * revision of a milestone. Recomputing a schedule always resolves to the same
 * key, so it can never produce a second row.
 */
export interface NotificationKey {
  userId: string;
  milestoneId: string;
  daysBefore: LeadTime;
  /** YYYY-MM-DD of the occurrence this notification leads up to */
  occurrenceDate: string;
  milestoneRevision: number;
}

export interface NotificationDocument extends NotificationKey {
  notificationId: string;
  vaultId: string;
  /** ISO-8601 UTC */
  scheduledFor: string;
  status: NotificationStatus;
  claimedBy: string | null;
  claimedAt: string | null;
  sentAt: string | null;
  viewedAt: string | null;
  failureReason: string | null;
  recommendationIds: string[];
  createdAt: string;
  updatedAt: string;
}

export interface SchedulerConfig {
  /** Local hour notifications are sent at, before quiet-hour adjustment */
  sendHour: number;
  defaultTimezone: string;
  pushTimeoutMs: number;
  claimTimeoutMs: number;
  /** Recommendations pre-attached to each notification */
  recommendationsPerNotification: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  sendHour: 9,
  defaultTimezone: 'America/New_York',
  pushTimeoutMs: 10_000,
  claimTimeoutMs: 300_000,
  recommendationsPerNotification: 3,
};

export interface ScheduleResult {
  created: number;
  updated: number;
  cancelled: number;
  unchanged: number;
  skipped: number;
}

export type DeliveryOutcome = 'sent' | 'failed' | 'cancelled' | 'skipped';

// =============================================================================
// COLLABORATORS
// =============================================================================

export interface PushPayload {
  title: string;
  body: string;
  category: 'MILESTONE_REMINDER';
  data: {
    notificationId: string;
    milestoneId: string;
    recommendationIds: string[];
  };
}

export interface PushResult {
  success: boolean;
  /** Opaque to the scheduler; recorded as the failure reason */
  reason?: string;
}

export interface PushTransport {
  send(deviceToken: string, platform: DevicePlatform, payload: PushPayload): Promise<PushResult>;
}

// =============================================================================
// HISTORY
// =============================================================================

export interface NotificationHistoryItem {
  notificationId: string;
  milestoneId: string;
  milestoneName: string | null;
  milestoneType: string | null;
  milestoneDate: string | null;
  occurrenceDate: string;
  daysBefore: LeadTime;
  scheduledFor: string;
  status: NotificationStatus;
  sentAt: string | null;
  viewedAt: string | null;
  recommendationsCount: number;
}

export interface NotificationStore {
  insert(notification: NotificationDocument): Promise<boolean>;
  findById(notificationId: string): Promise<NotificationDocument | null>;
  listForMilestone(userId: string, milestoneId: string): Promise<NotificationDocument[]>;
  /** Only moves a row that is still pending */
  reschedule(notificationId: string, scheduledFor: string, now: string): Promise<boolean>;
  cancelPending(
    scope: { milestoneId: string } | { vaultId: string } | { notificationId: string },
    reason: string,
    now: string
  ): Promise<number>;
  /** Pending rows with scheduledFor <= now, earliest first */
  due(now: string, limit: number): Promise<NotificationDocument[]>;
  /** Conditional pending -> claimed; null when another worker won */
  claim(notificationId: string, workerId: string, now: string): Promise<NotificationDocument | null>;
  /** Conditional transition; false when the row was not in `from` */
  transition(
    notificationId: string,
    from: NotificationStatus,
    to: NotificationStatus,
    fields: Partial<Pick<NotificationDocument, 'sentAt' | 'failureReason' | 'recommendationIds'>>,
    now: string
  ): Promise<boolean>;
  staleClaims(claimedBefore: string): Promise<NotificationDocument[]>;
  /** Newest scheduledFor first */
  history(userId: string, options: { limit: number; offset: number }): Promise<NotificationDocument[]>;
  /** Stamps viewedAt on a sent row the user owns, once */
  markViewed(notificationId: string, userId: string, now: string): Promise<boolean>;
  deleteByVault(vaultId: string): Promise<number>;
}
