/**
 * @file Tests for NotificationScheduler planning and delivery
 */

import { NotificationScheduler } from '../../../src/services/notification_scheduler/scheduler';
import type {
  NotificationDocument,
  PushPayload,
  PushResult,
  SchedulerConfig,
} from '../../../src/services/notification_scheduler/models';
import type { DevicePlatform } from '../../../src/models/user';
import { RecommendationService, CatalogCandidateSource } from '../../../src/services/recommendation_scorer';
import { EmbeddingStore } from '../../../src/services/embedding_store';
import { NotFoundError } from '../../../src/utils/errors';
import {
  InMemoryFeedbackStore,
  InMemoryHintStore,
  InMemoryNotificationStore,
  InMemoryRecommendationStore,
  InMemoryUserSettingsStore,
  InMemoryVaultStore,
  InMemoryWeightStore,
} from '../../fixtures/in_memory_stores';
import { makeMilestone, makeSettings, makeVault } from '../../fixtures/builders';

const MAY_FIRST = new Date('2025-05-01T12:00:00.000Z');

interface Harness {
  scheduler: NotificationScheduler;
  notifications: InMemoryNotificationStore;
  vaults: InMemoryVaultStore;
  settings: InMemoryUserSettingsStore;
  recommendations: InMemoryRecommendationStore;
  send: jest.Mock<Promise<PushResult>, [string, DevicePlatform, PushPayload]>;
}

async function createHarness(
  options: { config?: Partial<SchedulerConfig>; withRecommender?: boolean } = {}
): Promise<Harness> {
  const notifications = new InMemoryNotificationStore();
  const vaults = new InMemoryVaultStore();
  const settings = new InMemoryUserSettingsStore();
  const recommendations = new InMemoryRecommendationStore();
  const send = jest.fn<Promise<PushResult>, [string, DevicePlatform, PushPayload]>();
  send.mockResolvedValue({ success: true });

  await vaults.insert(makeVault());
  await settings.upsert(makeSettings());

  const recommender = options.withRecommender
    ? new RecommendationService({
        vaults,
        weights: new InMemoryWeightStore(),
        embeddings: new EmbeddingStore(new InMemoryHintStore(), { dimension: 3 }),
        recommendations,
        feedback: new InMemoryFeedbackStore(),
      })
    : undefined;

  const scheduler = new NotificationScheduler(
    {
      notifications,
      vaults,
      settings,
      recommendations,
      transport: { send },
      recommender,
      candidates: options.withRecommender ? new CatalogCandidateSource() : undefined,
    },
    options.config
  );
  return { scheduler, notifications, vaults, settings, recommendations, send };
}

function byLead(rows: NotificationDocument[]): Record<number, NotificationDocument> {
  return Object.fromEntries(rows.map((r) => [r.daysBefore, r]));
}

async function claimAndDeliver(h: Harness, now: Date): Promise<string[]> {
  const outcomes: string[] = [];
  for (const row of await h.scheduler.dueNotifications(now)) {
    const claimed = await h.scheduler.claim(row.notificationId, 'worker-test', now);
    if (claimed) outcomes.push(await h.scheduler.deliver(claimed, now));
  }
  return outcomes;
}

describe('NotificationScheduler', () => {
  describe('scheduleVault', () => {
    it('should plan 14, 7 and 3 days ahead at 09:00 local time', async () => {
      const h = await createHarness();

      const result = await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      expect(result).toEqual({ created: 3, updated: 0, cancelled: 0, unchanged: 0, skipped: 0 });
      const rows = byLead(h.notifications.all());
      expect(rows[14].scheduledFor).toBe('2025-05-27T13:00:00.000Z');
      expect(rows[7].scheduledFor).toBe('2025-06-03T13:00:00.000Z');
      expect(rows[3].scheduledFor).toBe('2025-06-07T13:00:00.000Z');
      expect(rows[14].occurrenceDate).toBe('2025-06-10');
      expect(rows[14].status).toBe('pending');
      expect(rows[14].milestoneRevision).toBe(1);
    });

    it('should defer a send hour inside quiet hours to the end of the window', async () => {
      const h = await createHarness({ config: { sendHour: 23 } });

      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      // 2025-05-28 08:00 America/New_York
      expect(byLead(h.notifications.all())[14].scheduledFor).toBe('2025-05-28T12:00:00.000Z');
    });

    it('should be idempotent across repeated passes', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      const again = await h.scheduler.scheduleVault('vault-1', new Date('2025-05-02T12:00:00.000Z'));

      expect(again).toEqual({ created: 0, updated: 0, cancelled: 0, unchanged: 3, skipped: 0 });
      expect(h.notifications.rows.size).toBe(3);
    });

    it('should skip lead times that have already passed', async () => {
      const h = await createHarness();

      const result = await h.scheduler.scheduleVault('vault-1', new Date('2025-06-05T12:00:00.000Z'));

      expect(result).toEqual({ created: 1, updated: 0, cancelled: 0, unchanged: 0, skipped: 2 });
      expect(h.notifications.all().map((r) => r.daysBefore)).toEqual([3]);
    });

    it('should roll a yearly milestone to next year when nothing is left this year', async () => {
      const h = await createHarness();

      await h.scheduler.scheduleVault('vault-1', new Date('2025-06-09T12:00:00.000Z'));

      const rows = byLead(h.notifications.all());
      expect(rows[14].occurrenceDate).toBe('2026-06-10');
      expect(rows[14].scheduledFor).toBe('2026-05-27T13:00:00.000Z');
    });

    it('should use the zone of the vault state when settings have none', async () => {
      const h = await createHarness();
      await h.settings.upsert(makeSettings({ timezone: null }));
      await h.vaults.replace(makeVault({ location: { state: 'CA' }, version: 2 }), 1);

      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      // 09:00 America/Los_Angeles (PDT)
      expect(byLead(h.notifications.all())[14].scheduledFor).toBe('2025-05-27T16:00:00.000Z');
    });

    it('should reschedule pending rows when the time zone changes', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      await h.settings.upsert(makeSettings({ timezone: 'America/Chicago' }));

      const result = await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      expect(result).toEqual({ created: 0, updated: 3, cancelled: 0, unchanged: 0, skipped: 0 });
      expect(byLead(h.notifications.all())[7].scheduledFor).toBe('2025-06-03T14:00:00.000Z');
    });

    it('should supersede rows of an older milestone revision', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      await h.vaults.replace(
        makeVault({ milestones: [makeMilestone({ date: '1994-07-04', revision: 2 })], version: 2 }),
        1
      );

      const result = await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      expect(result).toEqual({ created: 3, updated: 0, cancelled: 3, unchanged: 0, skipped: 0 });
      const live = h.notifications.all().filter((r) => r.status === 'pending');
      expect(live.map((r) => r.occurrenceDate)).toEqual(['2025-07-04', '2025-07-04', '2025-07-04']);
      const superseded = h.notifications.all().filter((r) => r.status === 'cancelled');
      expect(superseded.every((r) => r.failureReason === 'superseded')).toBe(true);
    });

    it('should plan nothing for a one-time milestone in the past', async () => {
      const h = await createHarness();
      await h.vaults.replace(
        makeVault({ milestones: [makeMilestone({ date: '2025-04-01', recurrence: 'one_time' })], version: 2 }),
        1
      );

      const result = await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      expect(result).toEqual({ created: 0, updated: 0, cancelled: 0, unchanged: 0, skipped: 0 });
      expect(h.notifications.rows.size).toBe(0);
    });

    it('should return null for a missing vault', async () => {
      const h = await createHarness();
      expect(await h.scheduler.scheduleVault('vault-missing', MAY_FIRST)).toBeNull();
    });
  });

  describe('across daylight-saving changes', () => {
    it('should not duplicate rows when re-planned after clocks spring forward', async () => {
      const h = await createHarness();
      await h.vaults.replace(makeVault({ milestones: [makeMilestone({ date: '1990-03-20' })], version: 2 }), 1);

      const first = await h.scheduler.scheduleVault('vault-1', new Date('2025-03-01T12:00:00.000Z'));
      expect(first).toEqual({ created: 3, updated: 0, cancelled: 0, unchanged: 0, skipped: 0 });
      expect(h.notifications.all().map((r) => r.scheduledFor)).toEqual([
        '2025-03-06T14:00:00.000Z',
        '2025-03-13T13:00:00.000Z',
        '2025-03-17T13:00:00.000Z',
      ]);

      const again = await h.scheduler.scheduleVault('vault-1', new Date('2025-03-10T12:00:00.000Z'));

      expect(again).toEqual({ created: 0, updated: 0, cancelled: 0, unchanged: 3, skipped: 0 });
      expect(h.notifications.rows.size).toBe(3);
    });

    it('should not duplicate rows when re-planned after clocks fall back', async () => {
      const h = await createHarness();
      await h.vaults.replace(makeVault({ milestones: [makeMilestone({ date: '1990-11-10' })], version: 2 }), 1);

      await h.scheduler.scheduleVault('vault-1', new Date('2025-10-20T12:00:00.000Z'));
      expect(h.notifications.all().map((r) => r.scheduledFor)).toEqual([
        '2025-10-27T13:00:00.000Z',
        '2025-11-03T14:00:00.000Z',
        '2025-11-07T14:00:00.000Z',
      ]);

      const again = await h.scheduler.scheduleVault('vault-1', new Date('2025-11-02T12:00:00.000Z'));

      expect(again).toEqual({ created: 0, updated: 0, cancelled: 0, unchanged: 3, skipped: 0 });
      expect(h.notifications.rows.size).toBe(3);
    });

    it('should keep a send time that falls in the skipped hour stable', async () => {
      const h = await createHarness({ config: { sendHour: 2 } });
      await h.settings.upsert(makeSettings({ quietHoursStart: 0, quietHoursEnd: 0 }));
      await h.vaults.replace(makeVault({ milestones: [makeMilestone({ date: '1990-03-16' })], version: 2 }), 1);

      await h.scheduler.scheduleVault('vault-1', new Date('2025-03-01T12:00:00.000Z'));
      // 02:00 does not exist on 2025-03-09; the 7-day row moves to 03:00 EDT
      expect(byLead(h.notifications.all())[7].scheduledFor).toBe('2025-03-09T07:00:00.000Z');

      const again = await h.scheduler.scheduleVault('vault-1', new Date('2025-03-10T00:00:00.000Z'));

      expect(again).toEqual({ created: 0, updated: 0, cancelled: 0, unchanged: 3, skipped: 0 });
      expect(h.notifications.rows.size).toBe(3);
    });
  });

  describe('cancelFor', () => {
    it('should cancel every pending row of the milestone', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      const cancelled = await h.scheduler.cancelFor('ms-birthday', 'milestone_deleted', MAY_FIRST);

      expect(cancelled).toBe(3);
      expect(h.notifications.all().every((r) => r.status === 'cancelled')).toBe(true);
      expect(h.notifications.all()[0].failureReason).toBe('milestone_deleted');
    });
  });

  describe('deliver', () => {
    const DUE = new Date('2025-05-27T13:00:00.000Z');

    it('should send a claimed notification and record sentAt', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      expect(await claimAndDeliver(h, DUE)).toEqual(['sent']);

      expect(h.send).toHaveBeenCalledTimes(1);
      const [token, platform, payload] = h.send.mock.calls[0];
      expect(token).toBe('device-token-1');
      expect(platform).toBe('ios');
      expect(payload.title).toBe("Sam's Birthday is in 14 days");
      expect(payload.body).toBe('Tap to start planning.');
      expect(payload.category).toBe('MILESTONE_REMINDER');

      const sent = byLead(h.notifications.all())[14];
      expect(sent.status).toBe('sent');
      expect(sent.sentAt).toBe('2025-05-27T13:00:00.000Z');
    });

    it('should pre-attach recommendations when a recommender is wired', async () => {
      const h = await createHarness({ withRecommender: true });
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      await claimAndDeliver(h, DUE);

      const payload = h.send.mock.calls[0][2];
      expect(payload.body).toBe("I've found 3 Romantic options based on their interests. Tap to see them.");
      const sent = byLead(h.notifications.all())[14];
      expect(sent.recommendationIds).toHaveLength(3);
      expect(payload.data.recommendationIds).toEqual(sent.recommendationIds);
      const counts = await h.recommendations.countByNotification([sent.notificationId]);
      expect(counts.get(sent.notificationId)).toBe(3);
    });

    it('should mark the row failed with the transport reason', async () => {
      const h = await createHarness();
      h.send.mockResolvedValue({ success: false, reason: 'Unregistered' });
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      expect(await claimAndDeliver(h, DUE)).toEqual(['failed']);
      expect(byLead(h.notifications.all())[14].failureReason).toBe('Unregistered');
    });

    it('should fail a delivery that exceeds the push timeout', async () => {
      const h = await createHarness({ config: { pushTimeoutMs: 5 } });
      h.send.mockReturnValue(new Promise<PushResult>(() => undefined));
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      expect(await claimAndDeliver(h, DUE)).toEqual(['failed']);
      expect(byLead(h.notifications.all())[14].failureReason).toBe('Push delivery timed out after 5ms');
    });

    it('should fail without a device token', async () => {
      const h = await createHarness();
      await h.settings.upsert(makeSettings({ deviceToken: null, devicePlatform: null }));
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      expect(await claimAndDeliver(h, DUE)).toEqual(['failed']);
      expect(byLead(h.notifications.all())[14].failureReason).toBe('no_device_token');
      expect(h.send).not.toHaveBeenCalled();
    });

    it('should cancel when notifications are disabled', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      await h.settings.upsert(makeSettings({ notificationsEnabled: false }));

      expect(await claimAndDeliver(h, DUE)).toEqual(['cancelled']);
      expect(byLead(h.notifications.all())[14].failureReason).toBe('notifications_disabled');
    });

    it('should cancel when the milestone revision moved on', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      await h.vaults.replace(makeVault({ milestones: [makeMilestone({ revision: 2 })], version: 2 }), 1);

      expect(await claimAndDeliver(h, DUE)).toEqual(['cancelled']);
      expect(byLead(h.notifications.all())[14].failureReason).toBe('milestone_removed');
    });

    it('should skip a row that is not claimed', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      const [row] = await h.scheduler.dueNotifications(DUE);

      expect(await h.scheduler.deliver(row, DUE)).toBe('skipped');
      expect(h.send).not.toHaveBeenCalled();
    });

    it('should let only one worker claim a row', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      const [row] = await h.scheduler.dueNotifications(DUE);

      const first = await h.scheduler.claim(row.notificationId, 'worker-a', DUE);
      const second = await h.scheduler.claim(row.notificationId, 'worker-b', DUE);

      expect(first?.claimedBy).toBe('worker-a');
      expect(second).toBeNull();
    });

    it('should plan the next year once the last lead time is sent', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);

      await claimAndDeliver(h, DUE);
      await claimAndDeliver(h, new Date('2025-06-03T13:00:00.000Z'));
      await claimAndDeliver(h, new Date('2025-06-07T13:00:00.000Z'));

      const thisYear = h.notifications.all().filter((r) => r.occurrenceDate === '2025-06-10');
      const nextYear = h.notifications.all().filter((r) => r.occurrenceDate === '2026-06-10');
      expect(thisYear.map((r) => r.status)).toEqual(['sent', 'sent', 'sent']);
      expect(nextYear.map((r) => r.status)).toEqual(['pending', 'pending', 'pending']);

      const pass = await h.scheduler.runSchedulingPass(new Date('2025-06-08T12:00:00.000Z'));
      expect(pass.result.created).toBe(0);
      expect(h.notifications.rows.size).toBe(6);
    });

    it('should not plan the next year while a row is still claimed', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      const afterLastLead = new Date('2025-06-08T12:00:00.000Z');
      for (const row of await h.scheduler.dueNotifications(afterLastLead)) {
        await h.scheduler.claim(row.notificationId, 'worker-a', afterLastLead);
      }

      const result = await h.scheduler.scheduleVault('vault-1', afterLastLead);

      expect(result).toEqual({ created: 0, updated: 0, cancelled: 0, unchanged: 3, skipped: 0 });
      expect(h.notifications.all().map((r) => r.status)).toEqual(['claimed', 'claimed', 'claimed']);
    });
  });

  describe('releaseStaleClaims', () => {
    it('should fail claims older than the claim timeout', async () => {
      const h = await createHarness({ config: { claimTimeoutMs: 60_000 } });
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      const due = new Date('2025-05-27T13:00:00.000Z');
      const [row] = await h.scheduler.dueNotifications(due);
      await h.scheduler.claim(row.notificationId, 'worker-dead', due);

      expect(await h.scheduler.releaseStaleClaims(new Date('2025-05-27T13:00:30.000Z'))).toBe(0);
      expect(await h.scheduler.releaseStaleClaims(new Date('2025-05-27T13:05:00.000Z'))).toBe(1);

      const released = await h.notifications.findById(row.notificationId);
      expect(released?.status).toBe('failed');
      expect(released?.failureReason).toBe('claim_timeout');
    });
  });

  describe('history', () => {
    it('should join milestone fields and recommendation counts', async () => {
      const h = await createHarness({ withRecommender: true });
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      await claimAndDeliver(h, new Date('2025-05-27T13:00:00.000Z'));

      const items = await h.scheduler.history('user-1', { limit: 10 });

      expect(items.map((i) => i.daysBefore)).toEqual([3, 7, 14]);
      expect(items[2]).toMatchObject({
        milestoneName: 'Birthday',
        milestoneType: 'birthday',
        status: 'sent',
        recommendationsCount: 3,
      });
      expect(items[0].recommendationsCount).toBe(0);
    });

    it('should stamp viewedAt once on a sent row', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      await claimAndDeliver(h, new Date('2025-05-27T13:00:00.000Z'));
      const sent = byLead(h.notifications.all())[14];
      const viewedAt = new Date('2025-05-27T14:00:00.000Z');

      expect(await h.scheduler.markViewed(sent.notificationId, 'user-1', viewedAt)).toBe(true);
      expect(await h.scheduler.markViewed(sent.notificationId, 'user-1', viewedAt)).toBe(false);
      expect((await h.notifications.findById(sent.notificationId))?.viewedAt).toBe('2025-05-27T14:00:00.000Z');
    });

    it('should hide rows owned by another user', async () => {
      const h = await createHarness();
      await h.scheduler.scheduleVault('vault-1', MAY_FIRST);
      const row = h.notifications.all()[0];

      await expect(h.scheduler.markViewed(row.notificationId, 'user-2')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
