/**
 * @file Tests for DeliveryWorker
 */

import { DeliveryWorker } from '../../../src/services/notification_scheduler/worker';
import { NotificationScheduler } from '../../../src/services/notification_scheduler/scheduler';
import type { PushResult } from '../../../src/services/notification_scheduler/models';
import {
  InMemoryNotificationStore,
  InMemoryRecommendationStore,
  InMemoryUserSettingsStore,
  InMemoryVaultStore,
} from '../../fixtures/in_memory_stores';
import { makeSettings, makeVault } from '../../fixtures/builders';

async function setup(send: () => Promise<PushResult>) {
  const notifications = new InMemoryNotificationStore();
  const vaults = new InMemoryVaultStore();
  const settings = new InMemoryUserSettingsStore();
  await vaults.insert(makeVault());
  await settings.upsert(makeSettings());

  const scheduler = new NotificationScheduler({
    notifications,
    vaults,
    settings,
    recommendations: new InMemoryRecommendationStore(),
    transport: { send },
  });
  await scheduler.scheduleVault('vault-1', new Date('2025-05-01T12:00:00.000Z'));
  return { scheduler, notifications };
}

describe('DeliveryWorker', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should claim and deliver every due row in a tick', async () => {
    const { scheduler, notifications } = await setup(async () => ({ success: true }));
    const worker = new DeliveryWorker(scheduler, { workerId: 'worker-1', concurrency: 2 });
    const delivered = jest.fn();
    worker.on('delivered', delivered);

    const summary = await worker.tick(() => new Date('2025-06-03T13:00:00.000Z'));

    expect(summary).toEqual({
      due: 2,
      claimed: 2,
      outcomes: { sent: 2, failed: 0, cancelled: 0, skipped: 0 },
      errors: 0,
      staleReleased: 0,
    });
    expect(delivered).toHaveBeenCalledTimes(2);
    expect(notifications.all().filter((r) => r.status === 'sent').map((r) => r.claimedBy)).toEqual([
      'worker-1',
      'worker-1',
    ]);
  });

  it('should keep going when one delivery throws', async () => {
    const { scheduler } = await setup(async () => ({ success: true }));
    const deliver = jest.spyOn(scheduler, 'deliver').mockRejectedValueOnce(new Error('boom'));
    const worker = new DeliveryWorker(scheduler, { workerId: 'worker-1', concurrency: 1 });

    const summary = await worker.tick(() => new Date('2025-06-03T13:00:00.000Z'));

    expect(deliver).toHaveBeenCalledTimes(2);
    expect(summary?.errors).toBe(1);
    expect(summary?.outcomes.sent).toBe(1);
  });

  it('should skip a tick while the previous one is running', async () => {
    let release: (result: PushResult) => void = () => undefined;
    const { scheduler } = await setup(
      () =>
        new Promise<PushResult>((resolve) => {
          release = resolve;
        })
    );
    const worker = new DeliveryWorker(scheduler, { workerId: 'worker-1' });
    const now = () => new Date('2025-05-27T13:00:00.000Z');

    const first = worker.tick(now);
    expect(await worker.tick(now)).toBeNull();

    // Let the first tick reach the transport before releasing it
    await new Promise((resolve) => setImmediate(resolve));
    await new Promise((resolve) => setImmediate(resolve));
    release({ success: true });
    expect((await first)?.outcomes.sent).toBe(1);
  });

  it('should start and stop its timers', () => {
    jest.useFakeTimers();
    const scheduler = new NotificationScheduler({
      notifications: new InMemoryNotificationStore(),
      vaults: new InMemoryVaultStore(),
      settings: new InMemoryUserSettingsStore(),
      recommendations: new InMemoryRecommendationStore(),
      transport: { send: async () => ({ success: true }) },
    });
    const worker = new DeliveryWorker(scheduler, { tickMs: 1000, schedulingPassMs: 5000 });
    const tick = jest.spyOn(worker, 'tick').mockResolvedValue(null);
    const pass = jest.spyOn(worker, 'schedulingPass').mockResolvedValue(true);
    const started = jest.fn();
    worker.on('started', started);

    worker.start();
    jest.advanceTimersByTime(5000);
    worker.stop();
    jest.advanceTimersByTime(5000);

    expect(started).toHaveBeenCalledTimes(1);
    expect(worker.isRunning).toBe(false);
    expect(tick).toHaveBeenCalledTimes(5);
    expect(pass).toHaveBeenCalledTimes(1);
  });
});
