/**
 * @file Delivery worker: a periodic tick that claims due notifications and
 * delivers them through a fixed-size pool, plus a slower scheduling pass.
 *
 * A tick still running when the next one fires is skipped, never overlapped.
 * Every item is processed in its own try/catch so one failure cannot stop the
 * rest of the tick.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { logger, errorMessage, shortId } from '../../utils/logger';
import { runPool } from '../../utils/async';
import type { NotificationScheduler } from './scheduler';
import type { DeliveryOutcome } from './models';

export interface DeliveryWorkerConfig {
  tickMs: number;
  schedulingPassMs: number;
  concurrency: number;
  /** Due rows fetched per tick */
  batchSize: number;
  workerId: string;
}

const DEFAULT_CONFIG: DeliveryWorkerConfig = {
  tickMs: 60_000,
  schedulingPassMs: 3_600_000,
  concurrency: 4,
  batchSize: 100,
  workerId: `worker-${uuidv4()}`,
};

export interface TickSummary {
  due: number;
  claimed: number;
  outcomes: Record<DeliveryOutcome, number>;
  errors: number;
  staleReleased: number;
}

export class DeliveryWorker extends EventEmitter {
  readonly config: DeliveryWorkerConfig;
  private tickTimer: NodeJS.Timeout | null = null;
  private passTimer: NodeJS.Timeout | null = null;
  private ticking = false;
  private passing = false;

  constructor(
    private readonly scheduler: NotificationScheduler,
    config: Partial<DeliveryWorkerConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get isRunning(): boolean {
    return this.tickTimer !== null;
  }

  start(): void {
    if (this.tickTimer) {
      logger.warn('[DeliveryWorker] Already running');
      return;
    }

    this.tickTimer = setInterval(() => {
      void this.tick();
    }, this.config.tickMs);
    this.passTimer = setInterval(() => {
      void this.schedulingPass();
    }, this.config.schedulingPassMs);

    logger.info(`[DeliveryWorker] ${this.config.workerId} started (tick ${this.config.tickMs}ms)`);
    this.emit('started');
  }

  stop(): void {
    if (!this.tickTimer) return;

    clearInterval(this.tickTimer);
    this.tickTimer = null;
    if (this.passTimer) {
      clearInterval(this.passTimer);
      this.passTimer = null;
    }

    logger.info(`[DeliveryWorker] ${this.config.workerId} stopped`);
    this.emit('stopped');
  }

  /**
   * One delivery cycle. Returns null when the previous tick is still running.
   */
  async tick(now: () => Date = () => new Date()): Promise<TickSummary | null> {
    if (this.ticking) {
      logger.debug('[DeliveryWorker] Previous tick still running, skipping');
      return null;
    }
    this.ticking = true;

    const summary: TickSummary = {
      due: 0,
      claimed: 0,
      outcomes: { sent: 0, failed: 0, cancelled: 0, skipped: 0 },
      errors: 0,
      staleReleased: 0,
    };

    try {
      summary.staleReleased = await this.scheduler.releaseStaleClaims(now());
      const due = await this.scheduler.dueNotifications(now(), this.config.batchSize);
      summary.due = due.length;

      await runPool(due, this.config.concurrency, async (row) => {
        try {
          const claimed = await this.scheduler.claim(row.notificationId, this.config.workerId, now());
          if (!claimed) return;
          summary.claimed++;
          const outcome = await this.scheduler.deliver(claimed, now());
          summary.outcomes[outcome]++;
          this.emit('delivered', { notificationId: claimed.notificationId, outcome });
        } catch (error) {
          summary.errors++;
          logger.error(`[DeliveryWorker] Delivery of ${shortId(row.notificationId)} errored: ${errorMessage(error)}`);
        }
      });

      if (summary.due > 0) {
        logger.info(
          `[DeliveryWorker] Tick: ${summary.due} due, ${summary.claimed} claimed, ` +
            `${summary.outcomes.sent} sent, ${summary.outcomes.failed} failed, ${summary.outcomes.cancelled} cancelled`
        );
      }
      this.emit('tick', summary);
      return summary;
    } catch (error) {
      logger.error(`[DeliveryWorker] Tick failed: ${errorMessage(error)}`);
      this.emit('tick_failed', error);
      return summary;
    } finally {
      this.ticking = false;
    }
  }

  /**
   * Scheduling pass over all vaults; skipped while one is running.
   */
  async schedulingPass(now: Date = new Date()): Promise<boolean> {
    if (this.passing) return false;
    this.passing = true;
    try {
      await this.scheduler.runSchedulingPass(now);
      return true;
    } catch (error) {
      logger.error(`[DeliveryWorker] Scheduling pass failed: ${errorMessage(error)}`);
      return false;
    } finally {
      this.passing = false;
    }
  }
}
