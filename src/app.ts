/**
 * @file HTTP surface: health and the notification-history API.
 */

import express, { type Application, type Request, type Response } from 'express';
import { createNotificationRouter } from './services/notification_scheduler/router';
import type { NotificationScheduler } from './services/notification_scheduler/scheduler';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  checks: Record<string, boolean>;
}

export function createApp(deps: {
  scheduler: Pick<NotificationScheduler, 'history' | 'markViewed'>;
  health: () => Promise<HealthStatus>;
}): Application {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response): void => {
    deps
      .health()
      .then((health) => {
        res.status(health.status === 'healthy' ? 200 : 503).json({
          ...health,
          service: 'partner-core',
          timestamp: new Date().toISOString(),
        });
      })
      .catch((error: unknown) => {
        res.status(503).json({
          status: 'unhealthy',
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      });
  });

  app.use('/api/v1/notifications', createNotificationRouter(deps.scheduler));
  return app;
}
