/**
 * @file Notification history read API.
 *
 *   GET  /api/v1/notifications/history?limit=&offset=
 *   POST /api/v1/notifications/:id/viewed
 *
 * The caller is identified by the `x-user-id` header set by the upstream
 * gateway.
 */

import { Router } from 'express';
import { logger, errorMessage } from '../../utils/logger';
import { NotFoundError } from '../../utils/errors';
import type { NotificationScheduler } from './scheduler';

const MAX_PAGE_SIZE = 100;

/** The parts of an express request the handlers read */
export interface HandlerRequest {
  header(name: string): string | undefined;
  params: Record<string, string>;
  query: Record<string, unknown>;
}

export interface HandlerResponse {
  status(code: number): HandlerResponse;
  json(body: unknown): unknown;
}

function pageParam(value: unknown, fallback: number, max: number): number | null {
  if (value === undefined) return fallback;
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > max) return null;
  return parsed;
}

export function createHistoryHandlers(scheduler: Pick<NotificationScheduler, 'history' | 'markViewed'>) {
  return {
    async history(req: HandlerRequest, res: HandlerResponse): Promise<void> {
      const userId = req.header('x-user-id');
      if (!userId) {
        res.status(401).json({ error: 'x-user-id header is required' });
        return;
      }

      const limit = pageParam(req.query.limit, 50, MAX_PAGE_SIZE);
      const offset = pageParam(req.query.offset, 0, Number.MAX_SAFE_INTEGER);
      if (limit === null || offset === null) {
        res.status(400).json({ error: `limit must be 0-${MAX_PAGE_SIZE} and offset a non-negative integer` });
        return;
      }

      try {
        const notifications = await scheduler.history(userId, { limit, offset });
        res.status(200).json({ notifications, limit, offset });
      } catch (error) {
        logger.error(`[NotificationRouter] History failed: ${errorMessage(error)}`);
        res.status(500).json({ error: 'Failed to load notification history' });
      }
    },

    async markViewed(req: HandlerRequest, res: HandlerResponse): Promise<void> {
      const userId = req.header('x-user-id');
      if (!userId) {
        res.status(401).json({ error: 'x-user-id header is required' });
        return;
      }

      try {
        const updated = await scheduler.markViewed(req.params.id, userId);
        res.status(200).json({ notificationId: req.params.id, updated });
      } catch (error) {
        if (error instanceof NotFoundError) {
          res.status(404).json({ error: error.message });
          return;
        }
        logger.error(`[NotificationRouter] Mark viewed failed: ${errorMessage(error)}`);
        res.status(500).json({ error: 'Failed to mark notification viewed' });
      }
    },
  };
}

export function createNotificationRouter(scheduler: Pick<NotificationScheduler, 'history' | 'markViewed'>): Router {
  const handlers = createHistoryHandlers(scheduler);
  const router = Router();

  router.get('/history', (req, res) => {
    void handlers.history(req, res);
  });
  router.post('/:id/viewed', (req, res) => {
    void handlers.markViewed(req, res);
  });

  return router;
}
