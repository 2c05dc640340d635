import { Router, Request, Response } from 'express';
import type { TurnStore } from '../services/storage.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

/**
 * Clamp the `limit` query parameter to [1, MAX_LIMIT]
 */
export function parseLimit(value: unknown): number {
  const parsed = typeof value === 'string' ? parseInt(value, 10) : NaN;
  if (Number.isNaN(parsed)) return DEFAULT_LIMIT;
  return Math.max(1, Math.min(parsed, MAX_LIMIT));
}

export function createAdminRouter(store: TurnStore): Router {
  const router = Router();

  /**
   * GET /admin/turns?limit=N
   *
   * Most recent turns, newest first, for manual review.
   */
  router.get('/admin/turns', (req: Request, res: Response) => {
    res.json(store.recentTurns(parseLimit(req.query.limit)));
  });

  return router;
}
