import { Router } from 'express';

/**
 * @openapi
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Report whether the database answers
 *     responses:
 *       200:
 *         description: Database reachable
 *       500:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

export type HealthCheck = () => Promise<unknown>;

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createHealthRoutes(check: HealthCheck, timeoutMs = HEALTH_TIMEOUT_MS) {
  const router = Router();

  router.get('/healthz', (_req, res, next) => {
    withTimeout(check(), timeoutMs)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  return router;
}
