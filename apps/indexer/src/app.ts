import { Hono } from 'hono';
import { requestId } from 'hono/request-id';
import { ChainIdSchema } from '@tidemark/shared/schemas';
import type { HealthResponse } from '@tidemark/shared';
import { errorHandler } from './middleware/error-handler.js';
import { IndexerError } from './lib/errors.js';
import { logger } from './lib/logger.js';
import type { AppDeps } from './types.js';

export function createApp({ store, health }: AppDeps): Hono {
  const app = new Hono();

  app.use('*', requestId());
  app.onError(errorHandler);

  // ---- Health check (with dependency probes) ----
  app.get('/health', async (c) => {
    const checks: Record<string, 'ok' | 'error'> = {};

    try {
      await store.ping();
      checks.db = 'ok';
    } catch (err) {
      logger.warn({ err }, 'Health check: database ping failed');
      checks.db = 'error';
    }

    checks.chains = health.allHealthy() ? 'ok' : 'error';

    const allHealthy = Object.values(checks).every((v) => v === 'ok');
    if (!allHealthy) {
      logger.warn({ checks }, 'Health check: some dependencies unhealthy');
    }

    const body: HealthResponse = {
      status: allHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
      chains: health.list(),
    };
    return c.json(body, allHealthy ? 200 : 503);
  });

  app.get('/health/chains', (c) => c.json({ chains: health.list() }));

  app.get('/health/chains/:chainId', (c) => {
    const parsed = ChainIdSchema.safeParse(c.req.param('chainId'));
    if (!parsed.success) {
      throw new IndexerError('VALIDATION_ERROR', 'chainId must be a positive integer', {
        chainId: c.req.param('chainId'),
      });
    }
    const chain = health.get(parsed.data);
    if (!chain) {
      throw new IndexerError('CHAIN_NOT_FOUND', `Chain ${parsed.data} is not configured`, { chainId: parsed.data });
    }
    return c.json(chain);
  });

  // ---- 404 fallback ----
  app.notFound((c) => c.json({ error: { code: 'NOT_FOUND', message: 'Route not found' } }, 404));

  return app;
}
