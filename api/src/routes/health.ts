/**
 * Health Route
 *
 * Store reachability plus the state of each repository wrapper. 503 when
 * the store is down; a repository in fallback only marks the service
 * degraded.
 */

import { Hono } from 'hono';
import type { HonoEnv } from '@/types/hono';
import type { Repositories } from '@/repositories/factory';
import type { MessageStore } from '@/store/types';

export function createHealthRoutes(deps: { store: MessageStore; repositories: Repositories }) {
  const health = new Hono<HonoEnv>();

  health.get('/', async (c) => {
    const storeHealthy = await deps.store.healthCheck();
    const search = deps.repositories.search.status();
    const generation = deps.repositories.generation.status();
    const degraded = search.state === 'fallback' || generation.state === 'fallback';

    return c.json(
      {
        status: !storeHealthy ? 'unavailable' : degraded ? 'degraded' : 'ok',
        timestamp: new Date().toISOString(),
        store: { kind: deps.store.kind, healthy: storeHealthy },
        repositories: {
          search: {
            state: search.state,
            backend: search.backend,
            reason: search.reason,
            consecutive_failures: search.consecutiveFailures,
          },
          generation: {
            state: generation.state,
            backend: generation.backend,
            reason: generation.reason,
            consecutive_failures: generation.consecutiveFailures,
          },
        },
      },
      storeHealthy ? 200 : 503,
    );
  });

  return health;
}
