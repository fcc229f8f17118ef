import { GroundworkHttpClient } from '../http.js';
import type { HealthResult, HealthStatus, RepositoryHealth } from '../types.js';

interface RepositoryPayload {
  state: 'real' | 'fallback';
  backend: string;
  reason?: string;
  consecutive_failures: number;
}

interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  store: { kind: string; healthy: boolean };
  repositories: {
    search: RepositoryPayload;
    generation: RepositoryPayload;
  };
}

// 503 still carries the report when the store is down
export async function healthMethod(http: GroundworkHttpClient): Promise<HealthResult> {
  const response = await http.request<HealthResponse>({
    method: 'GET',
    path: '/health',
    acceptStatuses: [503],
  });

  return {
    status: response.status,
    timestamp: response.timestamp,
    store: response.store,
    repositories: {
      search: toRepositoryHealth(response.repositories.search),
      generation: toRepositoryHealth(response.repositories.generation),
    },
  };
}

function toRepositoryHealth(payload: RepositoryPayload): RepositoryHealth {
  return {
    state: payload.state,
    backend: payload.backend,
    ...(payload.reason !== undefined ? { reason: payload.reason } : {}),
    consecutiveFailures: payload.consecutive_failures,
  };
}
