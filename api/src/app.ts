/**
 * Groundwork HTTP application
 *
 * - POST /chat, POST /vote
 * - POST /ask, POST /ask/stream
 * - /sessions (create, fetch, list, history, close, delete)
 * - GET /health
 */

import { Hono } from 'hono';
import type { Container } from '@/container';
import { createAuthResolver } from '@/middleware/auth';
import { createCors } from '@/middleware/cors';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createRateLimit } from '@/middleware/rateLimit';
import { createRequestContext } from '@/middleware/requestContext';
import { securityHeaders } from '@/middleware/securityHeaders';
import { createAskRoutes } from '@/routes/ask';
import { createChatRoutes } from '@/routes/chat';
import { createHealthRoutes } from '@/routes/health';
import { createSessionRoutes } from '@/routes/sessions';
import { createVoteRoutes } from '@/routes/vote';
import type { HonoEnv } from '@/types/hono';

export function createApp(container: Container) {
  const { config } = container;
  const app = new Hono<HonoEnv>();

  // Global middleware chain
  app.use('*', createRequestContext(container.logger));
  app.use('*', securityHeaders);
  app.use('*', createCors(config.corsOrigins));
  app.use(
    '*',
    createAuthResolver({
      jwtSecret: config.jwtSecret,
      allowTestHeaders: config.env === 'test',
    }),
  );

  // chat and ask draw on one per-user budget
  const rateLimit = createRateLimit(container.rateLimiter);

  app.route('/health', createHealthRoutes(container));
  app.route('/chat', createChatRoutes({ chatService: container.chatService, rateLimit }));
  app.route('/ask', createAskRoutes({ askService: container.askService, rateLimit }));
  app.route('/vote', createVoteRoutes(container));
  app.route('/sessions', createSessionRoutes(container));

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}

export type App = ReturnType<typeof createApp>;
