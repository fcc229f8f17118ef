/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

import type { Logger } from '@/utils/logger';

/**
 * Environment variables for Hono context
 */
export type HonoEnv = {
  Variables: {
    userId?: string;
    requestId: string;
    logger: Logger;
  };
};
