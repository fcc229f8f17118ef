/**
 * Vitest Global Setup
 *
 * Loads environment variables and sets up test configuration
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'node:url';

// Set NODE_ENV to 'test' BEFORE loading dotenv so verbose errors and the
// test auth headers are active
process.env.NODE_ENV = 'test';

// Load .env.test if it exists
config({ path: fileURLToPath(new URL('../.env.test', import.meta.url)) });

// Tests never reach a database or a real backend
delete process.env.DATABASE_URL;
process.env.USE_STAND_INS = 'true';

if (!process.env.JWT_SECRET) {
  process.env.JWT_SECRET = 'test-secret';
}

// Keep test output quiet unless asked for
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
