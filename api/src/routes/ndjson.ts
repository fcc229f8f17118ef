/**
 * NDJSON streaming for pipeline routes: one line per stage event, then a
 * final `result` or `error` line.
 */

import type { Context } from 'hono';
import { stream } from 'hono/streaming';
import { toErrorResponse } from '@/middleware/errorHandler';
import type { HonoEnv } from '@/types/hono';

export function streamNdjson<T>(
  c: Context<HonoEnv>,
  options: {
    run: (send: (line: object) => void) => Promise<T>;
    result: (value: T) => object;
    /** Log message when the pipeline throws */
    failure: string;
  },
): Response {
  const log = c.get('logger');
  c.header('Content-Type', 'application/x-ndjson; charset=utf-8');
  c.header('Cache-Control', 'no-cache');

  return stream(c, async (out) => {
    // Events fire synchronously from the pipeline; writes are chained so
    // lines leave in emission order.
    let pending: Promise<unknown> = Promise.resolve();
    const writeLine = (payload: object) => {
      pending = pending.then(() => (out.aborted ? undefined : out.write(`${JSON.stringify(payload)}\n`)));
      return pending;
    };

    try {
      const value = await options.run((line) => {
        void writeLine(line);
      });
      await writeLine({ type: 'result', ...options.result(value) });
    } catch (error) {
      const mapped = toErrorResponse(error);
      log.warn(options.failure, {
        code: mapped.body.error.code,
        error: error instanceof Error ? error.message : String(error),
      });
      await writeLine({ type: 'error', status: mapped.status, ...mapped.body });
    }
  });
}
