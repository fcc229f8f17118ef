/**
 * Logger that keeps entries in memory, bindings and context apart
 */

import type { LogContext, Logger } from '@/utils/logger';

export interface LogRecord {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  bindings: LogContext;
  context: LogContext;
}

export function createRecordingLogger(
  records: LogRecord[] = [],
  bindings: LogContext = {},
): Logger & { records: LogRecord[] } {
  const record = (level: LogRecord['level']) => (message: string, context: LogContext = {}) => {
    records.push({ level, message, bindings, context });
  };
  return {
    records,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child(extra) {
      return createRecordingLogger(records, { ...bindings, ...extra });
    },
  };
}
