// test/helpers/recording-logger.ts
import Logger from '../../src/logger.js';
import type { LoggerInstance, LogRecord } from '../../src/types/gauge-types.js';

/**
 * Real logger with console output off; every record is kept for assertions.
 */
export function recordingLogger(name: string = 'Test'): {
  logger: LoggerInstance;
  records: LogRecord[];
  messages: (level: LogRecord['level']) => string[];
} {
  const root = new Logger();
  const records: LogRecord[] = [];
  root.setLevel('trace');
  root.setConsoleOutput(false);
  root.watch(record => records.push(record));
  return {
    logger: root.createLogger(name),
    records,
    messages: level =>
      records.filter(r => r.level === level).map(r => r.args.map(String).join(' ')),
  };
}
