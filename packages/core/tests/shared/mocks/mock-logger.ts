import type { LogContext } from '@huffkit/shared';
import type { HuffLogger } from '../../../src/huff-types.js';

type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

interface CapturedLog {
  level: LogLevelName;
  message: string;
  context?: LogContext;
}

/**
 * Mock logger for unit testing
 * Captures log messages for assertion without console output
 */
export class MockLogger implements HuffLogger {
  private logs: CapturedLog[] = [];

  debug(message: string, context?: LogContext): void {
    this.logs.push({ level: 'debug', message, context });
  }

  info(message: string, context?: LogContext): void {
    this.logs.push({ level: 'info', message, context });
  }

  warn(message: string, context?: LogContext): void {
    this.logs.push({ level: 'warn', message, context });
  }

  error(message: string, context?: LogContext): void {
    this.logs.push({ level: 'error', message, context });
  }

  getLogs(): CapturedLog[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevelName): CapturedLog[] {
    return this.logs.filter(log => log.level === level);
  }

  hasLog(level: LogLevelName, message: string): boolean {
    return this.logs.some(
      log => log.level === level && log.message.includes(message)
    );
  }

  clear(): void {
    this.logs = [];
  }
}
