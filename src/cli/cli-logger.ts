import { ConsoleLogger, LogLevel } from '@nestjs/common';

const LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Levels enabled for a threshold: "warn" → error and warn.
 * Unknown names fall back to "log".
 */
export function logLevelsFor(threshold: string): LogLevel[] {
  const index = LEVELS.findIndex((level) => level === threshold);
  return LEVELS.slice(0, (index === -1 ? LEVELS.indexOf('log') : index) + 1);
}

// Nest's console logger with every level on stderr: stdout carries the report.
export class CliLogger extends ConsoleLogger {
  protected printMessages(messages: unknown[], context?: string, logLevel?: LogLevel): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
