import { ALogger } from './ALogger.js';
import { isVerbose, isDebugLevel, LOG_LEVEL } from '../../config/env.js';
import type { LogContext } from './ALogger.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type { LogContext } from './ALogger.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

class Logger extends ALogger {
  constructor(private readonly minLevel: LogLevel) {
    super();
  }

  private enabled(level: LogLevel): boolean {
    if (level === 'debug') {
      return isDebugLevel();
    }
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);

    let contextStr = '';
    if (context) {
      const parts: string[] = [];

      if (context.component) parts.push(`component=${String(context.component)}`);

      for (const [key, value] of Object.entries(context)) {
        if (key === 'component' || value === undefined) continue;
        parts.push(`${key}=${typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value)}`);
      }

      if (parts.length > 0) {
        contextStr = ` [${parts.join(', ')}]`;
      }
    }

    return `${timestamp} ${levelStr}${contextStr} ${message}`;
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled('debug')) return;
    console.log(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled('info')) return;
    console.log(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled('warn')) return;
    console.warn(this.formatMessage('warn', message, context));
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    console.error(this.formatMessage('error', message, context));
    if (error) {
      if (error instanceof Error) {
        console.error(`  Error: ${error.message}`);
        if (error.stack && (isVerbose() || isDebugLevel())) {
          console.error(`  Stack: ${error.stack}`);
        }
        if (isVerbose() && error.cause !== undefined) {
          console.error(`  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`);
        }
      } else {
        console.error(`  Details: ${JSON.stringify(error, null, 2)}`);
      }
    }
  }
}

/**
 * Logger that discards everything. Handy for tests and for embedding
 * components in hosts that bring their own logging.
 */
class SilentLogger extends ALogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const logger: ALogger = new Logger(LOG_LEVEL);

export const silentLogger: ALogger = new SilentLogger();
