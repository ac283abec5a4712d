import pino from 'pino';
import { LogEntry, LogLevel } from './types.js';

type PinoLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Structured JSON sink. `target` is a file path or a file descriptor
 * (2 = stderr; stdout carries JSON-RPC on the stdio transport).
 */
export class PinoSink {
  readonly target: string | number;
  private destination: ReturnType<typeof pino.destination>;
  private pino: pino.Logger;

  constructor(target: string | number) {
    this.target = target;
    this.destination =
      typeof target === 'number'
        ? pino.destination({ dest: target, sync: true })
        : pino.destination({ dest: target, sync: false, mkdir: true });
    this.pino = pino(
      {
        level: 'debug', // filtering happens in logger.ts
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
        redact: {
          paths: ['*.apiKey', '*.api_key', '*.password', '*.authorization', 'headers.Authorization'],
          censor: '***REDACTED***',
        },
      },
      this.destination
    );
  }

  /** Flush pending writes and release the file; never called for stderr. */
  close(): void {
    this.destination.end();
  }

  log(entry: LogEntry): void {
    this.pino[this.mapToPinoLevel(entry.level)](
      {
        level: entry.level, // keep the RFC 5424 label
        logger: entry.logger,
        timestamp: entry.timestamp,
        ...entry.data,
      },
      entry.message
    );
  }

  // Map RFC 5424 levels to pino's standard levels
  private mapToPinoLevel(level: LogLevel): PinoLevel {
    switch (level) {
      case LogLevel.DEBUG: return 'debug';
      case LogLevel.INFO: return 'info';
      case LogLevel.NOTICE: return 'info';
      case LogLevel.WARNING: return 'warn';
      case LogLevel.ERROR: return 'error';
      case LogLevel.CRITICAL: return 'error';
      case LogLevel.ALERT: return 'fatal';
      case LogLevel.EMERGENCY: return 'fatal';
      default: return 'info';
    }
  }
}
