import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';
import { LogEntry, LogLevel } from './types.js';

const MCP_LEVELS: Record<LogLevel, LoggingLevel> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.NOTICE]: 'notice',
  [LogLevel.WARNING]: 'warning',
  [LogLevel.ERROR]: 'error',
  [LogLevel.CRITICAL]: 'critical',
  [LogLevel.ALERT]: 'alert',
  [LogLevel.EMERGENCY]: 'emergency',
};

/** Forwards log entries to the connected client as `notifications/message`. */
export class MCPLogger {
  private server: Server | null = null; // set once the transport is connected

  setServer(server: Server | null): void {
    this.server = server;
  }

  log(entry: LogEntry): void {
    if (!this.server) return;

    void this.server
      .sendLoggingMessage({
        level: MCP_LEVELS[entry.level],
        logger: entry.logger || 'openproject-mcp',
        data: {
          message: entry.message,
          timestamp: entry.timestamp || new Date().toISOString(),
          ...entry.data,
        },
      })
      .catch((error: unknown) => {
        // a log notification must never fail a tool call; report on stderr
        process.stderr.write(`[MCPLogger] Failed to send log: ${String(error)}\n`);
      });
  }
}
