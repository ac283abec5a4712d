import { LogLevel, LogEntry, LoggerConfig, PerformanceMetrics } from './types.js';
import { MCPLogger } from './mcp-logger.js';
import { PinoSink } from './pino-sink.js';
import { MetricsCollector, MetricsSnapshot } from './metrics.js';
import { redactSecrets } from '../config.js';
import { isRecord } from '../hal.js';

const STDERR_FD = 2;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

// Load config from environment
export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    enabled: env.OPENPROJECT_LOG_ENABLED !== 'false',
    level: parseLogLevel(env.OPENPROJECT_LOG_LEVEL) ?? LogLevel.INFO,
    stderrEnabled: env.OPENPROJECT_LOG_STDERR !== 'false',
    mcpEnabled: env.OPENPROJECT_LOG_MCP_ENABLED === 'true',
    fileEnabled: env.OPENPROJECT_LOG_FILE_ENABLED === 'true',
    filePath: env.OPENPROJECT_LOG_FILE_PATH || './logs/openproject-mcp.log',
    requestsEnabled: env.OPENPROJECT_LOG_REQUESTS === 'true',
    metricsEnabled: env.OPENPROJECT_LOG_METRICS !== 'false',
  };
}

export class Logger {
  private config: LoggerConfig;
  private mcpLogger: MCPLogger;
  private stderrSink: PinoSink | null;
  private fileSink: PinoSink | null;
  private metricsCollector: MetricsCollector;
  private secrets = new Set<string>();

  constructor(config: LoggerConfig = loadLoggerConfig()) {
    this.config = config;
    this.mcpLogger = new MCPLogger();
    this.stderrSink = null;
    this.fileSink = null;
    this.openSinks();
    this.metricsCollector = new MetricsCollector(this.config.metricsEnabled);
  }

  // Check if level should be logged
  private shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    const levels = Object.values(LogLevel);
    return levels.indexOf(level) >= levels.indexOf(this.config.level);
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    const redacted: LogEntry = {
      ...entry,
      message: this.redact(entry.message),
      data: entry.data ? this.redactData(entry.data) : undefined,
      timestamp: entry.timestamp ?? new Date().toISOString(),
    };

    if (this.config.mcpEnabled) {
      this.mcpLogger.log(redacted);
    }
    this.stderrSink?.log(redacted);
    this.fileSink?.log(redacted);
  }

  // Public API (convenience methods)
  debug(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.DEBUG, message, data, logger });
  }

  info(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.INFO, message, data, logger });
  }

  notice(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.NOTICE, message, data, logger });
  }

  warning(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.WARNING, message, data, logger });
  }

  error(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.ERROR, message, data, logger });
  }

  critical(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.CRITICAL, message, data, logger });
  }

  alert(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.ALERT, message, data, logger });
  }

  emergency(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.EMERGENCY, message, data, logger });
  }

  // ============================================
  // SECRETS
  // ============================================

  addSecret(secret: string | null | undefined): void {
    if (secret) this.secrets.add(secret);
  }

  redact(text: string): string {
    return redactSecrets(text, this.secrets);
  }

  private redactData(data: Record<string, unknown>): Record<string, unknown> {
    if (this.secrets.size === 0) return data;
    const parsed: unknown = JSON.parse(this.redact(JSON.stringify(data)));
    return isRecord(parsed) ? parsed : {};
  }

  // ============================================
  // METRICS
  // ============================================

  recordMetric(metric: PerformanceMetrics): void {
    this.metricsCollector.record(metric);
  }

  getMetrics(): MetricsSnapshot {
    return this.metricsCollector.getMetrics();
  }

  clearMetrics(): void {
    this.metricsCollector.clear();
  }

  // Expose MCP logger for server initialization
  getMCPLogger(): MCPLogger {
    return this.mcpLogger;
  }

  // Runtime config update (without restart)
  updateConfig(newConfig: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...newConfig };

    const sinkKeys: (keyof LoggerConfig)[] = ['enabled', 'stderrEnabled', 'fileEnabled', 'filePath'];
    if (sinkKeys.some((key) => newConfig[key] !== undefined)) {
      this.openSinks();
    }
    if (newConfig.metricsEnabled !== undefined) {
      this.metricsCollector = new MetricsCollector(newConfig.metricsEnabled);
    }

    this.info('Logging configuration updated', { config: this.config }, 'logger');
  }

  // Sinks are reused while their target stays the same
  private openSinks(): void {
    const { enabled, stderrEnabled, fileEnabled, filePath } = this.config;

    if (enabled && stderrEnabled) {
      this.stderrSink ??= new PinoSink(STDERR_FD);
    } else {
      this.stderrSink = null;
    }

    const wantFile = enabled && fileEnabled;
    if (this.fileSink && (!wantFile || this.fileSink.target !== filePath)) {
      this.fileSink.close();
      this.fileSink = null;
    }
    if (wantFile && !this.fileSink) {
      this.fileSink = new PinoSink(filePath);
    }
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

// Singleton instance
export const logger = new Logger();
