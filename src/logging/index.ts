export { logger, Logger, loadLoggerConfig, parseLogLevel } from './logger.js';
export { LogLevel, type LogEntry, type PerformanceMetrics, type LoggerConfig } from './types.js';
export type { MetricsSnapshot, AggregatedMetrics } from './metrics.js';
