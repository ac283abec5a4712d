// RFC 5424 log levels (same set as MCP logging levels)
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  NOTICE = 'notice',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
  ALERT = 'alert',
  EMERGENCY = 'emergency'
}

// Log entry structure
export interface LogEntry {
  level: LogLevel;
  message: string;
  logger?: string;
  timestamp?: string;
  data?: Record<string, unknown>;
}

// Metrics structure
export interface PerformanceMetrics {
  tool: string;
  latency_ms: number;
  success: boolean;
  timestamp: string;
  status?: number;
  attempt?: number;
  error?: string;
}

// Logger configuration
export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
  stderrEnabled: boolean;
  mcpEnabled: boolean;
  fileEnabled: boolean;
  filePath: string;
  requestsEnabled: boolean;
  metricsEnabled: boolean;
}
