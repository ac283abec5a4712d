import { AxiosInstance, AxiosError, InternalAxiosRequestConfig, AxiosResponse } from 'axios';
import type { IAxiosRetryConfigExtended } from 'axios-retry';
import { logger } from '../logging/index.js';

declare module 'axios' {
  interface AxiosRequestConfig {
    /** Tool that issued the call; shows up in logs and metrics. */
    tool?: string;
    metadata?: { startTime: number };
  }
}

// axios-retry keeps its per-request state under this key
function attemptOf(config: { 'axios-retry'?: IAxiosRetryConfigExtended } | undefined): number {
  return (config?.['axios-retry']?.retryCount ?? 0) + 1;
}

/**
 * Registered before axios-retry so every attempt is seen, not only the last.
 */
export function setupLoggingMiddleware(axiosInstance: AxiosInstance): void {
  axiosInstance.interceptors.request.use((config: InternalAxiosRequestConfig) => {
    config.metadata = { startTime: Date.now() };

    if (logger.getConfig().requestsEnabled) {
      logger.debug('HTTP Request', {
        tool: config.tool,
        method: config.method?.toUpperCase(),
        url: axiosInstance.getUri(config),
        params: config.params,
        attempt: attemptOf(config),
      }, 'http-client');
    }

    return config;
  });

  axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      const config = response.config;
      const duration = Date.now() - (config.metadata?.startTime ?? Date.now());

      if (logger.getConfig().requestsEnabled) {
        logger.debug('HTTP Response', {
          tool: config.tool,
          method: config.method?.toUpperCase(),
          url: axiosInstance.getUri(config),
          status: response.status,
          duration_ms: duration,
          attempt: attemptOf(config),
        }, 'http-client');
      }

      logger.recordMetric({
        tool: 'http_request',
        latency_ms: duration,
        success: true,
        timestamp: new Date().toISOString(),
        status: response.status,
        attempt: attemptOf(config),
      });

      return response;
    },
    (error: unknown) => {
      if (!(error instanceof AxiosError)) {
        return Promise.reject(error);
      }

      const config = error.config;
      const duration = config?.metadata ? Date.now() - config.metadata.startTime : 0;

      logger.warning('HTTP Response Error', {
        tool: config?.tool,
        method: config?.method?.toUpperCase(),
        url: config ? axiosInstance.getUri(config) : undefined,
        status: error.response?.status,
        code: error.code,
        duration_ms: duration,
        attempt: attemptOf(config),
        message: error.message,
      }, 'http-client');

      logger.recordMetric({
        tool: 'http_request',
        latency_ms: duration,
        success: false,
        timestamp: new Date().toISOString(),
        status: error.response?.status,
        attempt: attemptOf(config),
        error: error.message,
      });

      return Promise.reject(error);
    }
  );
}
