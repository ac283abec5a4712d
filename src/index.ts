#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { MetadataCache } from './cache.js';
import { AppConfig, ConfigError, VERSION, loadConfig, loadEnvFile } from './config.js';
import { seedFromConfig } from './context.js';
import { loadLoggerConfig, logger } from './logging/index.js';
import { OpenProjectClient } from './openproject-client.js';
import { createServer } from './server.js';
import { buildRegistry } from './tools/index.js';
import { startHttpServer } from './transports/http.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Invalid environment configuration:');
      for (const issue of error.issues) console.error(issue);
      process.exit(1);
    }
    throw error;
  }
}

// ============================================
// START SERVER
// ============================================

async function main(): Promise<void> {
  loadEnvFile();
  logger.updateConfig(loadLoggerConfig());

  const config = readConfig();
  const registry = buildRegistry({ version: VERSION, config });
  const cache = new MetadataCache({ ttlMs: config.cacheTtlSeconds * 1000 });

  if (config.transport === 'http') {
    await startHttpServer({ config, registry, cache, version: VERSION });
    console.error(`OpenProject MCP Server v${VERSION} listening on http://${config.httpHost}:${config.httpPort}/mcp`);
    console.error(`- Tools: ${registry.size} available`);
    return;
  }

  const context = seedFromConfig(config);
  const client = new OpenProjectClient({
    baseUrl: context.baseUrl,
    apiKey: context.apiKey,
    timeoutMs: config.requestTimeoutMs,
    retry: {
      maxRetries: config.maxRetries,
      backoffBaseMs: config.retryBackoffMs,
      retryOn429: config.retryOn429,
    },
    maxConcurrentRequests: config.maxConcurrentRequests,
  });

  const server = createServer({ registry, client, cache, requestId: context.requestId, version: VERSION });
  logger.getMCPLogger().setServer(server);

  await server.connect(new StdioServerTransport());

  logger.info('OpenProject MCP Server started', {
    version: VERSION,
    base_url: config.baseUrl,
    tools: registry.size,
    logging_enabled: logger.getConfig().enabled,
  }, 'main');
  console.error(`OpenProject MCP Server v${VERSION} running on stdio`);
  console.error(`- Instance: ${config.baseUrl}`);
  console.error(`- Tools: ${registry.size} available`);
  console.error('- Logging: Runtime control available via set_log_level');
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
