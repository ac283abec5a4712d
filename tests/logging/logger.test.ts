import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, Logger, type LoggerConfig, loadLoggerConfig } from '../../src/logging/index.js';
import { PinoSink } from '../../src/logging/pino-sink.js';

describe('loadLoggerConfig', () => {
  it('reads OPENPROJECT_LOG_* variables', () => {
    expect(
      loadLoggerConfig({ OPENPROJECT_LOG_LEVEL: 'WARNING', OPENPROJECT_LOG_FILE_ENABLED: 'true', OPENPROJECT_LOG_METRICS: 'false' })
    ).toMatchObject({ enabled: true, level: LogLevel.WARNING, fileEnabled: true, metricsEnabled: false });
  });
});

describe('Logger file sink', () => {
  let dir: string;
  let config: LoggerConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'op-logs-'));
    config = {
      enabled: true,
      level: LogLevel.ERROR,
      stderrEnabled: false,
      mcpEnabled: false,
      fileEnabled: true,
      filePath: join(dir, 'first.log'),
      requestsEnabled: false,
      metricsEnabled: false,
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps the open file across level changes', () => {
    const close = vi.spyOn(PinoSink.prototype, 'close');
    const log = new Logger(config);

    log.updateConfig({ enabled: true, level: LogLevel.DEBUG });
    log.updateConfig({ enabled: true, level: LogLevel.ERROR });

    expect(close).not.toHaveBeenCalled();
  });

  it('closes the previous file when the path changes or file logging stops', () => {
    const close = vi.spyOn(PinoSink.prototype, 'close');
    const log = new Logger(config);

    log.updateConfig({ filePath: join(dir, 'second.log') });
    expect(close).toHaveBeenCalledTimes(1);

    log.updateConfig({ fileEnabled: false });
    expect(close).toHaveBeenCalledTimes(2);

    log.updateConfig({ enabled: false });
    expect(close).toHaveBeenCalledTimes(2);
  });
});
