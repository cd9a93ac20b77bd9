import pino from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

declare global {
  // eslint-disable-next-line no-var
  var __LOG_COLLECTOR__: string[] | undefined;
}

function collectorLogger(level: string): pino.Logger {
  const logs: string[] = [];
  globalThis.__LOG_COLLECTOR__ = logs;
  const sink = new Writable({
    write(chunk: Buffer, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return pino({ level }, sink);
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      loggerInstance = collectorLogger(cfg.logging.level);
    } else {
      loggerInstance = pino({
        level: cfg.logging.level,
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level = 'debug') {
  loggerInstance = collectorLogger(level);
  return globalThis.__LOG_COLLECTOR__ ?? [];
}
