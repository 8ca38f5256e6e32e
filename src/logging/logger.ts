import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import pino from 'pino';
import { createStream } from 'rotating-file-stream';
import type { CategoryGateConfig } from '../config/schema.js';

export type Logger = pino.Logger;

/**
 * Application logger. Always writes to stderr; also to a daily-rotated
 * `engine.log` when `logDir` is configured.
 */
export function createLogger(config: Pick<CategoryGateConfig, 'logLevel' | 'logDir'>): Logger {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    base: { service: 'category-gate' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!config.logDir) {
    return pino(options, pino.destination(2));
  }

  const logDir = resolve(config.logDir);
  mkdirSync(logDir, { recursive: true });

  const fileStream = createStream('engine.log', {
    interval: '1d',
    size: '10M',
    rotate: 30,
    path: logDir,
    compress: 'gzip',
  });

  return pino(
    options,
    pino.multistream([
      { level: config.logLevel, stream: pino.destination(2) },
      { level: config.logLevel, stream: fileStream },
    ]),
  );
}

