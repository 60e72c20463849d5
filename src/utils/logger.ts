/**
 * Pino logger
 *
 * Writes to stdout, and to LOG_FILE as well when one is configured.
 */

import pino from 'pino';
import { config } from '../config/index.js';

/**
 * Errors are logged as `{ error }` across the app; pino only serialises `err` out of the box.
 */
export function buildLoggerOptions(level: pino.LevelWithSilent): pino.LoggerOptions {
  return {
    name: config.app.name,
    level,
    base: { app: config.app.name, version: config.app.version },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { error: pino.stdSerializers.err, err: pino.stdSerializers.err },
  };
}

function createLogger(): pino.Logger {
  const level = config.app.env === 'test' ? 'silent' : config.logging.level;
  const options = buildLoggerOptions(level);

  if (!config.logging.file) {
    return pino(options);
  }

  const streamLevel: pino.Level = level === 'silent' ? 'fatal' : level;

  return pino(
    options,
    pino.multistream([
      { level: streamLevel, stream: process.stdout },
      {
        level: streamLevel,
        stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }),
      },
    ])
  );
}

export const logger = createLogger();

export type Logger = pino.Logger;
