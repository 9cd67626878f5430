/**
 * Structured logger (pino)
 *
 * Writes JSON lines to stdout, and to LOG_FILE as well when it is set.
 */

import pino from 'pino';
import { config } from '../config/index.js';

/**
 * Call sites log failures as `{ error }`, so that key gets the Error
 * serializer pino only applies to `err` by default.
 */
export function buildLoggerOptions(level: string, app: string): pino.LoggerOptions {
  return {
    level,
    base: { app },
    serializers: { error: pino.stdSerializers.err },
  };
}

function createLogger(): pino.Logger {
  const { level, file } = config.logging;
  const options = buildLoggerOptions(level, config.app.name);

  if (!file) {
    return pino(options);
  }

  return pino(
    options,
    pino.multistream([
      { level, stream: process.stdout },
      { level, stream: pino.destination({ dest: file, mkdir: true, sync: false }) },
    ])
  );
}

export const logger = createLogger();
