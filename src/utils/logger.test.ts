import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { buildLoggerOptions } from './logger.js';

function captureLogger(): { log: pino.Logger; lines: string[] } {
  const lines: string[] = [];
  const log = pino(buildLoggerOptions('info', 'forum-listing-watch'), {
    write: (line: string) => {
      lines.push(line);
    },
  });
  return { log, lines };
}

describe('buildLoggerOptions', () => {
  it('should serialize errors logged under the error key', () => {
    const { log, lines } = captureLogger();

    log.error({ error: new Error('535 Authentication failed') }, 'Failed to send notification');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('"message":"535 Authentication failed"');
    expect(lines[0]).toContain('"type":"Error"');
    expect(lines[0]).toContain('"stack":"Error: 535 Authentication failed');
    expect(lines[0]).not.toContain('"error":{}');
  });

  it('should tag every line with the app name', () => {
    const { log, lines } = captureLogger();

    log.info('Service running');

    expect(lines[0]).toContain('"app":"forum-listing-watch"');
    expect(lines[0]).toContain('"msg":"Service running"');
  });

  it('should drop lines below the level', () => {
    const { log, lines } = captureLogger();

    log.debug('Entering stage');

    expect(lines).toEqual([]);
  });
});
