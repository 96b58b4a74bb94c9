import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../logger.js';

describe('createLogger', () => {
  function capture(level: 'debug' | 'info' | 'warn' = 'info') {
    const lines: Array<[string, string]> = [];
    const logger = createLogger({ level, noColor: true, write: (line, stream) => lines.push([stream, line]) });
    return { logger, lines };
  }

  it('should drop messages below the threshold', () => {
    const { logger, lines } = capture('warn');

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(lines).toEqual([
      ['stdout', '⚠ c'],
      ['stderr', '✗ d'],
    ]);
  });

  it('should prefix nested scopes', () => {
    const { logger, lines } = capture('debug');

    logger.child('qtest').child('auth').debug('token refreshed');

    expect(lines).toEqual([['stdout', '· [qtest:auth] token refreshed']]);
  });

  it('should discard everything when silent', () => {
    expect(() => silentLogger.error('ignored')).not.toThrow();
  });
});
