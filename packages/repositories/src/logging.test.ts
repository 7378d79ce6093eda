import { describe, it, expect, vi } from 'vitest';
import { createCapturingLogger, createLogger, silentLogger } from './logging.js';

describe('createLogger', () => {
  it('drops entries below the configured level', () => {
    const sink = createCapturingLogger();
    const logger = createLogger('warn', sink);

    logger.debug('Statement executed');
    logger.info('User inserted', { userId: 1 });
    logger.warn('Transaction rolled back', { error: 'boom' });
    logger.error('Pool closed');

    expect(sink.entries).toEqual([
      { level: 'warn', message: 'Transaction rolled back', data: { error: 'boom' } },
      { level: 'error', message: 'Pool closed', data: undefined },
    ]);
  });

  it('passes everything at debug', () => {
    const sink = createCapturingLogger();
    const logger = createLogger('debug', sink);

    logger.debug('a');
    logger.info('b');

    expect(sink.entries.map((entry) => entry.level)).toEqual(['debug', 'info']);
  });

  it('drops everything when silent', () => {
    const sink = createCapturingLogger();
    const logger = createLogger('silent', sink);

    logger.error('Pool closed');

    expect(sink.entries).toEqual([]);
  });

  it('writes to the console by default', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    createLogger('info').info('User inserted', { userId: 1 });

    expect(info).toHaveBeenCalledWith('[INFO] User inserted', { userId: 1 });
    info.mockRestore();
  });
});

describe('silentLogger', () => {
  it('accepts entries without output', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    silentLogger.debug('Statement executed');

    expect(debug).not.toHaveBeenCalled();
    debug.mockRestore();
  });
});
