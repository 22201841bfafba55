import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger } from './consoleLogger';
import type { ValidationStarted } from '../types/events';

const event: ValidationStarted = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'ValidationStarted',
  payload: { exercise: 'add', referenceId: 'reference', candidateIds: ['c1'], caseCount: 3 },
};

describe('ConsoleLogger', () => {
  it('logs and traces events as JSON', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = new ConsoleLogger();

    logger.log(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));

    logger.trace(event, 'hello');
    expect(logSpy).toHaveBeenCalledWith('hello', JSON.stringify(event));

    logSpy.mockRestore();
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));

    vi.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'warn' });
    logger.log(event);
    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('w');

    vi.restoreAllMocks();
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] hello');

    logger.child({ candidate: 'c1' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[candidate=c1] warn');

    infoSpy.mockRestore();
    warnSpy.mockRestore();
  });
});
