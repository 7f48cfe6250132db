import { afterAll, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { configureLogging, createLogger, getLoggingConfig, loadLoggingFromEnv, resetLogging } from '../src/util/logger';
import { formatDiagnostic, warn } from '../src/util/diag';

describe('util.logger', () => {
  let warnSpy: jest.SpiedFunction<typeof console.warn>;
  let logSpy: jest.SpiedFunction<typeof console.log>;

  beforeEach(() => {
    resetLogging();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy.mockClear();
    logSpy.mockClear();
  });

  afterAll(() => {
    resetLogging();
  });

  test('defaults to error-only', () => {
    createLogger('test').warn('hidden');
    expect(warnSpy).not.toHaveBeenCalled();
    expect(getLoggingConfig().level).toBe('error');
  });

  test('prefixes output with the module name', () => {
    configureLogging({ level: 'warn' });
    createLogger('import').warn('shown', 3);
    expect(warnSpy).toHaveBeenCalledWith('[import]', 'shown', 3);
  });

  test('module filter silences other namespaces', () => {
    configureLogging({ level: 'debug', modules: ['export'] });
    logSpy.mockClear();
    createLogger('import').debug('filtered');
    createLogger('export').debug('kept');
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('[export]', 'kept');
  });

  test('reads level and modules from the environment', () => {
    loadLoggingFromEnv({ LIFTPLAN_LOG_LEVEL: 'INFO', LIFTPLAN_LOG_MODULES: 'cli, render' });
    expect(getLoggingConfig()).toMatchObject({ level: 'info', modules: ['cli', 'render'] });
  });

  test('ignores an unknown level', () => {
    loadLoggingFromEnv({ LIFTPLAN_LOG_LEVEL: 'verbose' });
    expect(getLoggingConfig().level).toBe('error');
  });
});

describe('util.diag', () => {
  test('formats level, component and location fields', () => {
    expect(formatDiagnostic('WARN', 'import', 'bad cell', { file: 'a.csv', row: 4, column: 'shafts' }))
      .toBe('[WARN] [import] bad cell file=a.csv, row=4, column=shafts');
    expect(formatDiagnostic('ERROR', 'render', 'too wide', { shaft: 9 })).toBe('[ERROR] [render] too wide shaft=9');
    expect(formatDiagnostic('INFO', '', 'plain')).toBe('[INFO] [unknown] plain');
  });

  test('warn goes through the diagnostics logger', () => {
    resetLogging();
    configureLogging({ level: 'warn' });
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    spy.mockClear();
    warn('render', 'shaft 9 not drawn', { shaft: 9 });
    expect(spy).toHaveBeenCalledWith('[diagnostics]', '[WARN] [render] shaft 9 not drawn shaft=9');
    resetLogging();
  });
});
