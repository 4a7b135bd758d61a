import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, parseVerbosity } from './logger';

const verbosityCases: Array<[string | undefined, number]> = [
  [undefined, 1],
  ['', 1],
  ['0', 0],
  ['3', 3],
  ['debug', 3],
  [' Info ', 2],
  ['ERROR', 0],
  ['loud', 1],
];

describe('parseVerbosity', () => {
  it.each(verbosityCases)('reads %j as level %i', (raw, expected) => {
    expect(parseVerbosity(raw)).toBe(expected);
  });
});

describe('Logger', () => {
  afterEach(() => {
    delete process.env.LOG_VERBOSITY;
    vi.restoreAllMocks();
  });

  it('masks registered secrets in messages and string arguments', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    Logger.addSecret('test-secret');

    Logger.error('login test-secret rejected', 'echo: test-secret', 42);

    const [line, detail, count] = errorSpy.mock.calls[0];
    expect(String(line)).toMatch(/^\d{2}:\d{2}:\d{2} \[ERROR\] login \*{8} rejected$/);
    expect(detail).toBe('echo: ********');
    expect(count).toBe(42);
  });

  it('ignores an empty secret', () => {
    Logger.addSecret('');

    expect(Logger.mask('unchanged')).toBe('unchanged');
  });

  it('gates debug output on the named level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    process.env.LOG_VERBOSITY = 'info';
    Logger.debug('hidden');
    expect(Logger.isDebugEnabled()).toBe(false);
    expect(logSpy.mock.calls.some(call => String(call[0]).endsWith('hidden'))).toBe(false);

    process.env.LOG_VERBOSITY = 'debug';
    Logger.debug('shown');
    expect(Logger.isDebugEnabled()).toBe(true);
    expect(logSpy.mock.calls.some(call => String(call[0]).endsWith('[DEBUG] shown'))).toBe(true);
  });
});
