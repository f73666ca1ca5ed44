import { Logger } from './logging.interceptor';

describe('Logger', () => {
  let debug: jest.SpyInstance;
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    Logger.setLevel('debug');
    jest.restoreAllMocks();
  });

  it('falls back to debug for unknown levels', () => {
    expect(Logger.parseLevel('verbose')).toBe('debug');
    expect(Logger.parseLevel(undefined)).toBe('debug');
    expect(Logger.parseLevel('warn')).toBe('warn');
  });

  it('drops messages below the configured level', () => {
    Logger.setLevel('warn');
    Logger.debug('hidden', 'Test');
    Logger.log('hidden', 'Test');
    Logger.warn('shown', 'Test');

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[WARN\] .* \[Test\] shown$/));
  });
});
