import { config, resolveLogLevels } from './config';

describe('resolveLogLevels', () => {
  it('enables the given level and everything more severe', () => {
    expect(resolveLogLevels('warn')).toEqual(['warn', 'error', 'fatal']);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(resolveLogLevels(' DEBUG ')).toEqual(['debug', 'log', 'warn', 'error', 'fatal']);
  });

  it('enables every level for verbose', () => {
    expect(resolveLogLevels('verbose')).toEqual(['verbose', 'debug', 'log', 'warn', 'error', 'fatal']);
  });

  it('throws on an unknown level', () => {
    expect(() => resolveLogLevels('loud')).toThrow('Unknown LOG_LEVEL "loud"');
  });
});

describe('config.validateConfig', () => {
  const { dataFile, logLevel } = config;

  afterEach(() => {
    config.dataFile = dataFile;
    config.logLevel = logLevel;
  });

  it('accepts a known log level', () => {
    config.logLevel = 'warn';

    expect(config.validateConfig()).toBe(true);
  });

  it('rejects an unknown log level when called, not when imported', () => {
    config.logLevel = 'loud';

    expect(() => config.validateConfig()).toThrow('Unknown LOG_LEVEL "loud"');
  });

  it('rejects a blank data file path', () => {
    config.dataFile = '   ';
    config.logLevel = 'log';

    expect(() => config.validateConfig()).toThrow('DATA_FILE must not be blank');
  });
});
