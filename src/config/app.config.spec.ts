import { loadAppConfig } from './app.config';

describe('loadAppConfig', () => {
  it('should fall back to defaults with an empty environment', () => {
    const config = loadAppConfig({});

    expect(config.port).toBe(3000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.logLevels).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('should read PORT and HOST', () => {
    const config = loadAppConfig({ PORT: '8080', HOST: '127.0.0.1' });

    expect(config.port).toBe(8080);
    expect(config.host).toBe('127.0.0.1');
  });

  it('should ignore an invalid PORT', () => {
    expect(loadAppConfig({ PORT: 'abc' }).port).toBe(3000);
    expect(loadAppConfig({ PORT: '70000' }).port).toBe(3000);
  });

  it('should enable every level up to LOG_LEVEL', () => {
    expect(loadAppConfig({ LOG_LEVEL: 'warn' }).logLevels).toEqual(['fatal', 'error', 'warn']);
    expect(loadAppConfig({ LOG_LEVEL: 'VERBOSE' }).logLevels).toHaveLength(6);
  });

  it('should fall back to log for an unknown LOG_LEVEL', () => {
    expect(loadAppConfig({ LOG_LEVEL: 'chatty' }).logLevels).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});
