import { envInt, loadAppConfig } from '../../src/config/app.config';
import { LogLevel } from '../../src/infrastructure/logging/Logger';

describe('envInt', () => {
  it('parses integers and falls back on blanks or junk', () => {
    expect(envInt('42', 7)).toBe(42);
    expect(envInt(undefined, 7)).toBe(7);
    expect(envInt('  ', 7)).toBe(7);
    expect(envInt('abc', 7)).toBe(7);
    expect(envInt('1.5', 7)).toBe(7);
  });

  it('rejects values under the minimum', () => {
    expect(envInt('0', 20, 1)).toBe(20);
    expect(envInt('-3', 5)).toBe(5);
  });
});

describe('loadAppConfig', () => {
  it('uses the documented defaults for an empty environment', () => {
    expect(loadAppConfig({})).toEqual({
      searchUrl: 'https://www.pakwheels.com/used-cars/search/-/',
      startPage: 1,
      maxPages: 2000,
      saveInterval: 20,
      maxAttempts: 5,
      baseTimeoutMs: 20_000,
      timeoutIncrementMs: 10_000,
      baseDelayMs: 2_000,
      statusRetries: 3,
      statusBackoffMs: 1_000,
      pageDelayMs: 1_500,
      emptyPageDelayMs: 2_000,
      maxConsecutiveEmptyPages: 0,
      outputDir: './output',
      outputPrefix: 'pakwheels_cars',
      logLevel: LogLevel.INFO,
      logDir: './data',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadAppConfig({
      SEARCH_URL: 'https://example.com/search',
      MAX_PAGES: '50',
      SAVE_INTERVAL: '5',
      MAX_CONSECUTIVE_EMPTY_PAGES: '10',
      OUTPUT_PREFIX: 'cars',
      LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      searchUrl: 'https://example.com/search',
      maxPages: 50,
      saveInterval: 5,
      maxConsecutiveEmptyPages: 10,
      outputPrefix: 'cars',
      logLevel: LogLevel.DEBUG,
    });
  });
});
