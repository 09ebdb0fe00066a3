import 'dotenv/config';
import { LogLevel, parseLogLevel } from '../infrastructure/logging/Logger.js';

export interface AppConfig {
  searchUrl: string;
  startPage: number;
  maxPages: number;
  saveInterval: number;
  maxAttempts: number;
  baseTimeoutMs: number;
  timeoutIncrementMs: number;
  baseDelayMs: number;
  statusRetries: number;
  statusBackoffMs: number;
  pageDelayMs: number;
  emptyPageDelayMs: number;
  /** 0 keeps going through empty pages; a positive value ends the run after that many in a row. */
  maxConsecutiveEmptyPages: number;
  outputDir: string;
  outputPrefix: string;
  logLevel: LogLevel;
  logDir: string;
}

export const envInt = (value: string | undefined, fallback: number, min = 0): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  return Number.isInteger(n) && n >= min ? n : fallback;
};

export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  searchUrl: env.SEARCH_URL || 'https://www.pakwheels.com/used-cars/search/-/',
  startPage: envInt(env.START_PAGE, 1, 1),
  maxPages: envInt(env.MAX_PAGES, 2000, 1),
  saveInterval: envInt(env.SAVE_INTERVAL, 20, 1),
  maxAttempts: envInt(env.MAX_ATTEMPTS, 5, 1),
  baseTimeoutMs: envInt(env.BASE_TIMEOUT_MS, 20_000, 1),
  timeoutIncrementMs: envInt(env.TIMEOUT_INCREMENT_MS, 10_000),
  baseDelayMs: envInt(env.BASE_DELAY_MS, 2_000),
  statusRetries: envInt(env.STATUS_RETRIES, 3),
  statusBackoffMs: envInt(env.STATUS_BACKOFF_MS, 1_000),
  pageDelayMs: envInt(env.PAGE_DELAY_MS, 1_500),
  emptyPageDelayMs: envInt(env.EMPTY_PAGE_DELAY_MS, 2_000),
  maxConsecutiveEmptyPages: envInt(env.MAX_CONSECUTIVE_EMPTY_PAGES, 0),
  outputDir: env.OUTPUT_DIR || './output',
  outputPrefix: env.OUTPUT_PREFIX || 'pakwheels_cars',
  logLevel: parseLogLevel(env.LOG_LEVEL),
  logDir: env.LOG_DIR || './data',
});
