import dotenv from 'dotenv';

dotenv.config();

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const DEFAULT_PREFIX = 'BMS_DATA:';

export const parseLogLevel = (value: string | undefined, fallback: LogLevel): LogLevel => {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
};

export const parseNonNegativeInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    return fallback;
  }

  return parsed;
};

export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

export const parsePrefix = (value: string | undefined, fallback: string): string => {
  // Surrounding whitespace is significant in a line prefix, only empty values fall back.
  if (!value) {
    return fallback;
  }

  return value;
};

export const config = {
  logLevel: parseLogLevel(process.env.LOG_LEVEL, 'info'),
  logPretty: parseBoolean(process.env.LOG_PRETTY, process.env.NODE_ENV === 'development'),
  prefix: parsePrefix(process.env.BMS_DATA_PREFIX, DEFAULT_PREFIX),
  report: {
    indent: parseNonNegativeInt(process.env.BMS_JSON_INDENT, 2)
  }
};

export type AppConfig = typeof config;
