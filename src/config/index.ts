import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export type VideoQuality = 'low' | 'standard' | 'hd';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  // MediathekView API
  mediathekApiUrl: string;
  httpTimeoutMs: number;
  userAgent: string;

  // Output
  outputDir: string;
  videoQuality: VideoQuality;

  // Console
  logLevel: LogLevel;
  showProgress: boolean;
}

const VIDEO_QUALITIES: readonly VideoQuality[] = ['low', 'standard', 'hd'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  return choices.find((choice) => choice === value) ?? defaultValue;
}

export function loadConfig(): Config {
  return {
    // MediathekView API
    mediathekApiUrl: getEnvString('MEDIATHEK_API_URL', 'https://mediathekviewweb.de/api/query'),
    httpTimeoutMs: getEnvNumber('HTTP_TIMEOUT_MS', 10000),
    userAgent: getEnvString('USER_AGENT', 'mediathek-scraper 0.1.0'),

    // Output
    outputDir: getEnvString('OUTPUT_DIR', './data'),
    videoQuality: getEnvChoice('VIDEO_QUALITY', VIDEO_QUALITIES, 'low'),

    // Console
    logLevel: getEnvChoice('LOG_LEVEL', LOG_LEVELS, 'info'),
    showProgress: getEnvBoolean('SHOW_PROGRESS', true),
  };
}

export const config = loadConfig();
