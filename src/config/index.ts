import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  // Server
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;

  // Documents
  maxUploadSize: number;
  maxDocuments: number;

  // Insertion timing
  defaultSubtitleLengthMs: number;
  subtitleSpacingMs: number;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return ['debug', 'info', 'warn', 'error'].includes(value);
}

function getEnvLogLevel(key: string, defaultValue: LogLevel): LogLevel {
  const value = getEnvString(key, defaultValue).toLowerCase();
  return isLogLevel(value) ? value : defaultValue;
}

export function loadConfig(): Config {
  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),
    logLevel: getEnvLogLevel('LOG_LEVEL', 'info'),

    // Documents
    maxUploadSize: getEnvNumber('MAX_UPLOAD_SIZE', 5242880), // 5MB
    maxDocuments: getEnvNumber('MAX_DOCUMENTS', 100),

    // Insertion timing
    defaultSubtitleLengthMs: getEnvNumber('DEFAULT_SUBTITLE_LENGTH_MS', 1000),
    subtitleSpacingMs: getEnvNumber('SUBTITLE_SPACING_MS', 100),
  };
}

export const config = loadConfig();
