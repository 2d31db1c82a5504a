import pino, { type Logger, type LoggerOptions } from 'pino';
import { config, isDevelopment, isTest } from '../config/app.js';

export type { Logger } from 'pino';

export interface LoggerSettings {
  level?: LoggerOptions['level'];
  pretty?: boolean;
  name?: string;
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  const options: LoggerOptions = {
    name: settings.name ?? config.PROJECT_NAME,
    level: settings.level ?? (isTest ? 'silent' : config.LOG_LEVEL)
  };

  if (settings.pretty ?? isDevelopment) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname'
      }
    };
  }

  return pino(options);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
