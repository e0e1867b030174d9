import { registerAs } from '@nestjs/config';
import { LogLevel } from '@nestjs/common';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export interface CorsConfig {
  allowedOrigins: string[];
  methods: string[];
  allowedHeaders: string[];
}

export interface AppConfig {
  port: number;
  cors: CorsConfig;
  logLevels: LogLevel[];
}

/**
 * Expands LOG_LEVEL into the list Nest's logger expects: the named level
 * and every level more severe than it.
 */
export const resolveLogLevels = (level: string | undefined): LogLevel[] => {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(0, index === -1 ? LOG_LEVELS.indexOf('log') + 1 : index + 1);
};

export const getAppConfig = (): AppConfig =>
  Object.freeze({
    port: parseInt(process.env.PORT || '8000', 10),
    cors: Object.freeze({
      allowedOrigins: process.env.CORS_ALLOWED_ORIGINS
        ? process.env.CORS_ALLOWED_ORIGINS.split(',').map((origin) => origin.trim())
        : ['http://localhost:3000'],
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    }),
    logLevels: resolveLogLevels(process.env.LOG_LEVEL),
  });

export default registerAs('app', getAppConfig);
