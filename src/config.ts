import dotenv from 'dotenv';
import { LogLevel } from '@nestjs/common';

dotenv.config();

// Ordered from most to least verbose
const LOG_LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

export function resolveLogLevels(minimum: string): LogLevel[] {
  const level = minimum.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Unknown LOG_LEVEL "${minimum}", expected one of: ${LOG_LEVELS.join(', ')}`);
  }
  return LOG_LEVELS.slice(LOG_LEVELS.indexOf(level));
}

export const config = {
  dataFile: process.env.DATA_FILE || 'consumption_data.json',
  logLevel: process.env.LOG_LEVEL || 'log',

  logLevels: (): LogLevel[] => resolveLogLevels(config.logLevel),

  validateConfig: () => {
    if (!config.dataFile.trim()) {
      throw new Error('DATA_FILE must not be blank');
    }
    config.logLevels();
    return true;
  }
};
