import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});
