import pino from 'pino';
import type { Logger } from 'pino';
import { config } from './config';

export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: 'payroll-api', env: config.env },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };
