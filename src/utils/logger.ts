import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
  base: { service: 'catalog-resolver' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
