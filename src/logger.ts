import pino from 'pino';

export const logger = pino({
  name: 'font-registry',
  level: process.env.LOG_LEVEL ?? 'info',
});
