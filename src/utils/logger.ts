import pino from 'pino';

const pretty = process.env.NODE_ENV !== 'production' && !process.env.VITEST;

const transport = pretty
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
      },
    })
  : undefined;

export const logger = pino({
  name: 'qupath-bridge',
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  redact: ['authToken'],
}, transport);
