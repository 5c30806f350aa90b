import pino from 'pino';

const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

// one logger for the whole process
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: pretty ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname'
    }
  } : undefined
});
