import pino from 'pino';

// stdout carries the report, so logs go to stderr.
export const logger = pino(
  {
    name: 'newsvendor',
    level: process.env.LOG_LEVEL ?? 'info'
  },
  pino.destination(2)
);
