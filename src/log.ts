import pino from 'pino';

export const log = pino({
  name: 'voice-relay',
  level: process.env.LOG_LEVEL ?? 'info',
});
