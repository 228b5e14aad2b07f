import pino from 'pino';

export type { Logger } from 'pino';

export const logger = pino({
  name: 'media-transcode-worker',
  level: process.env.LOG_LEVEL || 'info',
});
