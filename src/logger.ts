import pino from 'pino';
import { env } from './env';

export type Logger = pino.Logger;

const isDev = ['local', 'dev', 'development'].includes(env.NODE_ENV);

const transport = isDev
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        singleLine: false,
      },
    })
  : undefined;

const logger = pino(
  {
    name: 'stackpilot',
    level: env.LOG_LEVEL,
  },
  transport
);

export default logger;
