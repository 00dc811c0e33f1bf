import type { FastifyBaseLogger, FastifyHttpOptions } from 'fastify';
import type { Server } from 'http';
import { env } from './env';

const envToLogger = {
  development: {
    level: env.LOGGER_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  },
  production: {
    level: env.LOGGER_LEVEL,
  },
  test: {
    level: env.LOGGER_LEVEL,
  },
};

function isLoggerEnv(nodeEnv: string): nodeEnv is keyof typeof envToLogger {
  return nodeEnv in envToLogger;
}

const options: FastifyHttpOptions<Server, FastifyBaseLogger> = {
  logger: isLoggerEnv(env.NODE_ENV) ? envToLogger[env.NODE_ENV] : true,
};

export default options;
