import fp from 'fastify-plugin';
import * as Sentry from '@sentry/node';
import { HttpStatusCode } from 'axios';
import pkg from '../../package.json';
import { env } from '../env';
import { WalletError } from '../errors';
import { LightClientRpcError } from '../services/light-client';

export default fp(async (fastify) => {
  Sentry.init({
    dsn: env.SENTRY_DSN_URL,
    tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
    environment: env.NODE_ENV,
    release: pkg.version,
  });

  fastify.setErrorHandler<Error & { statusCode?: number }>((error, _, reply) => {
    const statusCode = error.statusCode ?? HttpStatusCode.InternalServerError;

    // captureException only for 5xx errors or unknown errors
    if (statusCode >= HttpStatusCode.InternalServerError) {
      fastify.log.error(error);
      Sentry.captureException(error);
    }

    if (error instanceof WalletError || error instanceof LightClientRpcError) {
      reply.status(statusCode).send({ code: error.code, message: error.message });
      return;
    }
    reply.status(statusCode).send({ message: error.message });
  });
});
