import fastify, { type FastifyInstance, type FastifySchemaCompiler } from 'fastify';
import sensible, { httpErrors } from '@fastify/sensible';
import compress from '@fastify/compress';
import { asValue } from 'awilix';
import { serializerCompiler, type ZodTypeProvider } from 'fastify-type-provider-zod';
import type { ZodTypeAny } from 'zod';
import swagger from './plugins/swagger';
import sentry from './plugins/sentry';
import walletRoutes from './routes/wallet';
import daoRoutes from './routes/dao';
import lightClientRoutes from './routes/light-client';
import { getSafeEnvs } from './env';
import container from './container';
import options from './options';

async function routes(fastify: FastifyInstance) {
  fastify.log.info(`Process env: ${JSON.stringify(getSafeEnvs(), null, 2)}`);

  await fastify.register(sentry);
  fastify.register(sensible);
  fastify.register(compress);
  fastify.register(swagger);

  fastify.register(walletRoutes, { prefix: '/wallet/v1' });
  fastify.register(daoRoutes, { prefix: '/dao/v1' });
  fastify.register(lightClientRoutes, { prefix: '/light-client/v1' });
}

export const validatorCompiler: FastifySchemaCompiler<ZodTypeAny> =
  ({ schema }) =>
  (data) => {
    const result = schema.safeParse(data);
    if (result.success) {
      return { value: result.data };
    }

    const error = result.error;
    if (error.errors.length) {
      const firstError = error.errors[0];
      const propName = firstError.path.length ? firstError.path.join('.') : 'param';
      return {
        error: httpErrors.badRequest(`Invalid ${propName}: ${firstError.message}`),
      };
    }
    return { error };
  };

export function buildFastify() {
  const app = fastify(options).withTypeProvider<ZodTypeProvider>();
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  container.register({ logger: asValue(app.log) });
  app.decorate('container', container);

  app.register(routes);
  return app;
}
