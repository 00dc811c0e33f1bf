import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import container from '../../container';
import addressRoutes from './address';
import transferRoutes from './transfer';

const walletRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  fastify.decorate('walletService', container.resolve('walletService'));

  fastify.register(addressRoutes, { prefix: '/address' });
  fastify.register(transferRoutes, { prefix: '/transfer' });
  done();
};

export default walletRoutes;
