import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import container from '../../container';
import transactionRoutes from './transaction';
import addressRoutes from './address';

const daoRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  fastify.decorate('daoService', container.resolve('daoService'));
  fastify.decorate('walletService', container.resolve('walletService'));

  fastify.register(transactionRoutes);
  fastify.register(addressRoutes, { prefix: '/address' });
  done();
};

export default daoRoutes;
