import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import container from '../../container';
import cellsRoutes from './cells';
import scriptsRoutes from './scripts';
import headerRoutes from './header';
import transactionsRoutes from './transactions';
import peersRoutes from './peers';
import searchKeyRoutes from './search-key';

const lightClientRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (
  fastify,
  _,
  done,
) => {
  fastify.decorate('lightClient', container.resolve('lightClient'));

  fastify.register(cellsRoutes, { prefix: '/cells' });
  fastify.register(scriptsRoutes, { prefix: '/scripts' });
  fastify.register(transactionsRoutes, { prefix: '/transactions' });
  fastify.register(peersRoutes, { prefix: '/peers' });
  fastify.register(searchKeyRoutes, { prefix: '/search-key' });
  fastify.register(headerRoutes);
  done();
};

export default lightClientRoutes;
