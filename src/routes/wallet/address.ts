import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import type { Env } from '../../env';
import { Capacity } from '../types';
import { parseAddress } from '../../utils/address';
import { formatHumanCapacity } from '../../utils/capacity';

const addressRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  const env: Env = fastify.container.resolve('env');

  fastify.get(
    '/:address/capacity',
    {
      schema: {
        description: 'Get the capacity of the live cells under the address lock',
        tags: ['Wallet'],
        params: z.object({
          address: z.string(),
        }),
        response: {
          200: Capacity,
        },
      },
    },
    async (request) => {
      const { address } = request.params;
      const lock = parseAddress(address, env.NETWORK);
      const capacity = await fastify.walletService.getCapacity(lock);
      return {
        capacity: capacity.toString(),
        capacity_ckb: formatHumanCapacity(capacity),
      };
    },
  );

  done();
};

export default addressRoutes;
