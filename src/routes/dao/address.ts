import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import type { Env } from '../../env';
import { Cell } from '../types';
import { parseAddress } from '../../utils/address';
import { formatHumanCapacity } from '../../utils/capacity';
import type { DaoCells } from '../../services/dao';

const DaoCellsResponse = z.object({
  cells: z.array(Cell),
  total_capacity: z.string().describe('Total capacity in shannons'),
  total_capacity_ckb: z.string(),
});

function toResponse({ cells, totalCapacity }: DaoCells) {
  return {
    cells,
    total_capacity: totalCapacity.toString(),
    total_capacity_ckb: formatHumanCapacity(totalCapacity),
  };
}

const addressRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  const env: Env = fastify.container.resolve('env');

  fastify.get(
    '/:address/deposited-cells',
    {
      schema: {
        description: 'Get the deposited DAO cells under the address lock',
        tags: ['DAO'],
        params: z.object({
          address: z.string(),
        }),
        response: {
          200: DaoCellsResponse,
        },
      },
    },
    async (request) => {
      const lock = parseAddress(request.params.address, env.NETWORK);
      return toResponse(await fastify.daoService.getDepositedCells(lock));
    },
  );

  fastify.get(
    '/:address/prepared-cells',
    {
      schema: {
        description: 'Get the prepared DAO cells under the address lock',
        tags: ['DAO'],
        params: z.object({
          address: z.string(),
        }),
        response: {
          200: DaoCellsResponse,
        },
      },
    },
    async (request) => {
      const lock = parseAddress(request.params.address, env.NETWORK);
      return toResponse(await fastify.daoService.getPreparedCells(lock));
    },
  );

  done();
};

export default addressRoutes;
