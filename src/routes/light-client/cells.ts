import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import type { Env } from '../../env';
import { Capacity, Cell } from '../types';
import { SearchKeyBody, toSearchFilter } from './search-key';
import CellCollector, { toSearchKey } from '../../services/cell-collector';
import { formatHumanCapacity } from '../../utils/capacity';

const cellsRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  const env: Env = fastify.container.resolve('env');

  fastify.post(
    '',
    {
      schema: {
        description: 'Search live cells indexed by the light client, paginated by cursor',
        tags: ['Light Client'],
        body: SearchKeyBody.extend({
          order: z.enum(['asc', 'desc']).default('asc'),
          limit: z.number().int().default(env.CELL_QUERY_PAGE_SIZE),
          after: z.string().optional().describe('The cursor returned by the previous page'),
        }),
        response: {
          200: z.object({
            cells: z.array(Cell),
            last_cursor: z.string().optional().describe('Absent once there are no more cells'),
          }),
        },
      },
    },
    async (request) => {
      const { order, limit, after, ...searchKey } = request.body;
      const collector = new CellCollector(fastify.lightClient);
      const { cells, nextCursor } = await collector.query(toSearchFilter(searchKey), order, limit, after);
      return { cells, last_cursor: nextCursor };
    },
  );

  fastify.post(
    '/capacity',
    {
      schema: {
        description: `
          Get the total capacity of the live cells matching the search key, as computed by the light client.

          The light client matches script args by prefix.
        `,
        tags: ['Light Client'],
        body: SearchKeyBody,
        response: {
          200: Capacity.extend({
            block_hash: z.string().describe('The block the capacity is computed at'),
            block_number: z.string(),
          }),
        },
      },
    },
    async (request) => {
      const filter = toSearchFilter(request.body);
      CellCollector.validateFilter(filter);
      const { capacity, blockHash, blockNumber } = await fastify.lightClient.getCellsCapacity(toSearchKey(filter));
      return {
        capacity: capacity.toString(),
        capacity_ckb: formatHumanCapacity(capacity),
        block_hash: blockHash,
        block_number: blockNumber,
      };
    },
  );

  done();
};

export default cellsRoutes;
