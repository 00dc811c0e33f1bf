import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import type { Env } from '../../env';
import {
  FetchStatus,
  HashList,
  Transaction,
  TransactionHash,
  TransactionView,
  TransactionWithStatus,
} from '../types';
import { SearchKeyBody, toSearchFilter } from './search-key';
import CellCollector, { toSearchKey } from '../../services/cell-collector';

const IoCell = z.object({
  io_type: z.enum(['input', 'output']),
  io_index: z.string(),
});

const transactionsRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (
  fastify,
  _,
  done,
) => {
  const env: Env = fastify.container.resolve('env');

  fastify.post(
    '',
    {
      schema: {
        description: 'Send a signed transaction through the light client',
        tags: ['Light Client'],
        body: z.object({
          transaction: Transaction,
        }),
        response: {
          200: TransactionHash,
        },
      },
    },
    async (request) => {
      const txhash = await fastify.lightClient.sendTransaction(request.body.transaction);
      return { txhash };
    },
  );

  fastify.post(
    '/search',
    {
      schema: {
        description: `
          Search the transactions spending or creating cells of the script, paginated by cursor.

          Without group_by_transaction a transaction is listed once per matched input or output.
        `,
        tags: ['Light Client'],
        body: SearchKeyBody.omit({ data_len_range: true, capacity_range: true }).extend({
          group_by_transaction: z.boolean().default(false),
          order: z.enum(['asc', 'desc']).default('asc'),
          limit: z.number().int().positive().default(env.CELL_QUERY_PAGE_SIZE),
          after: z.string().optional().describe('The cursor returned by the previous page'),
        }),
        response: {
          200: z.object({
            transactions: z.array(
              z.object({
                transaction: TransactionView,
                block_number: z.string(),
                tx_index: z.string(),
                cells: z.array(IoCell),
              }),
            ),
            last_cursor: z.string().optional().describe('Absent once there are no more transactions'),
          }),
        },
      },
    },
    async (request) => {
      const { group_by_transaction, order, limit, after, ...searchKey } = request.body;
      const filter = toSearchFilter(searchKey);
      CellCollector.validateFilter(filter);
      const page = await fastify.lightClient.getTransactions(
        { ...toSearchKey(filter), groupByTransaction: group_by_transaction },
        order,
        limit,
        after,
      );
      return {
        transactions: page.transactions.map(({ transaction, blockNumber, txIndex, cells }) => ({
          transaction,
          block_number: blockNumber,
          tx_index: txIndex,
          cells: cells.map(({ ioType, ioIndex }) => ({ io_type: ioType, io_index: ioIndex })),
        })),
        last_cursor: page.transactions.length < limit ? undefined : page.lastCursor,
      };
    },
  );

  fastify.get(
    '/:tx_hash',
    {
      schema: {
        description: 'Get a transaction stored by the light client with its status',
        tags: ['Light Client'],
        params: z.object({
          tx_hash: z.string(),
        }),
        response: {
          200: TransactionWithStatus,
        },
      },
    },
    async (request, reply) => {
      const result = await fastify.lightClient.getTransaction(request.params.tx_hash);
      if (!result) {
        reply.status(404);
        return;
      }
      return result;
    },
  );

  fastify.post(
    '/:tx_hash/fetch',
    {
      schema: {
        description: `
          Ask the light client to fetch a transaction from its peers.

          The status is one of:
          * fetched: the transaction is available in data.
          * fetching: the request was sent to the peers at first_sent.
          * added: the request was queued at timestamp.
          * not_found: the peers do not know the transaction.
        `,
        tags: ['Light Client'],
        params: z.object({
          tx_hash: z.string(),
        }),
        response: {
          200: FetchStatus(TransactionWithStatus),
        },
      },
    },
    async (request) => {
      return fastify.lightClient.fetchTransaction(request.params.tx_hash);
    },
  );

  fastify.delete(
    '',
    {
      schema: {
        description: 'Remove fetched transactions from the light client storage, all of them without tx_hashes',
        tags: ['Light Client'],
        body: z
          .object({
            tx_hashes: HashList.optional(),
          })
          .default({}),
        response: {
          200: z.object({
            removed: HashList,
          }),
        },
      },
    },
    async (request) => {
      const removed = await fastify.lightClient.removeTransactions(request.body.tx_hashes);
      return { removed };
    },
  );

  done();
};

export default transactionsRoutes;
