import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import { BlockHeader, FetchStatus, HashList, TransactionView } from '../types';

const headerRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  fastify.get(
    '/tip-header',
    {
      schema: {
        description: 'Get the tip header synced by the light client',
        tags: ['Light Client'],
        response: {
          200: BlockHeader,
        },
      },
    },
    async () => {
      return fastify.lightClient.getTipHeader();
    },
  );

  fastify.get(
    '/genesis-block',
    {
      schema: {
        description: 'Get the genesis block, its transactions deploy the system scripts',
        tags: ['Light Client'],
        response: {
          200: z.object({
            header: BlockHeader,
            transactions: z.array(TransactionView),
          }),
        },
      },
    },
    async () => {
      return fastify.lightClient.getGenesisBlock();
    },
  );

  fastify.get(
    '/headers/:block_hash',
    {
      schema: {
        description: 'Get a block header stored by the light client',
        tags: ['Light Client'],
        params: z.object({
          block_hash: z.string(),
        }),
        response: {
          200: BlockHeader,
        },
      },
    },
    async (request, reply) => {
      const header = await fastify.lightClient.getHeader(request.params.block_hash);
      if (!header) {
        reply.status(404);
        return;
      }
      return header;
    },
  );

  fastify.post(
    '/headers/:block_hash/fetch',
    {
      schema: {
        description: `
          Ask the light client to fetch a block header from its peers.

          The status is one of:
          * fetched: the header is available in data.
          * fetching: the request was sent to the peers at first_sent.
          * added: the request was queued at timestamp.
          * not_found: the peers do not know the block.
        `,
        tags: ['Light Client'],
        params: z.object({
          block_hash: z.string(),
        }),
        response: {
          200: FetchStatus(BlockHeader),
        },
      },
    },
    async (request) => {
      return fastify.lightClient.fetchHeader(request.params.block_hash);
    },
  );

  fastify.delete(
    '/headers',
    {
      schema: {
        description: 'Remove fetched headers from the light client storage, all of them without block_hashes',
        tags: ['Light Client'],
        body: z
          .object({
            block_hashes: HashList.optional(),
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
      const removed = await fastify.lightClient.removeHeaders(request.body.block_hashes);
      return { removed };
    },
  );

  done();
};

export default headerRoutes;
