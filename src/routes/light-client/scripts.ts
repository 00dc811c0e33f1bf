import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { BI } from '@ckb-lumos/lumos';
import z from 'zod';
import type { Env } from '../../env';
import { Script } from '../types';
import { encodeAddress, parseAddress } from '../../utils/address';

const scriptsRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  const env: Env = fastify.container.resolve('env');

  fastify.get(
    '',
    {
      schema: {
        description: 'Get the scripts the light client is syncing',
        tags: ['Light Client'],
        response: {
          200: z.array(
            z.object({
              script: Script,
              script_type: z.enum(['lock', 'type']),
              block_number: z.string(),
              address: z.string().optional().describe('Address of the lock script'),
            }),
          ),
        },
      },
    },
    async () => {
      const scripts = await fastify.lightClient.getScripts();
      return scripts.map(({ script, scriptType, blockNumber }) => ({
        script,
        script_type: scriptType,
        block_number: BI.from(blockNumber).toString(),
        address: scriptType === 'lock' ? encodeAddress(script, env.NETWORK) : undefined,
      }));
    },
  );

  fastify.post(
    '',
    {
      schema: {
        description: 'Register addresses to the light client, their cells are synced from the block number',
        tags: ['Light Client'],
        body: z.object({
          scripts: z
            .array(
              z.object({
                address: z.string(),
                block_number: z.number().int().nonnegative().default(0),
              }),
            )
            .min(1),
          command: z
            .enum(['all', 'partial', 'delete'])
            .default('partial')
            .describe('all: replace every script, partial: add or update the scripts, delete: remove the scripts'),
        }),
        response: {
          200: z.object({
            registered: z.number(),
          }),
        },
      },
    },
    async (request) => {
      const { scripts, command } = request.body;
      await fastify.lightClient.setScripts(
        scripts.map(({ address, block_number }) => ({
          script: parseAddress(address, env.NETWORK),
          scriptType: 'lock' as const,
          blockNumber: BI.from(block_number).toHexString(),
        })),
        command,
      );
      return { registered: scripts.length };
    },
  );

  done();
};

export default scriptsRoutes;
