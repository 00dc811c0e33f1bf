import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import type { Env } from '../../env';
import { CkbCapacity, Password, TransactionHash } from '../types';
import { parseReceiverAddress, parseSighashAddress } from '../../utils/address';
import { parseHumanCapacity } from '../../utils/capacity';

const transferRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  const env: Env = fastify.container.resolve('env');

  fastify.post(
    '',
    {
      schema: {
        description: 'Transfer capacity from a sighash address, the transaction is signed and sent',
        tags: ['Wallet'],
        body: z.object({
          from: z.string().describe('The sighash address paying the capacity and the fee'),
          to: z.string().describe('The receiver address'),
          capacity: CkbCapacity,
          skip_check_to_address: z
            .boolean()
            .default(false)
            .describe('Allow receiver addresses other than sighash and multisig addresses'),
          password: Password,
        }),
        response: {
          200: TransactionHash,
        },
      },
    },
    async (request) => {
      const { from, to, capacity, skip_check_to_address, password } = request.body;
      const tx = await fastify.walletService.transfer({
        from: parseSighashAddress(from, env.NETWORK),
        to: parseReceiverAddress(to, env.NETWORK, skip_check_to_address),
        capacity: parseHumanCapacity(capacity),
      });
      const txhash = await fastify.walletService.signAndSend(tx, password);
      return { txhash };
    },
  );

  done();
};

export default transferRoutes;
