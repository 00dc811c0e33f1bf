import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import type { Env } from '../../env';
import { CkbCapacity, OutPointString, Password, TransactionHash } from '../types';
import { parseSighashAddress } from '../../utils/address';
import { parseHumanCapacity } from '../../utils/capacity';
import { parseOutPoint } from '../../utils/out-point';

const transactionRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  const env: Env = fastify.container.resolve('env');

  fastify.post(
    '/deposit',
    {
      schema: {
        description: 'Deposit capacity into the Nervos DAO',
        tags: ['DAO'],
        body: z.object({
          from: z.string().describe('The sighash address paying the deposit and the fee'),
          to: z.string().optional().describe('The sighash address owning the deposit, the sender by default'),
          capacity: CkbCapacity,
          password: Password,
        }),
        response: {
          200: TransactionHash,
        },
      },
    },
    async (request) => {
      const { from, to, capacity, password } = request.body;
      const sender = parseSighashAddress(from, env.NETWORK);
      const tx = await fastify.daoService.deposit(sender, [
        {
          lock: to ? parseSighashAddress(to, env.NETWORK) : sender,
          capacity: parseHumanCapacity(capacity),
        },
      ]);
      const txhash = await fastify.walletService.signAndSend(tx, password);
      return { txhash };
    },
  );

  fastify.post(
    '/prepare',
    {
      schema: {
        description: 'Prepare deposited DAO cells for withdrawal',
        tags: ['DAO'],
        body: z.object({
          from: z.string().describe('The sighash address owning the deposits and paying the fee'),
          out_points: z.array(OutPointString).min(1),
          password: Password,
        }),
        response: {
          200: TransactionHash,
        },
      },
    },
    async (request) => {
      const { from, out_points, password } = request.body;
      const tx = await fastify.daoService.prepare(parseSighashAddress(from, env.NETWORK), out_points.map(parseOutPoint));
      const txhash = await fastify.walletService.signAndSend(tx, password);
      return { txhash };
    },
  );

  fastify.post(
    '/withdraw',
    {
      schema: {
        description: 'Withdraw prepared DAO cells with the accrued interest',
        tags: ['DAO'],
        body: z.object({
          from: z.string().describe('The sighash address owning the prepared cells'),
          to: z.string().optional().describe('The address receiving the payout, the sender by default'),
          out_points: z.array(OutPointString).min(1),
          password: Password,
        }),
        response: {
          200: TransactionHash,
        },
      },
    },
    async (request) => {
      const { from, to, out_points, password } = request.body;
      const sender = parseSighashAddress(from, env.NETWORK);
      const receiver = to ? parseSighashAddress(to, env.NETWORK) : sender;
      const tx = await fastify.daoService.withdraw(out_points.map(parseOutPoint), receiver);
      const txhash = await fastify.walletService.signAndSend(tx, password);
      return { txhash };
    },
  );

  done();
};

export default transactionRoutes;
