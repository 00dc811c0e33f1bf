import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';

const peersRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  fastify.get(
    '',
    {
      schema: {
        description: 'Get the peers connected to the light client',
        tags: ['Light Client'],
        response: {
          200: z.array(
            z.object({
              node_id: z.string(),
              version: z.string(),
              addresses: z.array(z.object({ address: z.string(), score: z.string() })),
              connected_duration: z.string().describe('Milliseconds since the peer connected, hex encoded'),
              protocols: z.array(z.object({ id: z.string(), version: z.string() })),
            }),
          ),
        },
      },
    },
    async () => {
      const peers = await fastify.lightClient.getPeers();
      return peers.map(({ nodeId, version, addresses, connectedDuration, protocols }) => ({
        node_id: nodeId,
        version,
        addresses,
        connected_duration: connectedDuration,
        protocols,
      }));
    },
  );

  done();
};

export default peersRoutes;
