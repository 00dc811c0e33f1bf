import type { FastifyPluginCallback } from 'fastify';
import type { Server } from 'http';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { BI } from '@ckb-lumos/lumos';
import z from 'zod';
import type { Env } from '../../env';
import { Script } from '../types';
import { InvalidFilterError } from '../../errors';
import type { SearchFilter } from '../../services/cell-collector';
import type { ValueRange } from '../../services/light-client';
import { NetworkType, getDaoTypeScript, getScriptKind } from '../../constants';

const Range = z
  .tuple([z.string(), z.string()])
  .describe('Half-open range [min, max), decimal or 0x-prefixed hex')
  .optional();

export const SearchKeyBody = z.object({
  script: Script,
  script_type: z.enum(['lock', 'type']),
  secondary_script: Script.optional().describe('The type script when searching by lock, or the other way'),
  script_len_range: Range,
  data_len_range: Range,
  capacity_range: Range,
  block_range: Range,
});
export type SearchKeyBody = z.infer<typeof SearchKeyBody>;

function toValueRange(name: string, range?: [string, string]): ValueRange | undefined {
  if (!range) {
    return undefined;
  }
  try {
    return [BI.from(range[0]), BI.from(range[1])];
  } catch {
    throw new InvalidFilterError(`Invalid ${name}: [${range[0]}, ${range[1]}), expect decimal or hex numbers`);
  }
}

export function toSearchFilter(body: SearchKeyBody): SearchFilter {
  return {
    script: body.script,
    scriptType: body.script_type,
    secondaryScript: body.secondary_script,
    scriptLenRange: toValueRange('scriptLenRange', body.script_len_range),
    dataLenRange: toValueRange('dataLenRange', body.data_len_range),
    capacityRange: toValueRange('capacityRange', body.capacity_range),
    blockRange: toValueRange('blockRange', body.block_range),
  };
}

/**
 * get_transactions filters on the secondary script, its length and the block range only
 */
export function createExampleSearchKey(
  network: NetworkType,
  withFilter: boolean,
  method: 'cells' | 'transactions' | 'capacity',
): SearchKeyBody {
  const searchKey: SearchKeyBody = {
    script: { ...getScriptKind(network, 'SECP256K1_BLAKE160'), args: '0x00010203' },
    script_type: 'lock',
  };
  if (!withFilter) {
    return searchKey;
  }
  const filter: SearchKeyBody = {
    ...searchKey,
    secondary_script: { ...getDaoTypeScript(network), args: '0x00010203' },
    block_range: ['33', '999'],
  };
  if (method === 'transactions') {
    return filter;
  }
  return {
    ...filter,
    data_len_range: ['22', '888'],
    capacity_range: ['1000000', '100000000'],
  };
}

const searchKeyRoutes: FastifyPluginCallback<Record<never, never>, Server, ZodTypeProvider> = (fastify, _, done) => {
  const env: Env = fastify.container.resolve('env');

  fastify.get(
    '/example',
    {
      schema: {
        description: 'An example search key for the cells, cells capacity and transactions routes',
        tags: ['Light Client'],
        querystring: z.object({
          with_filter: z.enum(['true', 'false']).default('false'),
          method: z.enum(['cells', 'transactions', 'capacity']).default('cells'),
        }),
        response: {
          200: SearchKeyBody,
        },
      },
    },
    async (request) => {
      const { with_filter, method } = request.query;
      return createExampleSearchKey(env.NETWORK, with_filter === 'true', method);
    },
  );

  done();
};

export default searchKeyRoutes;
