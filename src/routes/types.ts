import z from 'zod';

export const Script = z.object({
  codeHash: z.string(),
  args: z.string(),
  hashType: z.enum(['type', 'data', 'data1', 'data2']),
});
export type Script = z.infer<typeof Script>;

export const OutPoint = z.object({
  txHash: z.string(),
  index: z.string(),
});

export const Cell = z.object({
  outPoint: OutPoint,
  cellOutput: z.object({
    capacity: z.string(),
    lock: Script,
    type: Script.optional(),
  }),
  data: z.string(),
  blockNumber: z.string().optional(),
  txIndex: z.string().optional(),
});
export type Cell = z.infer<typeof Cell>;

export const BlockHeader = z.object({
  hash: z.string(),
  number: z.string(),
  epoch: z.string(),
  dao: z.string(),
  timestamp: z.string(),
  parentHash: z.string(),
});

export const TransactionHash = z.object({
  txhash: z.string().describe('The hash of the sent transaction'),
});

export const Capacity = z.object({
  capacity: z.string().describe('Capacity in shannons'),
  capacity_ckb: z.string().describe('Capacity in CKB, 1 CKB = 10^8 shannons'),
});

export const CkbCapacity = z.string().describe('Capacity in CKB with at most 8 decimals, e.g. 102.43');

export const OutPointString = z.string().describe('Out point in the format of {tx-hash}-{index}, e.g. 0x...-0');

export const Password = z.string().optional().describe('Passphrase to unlock the keystore of the sender');

const CellDep = z.object({
  outPoint: OutPoint,
  depType: z.enum(['code', 'depGroup']),
});

const CellInput = z.object({
  previousOutput: OutPoint,
  since: z.string(),
});

const CellOutput = z.object({
  capacity: z.string(),
  lock: Script,
  type: Script.optional(),
});

export const Transaction = z.object({
  version: z.string().default('0x0'),
  cellDeps: z.array(CellDep),
  headerDeps: z.array(z.string()),
  inputs: z.array(CellInput),
  outputs: z.array(CellOutput),
  outputsData: z.array(z.string()),
  witnesses: z.array(z.string()),
});

export const TransactionView = Transaction.extend({
  hash: z.string(),
});

export const TransactionWithStatus = z.object({
  transaction: TransactionView.nullable(),
  txStatus: z.object({
    status: z.enum(['pending', 'proposed', 'committed', 'unknown', 'rejected']),
    blockHash: z.string().optional(),
  }),
});

/**
 * Light client fetch progress: fetched with the data, fetching since first_sent, added at timestamp, or not_found
 */
export function FetchStatus<T extends z.ZodTypeAny>(data: T) {
  return z.discriminatedUnion('status', [
    z.object({ status: z.literal('fetched'), data }),
    z.object({ status: z.literal('fetching'), first_sent: z.string() }),
    z.object({ status: z.literal('added'), timestamp: z.string() }),
    z.object({ status: z.literal('not_found') }),
  ]);
}

export const HashList = z.array(z.string());
