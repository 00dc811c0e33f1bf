import axios, { type AxiosInstance, HttpStatusCode, isAxiosError } from 'axios';
import * as Sentry from '@sentry/node';
import { BI } from '@ckb-lumos/lumos';
import type { Hash, Script, Transaction } from '@ckb-lumos/base';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Cradle } from '../container';
import { addLoggerInterceptor } from '../utils/interceptors';
import { LedgerUnavailableError } from '../errors';
import type { LiveCell } from '../utils/transaction';

export type Order = 'asc' | 'desc';
export type ScriptType = 'lock' | 'type';
export type ValueRange = [BI, BI];

export interface SearchKey {
  script: Script;
  scriptType: ScriptType;
  /**
   * get_transactions only, one record per transaction listing every matched input and output
   */
  groupByTransaction?: boolean;
  filter?: {
    script?: Script;
    scriptLenRange?: ValueRange;
    outputDataLenRange?: ValueRange;
    outputCapacityRange?: ValueRange;
    blockRange?: ValueRange;
  };
}

const RpcScript = z
  .object({
    code_hash: z.string(),
    hash_type: z.enum(['type', 'data', 'data1', 'data2']),
    args: z.string(),
  })
  .transform(
    ({ code_hash, hash_type, args }): Script => ({
      codeHash: code_hash,
      hashType: hash_type,
      args,
    }),
  );

const RpcOutPoint = z
  .object({
    tx_hash: z.string(),
    index: z.string(),
  })
  .transform(({ tx_hash, index }) => ({ txHash: tx_hash, index }));

const RpcOutput = z
  .object({
    capacity: z.string(),
    lock: RpcScript,
    type: RpcScript.nullable().optional(),
  })
  .transform(({ capacity, lock, type }) => ({ capacity, lock, type: type ?? undefined }));

const RpcCell = z
  .object({
    output: RpcOutput,
    output_data: z.string().nullable().optional(),
    out_point: RpcOutPoint,
    block_number: z.string(),
    tx_index: z.string(),
  })
  .transform(
    (cell): LiveCell => ({
      outPoint: cell.out_point,
      cellOutput: cell.output,
      data: cell.output_data ?? '0x',
      blockNumber: cell.block_number,
      txIndex: cell.tx_index,
    }),
  );

const CellsPage = z
  .object({
    objects: z.array(RpcCell),
    last_cursor: z.string(),
  })
  .transform(({ objects, last_cursor }) => ({ cells: objects, lastCursor: last_cursor }));
export type CellsPage = z.infer<typeof CellsPage>;

export const BlockHeader = z
  .object({
    hash: z.string(),
    number: z.string(),
    epoch: z.string(),
    dao: z.string(),
    timestamp: z.string(),
    parent_hash: z.string(),
  })
  .transform(({ parent_hash, ...header }) => ({ ...header, parentHash: parent_hash }));
export type BlockHeader = z.infer<typeof BlockHeader>;

const RpcTransaction = z
  .object({
    hash: z.string(),
    version: z.string(),
    cell_deps: z.array(
      z.object({
        out_point: RpcOutPoint,
        dep_type: z.enum(['code', 'dep_group']),
      }),
    ),
    header_deps: z.array(z.string()),
    inputs: z.array(
      z.object({
        previous_output: RpcOutPoint,
        since: z.string(),
      }),
    ),
    outputs: z.array(RpcOutput),
    outputs_data: z.array(z.string()),
    witnesses: z.array(z.string()),
  })
  .transform((tx) => ({
    hash: tx.hash,
    version: tx.version,
    cellDeps: tx.cell_deps.map(({ out_point, dep_type }) => ({
      outPoint: out_point,
      depType: dep_type === 'dep_group' ? ('depGroup' as const) : ('code' as const),
    })),
    headerDeps: tx.header_deps,
    inputs: tx.inputs.map(({ previous_output, since }) => ({ previousOutput: previous_output, since })),
    outputs: tx.outputs,
    outputsData: tx.outputs_data,
    witnesses: tx.witnesses,
  }));
export type TransactionView = z.infer<typeof RpcTransaction>;

const TransactionWithStatus = z
  .object({
    transaction: RpcTransaction.nullable(),
    tx_status: z.object({
      status: z.enum(['pending', 'proposed', 'committed', 'unknown', 'rejected']),
      block_hash: z.string().nullable().optional(),
    }),
  })
  .transform(({ transaction, tx_status }) => ({
    transaction,
    txStatus: { status: tx_status.status, blockHash: tx_status.block_hash ?? undefined },
  }));
export type TransactionWithStatus = z.infer<typeof TransactionWithStatus>;

export const GenesisBlock = z.object({
  header: BlockHeader,
  transactions: z.array(RpcTransaction),
});
export type GenesisBlock = z.infer<typeof GenesisBlock>;

function FetchStatus<T extends z.ZodTypeAny>(data: T) {
  return z.discriminatedUnion('status', [
    z.object({ status: z.literal('fetched'), data }),
    z.object({ status: z.literal('fetching'), first_sent: z.string() }),
    z.object({ status: z.literal('added'), timestamp: z.string() }),
    z.object({ status: z.literal('not_found') }),
  ]);
}

const FetchHeaderResult = FetchStatus(BlockHeader);
export type FetchHeaderResult = z.infer<typeof FetchHeaderResult>;

const FetchTransactionResult = FetchStatus(TransactionWithStatus);
export type FetchTransactionResult = z.infer<typeof FetchTransactionResult>;

const ScriptStatus = z
  .object({
    script: RpcScript,
    script_type: z.enum(['lock', 'type']),
    block_number: z.string(),
  })
  .transform(({ script, script_type, block_number }) => ({
    script,
    scriptType: script_type,
    blockNumber: block_number,
  }));
export type ScriptStatus = z.infer<typeof ScriptStatus>;

export type SetScriptsCommand = 'all' | 'partial' | 'delete';

const CellsCapacity = z
  .object({
    capacity: z.string(),
    block_hash: z.string(),
    block_number: z.string(),
  })
  .transform(({ capacity, block_hash, block_number }) => ({
    capacity: BI.from(capacity),
    blockHash: block_hash,
    blockNumber: block_number,
  }));
export type CellsCapacity = z.infer<typeof CellsCapacity>;

const IoType = z.enum(['input', 'output']);

/**
 * Ungrouped records carry one io_type and io_index, grouped records list them in cells
 */
const TransactionRecord = z
  .object({
    transaction: RpcTransaction,
    block_number: z.string(),
    tx_index: z.string(),
    io_type: IoType.optional(),
    io_index: z.string().optional(),
    cells: z.array(z.tuple([IoType, z.string()])).optional(),
  })
  .transform(({ transaction, block_number, tx_index, io_type, io_index, cells }) => ({
    transaction,
    blockNumber: block_number,
    txIndex: tx_index,
    cells: cells
      ? cells.map(([ioType, ioIndex]) => ({ ioType, ioIndex }))
      : io_type && io_index
        ? [{ ioType: io_type, ioIndex: io_index }]
        : [],
  }));
export type TransactionRecord = z.infer<typeof TransactionRecord>;

const TransactionsPage = z
  .object({
    objects: z.array(TransactionRecord),
    last_cursor: z.string(),
  })
  .transform(({ objects, last_cursor }) => ({ transactions: objects, lastCursor: last_cursor }));
export type TransactionsPage = z.infer<typeof TransactionsPage>;

const RemoteNode = z
  .object({
    version: z.string(),
    node_id: z.string(),
    addresses: z.array(z.object({ address: z.string(), score: z.string() })),
    connected_duration: z.string(),
    protocols: z.array(z.object({ id: z.string(), version: z.string() })),
  })
  .transform(({ node_id, connected_duration, ...node }) => ({
    ...node,
    nodeId: node_id,
    connectedDuration: connected_duration,
  }));
export type RemoteNode = z.infer<typeof RemoteNode>;

/**
 * The ledger surface consumed by the wallet core
 */
export interface ILightClient {
  getCells(searchKey: SearchKey, order: Order, limit: number, after?: string): Promise<CellsPage>;
  getCellsCapacity(searchKey: SearchKey): Promise<CellsCapacity>;
  getTransactions(searchKey: SearchKey, order: Order, limit: number, after?: string): Promise<TransactionsPage>;
  getHeader(blockHash: Hash): Promise<BlockHeader | null>;
  fetchHeader(blockHash: Hash): Promise<FetchHeaderResult>;
  getTipHeader(): Promise<BlockHeader>;
  getGenesisBlock(): Promise<GenesisBlock>;
  getTransaction(txHash: Hash): Promise<TransactionWithStatus | null>;
  fetchTransaction(txHash: Hash): Promise<FetchTransactionResult>;
  sendTransaction(tx: Transaction): Promise<Hash>;
  getScripts(): Promise<ScriptStatus[]>;
  setScripts(scripts: ScriptStatus[], command?: SetScriptsCommand): Promise<void>;
  /**
   * Remove fetched headers or transactions from the light client storage, all of them when no hash is given
   */
  removeHeaders(blockHashes?: Hash[]): Promise<Hash[]>;
  removeTransactions(txHashes?: Hash[]): Promise<Hash[]>;
  getPeers(): Promise<RemoteNode[]>;
}

// https://github.com/nervosnetwork/ckb/blob/develop/rpc/src/error.rs
export class LightClientRpcError extends Error {
  public code: number;
  public statusCode = HttpStatusCode.BadGateway;

  public static schema = z.object({
    code: z.number(),
    message: z.string(),
  });

  constructor(code: number, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
  }
}

function toRpcScript(script: Script) {
  return {
    code_hash: script.codeHash,
    hash_type: script.hashType,
    args: script.args,
  };
}

function toRpcRange(range?: ValueRange) {
  return range ? [range[0].toHexString(), range[1].toHexString()] : undefined;
}

export function toRpcSearchKey(searchKey: SearchKey) {
  const { filter } = searchKey;
  return {
    script: toRpcScript(searchKey.script),
    script_type: searchKey.scriptType,
    filter: filter
      ? {
          script: filter.script ? toRpcScript(filter.script) : undefined,
          script_len_range: toRpcRange(filter.scriptLenRange),
          output_data_len_range: toRpcRange(filter.outputDataLenRange),
          output_capacity_range: toRpcRange(filter.outputCapacityRange),
          block_range: toRpcRange(filter.blockRange),
        }
      : undefined,
    with_data: true,
    ...(searchKey.groupByTransaction ? { group_by_transaction: true } : {}),
  };
}

export function toRpcTransaction(tx: Transaction) {
  return {
    version: tx.version,
    cell_deps: tx.cellDeps.map(({ outPoint, depType }) => ({
      out_point: { tx_hash: outPoint.txHash, index: outPoint.index },
      dep_type: depType === 'depGroup' ? 'dep_group' : 'code',
    })),
    header_deps: tx.headerDeps,
    inputs: tx.inputs.map(({ previousOutput, since }) => ({
      previous_output: { tx_hash: previousOutput.txHash, index: previousOutput.index },
      since,
    })),
    outputs: tx.outputs.map(({ capacity, lock, type }) => ({
      capacity,
      lock: toRpcScript(lock),
      type: type ? toRpcScript(type) : null,
    })),
    outputs_data: tx.outputsData,
    witnesses: tx.witnesses,
  };
}

/**
 * CKB light client JSON-RPC client
 * https://github.com/nervosnetwork/ckb-light-client/blob/develop/README.md
 */
export default class LightClient implements ILightClient {
  private request: AxiosInstance;

  constructor({ env, logger }: Pick<Cradle, 'env' | 'logger'>) {
    this.request = axios.create({
      baseURL: env.CKB_LIGHT_CLIENT_RPC_URL,
    });
    addLoggerInterceptor(this.request, logger);
  }

  private async callMethod<T extends z.ZodTypeAny>(method: string, params: unknown[], schema: T): Promise<z.output<T>> {
    return Sentry.startSpan({ op: this.constructor.name, name: method }, async () => {
      let data: unknown;
      try {
        const response = await this.request.post('', {
          jsonrpc: '2.0',
          id: randomUUID(),
          method,
          params,
        });
        data = response.data;
      } catch (err) {
        if (isAxiosError(err)) {
          throw new LedgerUnavailableError(`Light client request ${method} failed: ${err.message}`, { cause: err });
        }
        throw err;
      }

      const payload = z.object({ error: LightClientRpcError.schema.optional(), result: z.unknown() }).parse(data);
      if (payload.error) {
        throw new LightClientRpcError(payload.error.code, payload.error.message);
      }
      return schema.parse(payload.result);
    });
  }

  public async getCells(searchKey: SearchKey, order: Order, limit: number, after?: string) {
    return this.callMethod(
      'get_cells',
      [toRpcSearchKey(searchKey), order, BI.from(limit).toHexString(), after ?? null],
      CellsPage,
    );
  }

  public async getCellsCapacity(searchKey: SearchKey) {
    return this.callMethod('get_cells_capacity', [toRpcSearchKey(searchKey)], CellsCapacity);
  }

  public async getTransactions(searchKey: SearchKey, order: Order, limit: number, after?: string) {
    return this.callMethod(
      'get_transactions',
      [toRpcSearchKey(searchKey), order, BI.from(limit).toHexString(), after ?? null],
      TransactionsPage,
    );
  }

  public async getHeader(blockHash: Hash) {
    return this.callMethod('get_header', [blockHash], BlockHeader.nullable());
  }

  public async fetchHeader(blockHash: Hash) {
    return this.callMethod('fetch_header', [blockHash], FetchHeaderResult);
  }

  public async getTipHeader() {
    return this.callMethod('get_tip_header', [], BlockHeader);
  }

  public async getGenesisBlock() {
    return this.callMethod('get_genesis_block', [], GenesisBlock);
  }

  public async getTransaction(txHash: Hash) {
    return this.callMethod('get_transaction', [txHash], TransactionWithStatus.nullable());
  }

  public async fetchTransaction(txHash: Hash) {
    return this.callMethod('fetch_transaction', [txHash], FetchTransactionResult);
  }

  public async sendTransaction(tx: Transaction) {
    return this.callMethod('send_transaction', [toRpcTransaction(tx)], z.string());
  }

  public async getScripts() {
    return this.callMethod('get_scripts', [], z.array(ScriptStatus));
  }

  public async setScripts(scripts: ScriptStatus[], command?: SetScriptsCommand) {
    const params: unknown[] = [
      scripts.map(({ script, scriptType, blockNumber }) => ({
        script: toRpcScript(script),
        script_type: scriptType,
        block_number: blockNumber,
      })),
    ];
    if (command) {
      params.push(command);
    }
    await this.callMethod('set_scripts', params, z.null());
  }

  public async removeHeaders(blockHashes?: Hash[]) {
    return this.callMethod('remove_headers', [blockHashes ?? null], z.array(z.string()));
  }

  public async removeTransactions(txHashes?: Hash[]) {
    return this.callMethod('remove_transactions', [txHashes ?? null], z.array(z.string()));
  }

  public async getPeers() {
    return this.callMethod('get_peers', [], z.array(RemoteNode));
  }
}
