import { BI } from '@ckb-lumos/lumos';
import type { Hash, OutPoint, Script } from '@ckb-lumos/base';
import type { Cradle } from '../container';
import type { BlockHeader, ILightClient, TransactionView } from './light-client';
import type CellDepResolver from './cell-deps';
import CellCollector from './cell-collector';
import CapacityBalancer, { sighashCapacitySource } from './balancer';
import {
  InsufficientCapacityError,
  InvalidCapacityError,
  LedgerUnavailableError,
  NotDepositedError,
  NotPreparedError,
} from '../errors';
import { DAO_DEPOSIT_DATA, MAX_TOTAL_CAPACITY, NetworkType, SECP_SIGNATURE_SIZE, getDaoTypeScript } from '../constants';
import { formatOutPoint } from '../utils/out-point';
import { getOccupiedCapacity, isScriptEqual } from '../utils/script';
import { readUint64LE, toUint64LE } from '../utils/hex';
import {
  calculateDaoEarliestSince,
  calculateDaoWithdrawCapacity,
  extractAccumulatedRate,
  isDepositedData,
  isPreparedData,
} from '../utils/dao';
import {
  type LiveCell,
  type TransactionInput,
  type UnsignedTransaction,
  calculateFee,
  createPlaceholderWitness,
  createUnsignedTransaction,
  getTransactionSize,
  groupInputsByLock,
  packWitnessArgs,
} from '../utils/transaction';

export interface DepositReceiver {
  lock: Script;
  capacity: BI;
}

interface CommittedCell {
  cell: LiveCell;
  transaction: TransactionView;
  header: BlockHeader;
}

export interface DaoCells {
  cells: LiveCell[];
  totalCapacity: BI;
}

/**
 * Builds the transactions of the DAO lifecycle: deposit, prepare and withdraw
 */
export class DaoTxBuilder {
  private lightClient: ILightClient;
  private cellDeps: CellDepResolver;
  private network: NetworkType;

  constructor(lightClient: ILightClient, cellDeps: CellDepResolver, network: NetworkType) {
    this.lightClient = lightClient;
    this.cellDeps = cellDeps;
    this.network = network;
  }

  private get daoTypeScript() {
    return getDaoTypeScript(this.network);
  }

  private isDaoCell(cell: LiveCell) {
    const { type } = cell.cellOutput;
    return !!type && isScriptEqual(type, this.daoTypeScript);
  }

  private async getHeader(blockHash: Hash): Promise<BlockHeader> {
    const header = await this.lightClient.getHeader(blockHash);
    if (header) {
      return header;
    }
    const fetched = await this.lightClient.fetchHeader(blockHash);
    if (fetched.status === 'fetched') {
      return fetched.data;
    }
    throw new LedgerUnavailableError(`Header ${blockHash} is not available in the light client: ${fetched.status}`);
  }

  /**
   * Load an output of a committed transaction with the header of its block, null when it is not on chain
   */
  private async getCommittedCell(outPoint: OutPoint): Promise<CommittedCell | null> {
    let result = await this.lightClient.getTransaction(outPoint.txHash);
    if (!result?.transaction) {
      const fetched = await this.lightClient.fetchTransaction(outPoint.txHash);
      if (fetched.status === 'not_found') {
        return null;
      }
      if (fetched.status !== 'fetched') {
        throw new LedgerUnavailableError(
          `Transaction ${outPoint.txHash} is not available in the light client: ${fetched.status}`,
        );
      }
      result = fetched.data;
    }

    const { transaction, txStatus } = result;
    const index = BI.from(outPoint.index).toNumber();
    const cellOutput = transaction?.outputs[index];
    if (!transaction || !cellOutput || txStatus.status !== 'committed' || !txStatus.blockHash) {
      return null;
    }
    const header = await this.getHeader(txStatus.blockHash);
    return {
      cell: {
        outPoint,
        cellOutput,
        data: transaction.outputsData[index] ?? '0x',
        blockNumber: header.number,
      },
      transaction,
      header,
    };
  }

  /**
   * The first witness of each lock group reserves room for a secp256k1 signature
   */
  private static withLockPlaceholders(tx: UnsignedTransaction, inputTypes: (string | undefined)[] = []) {
    const firstIndices = new Set(groupInputsByLock(tx).map(({ inputIndices }) => inputIndices[0]));
    const witnesses = tx.inputs.map((_, index) => {
      const inputType = inputTypes[index];
      if (firstIndices.has(index)) {
        return createPlaceholderWitness(SECP_SIGNATURE_SIZE, inputType);
      }
      return inputType ? packWitnessArgs({ inputType }) : '0x';
    });
    return { ...tx, witnesses };
  }

  public async buildDeposit(receivers: DepositReceiver[]): Promise<UnsignedTransaction> {
    const outputs = receivers.map(({ lock, capacity }) => {
      const cellOutput = { capacity: capacity.toHexString(), lock, type: this.daoTypeScript };
      const occupied = getOccupiedCapacity(cellOutput, DAO_DEPOSIT_DATA);
      if (capacity.lt(occupied)) {
        throw new InvalidCapacityError(
          `Deposit capacity ${capacity.toString()} is less than the occupied capacity ${occupied.toString()}`,
        );
      }
      return { cellOutput, data: DAO_DEPOSIT_DATA };
    });
    const tx = createUnsignedTransaction({ outputs });
    return this.cellDeps.addCellDeps(tx, [this.daoTypeScript]);
  }

  public async buildPrepare(outPoints: OutPoint[]): Promise<UnsignedTransaction> {
    const headerDeps: Hash[] = [];
    const inputs: TransactionInput[] = [];
    const outputs: UnsignedTransaction['outputs'] = [];

    for (const outPoint of outPoints) {
      const deposited = await this.getCommittedCell(outPoint);
      if (!deposited || !this.isDaoCell(deposited.cell) || !isDepositedData(deposited.cell.data)) {
        throw new NotDepositedError(formatOutPoint(outPoint));
      }
      const { cell, header } = deposited;
      if (!headerDeps.includes(header.hash)) {
        headerDeps.push(header.hash);
      }
      inputs.push({ cell, since: '0x0', capacity: BI.from(cell.cellOutput.capacity) });
      outputs.push({ cellOutput: cell.cellOutput, data: toUint64LE(BI.from(header.number)) });
    }

    const tx = DaoTxBuilder.withLockPlaceholders(createUnsignedTransaction({ headerDeps, inputs, outputs }));
    return this.cellDeps.completeCellDeps(tx);
  }

  /**
   * Withdraw prepared cells to the receiver, the fee is taken from the payout
   */
  public async buildWithdraw(outPoints: OutPoint[], receiver: Script, feeRate: BI): Promise<UnsignedTransaction> {
    const headerDeps: Hash[] = [];
    const inputs: TransactionInput[] = [];
    const depositHeaderHashes: Hash[] = [];

    for (const outPoint of outPoints) {
      const prepared = await this.getCommittedCell(outPoint);
      if (!prepared || !this.isDaoCell(prepared.cell) || !isPreparedData(prepared.cell.data)) {
        throw new NotPreparedError(formatOutPoint(outPoint));
      }

      const index = BI.from(outPoint.index).toNumber();
      const depositInput = prepared.transaction.inputs[index];
      const deposited = depositInput ? await this.getCommittedCell(depositInput.previousOutput) : null;
      const depositNumber = readUint64LE(prepared.cell.data);
      if (!deposited || !depositNumber?.eq(deposited.header.number)) {
        throw new NotPreparedError(formatOutPoint(outPoint));
      }

      const depositAR = extractAccumulatedRate(deposited.header.dao);
      if (depositAR.isZero()) {
        throw new NotPreparedError(formatOutPoint(outPoint));
      }
      const withdrawAR = extractAccumulatedRate(prepared.header.dao);
      const capacity = calculateDaoWithdrawCapacity(
        prepared.cell.cellOutput,
        prepared.cell.data,
        depositAR,
        withdrawAR,
      );

      for (const hash of [deposited.header.hash, prepared.header.hash]) {
        if (!headerDeps.includes(hash)) {
          headerDeps.push(hash);
        }
      }
      depositHeaderHashes.push(deposited.header.hash);
      inputs.push({
        cell: prepared.cell,
        since: calculateDaoEarliestSince(deposited.header.epoch, prepared.header.epoch),
        capacity,
      });
    }

    const inputTypes = depositHeaderHashes.map((hash) => toUint64LE(headerDeps.indexOf(hash)));
    let tx = DaoTxBuilder.withLockPlaceholders(createUnsignedTransaction({ headerDeps, inputs }), inputTypes);
    tx = await this.cellDeps.completeCellDeps(tx);

    const totalPayout = inputs.reduce((acc, input) => acc.add(input.capacity), BI.from(0));
    const output = { cellOutput: { capacity: '0x0', lock: receiver }, data: '0x' };
    const fee = calculateFee(getTransactionSize({ ...tx, outputs: [output] }), feeRate);
    const required = getOccupiedCapacity(output.cellOutput).add(fee);
    if (totalPayout.lt(required)) {
      throw new InsufficientCapacityError(
        required.toString(),
        totalPayout.toString(),
        required.sub(totalPayout).toString(),
      );
    }
    // the capacity field has a fixed size, the fee holds for the final output
    output.cellOutput.capacity = totalPayout.sub(fee).toHexString();
    return { ...tx, outputs: [output] };
  }
}

/**
 * DAO lifecycle service
 * responsible for building balanced DAO transactions and querying DAO cells of a lock
 */
export default class DaoService {
  private cradle: Cradle;

  constructor(cradle: Cradle) {
    this.cradle = cradle;
  }

  private get network() {
    return this.cradle.env.NETWORK;
  }

  private get collector() {
    return new CellCollector(this.cradle.lightClient, { pageSize: this.cradle.env.CELL_QUERY_PAGE_SIZE });
  }

  private get builder() {
    return new DaoTxBuilder(this.cradle.lightClient, this.cradle.cellDeps, this.network);
  }

  private get feeRate() {
    return BI.from(this.cradle.env.FEE_RATE);
  }

  private async balance(tx: UnsignedTransaction, from: Script) {
    const balancer = new CapacityBalancer(this.collector);
    const withDeps = await this.cradle.cellDeps.addCellDeps(tx, [from]);
    return balancer.balance(withDeps, {
      feeRate: this.feeRate,
      capacitySources: [sighashCapacitySource(from)],
      forceSmallChangeAsFee: BI.from(this.cradle.env.SMALL_CHANGE_AS_FEE),
    });
  }

  public async deposit(from: Script, receivers: DepositReceiver[]) {
    const tx = await this.builder.buildDeposit(receivers);
    this.cradle.logger.info(`[DaoService] Deposit ${receivers.length} DAO cells`);
    return this.balance(tx, from);
  }

  public async prepare(from: Script, outPoints: OutPoint[]) {
    const tx = await this.builder.buildPrepare(outPoints);
    this.cradle.logger.info(`[DaoService] Prepare ${outPoints.map(formatOutPoint).join(', ')}`);
    return this.balance(tx, from);
  }

  public async withdraw(outPoints: OutPoint[], receiver: Script) {
    this.cradle.logger.info(`[DaoService] Withdraw ${outPoints.map(formatOutPoint).join(', ')}`);
    return this.builder.buildWithdraw(outPoints, receiver, this.feeRate);
  }

  private async getDaoCells(lock: Script) {
    const { cells } = await this.collector.collectLiveCells(
      {
        script: lock,
        scriptType: 'lock',
        secondaryScript: getDaoTypeScript(this.network),
        dataLenRange: [BI.from(8), BI.from(9)],
      },
      MAX_TOTAL_CAPACITY,
    );
    return cells;
  }

  private static summarize(cells: LiveCell[]): DaoCells {
    return {
      cells,
      totalCapacity: cells.reduce((acc, cell) => acc.add(cell.cellOutput.capacity), BI.from(0)),
    };
  }

  public async getDepositedCells(lock: Script): Promise<DaoCells> {
    const cells = await this.getDaoCells(lock);
    return DaoService.summarize(cells.filter((cell) => isDepositedData(cell.data)));
  }

  public async getPreparedCells(lock: Script): Promise<DaoCells> {
    const cells = await this.getDaoCells(lock);
    return DaoService.summarize(cells.filter((cell) => isPreparedData(cell.data)));
  }
}
