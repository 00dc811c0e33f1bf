import { beforeEach, describe, expect, test, vi } from 'vitest';
import { asValue } from 'awilix';
import { BI } from '@ckb-lumos/lumos';
import { since } from '@ckb-lumos/base';
import type { CellDep, Script } from '@ckb-lumos/base';
import { bytes, number } from '@ckb-lumos/codec';
import container from '../../src/container';
import CellDepResolver from '../../src/services/cell-deps';
import DaoService, { DaoTxBuilder } from '../../src/services/dao';
import {
  InvalidCapacityError,
  LedgerUnavailableError,
  NotDepositedError,
  NotPreparedError,
} from '../../src/errors';
import { DAO_DEPOSIT_DATA, NetworkType, SECP_SIGNATURE_SIZE, SHANNONS_PER_CKB, getDaoTypeScript } from '../../src/constants';
import { toUint64LE } from '../../src/utils/hex';
import { calculateDaoEarliestSince } from '../../src/utils/dao';
import {
  calculateFee,
  createPlaceholderWitness,
  getTransactionSize,
} from '../../src/utils/transaction';
import {
  FakeLightClient,
  OTHER_PRIVATE_KEY,
  TEST_PRIVATE_KEY,
  createCell,
  createHeader,
  createTransactionView,
  sighashLock,
  txHashOf,
} from '../helpers/fake-light-client';

const lock = sighashLock(TEST_PRIVATE_KEY);
const receiver = sighashLock(OTHER_PRIVATE_KEY);
const daoType = getDaoTypeScript(NetworkType.testnet);
const ckb = (value: number) => SHANNONS_PER_CKB.mul(value);

const LOCK_DEP: CellDep = { outPoint: { txHash: txHashOf(0xe0), index: '0x0' }, depType: 'depGroup' };
const DAO_DEP: CellDep = { outPoint: { txHash: txHashOf(0xe1), index: '0x2' }, depType: 'code' };

function daoField(accumulatedRate: BI) {
  return bytes.hexify(bytes.concat(new Uint8Array(8), number.Uint64LE.pack(accumulatedRate), new Uint8Array(16)));
}

const depositHeader = createHeader({
  number: 100,
  epoch: since.generateHeaderEpoch({ number: 5, index: 100, length: 1000 }),
  dao: daoField(BI.from('10000000000000000')),
});
const prepareHeader = createHeader({
  number: 200,
  epoch: since.generateHeaderEpoch({ number: 10, index: 200, length: 1000 }),
  dao: daoField(BI.from('10001000000000000')),
});

const depositTxHash = txHashOf(0xd0);
const prepareTxHash = txHashOf(0xd1);
const depositOutPoint = { txHash: depositTxHash, index: '0x0' };
const prepareOutPoint = { txHash: prepareTxHash, index: '0x0' };
const daoCellOutput = { capacity: ckb(1000).toHexString(), lock, type: daoType };

function setupChain(lightClient: FakeLightClient) {
  lightClient.addCommittedTransaction(
    createTransactionView(depositTxHash, {
      inputs: [{ previousOutput: { txHash: txHashOf(0xc0), index: '0x0' }, since: '0x0' }],
      outputs: [daoCellOutput],
      outputsData: [DAO_DEPOSIT_DATA],
    }),
    depositHeader,
  );
  lightClient.addCommittedTransaction(
    createTransactionView(prepareTxHash, {
      inputs: [{ previousOutput: depositOutPoint, since: '0x0' }],
      outputs: [daoCellOutput],
      outputsData: [toUint64LE(100)],
    }),
    prepareHeader,
  );
}

function mockCellDeps(resolver: CellDepResolver) {
  return vi
    .spyOn(resolver, 'resolve')
    .mockImplementation(async (kind) => (kind.codeHash === daoType.codeHash ? DAO_DEP : LOCK_DEP));
}

describe('DaoTxBuilder', () => {
  let lightClient: FakeLightClient;
  let builder: DaoTxBuilder;

  beforeEach(() => {
    lightClient = new FakeLightClient();
    setupChain(lightClient);
    const resolver = new CellDepResolver({ lightClient });
    mockCellDeps(resolver);
    builder = new DaoTxBuilder(lightClient, resolver, NetworkType.testnet);
  });

  test('buildDeposit: create DAO cells with the deposit data', async () => {
    const tx = await builder.buildDeposit([{ lock: receiver, capacity: ckb(200) }]);
    expect(tx.outputs).toEqual([
      { cellOutput: { capacity: ckb(200).toHexString(), lock: receiver, type: daoType }, data: DAO_DEPOSIT_DATA },
    ]);
    expect(tx.cellDeps).toEqual([DAO_DEP]);
  });

  test('buildDeposit: throw InvalidCapacityError below the occupied capacity', async () => {
    // 8 (capacity) + 53 (lock) + 33 (type) + 8 (data) bytes
    await expect(builder.buildDeposit([{ lock: receiver, capacity: ckb(101) }])).rejects.toThrow(
      InvalidCapacityError,
    );
    await expect(builder.buildDeposit([{ lock: receiver, capacity: ckb(102) }])).resolves.toHaveProperty('outputs');
  });

  test('buildPrepare: replace the deposited cell with a prepared cell', async () => {
    const tx = await builder.buildPrepare([depositOutPoint]);
    expect(tx.headerDeps).toEqual([depositHeader.hash]);
    expect(tx.inputs.map(({ cell }) => cell.outPoint)).toEqual([depositOutPoint]);
    expect(tx.outputs).toEqual([{ cellOutput: daoCellOutput, data: '0x6400000000000000' }]);
    expect(tx.witnesses).toEqual([createPlaceholderWitness(SECP_SIGNATURE_SIZE)]);
    expect(tx.cellDeps).toEqual([LOCK_DEP, DAO_DEP]);
  });

  test('buildPrepare: throw NotDepositedError', async () => {
    await expect(builder.buildPrepare([prepareOutPoint])).rejects.toThrow(NotDepositedError);
    await expect(builder.buildPrepare([{ txHash: txHashOf(0xff), index: '0x0' }])).rejects.toThrow(
      NotDepositedError,
    );
    await expect(builder.buildPrepare([{ txHash: depositTxHash, index: '0x1' }])).rejects.toThrow(NotDepositedError);
  });

  test('buildPrepare: throw LedgerUnavailableError while the transaction is being fetched', async () => {
    vi.spyOn(lightClient, 'getTransaction').mockResolvedValue(null);
    vi.spyOn(lightClient, 'fetchTransaction').mockResolvedValue({ status: 'fetching', first_sent: '0x1' });
    await expect(builder.buildPrepare([depositOutPoint])).rejects.toThrow(LedgerUnavailableError);
  });

  test('buildPrepare: throw LedgerUnavailableError without the block header', async () => {
    lightClient.headers.delete(depositHeader.hash);
    await expect(builder.buildPrepare([depositOutPoint])).rejects.toThrow(LedgerUnavailableError);
  });

  test('buildWithdraw: pay out the prepared cell with its interest', async () => {
    const tx = await builder.buildWithdraw([prepareOutPoint], receiver, BI.from(1000));

    expect(tx.headerDeps).toEqual([depositHeader.hash, prepareHeader.hash]);
    expect(tx.inputs).toHaveLength(1);
    const [input] = tx.inputs;
    expect(input.cell.outPoint).toEqual(prepareOutPoint);
    // interest accrues on the 898 CKB above the 102 CKB occupied by the cell
    expect(input.capacity.toString()).toBe('100008980000');
    expect(input.since).toBe(calculateDaoEarliestSince(depositHeader.epoch, prepareHeader.epoch));
    expect(since.parseAbsoluteEpochSince(input.since)).toEqual({ number: 185, index: 100, length: 1000 });
    expect(tx.witnesses).toEqual([createPlaceholderWitness(SECP_SIGNATURE_SIZE, toUint64LE(0))]);
    expect(tx.cellDeps).toEqual([LOCK_DEP, DAO_DEP]);

    const fee = calculateFee(getTransactionSize(tx), BI.from(1000));
    expect(tx.outputs).toHaveLength(1);
    expect(tx.outputs[0].cellOutput.lock).toEqual(receiver);
    expect(BI.from(tx.outputs[0].cellOutput.capacity).toString()).toBe(BI.from('100008980000').sub(fee).toString());
  });

  test('buildWithdraw: stay within the payout allowed by the DAO type script', async () => {
    const tx = await builder.buildWithdraw([prepareOutPoint], receiver, BI.from(1000));
    const occupied = ckb(102);
    const allowed = ckb(1000).sub(occupied).mul('10001000000000000').div('10000000000000000').add(occupied);
    const outputCapacity = BI.from(tx.outputs[0].cellOutput.capacity);
    const fee = allowed.sub(outputCapacity);

    expect(outputCapacity.lt(allowed)).toBe(true);
    expect(fee.toString()).toBe(calculateFee(getTransactionSize(tx), BI.from(1000)).toString());
  });

  test('buildWithdraw: throw NotPreparedError', async () => {
    await expect(builder.buildWithdraw([depositOutPoint], receiver, BI.from(1000))).rejects.toThrow(NotPreparedError);
  });

  test('buildWithdraw: throw NotPreparedError when the deposit block does not match', async () => {
    const prepareTx = lightClient.transactions.get(prepareTxHash);
    if (prepareTx?.transaction) {
      prepareTx.transaction.outputsData = [toUint64LE(99)];
    }
    await expect(builder.buildWithdraw([prepareOutPoint], receiver, BI.from(1000))).rejects.toThrow(NotPreparedError);
  });
});

describe('DaoService', () => {
  let lightClient: FakeLightClient;
  let daoService: DaoService;

  beforeEach(() => {
    lightClient = new FakeLightClient();
    setupChain(lightClient);
    const resolver = new CellDepResolver({ lightClient });
    mockCellDeps(resolver);

    const scope = container.createScope();
    scope.register({ lightClient: asValue(lightClient), cellDeps: asValue(resolver) });
    daoService = new DaoService(scope.cradle);
  });

  test('deposit: balance the deposit with the cells of the sender', async () => {
    lightClient.addCells(createCell({ lock, capacity: ckb(2000) }));
    const tx = await daoService.deposit(lock, [{ lock: receiver, capacity: ckb(1000) }]);

    expect(tx.inputs).toHaveLength(1);
    expect(tx.outputs).toHaveLength(2);
    expect(tx.outputs[0].cellOutput.type).toEqual(daoType);
    expect(tx.outputs[1].cellOutput.lock).toEqual(lock);
    expect(tx.cellDeps).toEqual([DAO_DEP, LOCK_DEP]);
  });

  test('prepare: pay the fee with the cells of the sender', async () => {
    lightClient.addCells(createCell({ lock, capacity: ckb(200), blockNumber: 300 }));
    const tx = await daoService.prepare(lock, [depositOutPoint]);

    expect(tx.inputs).toHaveLength(2);
    expect(tx.witnesses[1]).toBe('0x');
    expect(tx.outputs[0].data).toBe('0x6400000000000000');
    expect(tx.outputs[1].cellOutput.lock).toEqual(lock);
  });

  test('withdraw', async () => {
    const tx = await daoService.withdraw([prepareOutPoint], receiver);
    expect(tx.outputs).toHaveLength(1);
    expect(tx.outputs[0].cellOutput.lock).toEqual(receiver);
  });

  test('getDepositedCells and getPreparedCells', async () => {
    lightClient.addCells(
      createCell({ lock, capacity: ckb(1000), type: daoType, data: DAO_DEPOSIT_DATA, blockNumber: 1 }),
      createCell({ lock, capacity: ckb(500), type: daoType, data: DAO_DEPOSIT_DATA, blockNumber: 2 }),
      createCell({ lock, capacity: ckb(300), type: daoType, data: toUint64LE(1), blockNumber: 3 }),
      createCell({ lock, capacity: ckb(100), blockNumber: 4 }),
    );

    const deposited = await daoService.getDepositedCells(lock);
    expect(deposited.cells).toHaveLength(2);
    expect(deposited.totalCapacity.toString()).toBe(ckb(1500).toString());

    const prepared = await daoService.getPreparedCells(lock);
    expect(prepared.cells.map(({ data }) => data)).toEqual(['0x0100000000000000']);
    expect(prepared.totalCapacity.toString()).toBe(ckb(300).toString());
  });
});
