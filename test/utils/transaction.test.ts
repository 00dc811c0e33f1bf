import { describe, expect, test } from 'vitest';
import { BI } from '@ckb-lumos/lumos';
import { blockchain } from '@ckb-lumos/base';
import {
  calculateFee,
  createPlaceholderWitness,
  createUnsignedTransaction,
  getTransactionFee,
  getTransactionHash,
  getTransactionSize,
  groupInputsByLock,
  toTransaction,
} from '../../src/utils/transaction';
import { byteLength } from '../../src/utils/hex';
import { createCell, sighashLock, TEST_PRIVATE_KEY, OTHER_PRIVATE_KEY } from '../helpers/fake-light-client';

const lockA = sighashLock(TEST_PRIVATE_KEY);
const lockB = sighashLock(OTHER_PRIVATE_KEY);

function input(lock: typeof lockA, capacity: number, blockNumber: number) {
  return { cell: createCell({ lock, capacity, blockNumber }), since: '0x0', capacity: BI.from(capacity) };
}

describe('transaction', () => {
  test('calculateFee: round the fee up', () => {
    expect(calculateFee(1000, BI.from(1000)).toNumber()).toBe(1000);
    expect(calculateFee(1001, BI.from(1000)).toNumber()).toBe(1001);
    expect(calculateFee(1, BI.from(999)).toNumber()).toBe(1);
    expect(calculateFee(10, BI.from(0)).toNumber()).toBe(0);
  });

  test('groupInputsByLock: group by lock in order of the first input', () => {
    const tx = createUnsignedTransaction({
      inputs: [input(lockA, 100, 1), input(lockB, 200, 2), input(lockA, 300, 3)],
    });
    expect(groupInputsByLock(tx)).toEqual([
      { script: lockA, inputIndices: [0, 2] },
      { script: lockB, inputIndices: [1] },
    ]);
  });

  test('getTransactionFee: inputs minus outputs', () => {
    const tx = createUnsignedTransaction({
      inputs: [input(lockA, 1000, 1)],
      outputs: [{ cellOutput: { capacity: BI.from(900).toHexString(), lock: lockB }, data: '0x' }],
    });
    expect(getTransactionFee(tx).toNumber()).toBe(100);
  });

  test('getTransactionHash: witnesses are not hashed', () => {
    const tx = createUnsignedTransaction({ inputs: [input(lockA, 1000, 1)], witnesses: ['0x'] });
    expect(getTransactionHash({ ...tx, witnesses: ['0x1234'] })).toBe(getTransactionHash(tx));
  });

  test('getTransactionSize: witnesses are counted', () => {
    const tx = createUnsignedTransaction({ inputs: [input(lockA, 1000, 1)], witnesses: ['0x'] });
    const size = getTransactionSize(tx);
    expect(size).toBe(blockchain.Transaction.pack(toTransaction(tx)).byteLength + 4);
    expect(getTransactionSize({ ...tx, witnesses: ['0x1234'] })).toBe(size + 2);
  });

  test('createPlaceholderWitness: a WitnessArgs with a zero-filled lock', () => {
    const witness = createPlaceholderWitness(65);
    expect(byteLength(witness)).toBe(85);
    expect(blockchain.WitnessArgs.unpack(witness).lock).toBe(`0x${'00'.repeat(65)}`);
  });
});
