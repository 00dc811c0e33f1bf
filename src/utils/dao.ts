import { BI } from '@ckb-lumos/lumos';
import { since } from '@ckb-lumos/base';
import type { HexString, Output, PackedSince } from '@ckb-lumos/base';
import { bytes, number } from '@ckb-lumos/codec';
import { DAO_LOCK_PERIOD_EPOCHS } from '../constants';
import { readUint64LE } from './hex';
import { getOccupiedCapacity } from './script';

/**
 * Accumulated rate AR, the second u64 of the header dao field (C, AR, S, U)
 */
export function extractAccumulatedRate(dao: HexString): BI {
  const buf = bytes.bytify(dao);
  if (buf.byteLength < 16) {
    throw new Error(`Invalid header dao field: ${dao}`);
  }
  return number.Uint64LE.unpack(buf.slice(8, 16));
}

/**
 * payout = floor(capacity * AR_withdraw / AR_deposit)
 */
export function calculateMaximumWithdraw(capacity: BI, depositAR: BI, withdrawAR: BI): BI {
  if (depositAR.isZero()) {
    throw new Error('Accumulated rate of the deposit block must not be zero');
  }
  return capacity.mul(withdrawAR).div(depositAR);
}

/**
 * The most a prepared cell can withdraw on chain: interest accrues on its free capacity only,
 * (capacity - occupied) * AR_withdraw / AR_deposit + occupied
 */
export function calculateDaoWithdrawCapacity(
  cellOutput: Pick<Output, 'capacity' | 'lock' | 'type'>,
  data: HexString,
  depositAR: BI,
  withdrawAR: BI,
): BI {
  const occupied = getOccupiedCapacity(cellOutput, data);
  const free = BI.from(cellOutput.capacity).sub(occupied);
  return calculateMaximumWithdraw(free, depositAR, withdrawAR).add(occupied);
}

/**
 * Deposited DAO cells hold 8 zero bytes, prepared cells hold the deposit block number
 */
export function isDepositedData(data: HexString): boolean {
  const value = readUint64LE(data);
  return value !== null && value.isZero();
}

export function isPreparedData(data: HexString): boolean {
  const value = readUint64LE(data);
  return value !== null && !value.isZero();
}

/**
 * Earliest absolute epoch since a prepared cell can be withdrawn:
 * the deposit epoch plus a whole number of lock periods covering the prepare epoch
 */
export function calculateDaoEarliestSince(depositEpoch: HexString, withdrawEpoch: HexString): PackedSince {
  const deposit = since.parseEpoch(depositEpoch);
  const withdraw = since.parseEpoch(withdrawEpoch);

  const withdrawFraction = BI.from(withdraw.index).mul(deposit.length);
  const depositFraction = BI.from(deposit.index).mul(withdraw.length);
  let depositedEpochs = withdraw.number - deposit.number;
  if (withdrawFraction.gt(depositFraction)) {
    depositedEpochs += 1;
  }
  const lockEpochs = Math.ceil(depositedEpochs / DAO_LOCK_PERIOD_EPOCHS) * DAO_LOCK_PERIOD_EPOCHS;

  return since.generateSince({
    relative: false,
    type: 'epochNumber',
    value: {
      number: deposit.number + lockEpochs,
      index: deposit.index,
      length: deposit.length,
    },
  });
}
