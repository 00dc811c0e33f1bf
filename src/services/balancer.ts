import { BI } from '@ckb-lumos/lumos';
import type { HexString, Script } from '@ckb-lumos/base';
import type CellCollector from './cell-collector';
import { InsufficientCapacityError } from '../errors';
import { SECP_SIGNATURE_SIZE, SHANNONS_PER_CKB } from '../constants';
import { isOutPointEqual } from '../utils/out-point';
import { getOccupiedCapacity, isScriptEqual } from '../utils/script';
import {
  type LiveCell,
  type TransactionOutput,
  type UnsignedTransaction,
  calculateFee,
  createPlaceholderWitness,
  getInputsCapacity,
  getOutputsCapacity,
  getTransactionSize,
} from '../utils/transaction';

export interface CapacitySource {
  lock: Script;
  /**
   * Witness of the first input of this lock, sized for the final signature
   */
  placeholderWitness: HexString;
}

export interface BalancerConfig {
  /**
   * Shannons per 1000 bytes
   */
  feeRate: BI;
  changeLock?: Script;
  capacitySources: CapacitySource[];
  /**
   * Leftover not worth a change cell is paid as fee up to this amount
   */
  forceSmallChangeAsFee?: BI;
}

export const SECP_PLACEHOLDER_WITNESS = createPlaceholderWitness(SECP_SIGNATURE_SIZE);
export const DEFAULT_SMALL_CHANGE_AS_FEE = SHANNONS_PER_CKB;

export function sighashCapacitySource(lock: Script): CapacitySource {
  return { lock, placeholderWitness: SECP_PLACEHOLDER_WITNESS };
}

type BalanceState =
  | { balanced: true; tx: UnsignedTransaction }
  | { balanced: false; required: BI; available: BI };

function withChange(tx: UnsignedTransaction, change: TransactionOutput): UnsignedTransaction {
  return { ...tx, outputs: [...tx.outputs, change] };
}

function padWitnesses(witnesses: HexString[], length: number) {
  const padded = [...witnesses];
  while (padded.length < length) {
    padded.push('0x');
  }
  return padded;
}

function appendInput(tx: UnsignedTransaction, cell: LiveCell, source: CapacitySource): UnsignedTransaction {
  const hasGroup = tx.inputs.some((input) => isScriptEqual(input.cell.cellOutput.lock, source.lock));
  const witness = hasGroup ? '0x' : source.placeholderWitness;
  const position = tx.inputs.length;
  return {
    ...tx,
    inputs: [...tx.inputs, { cell, since: '0x0', capacity: BI.from(cell.cellOutput.capacity) }],
    witnesses: [...tx.witnesses.slice(0, position), witness, ...tx.witnesses.slice(position)],
  };
}

/**
 * An empty cell of the source lock, sizes the fee of a transaction spending at least one of its cells
 */
function placeholderCell(source: CapacitySource): LiveCell {
  return {
    outPoint: { txHash: `0x${'00'.repeat(32)}`, index: '0x0' },
    cellOutput: { capacity: '0x0', lock: source.lock },
    data: '0x',
  };
}

/**
 * Capacity balancer
 * responsible for covering the outputs and the fee of a transaction with the cells of the capacity sources
 */
export default class CapacityBalancer {
  private collector: CellCollector;

  constructor(collector: CellCollector) {
    this.collector = collector;
  }

  /**
   * Settle the transaction as it would be submitted: with a change cell when the
   * change can hold one, or with the leftover folded into the fee
   */
  private static evaluate(tx: UnsignedTransaction, config: BalancerConfig, changeLock?: Script): BalanceState {
    const inputs = getInputsCapacity(tx);
    const outputs = getOutputsCapacity(tx);
    const forceSmallChangeAsFee = config.forceSmallChangeAsFee ?? DEFAULT_SMALL_CHANGE_AS_FEE;

    let requiredWithChange: BI | undefined;
    if (changeLock) {
      const change: TransactionOutput = { cellOutput: { capacity: '0x0', lock: changeLock }, data: '0x' };
      const feeWithChange = calculateFee(getTransactionSize(withChange(tx, change)), config.feeRate);
      const occupied = getOccupiedCapacity(change.cellOutput);
      const changeCapacity = inputs.sub(outputs).sub(feeWithChange);
      if (changeCapacity.gte(occupied)) {
        change.cellOutput.capacity = changeCapacity.toHexString();
        return { balanced: true, tx: withChange(tx, change) };
      }
      requiredWithChange = outputs.add(feeWithChange).add(occupied);
    }

    const fee = calculateFee(getTransactionSize(tx), config.feeRate);
    const leftover = inputs.sub(outputs).sub(fee);
    if (leftover.gte(0) && leftover.lte(forceSmallChangeAsFee)) {
      return { balanced: true, tx };
    }

    const required = leftover.lt(0) || !requiredWithChange ? outputs.add(fee) : requiredWithChange;
    return { balanced: false, required, available: inputs };
  }

  /**
   * Add inputs from the capacity sources until the transaction pays its outputs and fee
   */
  public async balance(tx: UnsignedTransaction, config: BalancerConfig): Promise<UnsignedTransaction> {
    const { capacitySources } = config;
    const changeLock = config.changeLock ?? capacitySources[capacitySources.length - 1]?.lock;

    let current: UnsignedTransaction = { ...tx, witnesses: padWitnesses(tx.witnesses, tx.inputs.length) };
    const state = CapacityBalancer.evaluate(current, config, changeLock);
    if (state.balanced) {
      return state.tx;
    }
    let { required, available } = state;
    let collected = 0;

    for (const source of capacitySources) {
      const cells = this.collector.collect({
        script: source.lock,
        scriptType: 'lock',
        scriptLenRange: [BI.from(0), BI.from(1)],
        dataLenRange: [BI.from(0), BI.from(1)],
      });
      for await (const cell of cells) {
        if (current.inputs.some((input) => isOutPointEqual(input.cell.outPoint, cell.outPoint))) {
          continue;
        }
        current = appendInput(current, cell, source);
        collected += 1;

        const next = CapacityBalancer.evaluate(current, config, changeLock);
        if (next.balanced) {
          return next.tx;
        }
        ({ required, available } = next);
      }
    }

    const [firstSource] = capacitySources;
    if (collected === 0 && firstSource) {
      const withInput = appendInput(current, placeholderCell(firstSource), firstSource);
      const estimate = CapacityBalancer.evaluate(withInput, config, changeLock);
      if (!estimate.balanced) {
        required = estimate.required;
      }
    }

    const short = required.sub(available);
    throw new InsufficientCapacityError(
      required.toString(),
      available.toString(),
      (short.gt(0) ? short : BI.from(0)).toString(),
    );
  }
}
