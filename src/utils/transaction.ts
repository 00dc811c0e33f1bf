import { BI } from '@ckb-lumos/lumos';
import { blockchain, utils } from '@ckb-lumos/base';
import type { CellDep, Hash, HexString, OutPoint, Output, PackedSince, Script, Transaction } from '@ckb-lumos/base';
import { bytes } from '@ckb-lumos/codec';

export interface LiveCell {
  outPoint: OutPoint;
  cellOutput: Output;
  data: HexString;
  /**
   * Position of the cell on chain, known for cells returned by a search
   */
  blockNumber?: HexString;
  txIndex?: HexString;
}

export interface TransactionInput {
  cell: LiveCell;
  since: PackedSince;
  /**
   * Capacity this input contributes, greater than the cell capacity for DAO withdraw inputs
   */
  capacity: BI;
}

export interface TransactionOutput {
  cellOutput: Output;
  data: HexString;
}

export interface UnsignedTransaction {
  cellDeps: CellDep[];
  headerDeps: Hash[];
  inputs: TransactionInput[];
  outputs: TransactionOutput[];
  witnesses: HexString[];
}

export interface ScriptGroup {
  script: Script;
  inputIndices: number[];
}

export function createUnsignedTransaction(partial: Partial<UnsignedTransaction> = {}): UnsignedTransaction {
  return {
    cellDeps: [],
    headerDeps: [],
    inputs: [],
    outputs: [],
    witnesses: [],
    ...partial,
  };
}

export function toTransaction(tx: UnsignedTransaction): Transaction {
  return {
    version: '0x0',
    cellDeps: tx.cellDeps,
    headerDeps: tx.headerDeps,
    inputs: tx.inputs.map(({ cell, since }) => ({ previousOutput: cell.outPoint, since })),
    outputs: tx.outputs.map(({ cellOutput }) => cellOutput),
    outputsData: tx.outputs.map(({ data }) => data),
    witnesses: tx.witnesses,
  };
}

/**
 * Transaction hash, computed over the raw transaction (witnesses excluded)
 */
export function getTransactionHash(tx: UnsignedTransaction): Hash {
  const { witnesses: _, ...raw } = toTransaction(tx);
  return utils.ckbHash(blockchain.RawTransaction.pack(raw));
}

/**
 * Serialized size in a block: the molecule-encoded transaction plus its 4-byte offset in the block
 */
export function getTransactionSize(tx: UnsignedTransaction): number {
  return blockchain.Transaction.pack(toTransaction(tx)).byteLength + 4;
}

/**
 * Fee for a transaction of the given size: ceil(size * feeRate / 1000)
 */
export function calculateFee(size: number, feeRate: BI): BI {
  const base = BI.from(size).mul(feeRate);
  const fee = base.div(1000);
  return base.mod(1000).isZero() ? fee : fee.add(1);
}

export function getInputsCapacity(tx: UnsignedTransaction): BI {
  return tx.inputs.reduce((acc, input) => acc.add(input.capacity), BI.from(0));
}

export function getOutputsCapacity(tx: UnsignedTransaction): BI {
  return tx.outputs.reduce((acc, output) => acc.add(output.cellOutput.capacity), BI.from(0));
}

/**
 * Fee actually paid by the transaction
 */
export function getTransactionFee(tx: UnsignedTransaction): BI {
  return getInputsCapacity(tx).sub(getOutputsCapacity(tx));
}

/**
 * Group input indices by lock script, groups are ordered by their first input
 */
export function groupInputsByLock(tx: UnsignedTransaction): ScriptGroup[] {
  const groups = new Map<Hash, ScriptGroup>();
  tx.inputs.forEach(({ cell }, index) => {
    const lockHash = utils.computeScriptHash(cell.cellOutput.lock);
    const group = groups.get(lockHash);
    if (group) {
      group.inputIndices.push(index);
    } else {
      groups.set(lockHash, { script: cell.cellOutput.lock, inputIndices: [index] });
    }
  });
  return Array.from(groups.values());
}

export function packWitnessArgs(witnessArgs: { lock?: HexString; inputType?: HexString; outputType?: HexString }) {
  return bytes.hexify(blockchain.WitnessArgs.pack(witnessArgs));
}

/**
 * A WitnessArgs whose lock holds `size` zero bytes, reserving room for a signature
 */
export function createPlaceholderWitness(size: number, inputType?: HexString): HexString {
  return packWitnessArgs({ lock: bytes.hexify(new Uint8Array(size)), inputType });
}
