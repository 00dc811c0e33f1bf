import { BI } from '@ckb-lumos/lumos';
import { blockchain, utils } from '@ckb-lumos/base';
import { bytes, molecule, number } from '@ckb-lumos/codec';
import type { CellDep, Script } from '@ckb-lumos/base';
import type { Cradle } from '../container';
import type { GenesisBlock } from './light-client';
import { UnresolvedCellDepError } from '../errors';
import { type ScriptKind, scriptKindKey } from '../utils/script';
import type { UnsignedTransaction } from '../utils/transaction';

const OutPointVec = molecule.vector(blockchain.OutPoint);
const OUT_POINT_SIZE = 36;

/**
 * Dep group cells hold a fixvec of out points: a u32 item count followed by the items
 */
function isOutPointVec(data: string) {
  const buf = bytes.bytify(data);
  if (buf.byteLength < 4) {
    return false;
  }
  const count = number.Uint32LE.unpack(buf.slice(0, 4));
  return buf.byteLength === 4 + count * OUT_POINT_SIZE;
}

/**
 * Index the system scripts deployed in the genesis block:
 * code cells of the first transaction by their type hash,
 * overridden by the dep groups of the second transaction that include them
 */
export function buildCellDepIndex(genesis: GenesisBlock): Map<string, CellDep> {
  const index = new Map<string, CellDep>();
  const [cellbase, depGroupTx] = genesis.transactions;
  if (!cellbase) {
    return index;
  }

  const codeCells: { key: string; outputIndex: number }[] = [];
  cellbase.outputs.forEach((output, outputIndex) => {
    if (!output.type) {
      return;
    }
    const key = scriptKindKey({ codeHash: utils.computeScriptHash(output.type), hashType: 'type' });
    codeCells.push({ key, outputIndex });
    index.set(key, {
      outPoint: { txHash: cellbase.hash, index: BI.from(outputIndex).toHexString() },
      depType: 'code',
    });
  });

  depGroupTx?.outputsData.forEach((data, outputIndex) => {
    if (!isOutPointVec(data)) {
      return;
    }
    for (const ref of OutPointVec.unpack(data)) {
      if (ref.txHash !== cellbase.hash) {
        continue;
      }
      const codeCell = codeCells.find(({ outputIndex }) => BI.from(ref.index).eq(outputIndex));
      if (codeCell) {
        index.set(codeCell.key, {
          outPoint: { txHash: depGroupTx.hash, index: BI.from(outputIndex).toHexString() },
          depType: 'depGroup',
        });
      }
    }
  });
  return index;
}

export default class CellDepResolver {
  private cradle: Pick<Cradle, 'lightClient'>;
  private index?: Promise<Map<string, CellDep>>;

  constructor(cradle: Pick<Cradle, 'lightClient'>) {
    this.cradle = cradle;
  }

  private async getIndex() {
    if (!this.index) {
      this.index = this.cradle.lightClient.getGenesisBlock().then(buildCellDepIndex);
      // a failed genesis fetch is retried by the next lookup
      this.index.catch(() => {
        this.index = undefined;
      });
    }
    return this.index;
  }

  /**
   * Resolve the cell dep of a script deployed in the genesis block, scripts are referenced by type hash
   */
  public async resolve(kind: ScriptKind): Promise<CellDep> {
    const index = await this.getIndex();
    const cellDep = kind.hashType === 'type' ? index.get(scriptKindKey(kind)) : undefined;
    if (!cellDep) {
      throw new UnresolvedCellDepError(scriptKindKey(kind));
    }
    return cellDep;
  }

  /**
   * Append the cell deps of the scripts that the transaction does not reference yet
   */
  public async addCellDeps(tx: UnsignedTransaction, scripts: ScriptKind[]): Promise<UnsignedTransaction> {
    const cellDeps = [...tx.cellDeps];
    for (const script of scripts) {
      const cellDep = await this.resolve(script);
      const exists = cellDeps.some(
        ({ outPoint, depType }) =>
          depType === cellDep.depType &&
          outPoint.txHash === cellDep.outPoint.txHash &&
          outPoint.index === cellDep.outPoint.index,
      );
      if (!exists) {
        cellDeps.push(cellDep);
      }
    }
    return { ...tx, cellDeps };
  }

  /**
   * Cell deps of every input lock and every input or output type script
   */
  public async completeCellDeps(tx: UnsignedTransaction): Promise<UnsignedTransaction> {
    const scripts: Script[] = [
      ...tx.inputs.map(({ cell }) => cell.cellOutput.lock),
      ...tx.inputs.flatMap(({ cell }) => (cell.cellOutput.type ? [cell.cellOutput.type] : [])),
      ...tx.outputs.flatMap(({ cellOutput }) => (cellOutput.type ? [cellOutput.type] : [])),
    ];
    return this.addCellDeps(tx, scripts);
  }
}
