import { BI } from '@ckb-lumos/lumos';
import type { Hash, Script } from '@ckb-lumos/base';
import type { Cradle } from '../container';
import CellCollector from './cell-collector';
import CapacityBalancer, { sighashCapacitySource } from './balancer';
import { type ISigner, CompositeSigner } from './signer';
import { assertUnlocked, createDefaultRegistry, unlockTransaction } from './unlocker';
import { InvalidCapacityError } from '../errors';
import { isScriptEqual, getOccupiedCapacity } from '../utils/script';
import { isSighashLock } from '../utils/address';
import {
  type UnsignedTransaction,
  createUnsignedTransaction,
  getTransactionHash,
  groupInputsByLock,
  toTransaction,
} from '../utils/transaction';

export interface TransferParams {
  from: Script;
  to: Script;
  capacity: BI;
}

interface IWalletService {
  getCapacity(lock: Script): Promise<BI>;
  transfer(params: TransferParams): Promise<UnsignedTransaction>;
  signAndSend(tx: UnsignedTransaction, password?: string): Promise<Hash>;
}

/**
 * Wallet service
 * responsible for capacity transfers and for signing and sending the built transactions
 */
export default class WalletService implements IWalletService {
  private cradle: Cradle;

  constructor(cradle: Cradle) {
    this.cradle = cradle;
  }

  private get collector() {
    return new CellCollector(this.cradle.lightClient, { pageSize: this.cradle.env.CELL_QUERY_PAGE_SIZE });
  }

  /**
   * Capacity of the live cells under the lock, as indexed by the light client
   */
  public async getCapacity(lock: Script) {
    const scripts = await this.cradle.lightClient.getScripts();
    const registered = scripts.some(({ script, scriptType }) => scriptType === 'lock' && isScriptEqual(script, lock));
    if (!registered) {
      this.cradle.logger.warn(`[WalletService] Lock ${lock.args} is not registered in the light client`);
    }
    const { capacity } = await this.cradle.lightClient.getCellsCapacity({ script: lock, scriptType: 'lock' });
    return capacity;
  }

  public async transfer({ from, to, capacity }: TransferParams) {
    const output = { cellOutput: { capacity: capacity.toHexString(), lock: to }, data: '0x' };
    const occupied = getOccupiedCapacity(output.cellOutput);
    if (capacity.lt(occupied)) {
      throw new InvalidCapacityError(
        `Transfer capacity ${capacity.toString()} is less than the occupied capacity ${occupied.toString()}`,
      );
    }

    const tx = await this.cradle.cellDeps.addCellDeps(createUnsignedTransaction({ outputs: [output] }), [from]);
    const balancer = new CapacityBalancer(this.collector);
    return balancer.balance(tx, {
      feeRate: BI.from(this.cradle.env.FEE_RATE),
      capacitySources: [sighashCapacitySource(from)],
      forceSmallChangeAsFee: BI.from(this.cradle.env.SMALL_CHANGE_AS_FEE),
    });
  }

  /**
   * Signers of the process, the keystore accounts of the sighash inputs are unlocked with the password
   */
  private async getSigner(tx: UnsignedTransaction, password?: string): Promise<ISigner> {
    const { rawKeySigner, keystoreSigner } = this.cradle;
    if (!keystoreSigner) {
      return rawKeySigner;
    }
    if (password !== undefined) {
      for (const { script } of groupInputsByLock(tx)) {
        const accountId = script.args;
        if (isSighashLock(script, this.cradle.env.NETWORK) && !rawKeySigner.hasAccount(accountId)) {
          await keystoreSigner.unlock(accountId, password);
        }
      }
    }
    return new CompositeSigner([rawKeySigner, keystoreSigner]);
  }

  public async signAndSend(tx: UnsignedTransaction, password?: string) {
    const signer = await this.getSigner(tx, password);
    const registry = createDefaultRegistry(this.cradle.env.NETWORK, signer);
    const signed = assertUnlocked(await unlockTransaction(tx, registry));

    const txHash = await this.cradle.lightClient.sendTransaction(toTransaction(signed));
    this.cradle.logger.info(`[WalletService] Transaction sent: ${txHash}`);
    if (txHash !== getTransactionHash(signed)) {
      this.cradle.logger.warn(`[WalletService] Unexpected transaction hash returned: ${txHash}`);
    }
    return txHash;
  }
}
