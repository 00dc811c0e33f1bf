import { beforeEach, describe, expect, test, vi } from 'vitest';
import { type AwilixContainer, asValue } from 'awilix';
import type { CellDep } from '@ckb-lumos/base';
import container, { type Cradle } from '../../src/container';
import CellDepResolver from '../../src/services/cell-deps';
import { KeystoreSigner, RawKeySigner } from '../../src/services/signer';
import WalletService from '../../src/services/wallet';
import { InvalidCapacityError, PartiallyUnlockedError } from '../../src/errors';
import { SHANNONS_PER_CKB } from '../../src/constants';
import { createUnsignedTransaction, getTransactionHash } from '../../src/utils/transaction';
import { FakeLightClient, OTHER_PRIVATE_KEY, TEST_PRIVATE_KEY, createCell, sighashLock } from '../helpers/fake-light-client';

const lock = sighashLock(TEST_PRIVATE_KEY);
const receiver = sighashLock(OTHER_PRIVATE_KEY);
const ckb = (value: number) => SHANNONS_PER_CKB.mul(value);
const LOCK_DEP: CellDep = { outPoint: { txHash: `0x${'e0'.repeat(32)}`, index: '0x0' }, depType: 'depGroup' };

describe('WalletService', () => {
  let lightClient: FakeLightClient;
  let scope: AwilixContainer<Cradle>;
  let walletService: WalletService;

  beforeEach(() => {
    lightClient = new FakeLightClient();
    const resolver = new CellDepResolver({ lightClient });
    vi.spyOn(resolver, 'resolve').mockResolvedValue(LOCK_DEP);

    scope = container.createScope();
    scope.register({
      lightClient: asValue(lightClient),
      cellDeps: asValue(resolver),
      rawKeySigner: asValue(new RawKeySigner([TEST_PRIVATE_KEY])),
      keystoreSigner: asValue(null),
    });
    walletService = new WalletService(scope.cradle);
  });

  test('getCapacity: sum the capacity of the live cells', async () => {
    lightClient.addCells(
      createCell({ lock, capacity: ckb(100), blockNumber: 1 }),
      createCell({ lock, capacity: ckb(250), blockNumber: 2 }),
    );
    lightClient.scripts = [{ script: lock, scriptType: 'lock', blockNumber: '0x0' }];
    const warn = vi.spyOn(scope.cradle.logger, 'warn');

    expect((await walletService.getCapacity(lock)).toString()).toBe(ckb(350).toString());
    expect(warn).not.toHaveBeenCalled();
  });

  test('getCapacity: warn about a lock the light client does not index', async () => {
    const warn = vi.spyOn(scope.cradle.logger, 'warn');
    expect((await walletService.getCapacity(lock)).toString()).toBe('0');
    expect(warn).toHaveBeenCalledWith(`[WalletService] Lock ${lock.args} is not registered in the light client`);
  });

  test('transfer: throw InvalidCapacityError below the occupied capacity', async () => {
    await expect(walletService.transfer({ from: lock, to: receiver, capacity: ckb(60) })).rejects.toThrow(
      InvalidCapacityError,
    );
  });

  test('transfer: build a balanced transfer', async () => {
    lightClient.addCells(createCell({ lock, capacity: ckb(1000) }));
    const tx = await walletService.transfer({ from: lock, to: receiver, capacity: ckb(61) });

    expect(tx.cellDeps).toEqual([LOCK_DEP]);
    expect(tx.inputs).toHaveLength(1);
    expect(tx.outputs.map(({ cellOutput }) => cellOutput.lock)).toEqual([receiver, lock]);
    expect(tx.outputs[0].cellOutput.capacity).toBe(ckb(61).toHexString());
  });

  test('signAndSend: sign with the raw key and send', async () => {
    lightClient.addCells(createCell({ lock, capacity: ckb(1000) }));
    const tx = await walletService.transfer({ from: lock, to: receiver, capacity: ckb(100) });
    const txHash = await walletService.signAndSend(tx);

    expect(txHash).toBe(getTransactionHash(tx));
    expect(lightClient.sent).toHaveLength(1);
    expect(lightClient.sent[0].witnesses[0]).not.toBe(tx.witnesses[0]);
  });

  test('signAndSend: throw PartiallyUnlockedError without sending', async () => {
    const tx = createUnsignedTransaction({
      inputs: [{ cell: createCell({ lock: receiver, capacity: ckb(100) }), since: '0x0', capacity: ckb(100) }],
      outputs: [{ cellOutput: { capacity: ckb(99).toHexString(), lock }, data: '0x' }],
    });
    await expect(walletService.signAndSend(tx)).rejects.toThrow(PartiallyUnlockedError);
    expect(lightClient.sent).toHaveLength(0);
  });

  test('signAndSend: unlock keystore accounts with the password', async () => {
    const keystoreSigner = new KeystoreSigner({ keystoreDir: '/tmp/keystore' });
    const unlock = vi.spyOn(keystoreSigner, 'unlock').mockResolvedValue(undefined);
    scope.register({ keystoreSigner: asValue(keystoreSigner) });

    const tx = createUnsignedTransaction({
      inputs: [
        { cell: createCell({ lock, capacity: ckb(100), blockNumber: 1 }), since: '0x0', capacity: ckb(100) },
        { cell: createCell({ lock: receiver, capacity: ckb(100), blockNumber: 2 }), since: '0x0', capacity: ckb(100) },
      ],
      outputs: [{ cellOutput: { capacity: ckb(199).toHexString(), lock }, data: '0x' }],
    });
    // the mocked unlock leaves the account locked
    await expect(walletService.signAndSend(tx, 'test-password')).rejects.toThrow(PartiallyUnlockedError);
    expect(unlock).toHaveBeenCalledTimes(1);
    expect(unlock).toHaveBeenCalledWith(receiver.args, 'test-password');
  });
});
