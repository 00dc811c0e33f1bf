import { describe, expect, test, vi } from 'vitest';
import { BI } from '@ckb-lumos/lumos';
import { buildFastify } from '../../src/app';
import { NetworkType, getDaoTypeScript } from '../../src/constants';
import { NotPreparedError, WalletErrorCode } from '../../src/errors';
import { encodeAddress } from '../../src/utils/address';
import { createUnsignedTransaction } from '../../src/utils/transaction';
import { OTHER_PRIVATE_KEY, TEST_PRIVATE_KEY, createCell, sighashLock } from '../helpers/fake-light-client';

const lock = sighashLock(TEST_PRIVATE_KEY);
const receiver = sighashLock(OTHER_PRIVATE_KEY);
const address = encodeAddress(lock, NetworkType.testnet);
const receiverAddress = encodeAddress(receiver, NetworkType.testnet);
const TX_HASH = `0x${'5e'.repeat(32)}`;
const OUT_POINT_TX_HASH = `0x${'d0'.repeat(32)}`;

describe('/dao/v1', () => {
  test('/deposit: deposit to the sender by default', async () => {
    const fastify = buildFastify();
    await fastify.ready();

    const daoService = fastify.container.resolve('daoService');
    const walletService = fastify.container.resolve('walletService');
    const tx = createUnsignedTransaction();
    const deposit = vi.spyOn(daoService, 'deposit').mockResolvedValueOnce(tx);
    const signAndSend = vi.spyOn(walletService, 'signAndSend').mockResolvedValueOnce(TX_HASH);

    const response = await fastify.inject({
      method: 'POST',
      url: '/dao/v1/deposit',
      payload: { from: address, capacity: '1000' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ txhash: TX_HASH });
    const [from, receivers] = deposit.mock.calls[0];
    expect(from).toEqual(lock);
    expect(receivers.map(({ lock: owner, capacity }) => [owner, capacity.toString()])).toEqual([[lock, '100000000000']]);
    expect(signAndSend).toHaveBeenCalledWith(tx, undefined);

    await fastify.close();
  });

  test('/prepare', async () => {
    const fastify = buildFastify();
    await fastify.ready();

    const daoService = fastify.container.resolve('daoService');
    const walletService = fastify.container.resolve('walletService');
    const prepare = vi.spyOn(daoService, 'prepare').mockResolvedValueOnce(createUnsignedTransaction());
    vi.spyOn(walletService, 'signAndSend').mockResolvedValueOnce(TX_HASH);

    const response = await fastify.inject({
      method: 'POST',
      url: '/dao/v1/prepare',
      payload: { from: address, out_points: [`${OUT_POINT_TX_HASH}-0`, `${OUT_POINT_TX_HASH}-10`] },
    });

    expect(response.statusCode).toBe(200);
    expect(prepare).toHaveBeenCalledWith(lock, [
      { txHash: OUT_POINT_TX_HASH, index: '0x0' },
      { txHash: OUT_POINT_TX_HASH, index: '0xa' },
    ]);

    await fastify.close();
  });

  test('/prepare: invalid out point', async () => {
    const fastify = buildFastify();
    await fastify.ready();

    const response = await fastify.inject({
      method: 'POST',
      url: '/dao/v1/prepare',
      payload: { from: address, out_points: [OUT_POINT_TX_HASH] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe(WalletErrorCode.InvalidOutPoint);

    await fastify.close();
  });

  test('/withdraw', async () => {
    const fastify = buildFastify();
    await fastify.ready();

    const daoService = fastify.container.resolve('daoService');
    const walletService = fastify.container.resolve('walletService');
    const withdraw = vi.spyOn(daoService, 'withdraw').mockResolvedValueOnce(createUnsignedTransaction());
    vi.spyOn(walletService, 'signAndSend').mockResolvedValueOnce(TX_HASH);

    const response = await fastify.inject({
      method: 'POST',
      url: '/dao/v1/withdraw',
      payload: { from: address, to: receiverAddress, out_points: [`${OUT_POINT_TX_HASH}-1`] },
    });

    expect(response.statusCode).toBe(200);
    expect(withdraw).toHaveBeenCalledWith([{ txHash: OUT_POINT_TX_HASH, index: '0x1' }], receiver);

    await fastify.close();
  });

  test('/withdraw: cell is not prepared', async () => {
    const fastify = buildFastify();
    await fastify.ready();

    const daoService = fastify.container.resolve('daoService');
    vi.spyOn(daoService, 'withdraw').mockRejectedValueOnce(new NotPreparedError(`${OUT_POINT_TX_HASH}-1`));

    const response = await fastify.inject({
      method: 'POST',
      url: '/dao/v1/withdraw',
      payload: { from: address, out_points: [`${OUT_POINT_TX_HASH}-1`] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      code: WalletErrorCode.NotPrepared,
      message: `Cell is not a prepared DAO cell: ${OUT_POINT_TX_HASH}-1`,
    });

    await fastify.close();
  });

  test('/address/:address/deposited-cells', async () => {
    const fastify = buildFastify();
    await fastify.ready();

    const daoService = fastify.container.resolve('daoService');
    const cell = createCell({ lock, capacity: BI.from('102000000000'), type: getDaoTypeScript(NetworkType.testnet), data: '0x0000000000000000' });
    const getDepositedCells = vi
      .spyOn(daoService, 'getDepositedCells')
      .mockResolvedValueOnce({ cells: [cell], totalCapacity: BI.from('102000000000') });

    const response = await fastify.inject({
      method: 'GET',
      url: `/dao/v1/address/${address}/deposited-cells`,
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      cells: [cell],
      total_capacity: '102000000000',
      total_capacity_ckb: '1020',
    });
    expect(getDepositedCells).toHaveBeenCalledWith(lock);

    await fastify.close();
  });

  test('/address/:address/prepared-cells', async () => {
    const fastify = buildFastify();
    await fastify.ready();

    const daoService = fastify.container.resolve('daoService');
    vi.spyOn(daoService, 'getPreparedCells').mockResolvedValueOnce({ cells: [], totalCapacity: BI.from(0) });

    const response = await fastify.inject({
      method: 'GET',
      url: `/dao/v1/address/${address}/prepared-cells`,
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ cells: [], total_capacity: '0', total_capacity_ckb: '0' });

    await fastify.close();
  });
});
