import { beforeEach, describe, expect, test, vi } from 'vitest';
import { BI } from '@ckb-lumos/lumos';
import CellCollector, { type SearchFilter } from '../../src/services/cell-collector';
import { InvalidFilterError } from '../../src/errors';
import { MAX_TOTAL_CAPACITY, NetworkType, SHANNONS_PER_CKB, getDaoTypeScript } from '../../src/constants';
import { FakeLightClient, TEST_PRIVATE_KEY, createCell, sighashLock } from '../helpers/fake-light-client';

const lock = sighashLock(TEST_PRIVATE_KEY);
const daoType = getDaoTypeScript(NetworkType.testnet);
const ckb = (value: number) => SHANNONS_PER_CKB.mul(value);

describe('CellCollector', () => {
  let lightClient: FakeLightClient;
  let collector: CellCollector;
  const filter: SearchFilter = { script: lock, scriptType: 'lock' };

  beforeEach(() => {
    lightClient = new FakeLightClient();
    for (let i = 1; i <= 5; i += 1) {
      lightClient.addCells(createCell({ lock, capacity: ckb(i * 100), blockNumber: i }));
    }
    lightClient.addCells(
      // matched by the light client through the args prefix only
      createCell({ lock: { ...lock, args: `${lock.args}00` }, capacity: ckb(1000), blockNumber: 6 }),
      createCell({ lock, type: daoType, data: '0x0000000000000000', capacity: ckb(1000), blockNumber: 7 }),
    );
    collector = new CellCollector(lightClient, { pageSize: 2 });
  });

  const blockNumbers = (cells: { blockNumber?: string }[]) => cells.map((cell) => BI.from(cell.blockNumber ?? 0).toNumber());

  test('query: reject invalid limits', async () => {
    await expect(collector.query(filter, 'asc', 0)).rejects.toThrow(InvalidFilterError);
    await expect(collector.query(filter, 'asc', 1.5)).rejects.toThrow(InvalidFilterError);
    await expect(collector.query(filter, 'asc', 0x100000000)).rejects.toThrow(InvalidFilterError);
  });

  test('query: reject a range whose min is greater than max', async () => {
    await expect(
      collector.query({ ...filter, capacityRange: [BI.from(2), BI.from(1)] }, 'asc', 10),
    ).rejects.toThrow('Invalid capacityRange: [2, 1)');
  });

  test('query: an empty range matches nothing', async () => {
    const getCells = vi.spyOn(lightClient, 'getCells');
    const result = await collector.query({ ...filter, capacityRange: [ckb(100), ckb(100)] }, 'asc', 10);
    expect(result).toEqual({ cells: [] });
    expect(getCells).not.toHaveBeenCalled();
  });

  test('query: keep exact script matches only', async () => {
    const { cells, nextCursor } = await collector.query(filter, 'asc', 100);
    expect(blockNumbers(cells)).toEqual([1, 2, 3, 4, 5, 7]);
    expect(nextCursor).toBeUndefined();
  });

  test('query: the same page is returned for the same cursor', async () => {
    const first = await collector.query(filter, 'asc', 2);
    const second = await collector.query(filter, 'asc', 2);
    expect(second).toEqual(first);

    const next = await collector.query(filter, 'asc', 2, first.nextCursor);
    expect(await collector.query(filter, 'asc', 2, first.nextCursor)).toEqual(next);
  });

  test('query: draining pages equals a single scan', async () => {
    const drained: number[] = [];
    let cursor: string | undefined;
    let pages = 0;
    do {
      const page = await collector.query(filter, 'asc', 2, cursor);
      drained.push(...blockNumbers(page.cells));
      cursor = page.nextCursor;
      pages += 1;
    } while (cursor);

    const { cells } = await collector.query(filter, 'asc', 1000);
    expect(drained).toEqual(blockNumbers(cells));
    expect(pages).toBe(4);
  });

  test('query: descending order', async () => {
    const { cells } = await collector.query(filter, 'desc', 3);
    expect(blockNumbers(cells)).toEqual([7, 5]);
  });

  test('query: filter by the secondary script', async () => {
    const { cells } = await collector.query(
      { ...filter, secondaryScript: daoType, dataLenRange: [BI.from(8), BI.from(9)] },
      'asc',
      10,
    );
    expect(blockNumbers(cells)).toEqual([7]);
  });

  test('query: plain capacity cells have no type script and no data', async () => {
    const { cells } = await collector.query(
      { ...filter, scriptLenRange: [BI.from(0), BI.from(1)], dataLenRange: [BI.from(0), BI.from(1)] },
      'asc',
      10,
    );
    expect(blockNumbers(cells)).toEqual([1, 2, 3, 4, 5]);
  });

  test('collect: iterate every page', async () => {
    const blocks: number[] = [];
    for await (const cell of collector.collect(filter)) {
      blocks.push(BI.from(cell.blockNumber ?? 0).toNumber());
    }
    expect(blocks).toEqual([1, 2, 3, 4, 5, 7]);
  });

  test('collectLiveCells: stop once the capacity is reached', async () => {
    const { cells, totalCapacity } = await collector.collectLiveCells(filter, ckb(250));
    expect(blockNumbers(cells)).toEqual([1, 2]);
    expect(totalCapacity.toString()).toBe(ckb(300).toString());
  });

  test('collectLiveCells: drain every cell with the maximum capacity', async () => {
    const { cells } = await collector.collectLiveCells(filter, MAX_TOTAL_CAPACITY);
    expect(cells).toHaveLength(6);
  });

  test('totalCapacity', async () => {
    expect((await collector.totalCapacity(filter)).toString()).toBe(ckb(2500).toString());
  });
});
