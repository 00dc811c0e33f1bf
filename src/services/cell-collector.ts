import { BI } from '@ckb-lumos/lumos';
import type { Script } from '@ckb-lumos/base';
import type { ILightClient, Order, ScriptType, SearchKey, ValueRange } from './light-client';
import type { LiveCell } from '../utils/transaction';
import { InvalidFilterError } from '../errors';
import { isScriptEqual } from '../utils/script';
import { MAX_TOTAL_CAPACITY } from '../constants';

const MAX_QUERY_LIMIT = 0xffffffff;

export interface SearchFilter {
  script: Script;
  scriptType: ScriptType;
  /**
   * The type script when searching by lock, or the lock script when searching by type
   */
  secondaryScript?: Script;
  /**
   * Length range of the secondary script, [0, 1) selects cells without one
   */
  scriptLenRange?: ValueRange;
  dataLenRange?: ValueRange;
  capacityRange?: ValueRange;
  blockRange?: ValueRange;
}

export interface QueryResult {
  cells: LiveCell[];
  nextCursor?: string;
}

interface ICellCollector {
  query(filter: SearchFilter, order: Order, limit: number, after?: string): Promise<QueryResult>;
  collect(filter: SearchFilter, order?: Order): AsyncGenerator<LiveCell>;
  collectLiveCells(filter: SearchFilter, minTotalCapacity: BI): Promise<{ cells: LiveCell[]; totalCapacity: BI }>;
  totalCapacity(filter: SearchFilter): Promise<BI>;
}

function isEmptyRange(range?: ValueRange) {
  return !!range && range[0].eq(range[1]);
}

export function toSearchKey(filter: SearchFilter): SearchKey {
  const { script, scriptType, secondaryScript, scriptLenRange, dataLenRange, capacityRange, blockRange } = filter;
  const hasFilter = secondaryScript || scriptLenRange || dataLenRange || capacityRange || blockRange;
  return {
    script,
    scriptType,
    filter: hasFilter
      ? {
          script: secondaryScript,
          scriptLenRange,
          outputDataLenRange: dataLenRange,
          outputCapacityRange: capacityRange,
          blockRange,
        }
      : undefined,
  };
}

/**
 * Live cell query engine
 * responsible for searching live cells in the light client with cursor pagination
 */
export default class CellCollector implements ICellCollector {
  private lightClient: ILightClient;
  private pageSize: number;

  constructor(lightClient: ILightClient, options: { pageSize?: number } = {}) {
    this.lightClient = lightClient;
    this.pageSize = options.pageSize ?? 100;
  }

  public static validateFilter(filter: SearchFilter) {
    const ranges: [string, ValueRange | undefined][] = [
      ['scriptLenRange', filter.scriptLenRange],
      ['dataLenRange', filter.dataLenRange],
      ['capacityRange', filter.capacityRange],
      ['blockRange', filter.blockRange],
    ];
    for (const [name, range] of ranges) {
      if (!range) {
        continue;
      }
      const [min, max] = range;
      if (min.lt(0) || min.gt(max)) {
        throw new InvalidFilterError(`Invalid ${name}: [${min.toString()}, ${max.toString()})`);
      }
    }
  }

  /**
   * The light client matches script args by prefix, keep exact matches only
   */
  private static isExactMatch(filter: SearchFilter, cell: LiveCell) {
    const { lock, type } = cell.cellOutput;
    const [target, secondary] = filter.scriptType === 'lock' ? [lock, type] : [type, lock];
    if (!target || !isScriptEqual(target, filter.script)) {
      return false;
    }
    if (filter.secondaryScript && (!secondary || !isScriptEqual(secondary, filter.secondaryScript))) {
      return false;
    }
    return true;
  }

  /**
   * Query one page of live cells
   * @param filter - the search filter, target script is required
   * @param order - ordered by (block number, tx index, output index)
   * @param limit - the maximum number of cells fetched for the page
   * @param after - the cursor returned by the previous page
   */
  public async query(filter: SearchFilter, order: Order, limit: number, after?: string): Promise<QueryResult> {
    if (!Number.isInteger(limit) || limit <= 0 || limit > MAX_QUERY_LIMIT) {
      throw new InvalidFilterError(`Invalid limit: ${limit}, expect an integer in [1, ${MAX_QUERY_LIMIT}]`);
    }
    CellCollector.validateFilter(filter);

    const ranges = [filter.scriptLenRange, filter.dataLenRange, filter.capacityRange, filter.blockRange];
    if (ranges.some(isEmptyRange)) {
      return { cells: [] };
    }

    const page = await this.lightClient.getCells(toSearchKey(filter), order, limit, after);
    const cells = page.cells.filter((cell) => CellCollector.isExactMatch(filter, cell));
    return {
      cells,
      nextCursor: page.cells.length < limit ? undefined : page.lastCursor,
    };
  }

  /**
   * Iterate all matching live cells, pages are fetched lazily
   */
  public async *collect(filter: SearchFilter, order: Order = 'asc'): AsyncGenerator<LiveCell> {
    let cursor: string | undefined;
    do {
      const { cells, nextCursor } = await this.query(filter, order, this.pageSize, cursor);
      for (const cell of cells) {
        yield cell;
      }
      cursor = nextCursor;
    } while (cursor);
  }

  /**
   * Collect live cells until their total capacity reaches minTotalCapacity,
   * pass MAX_TOTAL_CAPACITY to collect every matching cell
   */
  public async collectLiveCells(filter: SearchFilter, minTotalCapacity: BI) {
    const cells: LiveCell[] = [];
    let totalCapacity = BI.from(0);
    for await (const cell of this.collect(filter)) {
      cells.push(cell);
      totalCapacity = totalCapacity.add(cell.cellOutput.capacity);
      if (totalCapacity.gte(minTotalCapacity)) {
        break;
      }
    }
    return { cells, totalCapacity };
  }

  public async totalCapacity(filter: SearchFilter) {
    const { totalCapacity } = await this.collectLiveCells(filter, MAX_TOTAL_CAPACITY);
    return totalCapacity;
  }
}
