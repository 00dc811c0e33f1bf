import type { OutPoint } from '@ckb-lumos/base';
import { BI } from '@ckb-lumos/lumos';
import { InvalidOutPointError } from '../errors';
import { append0x } from './hex';

const OUT_POINT_PATTERN = /^(?:0x)?([0-9a-fA-F]{64})-(\d+)$/;

/**
 * Parse an out point written as `{tx-hash}-{index}`,
 * e.g. 0xd56ed5d4e8984701714de9744a533413f79604b3b91461e2265614829d2005d1-1
 */
export function parseOutPoint(value: string): OutPoint {
  const matched = OUT_POINT_PATTERN.exec(value);
  if (!matched) {
    throw new InvalidOutPointError(value);
  }
  const index = Number(matched[2]);
  if (index > 0xffffffff) {
    throw new InvalidOutPointError(value);
  }
  return {
    txHash: append0x(matched[1].toLowerCase()),
    index: BI.from(index).toHexString(),
  };
}

export function formatOutPoint(outPoint: OutPoint): string {
  return `${outPoint.txHash}-${BI.from(outPoint.index).toNumber()}`;
}

export function isOutPointEqual(a: OutPoint, b: OutPoint): boolean {
  return a.txHash.toLowerCase() === b.txHash.toLowerCase() && BI.from(a.index).eq(b.index);
}
