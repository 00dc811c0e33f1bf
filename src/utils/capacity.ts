import { BI } from '@ckb-lumos/lumos';
import { InvalidCapacityError } from '../errors';
import { MAX_TOTAL_CAPACITY, SHANNONS_PER_CKB } from '../constants';

const HUMAN_CAPACITY_PATTERN = /^(\d+)(?:\.(\d{1,8}))?$/;

/**
 * Parse a capacity in CKB (e.g. "102.43") into shannons
 */
export function parseHumanCapacity(value: string): BI {
  const matched = HUMAN_CAPACITY_PATTERN.exec(value.trim());
  if (!matched) {
    throw new InvalidCapacityError(`Invalid capacity: ${value}, expect CKB with at most 8 decimals`);
  }
  const [, integer, fraction = ''] = matched;
  const shannons = BI.from(integer)
    .mul(SHANNONS_PER_CKB)
    .add(BI.from(fraction.padEnd(8, '0')));
  if (shannons.gt(MAX_TOTAL_CAPACITY)) {
    throw new InvalidCapacityError(`Capacity overflow: ${value}`);
  }
  return shannons;
}

/**
 * Format shannons as CKB, trailing zeros of the fraction are dropped
 */
export function formatHumanCapacity(shannons: BI): string {
  const integer = shannons.div(SHANNONS_PER_CKB).toString();
  const fraction = shannons.mod(SHANNONS_PER_CKB).toString().padStart(8, '0').replace(/0+$/, '');
  return fraction ? `${integer}.${fraction}` : integer;
}
