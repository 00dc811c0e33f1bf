import { BI } from '@ckb-lumos/lumos';
import { bytes, number } from '@ckb-lumos/codec';

export const remove0x = (hex: string): string => {
  if (hex.startsWith('0x')) {
    return hex.substring(2);
  }
  return hex;
};

export const append0x = (hex?: string): string => {
  return hex?.startsWith('0x') ? hex : `0x${hex ?? ''}`;
};

/**
 * Byte length of a 0x-prefixed hex string
 */
export const byteLength = (hex: string): number => {
  return remove0x(hex).length / 2;
};

/**
 * Read a little-endian u64 at offset 0 of the hex data, returns null when the data is shorter than 8 bytes
 */
export const readUint64LE = (data: string): BI | null => {
  const buf = bytes.bytify(data);
  if (buf.byteLength < 8) {
    return null;
  }
  return number.Uint64LE.unpack(buf.slice(0, 8));
};

export const toUint64LE = (value: BI | number): string => {
  return bytes.hexify(number.Uint64LE.pack(value));
};
