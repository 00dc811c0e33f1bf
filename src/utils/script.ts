import { BI } from '@ckb-lumos/lumos';
import type { HexString, Output, Script } from '@ckb-lumos/base';
import { byteLength } from './hex';
import { SHANNONS_PER_CKB } from '../constants';

/**
 * The code hash and hash type of a script, shared by every script running the same code
 */
export type ScriptKind = Pick<Script, 'codeHash' | 'hashType'>;

export function scriptKindKey(kind: ScriptKind): string {
  return `${kind.codeHash.toLowerCase()}:${kind.hashType}`;
}

export function isScriptKind(script: Script, kind: ScriptKind): boolean {
  return script.codeHash.toLowerCase() === kind.codeHash.toLowerCase() && script.hashType === kind.hashType;
}

export function isScriptEqual(a: Script, b: Script): boolean {
  return isScriptKind(a, b) && a.args.toLowerCase() === b.args.toLowerCase();
}

/**
 * Occupied bytes of a script: code_hash (32) + hash_type (1) + args
 */
export function scriptOccupiedBytes(script: Script): number {
  return 32 + 1 + byteLength(script.args);
}

/**
 * The minimal capacity a cell must hold to store itself:
 * capacity (8) + lock + type + data, one byte per shannon-CKB
 */
export function getOccupiedCapacity(output: Pick<Output, 'lock' | 'type'>, data: HexString = '0x'): BI {
  let size = 8 + scriptOccupiedBytes(output.lock) + byteLength(data);
  if (output.type) {
    size += scriptOccupiedBytes(output.type);
  }
  return BI.from(size).mul(SHANNONS_PER_CKB);
}
