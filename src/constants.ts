import { BI, config } from '@ckb-lumos/lumos';
import type { Script } from '@ckb-lumos/base';
import type { ScriptKind } from './utils/script';

export enum NetworkType {
  mainnet = 'mainnet',
  testnet = 'testnet',
}

export type WellKnownScript = 'SECP256K1_BLAKE160' | 'SECP256K1_BLAKE160_MULTISIG' | 'DAO';

export const SHANNONS_PER_CKB = BI.from(100_000_000);

// u64::MAX, passed as the minimum total capacity to drain every matching cell
export const MAX_TOTAL_CAPACITY = BI.from('0xffffffffffffffff');

// https://github.com/nervosnetwork/rfcs/blob/master/rfcs/0023-dao-deposit-withdraw/0023-dao-deposit-withdraw.md
export const DAO_LOCK_PERIOD_EPOCHS = 180;
export const DAO_DEPOSIT_DATA = '0x0000000000000000';

// WitnessArgs lock placeholder for a secp256k1 recoverable signature
export const SECP_SIGNATURE_SIZE = 65;

export function getLumosConfig(network: NetworkType) {
  return network === NetworkType.mainnet ? config.predefined.LINA : config.predefined.AGGRON4;
}

/**
 * Get the code hash and hash type of a system script
 * (the type-id hashes of these scripts are shared by mainnet and testnet)
 */
export function getScriptKind(network: NetworkType, name: WellKnownScript): ScriptKind {
  const template = getLumosConfig(network).SCRIPTS[name];
  if (!template) {
    throw new Error(`Script ${name} is not configured for ${network}`);
  }
  return {
    codeHash: template.CODE_HASH,
    hashType: template.HASH_TYPE,
  };
}

export function getDaoTypeScript(network: NetworkType): Script {
  return {
    ...getScriptKind(network, 'DAO'),
    args: '0x',
  };
}
