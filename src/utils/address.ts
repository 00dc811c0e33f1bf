import { helpers } from '@ckb-lumos/lumos';
import type { Script } from '@ckb-lumos/base';
import { NetworkType, getLumosConfig, getScriptKind } from '../constants';
import { InvalidAddressError } from '../errors';
import { byteLength } from './hex';
import { isScriptKind } from './script';

export function parseAddress(address: string, network: NetworkType): Script {
  try {
    return helpers.parseAddress(address, { config: getLumosConfig(network) });
  } catch (err) {
    throw new InvalidAddressError(address, err instanceof Error ? err.message : String(err));
  }
}

export function encodeAddress(script: Script, network: NetworkType): string {
  return helpers.encodeToAddress(script, { config: getLumosConfig(network) });
}

export function isSighashLock(script: Script, network: NetworkType): boolean {
  return isScriptKind(script, getScriptKind(network, 'SECP256K1_BLAKE160')) && byteLength(script.args) === 20;
}

/**
 * Multisig lock args are blake160(multisig script), optionally followed by an 8-byte since
 */
export function isMultisigLock(script: Script, network: NetworkType): boolean {
  const argsLength = byteLength(script.args);
  return (
    isScriptKind(script, getScriptKind(network, 'SECP256K1_BLAKE160_MULTISIG')) &&
    (argsLength === 20 || argsLength === 28)
  );
}

/**
 * Parse an address that must be a secp256k1/blake160 sighash address
 */
export function parseSighashAddress(address: string, network: NetworkType): Script {
  const script = parseAddress(address, network);
  if (!isSighashLock(script, network)) {
    throw new InvalidAddressError(address, 'only sighash address is supported');
  }
  return script;
}

/**
 * Parse a transfer receiver address, only sighash and multisig addresses are accepted unless skipCheck is set
 */
export function parseReceiverAddress(address: string, network: NetworkType, skipCheck = false): Script {
  const script = parseAddress(address, network);
  if (!skipCheck && !isSighashLock(script, network) && !isMultisigLock(script, network)) {
    throw new InvalidAddressError(address, 'only sighash or multisig address is allowed without skip check');
  }
  return script;
}
