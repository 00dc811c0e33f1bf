import { blockchain, utils } from '@ckb-lumos/base';
import type { HexString } from '@ckb-lumos/base';
import { bytes, number } from '@ckb-lumos/codec';
import type { ISigner } from './signer';
import { NetworkType, SECP_SIGNATURE_SIZE, getScriptKind } from '../constants';
import { PartiallyUnlockedError, WalletError, WalletErrorCode } from '../errors';
import { byteLength } from '../utils/hex';
import { type ScriptKind, scriptKindKey } from '../utils/script';
import {
  type ScriptGroup,
  type UnsignedTransaction,
  getTransactionHash,
  groupInputsByLock,
  packWitnessArgs,
} from '../utils/transaction';

export interface MultisigConfig {
  /**
   * The first `requireFirstN` keys must sign
   */
  requireFirstN: number;
  threshold: number;
  pubkeyHashes: HexString[];
}

export type UnlockStrategy =
  | { kind: 'sighash'; signer: ISigner }
  | { kind: 'multisig'; signer: ISigner; configs: MultisigConfig[] }
  | { kind: 'custom'; handlerId: string };

/**
 * Unlocks one script group, resolves to null when the group cannot be signed
 */
export type CustomUnlockHandler = (tx: UnsignedTransaction, group: ScriptGroup) => Promise<UnsignedTransaction | null>;

export interface UnlockResult {
  tx: UnsignedTransaction;
  unresolvedGroups: ScriptGroup[];
}

export class UnlockerRegistry {
  private strategies = new Map<string, UnlockStrategy>();
  private handlers = new Map<string, CustomUnlockHandler>();

  public register(kind: ScriptKind, strategy: UnlockStrategy) {
    this.strategies.set(scriptKindKey(kind), strategy);
    return this;
  }

  public registerHandler(handlerId: string, handler: CustomUnlockHandler) {
    this.handlers.set(handlerId, handler);
    return this;
  }

  public getStrategy(kind: ScriptKind) {
    return this.strategies.get(scriptKindKey(kind));
  }

  public getHandler(handlerId: string) {
    return this.handlers.get(handlerId);
  }
}

/**
 * Registry with the secp256k1 sighash and multisig locks of the network
 */
export function createDefaultRegistry(network: NetworkType, signer: ISigner, multisigConfigs: MultisigConfig[] = []) {
  return new UnlockerRegistry()
    .register(getScriptKind(network, 'SECP256K1_BLAKE160'), { kind: 'sighash', signer })
    .register(getScriptKind(network, 'SECP256K1_BLAKE160_MULTISIG'), {
      kind: 'multisig',
      signer,
      configs: multisigConfigs,
    });
}

/**
 * Multisig script: 0x00 | requireFirstN | threshold | pubkey count | pubkey hashes
 */
export function serializeMultisigScript({ requireFirstN, threshold, pubkeyHashes }: MultisigConfig): HexString {
  const header = Uint8Array.from([0, requireFirstN, threshold, pubkeyHashes.length]);
  return bytes.hexify(bytes.concat(header, ...pubkeyHashes));
}

export function multisigArgs(config: MultisigConfig, since?: HexString): HexString {
  const hash = utils.ckbHash(serializeMultisigScript(config)).slice(0, 42);
  return since ? bytes.hexify(bytes.concat(hash, number.Uint64LE.pack(since))) : hash;
}

export function multisigPlaceholderLock(config: MultisigConfig): HexString {
  return bytes.hexify(
    bytes.concat(serializeMultisigScript(config), new Uint8Array(SECP_SIGNATURE_SIZE * config.threshold)),
  );
}

function unpackWitnessArgs(witness: HexString) {
  return witness === '0x' ? {} : blockchain.WitnessArgs.unpack(witness);
}

function hashWitness(hasher: utils.CKBHasher, witness: HexString) {
  hasher.update(bytes.hexify(number.Uint64LE.pack(byteLength(witness))));
  hasher.update(witness);
}

function padWitnesses(tx: UnsignedTransaction): HexString[] {
  const witnesses = [...tx.witnesses];
  while (witnesses.length < tx.inputs.length) {
    witnesses.push('0x');
  }
  return witnesses;
}

/**
 * Digest signed by a lock group: the transaction hash, then every group witness
 * and every witness beyond the inputs, each prefixed by its u64 LE length.
 * The lock of the first group witness is replaced by `placeholderLock`.
 */
export function computeSigningMessage(tx: UnsignedTransaction, group: ScriptGroup, placeholderLock: HexString) {
  const witnesses = padWitnesses(tx);
  const [first, ...rest] = group.inputIndices;
  const firstWitness = packWitnessArgs({ ...unpackWitnessArgs(witnesses[first]), lock: placeholderLock });

  const hasher = new utils.CKBHasher();
  hasher.update(getTransactionHash(tx));
  hashWitness(hasher, firstWitness);
  rest.forEach((index) => hashWitness(hasher, witnesses[index]));
  witnesses.slice(tx.inputs.length).forEach((witness) => hashWitness(hasher, witness));
  return hasher.digestHex();
}

function setGroupLock(tx: UnsignedTransaction, group: ScriptGroup, lock: HexString): UnsignedTransaction {
  const witnesses = padWitnesses(tx);
  const [first] = group.inputIndices;
  witnesses[first] = packWitnessArgs({ ...unpackWitnessArgs(witnesses[first]), lock });
  return { ...tx, witnesses };
}

async function unlockSighash(tx: UnsignedTransaction, group: ScriptGroup, signer: ISigner) {
  const accountId = group.script.args;
  if (byteLength(accountId) !== 20 || !signer.hasAccount(accountId)) {
    return null;
  }
  const placeholder = bytes.hexify(new Uint8Array(SECP_SIGNATURE_SIZE));
  const message = computeSigningMessage(tx, group, placeholder);
  const signature = await signer.signDigest(accountId, message);
  return setGroupLock(tx, group, signature);
}

async function unlockMultisig(tx: UnsignedTransaction, group: ScriptGroup, signer: ISigner, configs: MultisigConfig[]) {
  const scriptHash = group.script.args.slice(0, 42).toLowerCase();
  const config = configs.find((c) => multisigArgs(c).toLowerCase() === scriptHash);
  if (!config) {
    return null;
  }

  const { requireFirstN, threshold, pubkeyHashes } = config;
  if (!pubkeyHashes.slice(0, requireFirstN).every((hash) => signer.hasAccount(hash))) {
    return null;
  }
  const selected = pubkeyHashes
    .map((hash, index) => ({ hash, index }))
    .filter(({ hash, index }) => index < requireFirstN || signer.hasAccount(hash))
    .slice(0, threshold);
  if (selected.length < threshold) {
    return null;
  }

  const message = computeSigningMessage(tx, group, multisigPlaceholderLock(config));
  const signatures: HexString[] = [];
  for (const { hash } of selected) {
    signatures.push(await signer.signDigest(hash, message));
  }
  return setGroupLock(tx, group, bytes.hexify(bytes.concat(serializeMultisigScript(config), ...signatures)));
}

const SIGNER_ERROR_CODES = [
  WalletErrorCode.UnknownAccount,
  WalletErrorCode.InvalidPassphrase,
  WalletErrorCode.AccountNotFound,
];

function isSignerError(err: unknown) {
  return err instanceof WalletError && SIGNER_ERROR_CODES.includes(err.code);
}

function groupSummary({ script, inputIndices }: ScriptGroup) {
  return { lockHash: utils.computeScriptHash(script), inputIndices };
}

async function runUnlocker(
  tx: UnsignedTransaction,
  group: ScriptGroup,
  registry: UnlockerRegistry,
  strategy: UnlockStrategy,
): Promise<UnsignedTransaction | null> {
  switch (strategy.kind) {
    case 'sighash':
      return unlockSighash(tx, group, strategy.signer);
    case 'multisig':
      return unlockMultisig(tx, group, strategy.signer, strategy.configs);
    case 'custom': {
      const handler = registry.getHandler(strategy.handlerId);
      return handler ? handler(tx, group) : null;
    }
  }
}

/**
 * A failing unlocker leaves its group locked, signer errors naming the account propagate as they are
 */
async function unlockGroup(tx: UnsignedTransaction, group: ScriptGroup, registry: UnlockerRegistry) {
  const strategy = registry.getStrategy(group.script);
  if (!strategy) {
    return null;
  }
  try {
    return await runUnlocker(tx, group, registry, strategy);
  } catch (err) {
    if (isSignerError(err)) {
      throw err;
    }
    throw new PartiallyUnlockedError([groupSummary(group)], { cause: err });
  }
}

/**
 * Sign every lock group of the transaction the registry knows how to unlock,
 * groups left unsigned are reported rather than thrown
 */
export async function unlockTransaction(tx: UnsignedTransaction, registry: UnlockerRegistry): Promise<UnlockResult> {
  let current: UnsignedTransaction = { ...tx, witnesses: padWitnesses(tx) };
  const unresolvedGroups: ScriptGroup[] = [];
  for (const group of groupInputsByLock(tx)) {
    const unlocked = await unlockGroup(current, group, registry);
    if (unlocked) {
      current = unlocked;
    } else {
      unresolvedGroups.push(group);
    }
  }
  return { tx: current, unresolvedGroups };
}

export function assertUnlocked(result: UnlockResult): UnsignedTransaction {
  if (result.unresolvedGroups.length > 0) {
    throw new PartiallyUnlockedError(result.unresolvedGroups.map(groupSummary));
  }
  return result.tx;
}
