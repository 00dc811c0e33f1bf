import { hd } from '@ckb-lumos/lumos';
import type { HexString } from '@ckb-lumos/base';
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { append0x, remove0x } from '../utils/hex';
import { AccountNotFoundError, InvalidKeystoreError, InvalidPassphraseError, UnknownAccountError } from '../errors';

/**
 * Account id is the blake160 hash of the account public key, the args of its sighash lock
 */
export interface ISigner {
  hasAccount(accountId: string): boolean;
  /**
   * Sign a 32-byte digest, returns a 65-byte recoverable signature
   */
  signDigest(accountId: string, digest: HexString): Promise<HexString>;
}

const ACCOUNT_FILE_PATTERN = /([0-9a-fA-F]{40})(?:\.json)?$/;

function normalizeAccountId(accountId: string) {
  return remove0x(accountId).toLowerCase();
}

/**
 * Signs with private keys held in memory
 */
export class RawKeySigner implements ISigner {
  private keys = new Map<string, HexString>();

  constructor(privateKeys: HexString[]) {
    for (const privateKey of privateKeys) {
      this.keys.set(normalizeAccountId(hd.key.privateKeyToBlake160(privateKey)), privateKey);
    }
  }

  public get accounts() {
    return Array.from(this.keys.keys()).map(append0x);
  }

  public hasAccount(accountId: string) {
    return this.keys.has(normalizeAccountId(accountId));
  }

  public async signDigest(accountId: string, digest: HexString) {
    const privateKey = this.keys.get(normalizeAccountId(accountId));
    if (!privateKey) {
      throw new UnknownAccountError(accountId);
    }
    return hd.key.signRecoverable(digest, privateKey);
  }
}

/**
 * Signs with keys decrypted from keystore files in a directory,
 * an account can sign once it is unlocked with its passphrase
 */
export class KeystoreSigner implements ISigner {
  private keystoreDir: string;
  private unlocked = new Map<string, HexString>();

  constructor({ keystoreDir }: { keystoreDir: string }) {
    this.keystoreDir = keystoreDir;
  }

  /**
   * A keystore directory that does not exist holds no account
   */
  private async readKeystoreDir(): Promise<string[]> {
    try {
      return await readdir(this.keystoreDir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }
  }

  /**
   * Account ids of the keystore files found in the directory
   */
  public async listAccounts(): Promise<string[]> {
    const files = await this.readKeystoreDir();
    return files.flatMap((file) => {
      const matched = ACCOUNT_FILE_PATTERN.exec(file);
      return matched ? [append0x(normalizeAccountId(matched[1]))] : [];
    });
  }

  private async findKeystoreFile(accountId: string) {
    const files = await this.readKeystoreDir();
    const file = files.find((name) => {
      const matched = ACCOUNT_FILE_PATTERN.exec(name);
      return matched && normalizeAccountId(matched[1]) === accountId;
    });
    if (!file) {
      throw new AccountNotFoundError(accountId);
    }
    return path.join(this.keystoreDir, file);
  }

  /**
   * Decrypt the keystore of the account, the key stays available for the process lifetime
   */
  public async unlock(accountId: string, passphrase: string) {
    const id = normalizeAccountId(accountId);
    const file = await this.findKeystoreFile(id);

    let keystore: hd.Keystore;
    try {
      keystore = hd.Keystore.fromJson(await readFile(file, 'utf-8'));
    } catch (err) {
      throw new InvalidKeystoreError(path.basename(file), err instanceof Error ? err.message : String(err));
    }

    let extendedKey: hd.ExtendedPrivateKey;
    try {
      extendedKey = hd.ExtendedPrivateKey.parse(keystore.decrypt(passphrase));
    } catch {
      throw new InvalidPassphraseError(accountId);
    }

    const candidates = [extendedKey.privateKey, extendedKey.privateKeyInfo(hd.AddressType.Receiving, 0).privateKey];
    const privateKey = candidates.find((key) => normalizeAccountId(hd.key.privateKeyToBlake160(key)) === id);
    if (!privateKey) {
      throw new AccountNotFoundError(accountId);
    }
    this.unlocked.set(id, privateKey);
  }

  public lock(accountId: string) {
    this.unlocked.delete(normalizeAccountId(accountId));
  }

  public hasAccount(accountId: string) {
    return this.unlocked.has(normalizeAccountId(accountId));
  }

  public async signDigest(accountId: string, digest: HexString) {
    const privateKey = this.unlocked.get(normalizeAccountId(accountId));
    if (!privateKey) {
      throw new UnknownAccountError(accountId);
    }
    return hd.key.signRecoverable(digest, privateKey);
  }
}

/**
 * Tries each signer in order, the first one holding the account signs
 */
export class CompositeSigner implements ISigner {
  private signers: ISigner[];

  constructor(signers: ISigner[]) {
    this.signers = signers;
  }

  public hasAccount(accountId: string) {
    return this.signers.some((signer) => signer.hasAccount(accountId));
  }

  public async signDigest(accountId: string, digest: HexString) {
    const signer = this.signers.find((s) => s.hasAccount(accountId));
    if (!signer) {
      throw new UnknownAccountError(accountId);
    }
    return signer.signDigest(accountId, digest);
  }
}
