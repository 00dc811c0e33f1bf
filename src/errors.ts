import { HttpStatusCode } from 'axios';

export enum WalletErrorCode {
  InvalidFilter = 0x2000, // 8192
  LedgerUnavailable = 0x2001, // 8193
  InsufficientCapacity = 0x2002, // 8194
  UnknownAccount = 0x2003, // 8195
  InvalidPassphrase = 0x2004, // 8196
  AccountNotFound = 0x2005, // 8197
  PartiallyUnlocked = 0x2006, // 8198
  NotPrepared = 0x2007, // 8199
  NotDeposited = 0x2008, // 8200
  InvalidAddress = 0x2009, // 8201
  InvalidCapacity = 0x200a, // 8202
  InvalidOutPoint = 0x200b, // 8203
  InvalidKeystore = 0x200c, // 8204
  UnresolvedCellDep = 0x200d, // 8205
}

export class WalletError extends Error {
  public code: WalletErrorCode;
  public statusCode: number;

  constructor(code: WalletErrorCode, message: string, statusCode: number = HttpStatusCode.BadRequest) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidFilterError extends WalletError {
  constructor(message: string) {
    super(WalletErrorCode.InvalidFilter, message);
  }
}

/**
 * The light client could not be reached, a build may be retried as nothing was broadcast
 */
export class LedgerUnavailableError extends WalletError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(WalletErrorCode.LedgerUnavailable, message, HttpStatusCode.ServiceUnavailable);
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

export class InsufficientCapacityError extends WalletError {
  public required: string;
  public available: string;

  constructor(required: string, available: string, short: string) {
    super(
      WalletErrorCode.InsufficientCapacity,
      `Insufficient capacity: required ${required} shannons, available ${available} shannons, short of ${short} shannons`,
    );
    this.required = required;
    this.available = available;
  }
}

export class UnknownAccountError extends WalletError {
  constructor(accountId: string) {
    super(WalletErrorCode.UnknownAccount, `Unknown account: ${accountId}`);
  }
}

export class InvalidPassphraseError extends WalletError {
  constructor(accountId: string) {
    super(WalletErrorCode.InvalidPassphrase, `Invalid passphrase for account: ${accountId}`, HttpStatusCode.Forbidden);
  }
}

export class AccountNotFoundError extends WalletError {
  constructor(accountId: string) {
    super(WalletErrorCode.AccountNotFound, `Account not found in keystore: ${accountId}`, HttpStatusCode.NotFound);
  }
}

export class InvalidKeystoreError extends WalletError {
  constructor(file: string, reason: string) {
    super(WalletErrorCode.InvalidKeystore, `Invalid keystore file ${file}: ${reason}`, HttpStatusCode.InternalServerError);
  }
}

export class PartiallyUnlockedError extends WalletError {
  constructor(groups: { lockHash: string; inputIndices: number[] }[], options?: { cause?: unknown }) {
    const detail = groups.map(({ lockHash, inputIndices }) => `${lockHash} (inputs ${inputIndices.join(', ')})`);
    let message = `Transaction is partially unlocked, locked groups: ${detail.join('; ')}`;
    if (options?.cause instanceof Error) {
      message += `, unlocker failed: ${options.cause.message}`;
    }
    super(WalletErrorCode.PartiallyUnlocked, message);
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

export class NotPreparedError extends WalletError {
  constructor(outPoint: string) {
    super(WalletErrorCode.NotPrepared, `Cell is not a prepared DAO cell: ${outPoint}`);
  }
}

export class NotDepositedError extends WalletError {
  constructor(outPoint: string) {
    super(WalletErrorCode.NotDeposited, `Cell is not a deposited DAO cell: ${outPoint}`);
  }
}

export class InvalidAddressError extends WalletError {
  constructor(address: string, reason: string) {
    super(WalletErrorCode.InvalidAddress, `Invalid address ${address}: ${reason}`);
  }
}

export class InvalidCapacityError extends WalletError {
  constructor(message: string) {
    super(WalletErrorCode.InvalidCapacity, message);
  }
}

export class InvalidOutPointError extends WalletError {
  constructor(outPoint: string) {
    super(WalletErrorCode.InvalidOutPoint, `Invalid out point: ${outPoint}, format: {tx-hash}-{index}`);
  }
}

export class UnresolvedCellDepError extends WalletError {
  constructor(scriptKind: string) {
    super(
      WalletErrorCode.UnresolvedCellDep,
      `No cell dep found for script ${scriptKind}`,
      HttpStatusCode.InternalServerError,
    );
  }
}
