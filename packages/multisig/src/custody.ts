/**
 * Custody: the wallet's balance in its single native asset.
 */

import {
  compareMoney,
  LedgerError,
  normalizeMoney,
  subtractMoney,
  addMoney,
  zeroMoney,
} from "@concord/ledger";
import type { Asset, Money } from "@concord/types";
import { MultisigError } from "./errors.js";

/**
 * Canonicalize an amount in the wallet's asset.
 *
 * @throws MultisigError INVALID_AMOUNT for malformed amounts, excess
 *   precision or another asset
 */
export function toWalletAmount(amount: Money, asset: Asset): Money {
  try {
    return normalizeMoney(amount, asset);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new MultisigError("INVALID_AMOUNT", err.message, { cause: err });
    }
    throw err;
  }
}

export class CustodyAccount {
  readonly asset: Asset;
  private _balance: Money;

  constructor(asset: Asset, balance?: Money) {
    this.asset = asset;
    this._balance = balance ? toWalletAmount(balance, asset) : zeroMoney(asset);
  }

  get balance(): Money {
    return this._balance;
  }

  credit(amount: Money): Money {
    this._balance = addMoney(this._balance, amount);
    return this._balance;
  }

  /**
   * @throws MultisigError INSUFFICIENT_BALANCE
   */
  debit(amount: Money): Money {
    if (compareMoney(this._balance, amount) < 0) {
      throw new MultisigError(
        "INSUFFICIENT_BALANCE",
        `Balance ${this._balance.amount} ${this.asset.currency} is less than ${amount.amount}`,
      );
    }
    this._balance = subtractMoney(this._balance, amount);
    return this._balance;
  }

  restore(balance: Money): void {
    this._balance = balance;
  }
}
