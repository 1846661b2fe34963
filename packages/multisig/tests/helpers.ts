import type { Money } from "@concord/types";
import { MultisigError } from "../src/errors.js";
import type { TransferOutcome, ValueTransfer } from "../src/value-transfer.js";
import { MultisigWallet } from "../src/wallet.js";
import type { WalletDeps } from "../src/wallet.js";

export const FIXED_NOW = "2026-01-01T00:00:00.000Z";

export const USDC = { currency: "USDC", decimals: 6 } as const;

export function usdc(amount: string): Money {
  return { amount, ...USDC };
}

export function makeWallet(
  participants: readonly string[] = ["alice", "bob", "carol"],
  threshold = 2,
  deps: WalletDeps = {},
): MultisigWallet {
  return new MultisigWallet(
    { walletId: "w1", participants, threshold, asset: USDC },
    { now: () => FIXED_NOW, ...deps },
  );
}

/**
 * Run `fn` and return the MultisigError it throws.
 */
export function catchError(fn: () => unknown): MultisigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MultisigError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected a MultisigError, but nothing was thrown");
}

/**
 * A transfer rail whose behaviour each test sets.
 */
export class ScriptedRail implements ValueTransfer {
  onSend: (destination: string, amount: Money) => TransferOutcome = () => ({ ok: true });

  send(destination: string, amount: Money): TransferOutcome {
    return this.onSend(destination, amount);
  }
}
