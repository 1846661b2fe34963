/**
 * @concord/ledger — Deterministic monetary arithmetic.
 *
 * Amounts are decimal strings at the edges and bigint base units inside.
 * "1.5" ETH (18 decimals) is 1500000000000000000n wei.
 *
 * Rules:
 * - No floating-point operations
 * - Both operands must be the same asset (currency and decimals)
 * - Results are canonical: no leading zeros, no trailing fractional zeros
 */

import type { Asset, Money } from "@concord/types";
import { LedgerError } from "./types.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Conversion ──────────────────────────────────────────────────────────

/**
 * Parse a decimal string into base units.
 *
 * "100.50" with decimals=2 → 10050n
 * "-0.5" with decimals=6 → -500000n
 *
 * @throws LedgerError INVALID_AMOUNT on malformed input or excess precision
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const negative = trimmed.startsWith("-");
  const [whole = "0", fraction = ""] = (negative ? trimmed.slice(1) : trimmed).split(".");

  if (fraction.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${fraction.length} decimal places, asset allows ${decimals}`,
    );
  }

  const units = BigInt(whole + fraction.padEnd(decimals, "0"));
  return negative ? -units : units;
}

/**
 * Format base units as a canonical decimal string.
 *
 * 10050n with decimals=2 → "100.5"
 * 5000000n with decimals=6 → "5"
 */
export function formatAmount(units: bigint, decimals: number): string {
  const negative = units < 0n;
  const digits = (negative ? -units : units).toString().padStart(decimals + 1, "0");
  const whole = digits.slice(0, digits.length - decimals);
  const fraction = digits.slice(digits.length - decimals).replace(/0+$/, "");
  const body = fraction === "" ? whole : `${whole}.${fraction}`;
  return negative ? `-${body}` : body;
}

/**
 * Base units of a Money value.
 */
export function toUnits(money: Money): bigint {
  return parseAmount(money.amount, money.decimals);
}

/**
 * Build a Money value from base units.
 */
export function fromUnits(units: bigint, asset: Asset): Money {
  return {
    amount: formatAmount(units, asset.decimals),
    currency: asset.currency,
    decimals: asset.decimals,
  };
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws LedgerError if invalid.
 */
export function validateMoney(money: Money): void {
  if (money.currency.trim() === "") {
    throw new LedgerError("INVALID_MONEY", "Money currency must be a non-empty string");
  }
  if (!Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError(
      "INVALID_MONEY",
      `Money decimals must be a non-negative integer, got: ${money.decimals}`,
    );
  }
  parseAmount(money.amount, money.decimals);
}

/**
 * Assert a Money value is denominated in the given asset.
 */
export function assertAsset(money: Money, asset: Asset): void {
  if (money.currency !== asset.currency || money.decimals !== asset.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Expected ${asset.currency} (${asset.decimals} decimals), got ${money.currency} (${money.decimals} decimals)`,
    );
  }
}

/**
 * Validate and canonicalize an amount in the given asset.
 *
 * normalizeMoney({ amount: "005.10", ... }) → { amount: "5.1", ... }
 */
export function normalizeMoney(money: Money, asset: Asset): Money {
  validateMoney(money);
  assertAsset(money, asset);
  return fromUnits(toUnits(money), asset);
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function zeroMoney(asset: Asset): Money {
  return fromUnits(0n, asset);
}

export function addMoney(a: Money, b: Money): Money {
  assertAsset(b, a);
  return fromUnits(toUnits(a) + toUnits(b), a);
}

export function subtractMoney(a: Money, b: Money): Money {
  assertAsset(b, a);
  return fromUnits(toUnits(a) - toUnits(b), a);
}

/**
 * Compare two amounts of the same asset. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertAsset(b, a);
  const left = toUnits(a);
  const right = toUnits(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function isZero(money: Money): boolean {
  return toUnits(money) === 0n;
}

export function isPositive(money: Money): boolean {
  return toUnits(money) > 0n;
}

export function isNegative(money: Money): boolean {
  return toUnits(money) < 0n;
}
