/**
 * @concord/ledger — Deterministic money arithmetic.
 */

export {
  parseAmount,
  formatAmount,
  toUnits,
  fromUnits,
  validateMoney,
  assertAsset,
  normalizeMoney,
  zeroMoney,
  addMoney,
  subtractMoney,
  compareMoney,
  isZero,
  isPositive,
  isNegative,
} from "./money-math.js";

export { LedgerError } from "./types.js";
export type { LedgerErrorCode } from "./types.js";
