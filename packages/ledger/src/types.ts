/**
 * @concord/ledger — Error types.
 */

export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "CURRENCY_MISMATCH";

/**
 * Structured error from money arithmetic.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
