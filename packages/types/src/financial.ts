/**
 * Financial Types
 *
 * A wallet custodies exactly one native asset. Amounts travel as
 * decimal strings and are only ever converted to bigint for arithmetic.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency and decimals always travel with the amount
 */

/**
 * Asset symbol (e.g. "ETH", "XRP", "SAT").
 */
export type Currency = string;

/**
 * The native asset a wallet is denominated in.
 */
export interface Asset {
  readonly currency: Currency;

  /**
   * Number of decimal places.
   * ETH = 18 (wei), XRP = 6 (drops), BTC = 8 (sats).
   */
  readonly decimals: number;
}

/**
 * A precise amount of an asset.
 */
export interface Money extends Asset {
  /** Decimal string, e.g. "5", "0.25", "1000.000001" */
  readonly amount: string;
}
