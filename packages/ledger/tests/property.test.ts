/**
 * Property-Based Tests for @concord/ledger
 *
 * Uses fast-check to verify properties that must hold for ANY valid input:
 *
 * 1. formatAmount output parses back to the same units
 * 2. Addition is commutative and associative
 * 3. Subtraction undoes addition
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Asset, Money } from "@concord/types";
import {
  parseAmount,
  formatAmount,
  addMoney,
  subtractMoney,
  compareMoney,
  fromUnits,
} from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDecimals = fc.integer({ min: 0, max: 18 });

const arbUnits = fc.bigInt({ min: -(10n ** 30n), max: 10n ** 30n });

const ASSET: Asset = { currency: "ETH", decimals: 18 };

const arbMoney: fc.Arbitrary<Money> = fc
  .bigInt({ min: 0n, max: 10n ** 27n })
  .map((units) => fromUnits(units, ASSET));

// =============================================================================
// Properties
// =============================================================================

describe("money math properties", () => {
  it("format → parse is the identity on base units", () => {
    fc.assert(
      fc.property(arbUnits, arbDecimals, (units, decimals) => {
        expect(parseAmount(formatAmount(units, decimals), decimals)).toBe(units);
      }),
    );
  });

  it("addition is commutative", () => {
    fc.assert(
      fc.property(arbMoney, arbMoney, (a, b) => {
        expect(addMoney(a, b)).toEqual(addMoney(b, a));
      }),
    );
  });

  it("addition is associative", () => {
    fc.assert(
      fc.property(arbMoney, arbMoney, arbMoney, (a, b, c) => {
        expect(addMoney(addMoney(a, b), c)).toEqual(addMoney(a, addMoney(b, c)));
      }),
    );
  });

  it("subtraction undoes addition", () => {
    fc.assert(
      fc.property(arbMoney, arbMoney, (a, b) => {
        expect(compareMoney(subtractMoney(addMoney(a, b), b), a)).toBe(0);
      }),
    );
  });
});
