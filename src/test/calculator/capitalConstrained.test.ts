import { describe, test, expect } from "vitest";
import {
  computeLeftover,
  constrainByBudget,
} from "../../calculator/capitalConstrained.js";
import { ArithmeticOverflowError } from "../../calculator/errors.js";

describe("constrainByBudget", () => {
  test("passes scores through without a budget", () => {
    const scores = [1n, 2n, 3n];
    const matched = constrainByBudget(scores, undefined);

    expect(matched).toEqual([1n, 2n, 3n]);
    expect(matched).not.toBe(scores);
  });

  test("scales scores proportionally and rounds down", () => {
    const scores = [63001n, 172225n, 239121n, 101124n];
    const matched = constrainByBudget(scores, 550000n);

    expect(matched).toEqual([60212n, 164602n, 228537n, 96648n]);
    expect(computeLeftover(550000n, matched)).toBe(1n);
  });

  test("leaves the truncated remainder over", () => {
    const matched = constrainByBudget([1n, 1n, 1n], 100n);

    expect(matched).toEqual([33n, 33n, 33n]);
    expect(computeLeftover(100n, matched)).toBe(1n);
  });

  test("scales up when the budget exceeds the total score", () => {
    expect(constrainByBudget([1n, 3n], 1000n)).toEqual([250n, 750n]);
  });

  test("matches nothing when nothing scored", () => {
    const matched = constrainByBudget([0n, 0n], 100n);

    expect(matched).toEqual([0n, 0n]);
    expect(computeLeftover(100n, matched)).toBe(100n);
    expect(constrainByBudget([], 50n)).toEqual([]);
    expect(computeLeftover(50n, [])).toBe(50n);
  });

  test("throws when the total score does not fit in 128 bits", () => {
    expect(() => constrainByBudget([2n ** 127n, 2n ** 127n], 10n)).toThrow(
      ArithmeticOverflowError
    );
  });
});

describe("computeLeftover", () => {
  test("refuses matched amounts above the budget", () => {
    expect(() => computeLeftover(10n, [6n, 5n])).toThrow(
      "matched amounts exceed the budget of 10 by 1"
    );
  });
});
