import { describe, test, expect } from "vitest";
import { amountSchema, extractCoin } from "../../round/funds.js";
import { isExpired, outlasts } from "../../round/expiration.js";
import { NoFundsError } from "../../round/errors.js";

describe("amountSchema", () => {
  test("parses decimal strings into bigints", () => {
    expect(amountSchema.parse("340282366920938463463374607431768211455")).toBe(
      2n ** 128n - 1n
    );
  });

  test("rejects amounts that are negative, fractional or too large", () => {
    expect(amountSchema.safeParse("-1").success).toBe(false);
    expect(amountSchema.safeParse("1.5").success).toBe(false);
    expect(
      amountSchema.safeParse("340282366920938463463374607431768211456").success
    ).toBe(false);
  });
});

describe("extractCoin", () => {
  test("treats zero-amount coins as not sent", () => {
    expect(() => extractCoin([{ denom: "ucosm", amount: 0n }], "ucosm")).toThrow(
      NoFundsError
    );
  });
});

describe("expiration", () => {
  test("expires at its time", () => {
    const expiration = { type: "atTime", time: 100 } as const;

    expect(isExpired(expiration, 99)).toBe(false);
    expect(isExpired(expiration, 100)).toBe(true);
    expect(isExpired({ type: "never" }, Number.MAX_SAFE_INTEGER)).toBe(false);
  });

  test("compares expirations", () => {
    const early = { type: "atTime", time: 1 } as const;
    const late = { type: "atTime", time: 2 } as const;
    const never = { type: "never" } as const;

    expect(outlasts(late, early)).toBe(true);
    expect(outlasts(early, late)).toBe(false);
    expect(outlasts(early, early)).toBe(false);
    expect(outlasts(never, early)).toBe(true);
    expect(outlasts(early, never)).toBe(false);
    expect(outlasts(never, never)).toBe(false);
  });
});
