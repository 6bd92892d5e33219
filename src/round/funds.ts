import { z } from "zod";
import { UINT128_MAX } from "../calculator/checkedMath.js";
import { MultipleDenomsError, NoFundsError, WrongDenomError } from "./errors.js";

export const amountSchema = z
  .string()
  .regex(/^[0-9]+$/, "amount must be a non-negative integer string")
  .transform((value) => BigInt(value))
  .refine((value) => value <= UINT128_MAX, {
    message: "amount does not fit in 128 bits",
  });

export const coinSchema = z.object({
  denom: z.string().min(1),
  amount: amountSchema,
});

export type Coin = z.infer<typeof coinSchema>;

/**
 * Picks the single coin a sender attached to a request. Zero-amount coins are
 * ignored; whatever is left must be exactly one coin of `denom`.
 */
export function extractCoin(funds: readonly Coin[], denom: string): Coin {
  const sent = funds.filter((coin) => coin.amount > 0n);

  if (sent.length === 0) {
    throw new NoFundsError();
  }

  if (sent.length > 1) {
    throw new MultipleDenomsError();
  }

  const [coin] = sent;

  if (coin.denom !== denom) {
    throw new WrongDenomError(denom, coin.denom);
  }

  return coin;
}
