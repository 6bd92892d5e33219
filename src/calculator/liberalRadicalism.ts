import { checkedAdd, checkedMul } from "./checkedMath.js";
import { isqrt } from "./isqrt.js";

/** Liberal Radicalism score of one grant: the square of the sum of the
 * integer square roots of its contributions.
 *
 * Four contributions of 100 score (4 * 10)^2 = 1600 while a single
 * contribution of 400 scores 20^2 = 400.
 *
 * @throws ArithmeticOverflowError when the sum or the square exceeds 128 bits
 */
export function liberalRadicalismScore(contributions: readonly bigint[]): bigint {
  const sumOfRoots = contributions.reduce(
    (sum, contribution) =>
      checkedAdd(sum, isqrt(contribution), "sum of square roots"),
    0n
  );

  return checkedMul(sumOfRoots, sumOfRoots, "liberal radicalism score");
}
