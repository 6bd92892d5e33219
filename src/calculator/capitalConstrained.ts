import { checkedSum } from "./checkedMath.js";

/**
 * Scales raw scores down to a fixed budget, keeping their relative shape.
 *
 * Without a budget the scores are matched verbatim. With a budget every
 * grant receives `floor(budget * score / totalScore)`, so the matched amounts
 * never add up to more than the budget. When no grant scored anything the
 * whole budget is left over.
 */
export function constrainByBudget(
  scores: readonly bigint[],
  budget: bigint | undefined
): bigint[] {
  if (budget === undefined) {
    return [...scores];
  }

  const totalScore = checkedSum(scores, "total score");

  if (totalScore === 0n) {
    return scores.map(() => 0n);
  }

  // budget * score needs up to 256 bits; bigint holds it before the division
  return scores.map((score) => (budget * score) / totalScore);
}

/** The part of the budget the floor division did not hand out. */
export function computeLeftover(
  budget: bigint,
  matched: readonly bigint[]
): bigint {
  const leftover = budget - checkedSum(matched, "matched total");

  if (leftover < 0n) {
    throw new Error(
      `matched amounts exceed the budget of ${budget} by ${-leftover}`
    );
  }

  return leftover;
}
