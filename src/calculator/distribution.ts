import type { QuadraticFundingAlgorithm } from "./algorithm.js";
import { computeLeftover, constrainByBudget } from "./capitalConstrained.js";
import { checkedSum, isUint128 } from "./checkedMath.js";
import { InvalidInputError, UnsupportedAlgorithmError } from "./errors.js";
import { liberalRadicalismScore } from "./liberalRadicalism.js";

export type RawGrant = {
  address: string;
  contributions: readonly bigint[];
  collectedTotal: bigint;
};

export type GrantMatch = {
  address: string;
  matched: bigint;
  collectedTotal: bigint;
};

export type ConstrainedDistribution = {
  type: "capitalConstrained";
  budget: bigint;
  matches: GrantMatch[];
  leftover: bigint;
};

export type UnconstrainedDistribution = {
  type: "unconstrained";
  matches: GrantMatch[];
};

export type Distribution = ConstrainedDistribution | UnconstrainedDistribution;

export interface CalculateDistributionArgs {
  grants: readonly RawGrant[];
  algorithm: QuadraticFundingAlgorithm;
  budget?: bigint;
}

/**
 * Distributes a matching budget across grants.
 *
 * Matches come back in the order of `args.grants`. With a budget, the matched
 * amounts plus the leftover add up to exactly the budget; without one, every
 * grant is matched with its raw score and there is no leftover.
 *
 * The computation either succeeds as a whole or throws: an
 * `InvalidInputError` when a grant's collected total differs from the sum of
 * its contributions or an amount is outside the unsigned 128-bit range, an
 * `ArithmeticOverflowError` when a score or a total does not fit in 128 bits,
 * an `UnsupportedAlgorithmError` for an algorithm this engine does not know.
 */
export function calculateDistribution(
  args: CalculateDistributionArgs & { budget: bigint }
): ConstrainedDistribution;
export function calculateDistribution(
  args: CalculateDistributionArgs & { budget?: undefined }
): UnconstrainedDistribution;
export function calculateDistribution(
  args: CalculateDistributionArgs
): Distribution;
export function calculateDistribution(
  args: CalculateDistributionArgs
): Distribution {
  const { algorithm } = args;

  switch (algorithm.type) {
    case "capitalConstrainedLiberalRadicalism":
      return capitalConstrainedLiberalRadicalism(args.grants, args.budget);
    default: {
      const unsupported: never = algorithm.type;
      throw new UnsupportedAlgorithmError(String(unsupported));
    }
  }
}

function capitalConstrainedLiberalRadicalism(
  grants: readonly RawGrant[],
  budget: bigint | undefined
): Distribution {
  validateGrants(grants);

  if (budget !== undefined && !isUint128(budget)) {
    throw new InvalidInputError(
      `budget ${budget} is outside the unsigned 128-bit range`
    );
  }

  const scores = grants.map((grant) =>
    liberalRadicalismScore(grant.contributions)
  );
  const matched = constrainByBudget(scores, budget);
  const matches = assembleMatches(grants, matched);

  if (budget === undefined) {
    return { type: "unconstrained", matches };
  }

  return {
    type: "capitalConstrained",
    budget,
    matches,
    leftover: computeLeftover(budget, matched),
  };
}

function validateGrants(grants: readonly RawGrant[]): void {
  grants.forEach((grant, index) => {
    for (const contribution of grant.contributions) {
      if (!isUint128(contribution)) {
        throw new InvalidInputError(
          `grant ${index} (${grant.address}) has a contribution of ${contribution} outside the unsigned 128-bit range`
        );
      }
    }

    const contributionsTotal = checkedSum(
      grant.contributions,
      `contributions of grant ${index}`
    );

    if (contributionsTotal !== grant.collectedTotal) {
      throw new InvalidInputError(
        `grant ${index} (${grant.address}) collected ${grant.collectedTotal} but its contributions add up to ${contributionsTotal}`
      );
    }
  });
}

function assembleMatches(
  grants: readonly RawGrant[],
  matched: readonly bigint[]
): GrantMatch[] {
  return grants.map((grant, index) => ({
    address: grant.address,
    matched: matched[index],
    collectedTotal: grant.collectedTotal,
  }));
}
