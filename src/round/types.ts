import type { Address } from "../address.js";

export type Proposal = {
  id: number;
  title: string;
  description: string;
  metadata: string | null;
  fundAddress: Address;
  collectedFunds: bigint;
};

export type Vote = {
  proposalId: number;
  voter: Address;
  denom: string;
  amount: bigint;
};

/** One payout the distribution asks the transfer layer to make. A grant
 * receives its collected contributions back plus its matched amount. */
export type Transfer =
  | {
      kind: "grant";
      proposalId: number;
      toAddress: Address;
      matched: bigint;
      collected: bigint;
      amount: bigint;
    }
  | {
      kind: "leftover";
      toAddress: Address;
      amount: bigint;
    };

export type RoundDistribution = {
  roundId: string;
  denom: string;
  budget: bigint;
  leftover: bigint;
  leftoverAddress: Address;
  distributedAt: Date;
  transfers: Transfer[];
};

export type ProposalMatch = {
  proposalId: number;
  fundAddress: Address;
  matched: bigint;
  collected: bigint;
};

export type MatchesPreview =
  | {
      type: "capitalConstrained";
      denom: string;
      budget: bigint;
      leftover: bigint;
      matches: ProposalMatch[];
    }
  | {
      type: "unconstrained";
      denom: string;
      matches: ProposalMatch[];
    };
