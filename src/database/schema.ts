import type { Insertable, Selectable } from "kysely";
import type { Address } from "../address.js";

// amounts are stored as decimal strings: 128-bit values do not fit the
// integer types every supported dialect offers

export type RoundTable = {
  id: string;
  admin: Address;
  leftoverAddress: Address;
  // JSON encoded Address[] | null
  createProposalWhitelist: string | null;
  voteProposalWhitelist: string | null;
  // JSON encoded Expiration
  proposalPeriod: string;
  votingPeriod: string;
  budgetDenom: string;
  budgetAmount: string;
  // JSON encoded QuadraticFundingAlgorithm
  algorithm: string;
  nextProposalId: number;
  createdAt: string;
};

export type RoundRow = Selectable<RoundTable>;
export type NewRoundRow = Insertable<RoundTable>;

export type ProposalTable = {
  roundId: string;
  id: number;
  title: string;
  description: string;
  metadata: string | null;
  fundAddress: Address;
  collectedFunds: string;
};

export type ProposalRow = Selectable<ProposalTable>;
export type NewProposalRow = Insertable<ProposalTable>;

export type VoteTable = {
  roundId: string;
  proposalId: number;
  voter: Address;
  denom: string;
  amount: string;
};

export type VoteRow = Selectable<VoteTable>;
export type NewVoteRow = Insertable<VoteTable>;

export type DistributionTable = {
  roundId: string;
  denom: string;
  budget: string;
  leftover: string;
  leftoverAddress: Address;
  distributedAt: string;
};

export type DistributionRow = Selectable<DistributionTable>;
export type NewDistributionRow = Insertable<DistributionTable>;

export type TransferTable = {
  roundId: string;
  position: number;
  kind: "grant" | "leftover";
  proposalId: number | null;
  toAddress: Address;
  matched: string | null;
  collected: string | null;
  amount: string;
};

export type TransferRow = Selectable<TransferTable>;
export type NewTransferRow = Insertable<TransferTable>;

export interface Tables {
  rounds: RoundTable;
  proposals: ProposalTable;
  votes: VoteTable;
  distributions: DistributionTable;
  transfers: TransferTable;
}
