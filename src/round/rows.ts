import { z } from "zod";
import { parseAlgorithm } from "../calculator/algorithm.js";
import type {
  DistributionRow,
  NewRoundRow,
  NewTransferRow,
  ProposalRow,
  RoundRow,
  TransferRow,
  VoteRow,
} from "../database/schema.js";
import { type RoundConfig, whitelistSchema } from "./config.js";
import { expirationSchema } from "./expiration.js";
import type { Proposal, RoundDistribution, Transfer, Vote } from "./types.js";

function parseJsonColumn(value: string): unknown {
  return JSON.parse(value);
}

function parseWhitelistColumn(value: string | null) {
  return value === null ? null : whitelistSchema.parse(parseJsonColumn(value));
}

export function roundFromRow(row: RoundRow): RoundConfig {
  return {
    id: row.id,
    admin: row.admin,
    leftoverAddress: row.leftoverAddress,
    createProposalWhitelist: parseWhitelistColumn(row.createProposalWhitelist),
    voteProposalWhitelist: parseWhitelistColumn(row.voteProposalWhitelist),
    proposalPeriod: expirationSchema.parse(parseJsonColumn(row.proposalPeriod)),
    votingPeriod: expirationSchema.parse(parseJsonColumn(row.votingPeriod)),
    budget: { denom: row.budgetDenom, amount: BigInt(row.budgetAmount) },
    algorithm: parseAlgorithm(parseJsonColumn(row.algorithm)),
    createdAt: new Date(row.createdAt),
  };
}

export function roundToRow(round: RoundConfig): NewRoundRow {
  return {
    id: round.id,
    admin: round.admin,
    leftoverAddress: round.leftoverAddress,
    createProposalWhitelist:
      round.createProposalWhitelist === null
        ? null
        : JSON.stringify(round.createProposalWhitelist),
    voteProposalWhitelist:
      round.voteProposalWhitelist === null
        ? null
        : JSON.stringify(round.voteProposalWhitelist),
    proposalPeriod: JSON.stringify(round.proposalPeriod),
    votingPeriod: JSON.stringify(round.votingPeriod),
    budgetDenom: round.budget.denom,
    budgetAmount: round.budget.amount.toString(),
    algorithm: JSON.stringify(round.algorithm),
    nextProposalId: 1,
    createdAt: round.createdAt.toISOString(),
  };
}

export function proposalFromRow(row: ProposalRow): Proposal {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    metadata: row.metadata,
    fundAddress: row.fundAddress,
    collectedFunds: BigInt(row.collectedFunds),
  };
}

export function voteFromRow(row: VoteRow): Vote {
  return {
    proposalId: row.proposalId,
    voter: row.voter,
    denom: row.denom,
    amount: BigInt(row.amount),
  };
}

const optionalAmount = z
  .string()
  .nullable()
  .transform((value) => (value === null ? null : BigInt(value)));

export function transferToRow(
  roundId: string,
  position: number,
  transfer: Transfer
): NewTransferRow {
  switch (transfer.kind) {
    case "grant":
      return {
        roundId,
        position,
        kind: transfer.kind,
        proposalId: transfer.proposalId,
        toAddress: transfer.toAddress,
        matched: transfer.matched.toString(),
        collected: transfer.collected.toString(),
        amount: transfer.amount.toString(),
      };
    case "leftover":
      return {
        roundId,
        position,
        kind: transfer.kind,
        proposalId: null,
        toAddress: transfer.toAddress,
        matched: null,
        collected: null,
        amount: transfer.amount.toString(),
      };
  }
}

function transferFromRow(row: TransferRow): Transfer {
  if (row.kind === "leftover") {
    return {
      kind: "leftover",
      toAddress: row.toAddress,
      amount: BigInt(row.amount),
    };
  }

  const matched = optionalAmount.parse(row.matched);
  const collected = optionalAmount.parse(row.collected);

  if (row.proposalId === null || matched === null || collected === null) {
    throw new Error(
      `Transfer ${row.position} of round ${row.roundId} is missing its grant columns`
    );
  }

  return {
    kind: "grant",
    proposalId: row.proposalId,
    toAddress: row.toAddress,
    matched,
    collected,
    amount: BigInt(row.amount),
  };
}

export function distributionFromRows(
  row: DistributionRow,
  transfers: TransferRow[]
): RoundDistribution {
  return {
    roundId: row.roundId,
    denom: row.denom,
    budget: BigInt(row.budget),
    leftover: BigInt(row.leftover),
    leftoverAddress: row.leftoverAddress,
    distributedAt: new Date(row.distributedAt),
    transfers: transfers.map(transferFromRow),
  };
}
