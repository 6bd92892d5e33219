import type { Logger } from "pino";
import { parseAddress } from "../address.js";
import { checkedAdd } from "../calculator/checkedMath.js";
import {
  type GrantMatch,
  type RawGrant,
  calculateDistribution,
} from "../calculator/distribution.js";
import { type Database, isUniqueViolation } from "../database/index.js";
import type { Queries } from "../database/queries.js";
import { compareStrings } from "../utils/index.js";
import {
  type CreateProposalRequest,
  type CreateRoundRequest,
  type RoundConfig,
  isWhitelisted,
} from "./config.js";
import {
  AddressAlreadyVotedError,
  DistributionNotFoundError,
  InvalidPeriodError,
  ProposalNotFoundError,
  ProposalPeriodExpiredError,
  RoundAlreadyDistributedError,
  RoundAlreadyExistsError,
  RoundNotFoundError,
  UnauthorizedError,
  VotingPeriodExpiredError,
  VotingPeriodNotExpiredError,
} from "./errors.js";
import { isExpired, outlasts } from "./expiration.js";
import { type Coin, extractCoin } from "./funds.js";
import {
  distributionFromRows,
  proposalFromRow,
  roundFromRow,
  roundToRow,
  transferToRow,
  voteFromRow,
} from "./rows.js";
import type {
  MatchesPreview,
  Proposal,
  ProposalMatch,
  RoundDistribution,
  Transfer,
  Vote,
} from "./types.js";

export interface RoundServiceConfig {
  db: Database;
  logger: Logger;
  // milliseconds since the epoch, Date.now unless overridden
  now?: () => number;
}

/**
 * Bookkeeping around the matching engine: rounds, proposals and votes go in,
 * a single distribution per round comes out.
 */
export class RoundService {
  #db: Database;
  #logger: Logger;
  #now: () => number;

  constructor(config: RoundServiceConfig) {
    this.#db = config.db;
    this.#logger = config.logger;
    this.#now = config.now ?? Date.now;
  }

  /** Opens a round funded by `funds`, which must be a single coin of the
   * round's budget denomination. */
  async createRound(args: {
    sender: string;
    funds: readonly Coin[];
    request: CreateRoundRequest;
  }): Promise<RoundConfig> {
    const { request } = args;
    const sender = parseAddress(args.sender);
    const now = this.#now();

    if (isExpired(request.proposalPeriod, now)) {
      throw new ProposalPeriodExpiredError();
    }

    if (isExpired(request.votingPeriod, now)) {
      throw new VotingPeriodExpiredError();
    }

    if (outlasts(request.proposalPeriod, request.votingPeriod)) {
      throw new InvalidPeriodError(
        "Proposal period must not end after the voting period"
      );
    }

    const budget = extractCoin(args.funds, request.budgetDenom);

    const round: RoundConfig = {
      id: request.id,
      admin: request.admin,
      leftoverAddress: request.leftoverAddress,
      createProposalWhitelist: request.createProposalWhitelist,
      voteProposalWhitelist: request.voteProposalWhitelist,
      proposalPeriod: request.proposalPeriod,
      votingPeriod: request.votingPeriod,
      budget,
      algorithm: request.algorithm,
      createdAt: new Date(now),
    };

    // a concurrent create of the same id gets past the lookup and hits the
    // primary key instead
    await this.#db
      .transaction(async (queries) => {
        if ((await queries.getRoundById(round.id)) !== null) {
          throw new RoundAlreadyExistsError(round.id);
        }

        await queries.insertRound(roundToRow(round));
      })
      .catch((err: unknown) => {
        throw isUniqueViolation(err)
          ? new RoundAlreadyExistsError(round.id)
          : err;
      });

    this.#logger.info({
      msg: "round created",
      roundId: round.id,
      sender,
      budget: `${budget.amount} ${budget.denom}`,
    });

    return round;
  }

  async getRound(roundId: string): Promise<RoundConfig> {
    const row = await this.#db.getRoundById(roundId);

    if (row === null) {
      throw new RoundNotFoundError(roundId);
    }

    return roundFromRow(row);
  }

  async createProposal(args: {
    roundId: string;
    sender: string;
    request: CreateProposalRequest;
  }): Promise<Proposal> {
    const round = await this.getRound(args.roundId);
    const sender = parseAddress(args.sender);

    if (!isWhitelisted(round.createProposalWhitelist, sender)) {
      throw new UnauthorizedError();
    }

    if (isExpired(round.proposalPeriod, this.#now())) {
      throw new ProposalPeriodExpiredError();
    }

    const proposal = await this.#db.transaction(async (queries) => {
      const proposal: Proposal = {
        id: await queries.allocateProposalId(round.id),
        title: args.request.title,
        description: args.request.description,
        metadata: args.request.metadata,
        fundAddress: args.request.fundAddress,
        collectedFunds: 0n,
      };

      await queries.insertProposal({
        roundId: round.id,
        ...proposal,
        collectedFunds: proposal.collectedFunds.toString(),
      });

      return proposal;
    });

    this.#logger.debug({
      msg: "proposal created",
      roundId: round.id,
      proposalId: proposal.id,
      sender,
    });

    return proposal;
  }

  async getProposal(roundId: string, proposalId: number): Promise<Proposal> {
    const round = await this.getRound(roundId);
    const row = await this.#db.queries.getProposalById(round.id, proposalId);

    if (row === null) {
      throw new ProposalNotFoundError(proposalId);
    }

    return proposalFromRow(row);
  }

  async listProposals(roundId: string): Promise<Proposal[]> {
    const round = await this.getRound(roundId);
    const rows = await this.#db.queries.getRoundProposals(round.id);
    return rows.map(proposalFromRow);
  }

  /** Records the sender's contribution to a proposal. Every address votes at
   * most once per proposal. */
  async voteProposal(args: {
    roundId: string;
    proposalId: number;
    sender: string;
    funds: readonly Coin[];
  }): Promise<Proposal> {
    const round = await this.getRound(args.roundId);
    const voter = parseAddress(args.sender);

    if (!isWhitelisted(round.voteProposalWhitelist, voter)) {
      throw new UnauthorizedError();
    }

    if (isExpired(round.votingPeriod, this.#now())) {
      throw new VotingPeriodExpiredError();
    }

    const fund = extractCoin(args.funds, round.budget.denom);

    const proposal = await this.#db
      .transaction(async (queries) => {
        const row = await queries.getProposalById(round.id, args.proposalId);

        if (row === null) {
          throw new ProposalNotFoundError(args.proposalId);
        }

        if ((await queries.getVote(round.id, row.id, voter)) !== null) {
          throw new AddressAlreadyVotedError(row.id);
        }

        const proposal = proposalFromRow(row);
        const collectedFunds = checkedAdd(
          proposal.collectedFunds,
          fund.amount,
          "collected funds"
        );

        await queries.insertVote({
          roundId: round.id,
          proposalId: proposal.id,
          voter,
          denom: fund.denom,
          amount: fund.amount.toString(),
        });
        await queries.updateProposalCollectedFunds(
          round.id,
          proposal.id,
          collectedFunds
        );

        return { ...proposal, collectedFunds };
      })
      .catch((err: unknown) => {
        throw isUniqueViolation(err)
          ? new AddressAlreadyVotedError(args.proposalId)
          : err;
      });

    this.#logger.debug({
      msg: "vote recorded",
      roundId: round.id,
      proposalId: proposal.id,
      voter,
      amount: fund.amount.toString(),
      collectedFunds: proposal.collectedFunds.toString(),
    });

    return proposal;
  }

  /** Runs the matching engine on the votes cast so far without recording
   * anything. */
  async previewMatches(args: {
    roundId: string;
    unconstrained?: boolean;
  }): Promise<MatchesPreview> {
    const round = await this.getRound(args.roundId);
    const { proposals, grants } = await this.#db.transaction((queries) =>
      loadGrants(queries, round.id)
    );
    const denom = round.budget.denom;

    if (args.unconstrained === true) {
      const distribution = calculateDistribution({
        grants,
        algorithm: round.algorithm,
      });

      return {
        type: "unconstrained",
        denom,
        matches: toProposalMatches(proposals, distribution.matches),
      };
    }

    const distribution = calculateDistribution({
      grants,
      algorithm: round.algorithm,
      budget: round.budget.amount,
    });

    return {
      type: "capitalConstrained",
      denom,
      budget: distribution.budget,
      leftover: distribution.leftover,
      matches: toProposalMatches(proposals, distribution.matches),
    };
  }

  /**
   * Distributes the round's budget once its voting period is over. Only the
   * admin may trigger it, and only once per round.
   *
   * Every proposal gets a transfer of its collected funds plus its matched
   * amount, in proposal order, followed by one transfer of the leftover to
   * the round's leftover address. Together they pay out exactly the budget
   * plus every contribution.
   */
  async triggerDistribution(args: {
    roundId: string;
    sender: string;
  }): Promise<RoundDistribution> {
    const round = await this.getRound(args.roundId);
    const sender = parseAddress(args.sender);

    if (sender !== round.admin) {
      throw new UnauthorizedError();
    }

    const now = this.#now();

    if (!isExpired(round.votingPeriod, now)) {
      throw new VotingPeriodNotExpiredError();
    }

    const distribution = await this.#db
      .transaction(async (queries) => {
        if ((await queries.getDistributionByRoundId(round.id)) !== null) {
          throw new RoundAlreadyDistributedError(round.id);
        }

        const { proposals, grants } = await loadGrants(queries, round.id);

        const result = calculateDistribution({
          grants,
          algorithm: round.algorithm,
          budget: round.budget.amount,
        });

        const transfers: Transfer[] = [
          ...result.matches.map(
            (match, index): Transfer => ({
              kind: "grant",
              proposalId: proposals[index].id,
              toAddress: proposals[index].fundAddress,
              matched: match.matched,
              collected: match.collectedTotal,
              amount: checkedAdd(
                match.matched,
                match.collectedTotal,
                "grant transfer"
              ),
            })
          ),
          {
            kind: "leftover",
            toAddress: round.leftoverAddress,
            amount: result.leftover,
          },
        ];

        const distribution: RoundDistribution = {
          roundId: round.id,
          denom: round.budget.denom,
          budget: result.budget,
          leftover: result.leftover,
          leftoverAddress: round.leftoverAddress,
          distributedAt: new Date(now),
          transfers,
        };

        await queries.insertDistribution(
          {
            roundId: distribution.roundId,
            denom: distribution.denom,
            budget: distribution.budget.toString(),
            leftover: distribution.leftover.toString(),
            leftoverAddress: distribution.leftoverAddress,
            distributedAt: distribution.distributedAt.toISOString(),
          },
          transfers.map((transfer, position) =>
            transferToRow(round.id, position, transfer)
          )
        );

        return distribution;
      })
      .catch((err: unknown) => {
        throw isUniqueViolation(err)
          ? new RoundAlreadyDistributedError(round.id)
          : err;
      });

    this.#logger.info({
      msg: "round distributed",
      roundId: round.id,
      proposals: distribution.transfers.length - 1,
      budget: distribution.budget.toString(),
      leftover: distribution.leftover.toString(),
    });

    return distribution;
  }

  async getDistribution(roundId: string): Promise<RoundDistribution> {
    const round = await this.getRound(roundId);
    const row = await this.#db.queries.getDistributionByRoundId(round.id);

    if (row === null) {
      throw new DistributionNotFoundError(round.id);
    }

    const transfers = await this.#db.queries.getDistributionTransfers(round.id);

    return distributionFromRows(row, transfers);
  }
}

/** Builds one raw grant per proposal, in proposal id order, with each
 * proposal's contributions ordered by voter address. */
async function loadGrants(
  queries: Queries,
  roundId: string
): Promise<{ proposals: Proposal[]; grants: RawGrant[] }> {
  const proposals = (await queries.getRoundProposals(roundId)).map(
    proposalFromRow
  );
  const votes = (await queries.getRoundVotes(roundId)).map(voteFromRow);

  const votesByProposal = new Map<number, Vote[]>();
  for (const vote of votes) {
    const proposalVotes = votesByProposal.get(vote.proposalId) ?? [];
    proposalVotes.push(vote);
    votesByProposal.set(vote.proposalId, proposalVotes);
  }

  const grants = proposals.map((proposal) => ({
    address: proposal.fundAddress,
    contributions: (votesByProposal.get(proposal.id) ?? [])
      .sort((a, b) => compareStrings(a.voter, b.voter))
      .map((vote) => vote.amount),
    collectedTotal: proposal.collectedFunds,
  }));

  return { proposals, grants };
}

function toProposalMatches(
  proposals: Proposal[],
  matches: GrantMatch[]
): ProposalMatch[] {
  return matches.map((match, index) => ({
    proposalId: proposals[index].id,
    fundAddress: proposals[index].fundAddress,
    matched: match.matched,
    collected: match.collectedTotal,
  }));
}
