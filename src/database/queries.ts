import type { Kysely } from "kysely";
import type { Address } from "../address.js";
import type {
  DistributionRow,
  NewDistributionRow,
  NewProposalRow,
  NewRoundRow,
  NewTransferRow,
  NewVoteRow,
  ProposalRow,
  RoundRow,
  Tables,
  TransferRow,
  VoteRow,
} from "./schema.js";

/** Reads and writes of round data, bound either to the connection pool or
 * to a single transaction. */
export class Queries {
  #db: Kysely<Tables>;

  constructor(db: Kysely<Tables>) {
    this.#db = db;
  }

  async getRoundById(roundId: string): Promise<RoundRow | null> {
    const round = await this.#db
      .selectFrom("rounds")
      .selectAll()
      .where("id", "=", roundId)
      .executeTakeFirst();

    return round ?? null;
  }

  async insertRound(round: NewRoundRow): Promise<void> {
    await this.#db.insertInto("rounds").values(round).execute();
  }

  /** Hands out proposal ids 1, 2, 3, ... per round. */
  async allocateProposalId(roundId: string): Promise<number> {
    const round = await this.#db
      .selectFrom("rounds")
      .select("nextProposalId")
      .where("id", "=", roundId)
      .executeTakeFirstOrThrow();

    await this.#db
      .updateTable("rounds")
      .set({ nextProposalId: round.nextProposalId + 1 })
      .where("id", "=", roundId)
      .execute();

    return round.nextProposalId;
  }

  async insertProposal(proposal: NewProposalRow): Promise<void> {
    await this.#db.insertInto("proposals").values(proposal).execute();
  }

  async getProposalById(
    roundId: string,
    proposalId: number
  ): Promise<ProposalRow | null> {
    const proposal = await this.#db
      .selectFrom("proposals")
      .selectAll()
      .where("roundId", "=", roundId)
      .where("id", "=", proposalId)
      .executeTakeFirst();

    return proposal ?? null;
  }

  async getRoundProposals(roundId: string): Promise<ProposalRow[]> {
    return await this.#db
      .selectFrom("proposals")
      .selectAll()
      .where("roundId", "=", roundId)
      .orderBy("id", "asc")
      .execute();
  }

  async updateProposalCollectedFunds(
    roundId: string,
    proposalId: number,
    collectedFunds: bigint
  ): Promise<void> {
    await this.#db
      .updateTable("proposals")
      .set({ collectedFunds: collectedFunds.toString() })
      .where("roundId", "=", roundId)
      .where("id", "=", proposalId)
      .execute();
  }

  async getVote(
    roundId: string,
    proposalId: number,
    voter: Address
  ): Promise<VoteRow | null> {
    const vote = await this.#db
      .selectFrom("votes")
      .selectAll()
      .where("roundId", "=", roundId)
      .where("proposalId", "=", proposalId)
      .where("voter", "=", voter)
      .executeTakeFirst();

    return vote ?? null;
  }

  async insertVote(vote: NewVoteRow): Promise<void> {
    await this.#db.insertInto("votes").values(vote).execute();
  }

  async getRoundVotes(roundId: string): Promise<VoteRow[]> {
    return await this.#db
      .selectFrom("votes")
      .selectAll()
      .where("roundId", "=", roundId)
      .orderBy("proposalId", "asc")
      .execute();
  }

  async getDistributionByRoundId(
    roundId: string
  ): Promise<DistributionRow | null> {
    const distribution = await this.#db
      .selectFrom("distributions")
      .selectAll()
      .where("roundId", "=", roundId)
      .executeTakeFirst();

    return distribution ?? null;
  }

  async getDistributionTransfers(roundId: string): Promise<TransferRow[]> {
    return await this.#db
      .selectFrom("transfers")
      .selectAll()
      .where("roundId", "=", roundId)
      .orderBy("position", "asc")
      .execute();
  }

  async insertDistribution(
    distribution: NewDistributionRow,
    transfers: NewTransferRow[]
  ): Promise<void> {
    await this.#db.insertInto("distributions").values(distribution).execute();

    if (transfers.length > 0) {
      await this.#db.insertInto("transfers").values(transfers).execute();
    }
  }
}
