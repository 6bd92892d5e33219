import type { Kysely } from "kysely";
import type { Tables } from "./schema.js";

const ADDRESS_TYPE = "text";
const AMOUNT_TYPE = "text";
const ROUND_ID_TYPE = "text";

export async function migrate(db: Kysely<Tables>, schemaName: string | null) {
  if (schemaName !== null) {
    await db.schema.createSchema(schemaName).ifNotExists().execute();
  }

  const schema = schemaName === null ? db.schema : db.schema.withSchema(schemaName);

  await schema
    .createTable("rounds")
    .ifNotExists()
    .addColumn("id", ROUND_ID_TYPE, (col) => col.primaryKey())
    .addColumn("admin", ADDRESS_TYPE, (col) => col.notNull())
    .addColumn("leftoverAddress", ADDRESS_TYPE, (col) => col.notNull())
    .addColumn("createProposalWhitelist", "text")
    .addColumn("voteProposalWhitelist", "text")
    .addColumn("proposalPeriod", "text", (col) => col.notNull())
    .addColumn("votingPeriod", "text", (col) => col.notNull())
    .addColumn("budgetDenom", "text", (col) => col.notNull())
    .addColumn("budgetAmount", AMOUNT_TYPE, (col) => col.notNull())
    .addColumn("algorithm", "text", (col) => col.notNull())
    .addColumn("nextProposalId", "integer", (col) => col.notNull())
    .addColumn("createdAt", "text", (col) => col.notNull())
    .execute();

  await schema
    .createTable("proposals")
    .ifNotExists()
    .addColumn("roundId", ROUND_ID_TYPE, (col) => col.notNull())
    .addColumn("id", "integer", (col) => col.notNull())
    .addColumn("title", "text", (col) => col.notNull())
    .addColumn("description", "text", (col) => col.notNull())
    .addColumn("metadata", "text")
    .addColumn("fundAddress", ADDRESS_TYPE, (col) => col.notNull())
    .addColumn("collectedFunds", AMOUNT_TYPE, (col) => col.notNull())
    .addPrimaryKeyConstraint("proposals_pkey", ["roundId", "id"])
    .execute();

  await schema
    .createTable("votes")
    .ifNotExists()
    .addColumn("roundId", ROUND_ID_TYPE, (col) => col.notNull())
    .addColumn("proposalId", "integer", (col) => col.notNull())
    .addColumn("voter", ADDRESS_TYPE, (col) => col.notNull())
    .addColumn("denom", "text", (col) => col.notNull())
    .addColumn("amount", AMOUNT_TYPE, (col) => col.notNull())
    .addPrimaryKeyConstraint("votes_pkey", ["roundId", "proposalId", "voter"])
    .execute();

  await schema
    .createTable("distributions")
    .ifNotExists()
    .addColumn("roundId", ROUND_ID_TYPE, (col) => col.primaryKey())
    .addColumn("denom", "text", (col) => col.notNull())
    .addColumn("budget", AMOUNT_TYPE, (col) => col.notNull())
    .addColumn("leftover", AMOUNT_TYPE, (col) => col.notNull())
    .addColumn("leftoverAddress", ADDRESS_TYPE, (col) => col.notNull())
    .addColumn("distributedAt", "text", (col) => col.notNull())
    .execute();

  await schema
    .createTable("transfers")
    .ifNotExists()
    .addColumn("roundId", ROUND_ID_TYPE, (col) => col.notNull())
    .addColumn("position", "integer", (col) => col.notNull())
    .addColumn("kind", "text", (col) => col.notNull())
    .addColumn("proposalId", "integer")
    .addColumn("toAddress", ADDRESS_TYPE, (col) => col.notNull())
    .addColumn("matched", AMOUNT_TYPE)
    .addColumn("collected", AMOUNT_TYPE)
    .addColumn("amount", AMOUNT_TYPE, (col) => col.notNull())
    .addPrimaryKeyConstraint("transfers_pkey", ["roundId", "position"])
    .execute();
}

export async function dropTables(
  db: Kysely<Tables>,
  schemaName: string | null
) {
  const schema = schemaName === null ? db.schema : db.schema.withSchema(schemaName);

  for (const table of [
    "transfers",
    "distributions",
    "votes",
    "proposals",
    "rounds",
  ]) {
    await schema.dropTable(table).ifExists().execute();
  }
}
