import { CamelCasePlugin, type Dialect, Kysely } from "kysely";
import type { Logger } from "pino";
import { LRUCache } from "lru-cache";
import retry from "async-retry";

import { dropTables, migrate } from "./migrate.js";
import { Queries } from "./queries.js";
import type { RoundRow, Tables } from "./schema.js";

const SERIALIZATION_FAILURE = "40001";
const UNIQUE_VIOLATIONS = [
  "23505",
  "SQLITE_CONSTRAINT_PRIMARYKEY",
  "SQLITE_CONSTRAINT_UNIQUE",
];

function errorCode(err: unknown): string | null {
  if (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string"
  ) {
    return err.code;
  }

  return null;
}

export function isSerializationFailure(err: unknown): boolean {
  return errorCode(err) === SERIALIZATION_FAILURE;
}

/** A write hit an existing primary key or unique constraint, on either
 * dialect. */
export function isUniqueViolation(err: unknown): boolean {
  const code = errorCode(err);
  return code !== null && UNIQUE_VIOLATIONS.includes(code);
}

export const TRANSACTION_RETRIES = 4;

type TransactionOutcome<T> =
  | { committed: true; value: T }
  | { committed: false; error: unknown };

export class Database {
  #rootDb: Kysely<Tables>;
  #db: Kysely<Tables>;
  #queries: Queries;
  // round rows never change once created
  #roundCache = new LRUCache<string, RoundRow>({ max: 500 });
  #logger: Logger;

  readonly databaseSchemaName: string | null;

  constructor(options: {
    dialect: Dialect;
    logger: Logger;
    schemaName?: string | null;
  }) {
    this.#rootDb = new Kysely<Tables>({
      dialect: options.dialect,
      plugins: [new CamelCasePlugin()],
    });

    this.databaseSchemaName = options.schemaName ?? null;
    this.#db =
      this.databaseSchemaName === null
        ? this.#rootDb
        : this.#rootDb.withSchema(this.databaseSchemaName);

    this.#queries = new Queries(this.#db);
    this.#logger = options.logger;
  }

  get queries(): Queries {
    return this.#queries;
  }

  async migrate(): Promise<void> {
    this.#logger.info({
      msg: "running migrations",
      schemaName: this.databaseSchemaName,
    });
    await migrate(this.#rootDb, this.databaseSchemaName);
  }

  async dropTables(): Promise<void> {
    this.#logger.info({
      msg: "dropping tables",
      schemaName: this.databaseSchemaName,
    });
    this.#roundCache.clear();
    await dropTables(this.#rootDb, this.databaseSchemaName);
  }

  async destroy(): Promise<void> {
    await this.#rootDb.destroy();
  }

  async getRoundById(roundId: string): Promise<RoundRow | null> {
    const cached = this.#roundCache.get(roundId);
    if (cached !== undefined) {
      return cached;
    }

    const round = await this.#queries.getRoundById(roundId);
    if (round !== null) {
      this.#roundCache.set(roundId, round);
    }

    return round;
  }

  /**
   * Runs `fn` in one serializable transaction; if it throws, nothing it
   * wrote is kept.
   *
   * A transaction that loses a serialization conflict to a concurrent one is
   * rolled back and `fn` runs again, up to `TRANSACTION_RETRIES` times. Any
   * other error is thrown on the first attempt.
   */
  async transaction<T>(fn: (queries: Queries) => Promise<T>): Promise<T> {
    const outcome = await retry(
      async (): Promise<TransactionOutcome<T>> => {
        try {
          const value = await this.#db
            .transaction()
            .setIsolationLevel("serializable")
            .execute((trx) => fn(new Queries(trx)));
          return { committed: true, value };
        } catch (error) {
          if (isSerializationFailure(error)) {
            throw error;
          }
          return { committed: false, error };
        }
      },
      {
        retries: TRANSACTION_RETRIES,
        minTimeout: 10,
        maxTimeout: 500,
        onRetry: (err, attempt) => {
          this.#logger.warn({
            msg: "retrying transaction after a serialization failure",
            attempt,
            err,
          });
        },
      }
    );

    if (!outcome.committed) {
      throw outcome.error;
    }

    return outcome.value;
  }
}
