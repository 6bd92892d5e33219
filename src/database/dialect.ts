import Sqlite from "better-sqlite3";
import { type Dialect, PostgresDialect, SqliteDialect } from "kysely";
import type { Logger } from "pino";

import pg, { type Pool as PgPool } from "pg";
const { Pool } = pg;

const SQLITE_URL_PREFIX = "sqlite:";

function createPgPool(args: { url: string; logger: Logger }): PgPool {
  const pool = new Pool({
    connectionString: args.url,
    max: 15,

    // Maximum number of milliseconds a client in the pool is allowed to be idle before it is closed
    idleTimeoutMillis: 30_000,
    keepAlive: true,

    // Maximum number of milliseconds to wait for acquiring a client from the pool
    connectionTimeoutMillis: 5_000,
  });

  pool.on("error", (err) => {
    args.logger.error({ err }, "Postgres pool error");
  });

  pool.on("connect", (client) => {
    client.on("error", (err) => {
      args.logger.error({ err }, "Postgres client error");
    });
  });

  return pool;
}

/**
 * `postgres://...` connects to Postgres, `sqlite:<path>` opens a SQLite file
 * and a bare `sqlite:` an in-memory database.
 */
export function createDialect(args: { url: string; logger: Logger }): Dialect {
  if (args.url.startsWith(SQLITE_URL_PREFIX)) {
    const filename = args.url.slice(SQLITE_URL_PREFIX.length);
    const database = new Sqlite(filename === "" ? ":memory:" : filename);

    if (filename !== "") {
      database.pragma("journal_mode = WAL");
    }

    return new SqliteDialect({ database });
  }

  return new PostgresDialect({ pool: createPgPool(args) });
}
