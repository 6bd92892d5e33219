import { pino } from "pino";
import type { Address } from "../address.js";
import { parseAddress } from "../address.js";
import { Database } from "../database/index.js";
import { createDialect } from "../database/dialect.js";

export const DUMMY_LOGGER = pino({ level: "silent" });

/** A deterministic address, `0x000...0001` for `testAddress(1)`. */
export function testAddress(n: number): Address {
  return parseAddress(`0x${n.toString(16).padStart(40, "0")}`);
}

/** A migrated in-memory SQLite database. */
export async function createTestDatabase(): Promise<Database> {
  const db = new Database({
    dialect: createDialect({ url: "sqlite:", logger: DUMMY_LOGGER }),
    logger: DUMMY_LOGGER,
  });
  await db.migrate();
  return db;
}

/** Deterministic pseudo-random bigints in `[0, max)`, for property checks. */
export function createBigIntSequence(seed: bigint) {
  let state = seed;
  return (max: bigint): bigint => {
    // 64-bit linear congruential generator
    state = (state * 6364136223846793005n + 1442695040888963407n) % 2n ** 64n;
    return max === 0n ? 0n : state % max;
  };
}
