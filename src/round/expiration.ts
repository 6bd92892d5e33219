import { z } from "zod";

export const expirationSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("atTime"),
    // milliseconds since the epoch
    time: z.number().int().nonnegative(),
  }),
  z.object({ type: z.literal("never") }),
]);

export type Expiration = z.infer<typeof expirationSchema>;

export function isExpired(expiration: Expiration, now: number): boolean {
  switch (expiration.type) {
    case "atTime":
      return now >= expiration.time;
    case "never":
      return false;
  }
}

/** Whether `a` is still running at some point after `b` has expired. */
export function outlasts(a: Expiration, b: Expiration): boolean {
  if (b.type === "never") {
    return false;
  }

  if (a.type === "never") {
    return true;
  }

  return a.time > b.time;
}
