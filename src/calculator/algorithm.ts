import { z } from "zod";
import { UnsupportedAlgorithmError } from "./errors.js";

// `parameter` is carried through configuration but no formula reads it yet
export const quadraticFundingAlgorithmSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("capitalConstrainedLiberalRadicalism"),
    parameter: z.string().default(""),
  }),
]);

export type QuadraticFundingAlgorithm = z.infer<
  typeof quadraticFundingAlgorithmSchema
>;

/**
 * Parses a stored or submitted algorithm. An unknown `type` is an
 * `UnsupportedAlgorithmError`; a known one with malformed fields is a
 * `ZodError`.
 */
export function parseAlgorithm(value: unknown): QuadraticFundingAlgorithm {
  const result = quadraticFundingAlgorithmSchema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  if (typeof value !== "object" || value === null || !("type" in value)) {
    throw new UnsupportedAlgorithmError(String(JSON.stringify(value)));
  }

  if (
    typeof value.type === "string" &&
    quadraticFundingAlgorithmSchema.optionsMap.has(value.type)
  ) {
    throw result.error;
  }

  throw new UnsupportedAlgorithmError(String(value.type));
}

// request field: any object with a `type`, resolved by `parseAlgorithm`
export const algorithmFieldSchema = z
  .object({ type: z.string() })
  .passthrough()
  .transform((value) => parseAlgorithm(value));
