import { z } from "zod";
import ClientError from "./http/api/clientError.js";

export type Address = `0x${string}` & { __brand: "Address" };

export class InvalidAddressError extends ClientError {
  constructor(address: string) {
    super(`Invalid address: ${address}`, 400);
  }
}

export function safeParseAddress(address: string): Address | null {
  if (/^0x[0-9a-fA-F]{40}$/.test(address) === false) {
    return null;
  }

  return address.toLowerCase() as Address;
}

export function parseAddress(address: string): Address {
  const parsed = safeParseAddress(address);
  if (!parsed) {
    throw new InvalidAddressError(address);
  }
  return parsed;
}

export const addressSchema = z.string().transform((value, ctx) => {
  const parsed = safeParseAddress(value);
  if (parsed === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid address: ${value}`,
    });
    return z.NEVER;
  }
  return parsed;
});
