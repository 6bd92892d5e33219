import { z } from "zod";
import { type Address, addressSchema } from "../address.js";
import {
  type QuadraticFundingAlgorithm,
  algorithmFieldSchema,
} from "../calculator/algorithm.js";
import { type Expiration, expirationSchema } from "./expiration.js";
import type { Coin } from "./funds.js";

export const roundIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, "round id must be 1-64 characters of [A-Za-z0-9_-]");

export const whitelistSchema = z.array(addressSchema).nullable();

export const createRoundRequestSchema = z.object({
  id: roundIdSchema,
  admin: addressSchema,
  // receives whatever the matching leaves undistributed
  leftoverAddress: addressSchema,
  // null lets anyone create proposals or vote
  createProposalWhitelist: whitelistSchema.default(null),
  voteProposalWhitelist: whitelistSchema.default(null),
  proposalPeriod: expirationSchema,
  votingPeriod: expirationSchema,
  budgetDenom: z.string().min(1),
  algorithm: algorithmFieldSchema,
});

export type CreateRoundRequest = z.infer<typeof createRoundRequestSchema>;

export type RoundConfig = {
  id: string;
  admin: Address;
  leftoverAddress: Address;
  createProposalWhitelist: Address[] | null;
  voteProposalWhitelist: Address[] | null;
  proposalPeriod: Expiration;
  votingPeriod: Expiration;
  budget: Coin;
  algorithm: QuadraticFundingAlgorithm;
  createdAt: Date;
};

export function isWhitelisted(
  whitelist: Address[] | null,
  address: Address
): boolean {
  return whitelist === null || whitelist.includes(address);
}

export const createProposalRequestSchema = z.object({
  title: z.string().min(1).max(256),
  description: z.string().max(10_000).default(""),
  // opaque to the round, usually a base64 or JSON blob
  metadata: z.string().nullable().default(null),
  fundAddress: addressSchema,
});

export type CreateProposalRequest = z.infer<typeof createProposalRequestSchema>;
