import { z } from "zod";
import { getAddress, isAddress } from "viem";

export const addressSchema = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), { message: "Invalid address" })
  .transform((v) => getAddress(v));

/** Unsigned integer amount, sent as a decimal string so uint256 values survive JSON. */
export const amountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer string")
  .transform((v) => BigInt(v));

export const outcomeIndexSchema = z.number().int().min(0);

export const marketParamsSchema = z.object({
  address: addressSchema,
  creator: addressSchema,
  feeFraction: z.bigint(),
  createdAt: z.date().optional(),
});

export const fundBodySchema = z.object({
  amount: amountSchema,
});

export const buyBodySchema = z.object({
  outcomeIndex: outcomeIndexSchema,
  count: amountSchema,
  maxCost: amountSchema,
});

export const sellBodySchema = z.object({
  outcomeIndex: outcomeIndexSchema,
  count: amountSchema,
  minProfit: amountSchema,
});

export const feeQuerySchema = z.object({
  amount: amountSchema,
});

export const marketAddressParamsSchema = z.object({
  address: addressSchema,
});

export const callerHeaderSchema = z.object({
  "x-caller-address": addressSchema,
});

export type FundBody = z.infer<typeof fundBodySchema>;
export type BuyBody = z.infer<typeof buyBodySchema>;
export type SellBody = z.infer<typeof sellBodySchema>;
export type FeeQuery = z.infer<typeof feeQuerySchema>;
