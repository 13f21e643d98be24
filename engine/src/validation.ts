import { z } from "zod";
import { addressSchema, amountSchema } from "./config.js";

const blockSchema = z.number().int().safe().nonnegative();

export const marketIdSchema = z.coerce.number().int().positive();

export const callerSchema = addressSchema;

export const createMarketSchema = z.object({
  description: z.string(),
  closeBlock: blockSchema,
});

export const placeBetSchema = z.object({
  prediction: z.boolean(),
  amount: amountSchema,
});

export const resolveMarketSchema = z.object({
  outcome: z.boolean(),
});

export const blockSettingSchema = z.object({
  value: blockSchema,
});

export const amountSettingSchema = z.object({
  value: amountSchema,
});

export const transferOwnershipSchema = z.object({
  newOwner: addressSchema,
});

export const mineSchema = z.object({
  blocks: z.number().int().safe().positive().default(1),
});

export const fundSchema = z.object({
  account: addressSchema,
  amount: amountSchema,
});
