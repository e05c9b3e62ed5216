import { z } from "zod";

const count = z.number().int().min(0);
const positiveMs = z.number().int().positive();

export const breakerConfigSchema = z.object({
  // Window shape
  capacity: z.number().int().min(1).optional(),
  spanMs: positiveMs.optional(),

  // Trip condition
  minEvalSize: count.optional(),
  errorThreshold: z.number().min(0).max(100).optional(),

  // Recovery
  retryTimeoutMs: z.number().int().min(0).optional(),
  trialSuccessRequired: count.optional(),
});

export const evalWindowSchema = z.object({
  windowMs: z.number().positive(),
  spans: z.number().int().min(1),
});
