/**
 * Zod schemas for validating tool inputs and outputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { MAX_LEVEL } from "@orbitrag/sdk";

const TopKSchema = z
  .number()
  .int()
  .min(0)
  .superRefine((val, ctx) => {
    if (val > 1000) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "topK cannot exceed 1000",
      });
    }
  });

const EndpointSchema = z
  .string()
  .url()
  .refine((val) => /^https?:\/\//i.test(val), { message: "endpoint must use http or https" });

// Tool input schemas

export const InitInputSchema = z
  .object({
    endpoint: EndpointSchema.optional(),
    apiKey: z.string().optional(),
    model: z.string().min(1, "model must be non-empty").optional(),
    level: z.number().int().min(1).max(MAX_LEVEL).optional(),
    timeoutMs: z.number().int().positive().max(600_000).optional(),
  })
  .strict();

export const LoadInputSchema = z
  .object({
    text: z.string(),
  })
  .strict();

export const AskInputSchema = z
  .object({
    question: z.string().min(1, "question must be non-empty"),
    topK: TopKSchema.default(8),
    useMemory: z.boolean().default(true),
  })
  .strict();

export const SearchInputSchema = z
  .object({
    query: z.string(),
    topK: TopKSchema.default(8),
  })
  .strict();

export const StatsInputSchema = z.object({}).strict();

export const ResetInputSchema = z.object({}).strict();

// Tool output schemas, checked against tool results in tests

export const InitOutputSchema = z.object({
  success: z.literal(true),
  model: z.string(),
  declaredStateCount: z.number().int().positive(),
});

export const LoadOutputSchema = z.object({
  success: z.literal(true),
  chunks: z.number().int().min(0),
  compressionRatio: z.string(),
  indexedKeywords: z.number().int().min(0),
  integrity: z.string(),
});

export const StatsOutputSchema = z.object({
  chunks: z.number().int().min(0),
  units: z.number().int().min(0),
  indexedKeywords: z.number().int().min(0),
  level: z.number().int().positive(),
  statesPerUnit: z.number().int().positive(),
  integrity: z.string(),
});

// Export types
export type InitInput = z.infer<typeof InitInputSchema>;
