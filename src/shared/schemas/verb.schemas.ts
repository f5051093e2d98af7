import { z } from 'zod';

// Schemas for JSON stored in verb rows and the bundled seed file

export const ContextualUsageSchema = z.object({
  context: z.string(),
  description: z.string(),
  examples: z.array(z.string()).default([]),
});

export const MeaningSchema = z.object({
  definition: z.string(),
  partOfSpeech: z.string(),
  register: z.string().nullish().transform((value) => value ?? undefined),
  examples: z.array(z.string()).default([]),
  contextualUsages: z.array(ContextualUsageSchema).default([]),
});

export const MeaningListSchema = z.array(MeaningSchema);

// Legacy column: { "<context>": "<description>" }
export const LegacyContextualUsageSchema = z.record(z.string(), z.string());

// Legacy column: ["example", ...]
export const LegacyExamplesSchema = z.array(z.string());

export const SeedVerbSchema = z.object({
  id: z.string().min(1),
  base: z.string().min(1),
  past: z.string(),
  participle: z.string(),
  pastUK: z.string().default(''),
  pastUS: z.string().default(''),
  participleUK: z.string().default(''),
  participleUS: z.string().default(''),
  pronunciationTextUS: z.string().optional(),
  pronunciationTextUK: z.string().optional(),
  meanings: MeaningListSchema.min(1),
});

export const SeedFileSchema = z.object({
  version: z.number().int().positive(),
  verbs: z.array(SeedVerbSchema),
});
