/**
 * Runtime validation for everything read from the network or from disk.
 */

import { z } from 'zod';

export const pairResponseSchema = z.object({
  result: z.string(),
  emoji: z.string(),
  isNew: z.boolean(),
});

export const discoveryRecordSchema = z.object({
  name: z.string().nullable(),
  emoji: z.string().nullable().default(null),
  isFirstDiscovery: z.boolean().nullable().default(null),
});

export const discoveryFileSchema = z.array(discoveryRecordSchema);

export const pairRecipeSchema = z.object({
  first: z.string().min(1),
  second: z.string().min(1),
  result: z.string().min(1),
  emoji: z.string().default(''),
  isNew: z.boolean().default(false),
});

export const recipeFileSchema = z.array(pairRecipeSchema);

export type PairRecipe = z.infer<typeof pairRecipeSchema>;
