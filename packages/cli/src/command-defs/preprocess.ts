/**
 * Preprocess Command Definitions
 */

import { z } from 'zod';

const formatOption = z.enum(['json', 'table']).default('table');

export const analyzeSchema = z.object({
  schema: z.string().min(1),
  batch: z.string().min(1),
  transform: z.string().min(1),
  out: z.string().min(1),
  output: z.string().min(1).optional(),
  lenient: z.boolean().default(false),
  shards: z.coerce.number().int().positive().optional(),
  format: formatOption,
});

export const applySchema = z.object({
  artifact: z.string().min(1),
  record: z.string().min(1),
  format: formatOption,
});

export const inspectSchema = z.object({
  artifact: z.string().min(1),
  format: formatOption,
});

export const transformsSchema = z.object({
  format: formatOption,
});

export type AnalyzeArgs = z.infer<typeof analyzeSchema>;
export type ApplyArgs = z.infer<typeof applySchema>;
export type InspectArgs = z.infer<typeof inspectSchema>;
export type TransformsArgs = z.infer<typeof transformsSchema>;
