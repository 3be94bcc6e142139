import { z } from 'zod';

export const ResultSource = z.enum(['catalog', 'web']);
export type ResultSource = z.infer<typeof ResultSource>;

export const IntentType = z.enum(['product_query', 'out_of_scope', 'clarification']);
export type IntentType = z.infer<typeof IntentType>;

export const Intent = z.object({
  type: IntentType,
  safetyFlags: z.array(z.string()),
});
export type Intent = z.infer<typeof Intent>;

export const SearchStrategy = z.enum(['catalog_only', 'web_only', 'hybrid']);
export type SearchStrategy = z.infer<typeof SearchStrategy>;

export const Constraints = z.object({
  maxPrice: z.number().positive().optional(),
  category: z.string().optional(),
  keywords: z.array(z.string()),
});
export type Constraints = z.infer<typeof Constraints>;

/**
 * Canonical result shape shared by both sources. Collaborator-specific fields
 * are adapted away at the adapter boundary.
 */
export const RawResult = z.object({
  identityKey: z.string().min(1),
  title: z.string(),
  url: z.string().optional(),
  snippet: z.string().optional(),
  price: z.number().gt(0).lt(10000).optional(),
  score: z.number().optional(),
  source: ResultSource,
});
export type RawResult = z.infer<typeof RawResult>;

export const ReconciledResult = RawResult.extend({
  rank: z.number().int().min(0),
});
export type ReconciledResult = z.infer<typeof ReconciledResult>;

export const Citation = z.object({
  index: z.number().int().min(1),
  title: z.string(),
  url: z.string().optional(),
  price: z.number().optional(),
});
export type Citation = z.infer<typeof Citation>;

export const FinalAnswer = z.object({
  summary: z.string().min(1),
  explanation: z.string().optional(),
});
export type FinalAnswer = z.infer<typeof FinalAnswer>;

export const SourceState = z.enum(['ok', 'failed', 'skipped']);
export type SourceState = z.infer<typeof SourceState>;

export type SourceStatus = Record<ResultSource, SourceState>;

/**
 * Stable JSON contract returned to callers. Absent optional fields are null.
 */
export const SearchResultItem = z.object({
  title: z.string(),
  url: z.string().nullable(),
  snippet: z.string().nullable(),
  price: z.number().nullable(),
  score: z.number().nullable(),
  source: ResultSource,
  rank: z.number().int().min(0),
});
export type SearchResultItem = z.infer<typeof SearchResultItem>;

export const SearchResponse = z
  .object({
    query: z.string(),
    results: z.array(SearchResultItem),
    error: z.string().nullable(),
  })
  .refine((r) => r.error === null || r.results.length === 0, {
    message: 'results must be empty when error is set',
  });
export type SearchResponse = z.infer<typeof SearchResponse>;
