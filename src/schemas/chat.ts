import { z } from 'zod';
import { Citation, Intent, SearchResultItem } from './product.js';

export const SearchInput = z.object({
  query: z.string().max(2000),
});
export type SearchInputT = z.infer<typeof SearchInput>;

export const ChatInput = z.object({
  message: z.string().min(1).max(2000),
});
export type ChatInputT = z.infer<typeof ChatInput>;

export const ChatOutput = z.object({
  reply: z.string().min(1),
  summary: z.string().min(1),
  explanation: z.string().nullable(),
  citations: z.array(Citation),
  intent: Intent.nullable(),
  results: z.array(SearchResultItem),
  error: z.string().nullable(),
});
export type ChatOutputT = z.infer<typeof ChatOutput>;
