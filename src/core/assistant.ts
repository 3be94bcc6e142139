import type { ChatInputT, ChatOutputT, SearchInputT } from '../schemas/chat.js';
import type { SearchResponse } from '../schemas/product.js';
import { runShoppingSearch, type PipelineDeps } from './graph.js';

export type HandlerContext = {
  deps: PipelineDeps;
  signal?: AbortSignal;
};

export async function handleSearch(input: SearchInputT, ctx: HandlerContext): Promise<SearchResponse> {
  const outcome = await runShoppingSearch(input.query, ctx.deps, { signal: ctx.signal });
  return outcome.response;
}

/**
 * Conversational surface over the pipeline: the reply is the summary followed
 * by the explanation, with citations returned alongside.
 */
export async function handleChat(input: ChatInputT, ctx: HandlerContext): Promise<ChatOutputT> {
  const outcome = await runShoppingSearch(input.message, ctx.deps, { signal: ctx.signal });
  const { summary, explanation } = outcome.finalAnswer;
  return {
    reply: explanation ? `${summary}\n\n${explanation}` : summary,
    summary,
    explanation: explanation ?? null,
    citations: outcome.citations,
    intent: outcome.intent ?? null,
    results: outcome.response.results,
    error: outcome.response.error,
  };
}
