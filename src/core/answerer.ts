import type { Citation, ReconciledResult, SourceStatus } from '../schemas/product.js';
import {
  buildCitations,
  extractCitationIndices,
  neutralizeCitationMarkers,
  unknownCitationIndices,
} from './citations.js';
import type { TextGenerator } from './llm.js';
import { fillPrompt, getPrompt } from './prompts.js';
import type { ConversationState, ConversationUpdate } from './state.js';
import type { Logger } from '../util/logging.js';

export const CLARIFICATION_PROMPT =
  'What product are you looking for? Tell me the item and, if you like, a budget, for example "stainless steel cleaner under $15".';

export const SEARCH_UNAVAILABLE_MESSAGE =
  'Sorry, I could not complete this search because the product sources are unavailable right now. Please try again shortly.';

const EXPLANATION_LIMIT = 5;

export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

/** True when at least one source was attempted and every attempted source failed. */
export function allSourcesFailed(status: SourceStatus): boolean {
  const attempted = Object.values(status).filter((s) => s !== 'skipped');
  return attempted.length > 0 && attempted.every((s) => s === 'failed');
}

function noResultsSummary(query: string, maxPrice: number | undefined): string {
  const budget = maxPrice !== undefined ? ` within a ${formatPrice(maxPrice)} budget` : '';
  return `I found no matching results for "${neutralizeCitationMarkers(query.trim())}"${budget}. Try different keywords or a higher budget.`;
}

export function templateSummary(results: ReconciledResult[], maxPrice: number | undefined): string {
  const [top] = results;
  if (!top) return '';
  const price = top.price !== undefined ? ` for ${formatPrice(top.price)}` : ' (price not listed)';
  const n = results.length;
  const count = `${n} option${n === 1 ? '' : 's'}`;
  const scope = maxPrice !== undefined ? `${count} within your ${formatPrice(maxPrice)} budget` : count;
  return `My top pick is ${neutralizeCitationMarkers(top.title)} [${top.rank + 1}]${price}. I found ${scope}.`;
}

export function templateExplanation(results: ReconciledResult[]): string {
  const lines = results.slice(0, EXPLANATION_LIMIT).map((r) => {
    const price = r.price !== undefined ? formatPrice(r.price) : 'price not listed';
    return `[${r.rank + 1}] ${neutralizeCitationMarkers(r.title)} - ${price} (${r.source})`;
  });
  return ['Top results:', ...lines].join('\n');
}

function numberedResults(results: ReconciledResult[]): string {
  return results
    .map((r) => {
      const price = r.price !== undefined ? formatPrice(r.price) : 'price not listed';
      const snippet = r.snippet ? ` - ${neutralizeCitationMarkers(r.snippet.slice(0, 160))}` : '';
      return `[${r.rank + 1}] ${neutralizeCitationMarkers(r.title)} | ${price} | ${r.source}${snippet}`;
    })
    .join('\n');
}

export type AnswererDeps = {
  llm?: TextGenerator;
  log: Logger;
  signal?: AbortSignal;
};

async function llmExplanation(
  state: ConversationState,
  citations: Citation[],
  deps: AnswererDeps,
): Promise<{ text?: string; note?: string }> {
  const { llm } = deps;
  if (!llm) return {};
  const tmpl = await getPrompt('answer_explainer');
  if (!tmpl) return { note: 'answerer: explainer prompt unavailable' };
  const maxPrice = state.constraints?.maxPrice;
  const prompt = fillPrompt(tmpl, {
    query: state.query.trim(),
    constraints: maxPrice !== undefined ? `Budget: at most ${formatPrice(maxPrice)}.` : '',
    results: numberedResults(state.reconciledResults),
  });
  try {
    const text = (await llm.complete(prompt, { signal: deps.signal })).trim();
    const unknown = unknownCitationIndices(text, citations);
    if (unknown.length > 0) {
      return { note: `answerer: llm explanation rejected (unknown citations ${unknown.join(',')})` };
    }
    if (extractCitationIndices(text).length === 0) {
      return { note: 'answerer: llm explanation rejected (no citations)' };
    }
    return { text };
  } catch (err) {
    if (deps.signal?.aborted) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    deps.log.warn({ reason }, 'explanation generation failed; using template');
    return { note: `answerer: llm explanation failed (${reason})` };
  }
}

/**
 * Writes the final answer and citations. Citations mirror the reconciled list;
 * every inline marker refers to one of them.
 */
export async function answerQuery(state: ConversationState, deps: AnswererDeps): Promise<ConversationUpdate> {
  if (state.intent?.type === 'clarification') {
    return {
      finalAnswer: { summary: CLARIFICATION_PROMPT },
      citations: [],
      log: ['answerer: asked for clarification'],
    };
  }

  const results = state.reconciledResults;
  const citations = buildCitations(results);
  const maxPrice = state.constraints?.maxPrice;

  if (results.length === 0) {
    const failed = allSourcesFailed(state.sourceStatus);
    return {
      finalAnswer: { summary: failed ? SEARCH_UNAVAILABLE_MESSAGE : noResultsSummary(state.query, maxPrice) },
      citations: [],
      log: [failed ? 'answerer: search unavailable' : 'answerer: no matching results'],
    };
  }

  const summary = templateSummary(results, maxPrice);
  const generated = await llmExplanation(state, citations, deps);
  const explanation = generated.text ?? templateExplanation(results);

  return {
    finalAnswer: { summary, explanation },
    citations,
    log: [
      ...(generated.note ? [generated.note] : []),
      `answerer: ${citations.length} citations, explanation=${generated.text ? 'llm' : 'template'}`,
    ],
  };
}
