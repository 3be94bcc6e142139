import { END, START, StateGraph } from '@langchain/langgraph';
import type { RetrievalConfig } from '../config/app.js';
import type { Citation, FinalAnswer, Intent, SearchResponse, SearchResultItem } from '../schemas/product.js';
import type { CatalogSearchAdapter } from '../tools/catalog_search.js';
import type { WebSearchAdapter } from '../tools/web_search.js';
import type { Logger } from '../util/logging.js';
import { allSourcesFailed, answerQuery } from './answerer.js';
import { TerminalPipelineError, type PipelineStage } from './errors.js';
import type { TextGenerator } from './llm.js';
import { planQuery } from './planner.js';
import { retrieveResults } from './retriever.js';
import { routeQuery, type IntentClassifier } from './router.js';
import { ConversationAnnotation, type ConversationState, type ConversationUpdate } from './state.js';

export type PipelineDeps = {
  config: RetrievalConfig;
  catalog?: CatalogSearchAdapter;
  web?: WebSearchAdapter;
  classifier?: IntentClassifier;
  llm?: TextGenerator;
  log: Logger;
};

export const PIPELINE_ERROR_MESSAGE =
  'Sorry, something went wrong while handling your request. Please try again.';
export const CANCELLED_MESSAGE = 'The search was cancelled before it finished.';

export type PipelineError = 'search_unavailable' | 'request_cancelled' | 'pipeline_error';

export type PipelineOutcome = {
  query: string;
  intent?: Intent;
  finalAnswer: FinalAnswer;
  citations: Citation[];
  response: SearchResponse;
  log: string[];
};

function isCancelled(signal?: AbortSignal): boolean {
  return signal?.aborted === true;
}

// Failures inside a stage become TerminalPipelineError; aborts pass through.
function stage(
  name: PipelineStage,
  fn: (state: ConversationState) => Promise<ConversationUpdate> | ConversationUpdate,
  signal?: AbortSignal,
) {
  return async (state: ConversationState): Promise<ConversationUpdate> => {
    try {
      return await fn(state);
    } catch (err) {
      if (isCancelled(signal)) throw err;
      throw new TerminalPipelineError(name, err);
    }
  };
}

/**
 * Router, then Planner, Retriever, Answerer. Out-of-scope queries end after
 * the Router; clarification requests skip straight to the Answerer.
 * Built per invocation so every node closes over the caller's signal.
 */
export function buildShoppingGraph(deps: PipelineDeps, signal?: AbortSignal) {
  const { log } = deps;
  const afterRouter = (state: ConversationState) => {
    if (state.intent?.type === 'out_of_scope') return END;
    if (state.intent?.type === 'clarification') return 'answerer';
    return 'planner';
  };

  return new StateGraph(ConversationAnnotation)
    .addNode('router', stage('router', (s) => routeQuery(s, { classifier: deps.classifier, log, signal }), signal))
    .addNode('planner', stage('planner', (s) => planQuery(s, { allowedDomains: deps.config.allowedDomains }), signal))
    .addNode('retriever', stage('retriever', (s) => retrieveResults(s, deps, signal), signal))
    .addNode('answerer', stage('answerer', (s) => answerQuery(s, { llm: deps.llm, log, signal }), signal))
    .addEdge(START, 'router')
    .addConditionalEdges('router', afterRouter, ['planner', 'answerer', END])
    .addEdge('planner', 'retriever')
    .addEdge('retriever', 'answerer')
    .addEdge('answerer', END)
    .compile();
}

export function toResultItems(state: ConversationState): SearchResultItem[] {
  return state.reconciledResults.map((r) => ({
    title: r.title,
    url: r.url ?? null,
    snippet: r.snippet ?? null,
    price: r.price ?? null,
    score: r.score ?? null,
    source: r.source,
    rank: r.rank,
  }));
}

function failure(query: string, error: PipelineError, summary: string, log: string[]): PipelineOutcome {
  return {
    query,
    finalAnswer: { summary },
    citations: [],
    response: { query, results: [], error },
    log,
  };
}

/**
 * Pipeline boundary: runs one query end to end and always resolves. Stage
 * failures become an apology with `error` set; nothing escapes to the host.
 */
export async function runShoppingSearch(
  query: string,
  deps: PipelineDeps,
  opts: { signal?: AbortSignal } = {},
): Promise<PipelineOutcome> {
  const { signal } = opts;
  const { log } = deps;
  const start = Date.now();

  if (isCancelled(signal)) {
    return failure(query, 'request_cancelled', CANCELLED_MESSAGE, ['pipeline: cancelled before start']);
  }

  let state: ConversationState;
  try {
    const graph = buildShoppingGraph(deps, signal);
    state = await graph.invoke({ query }, { signal });
  } catch (err) {
    if (isCancelled(signal)) {
      log.info({ ms: Date.now() - start }, 'search cancelled');
      return failure(query, 'request_cancelled', CANCELLED_MESSAGE, ['pipeline: cancelled']);
    }
    const terminal = err instanceof TerminalPipelineError ? err : new TerminalPipelineError('pipeline', err);
    log.error({ stage: terminal.stage, err: terminal.message }, 'pipeline failed');
    return failure(query, 'pipeline_error', PIPELINE_ERROR_MESSAGE, [`pipeline: ${terminal.message}`]);
  }

  if (isCancelled(signal)) {
    return failure(query, 'request_cancelled', CANCELLED_MESSAGE, [...state.log, 'pipeline: cancelled']);
  }

  const finalAnswer = state.finalAnswer ?? { summary: PIPELINE_ERROR_MESSAGE };
  const unavailable = state.reconciledResults.length === 0 && allSourcesFailed(state.sourceStatus);
  const error: PipelineError | null = unavailable ? 'search_unavailable' : state.finalAnswer ? null : 'pipeline_error';

  log.info(
    {
      intent: state.intent?.type,
      strategy: state.strategy,
      results: state.reconciledResults.length,
      sources: state.sourceStatus,
      ms: Date.now() - start,
    },
    'search completed',
  );

  return {
    query,
    intent: state.intent,
    finalAnswer,
    citations: error ? [] : state.citations,
    response: { query, results: error ? [] : toResultItems(state), error },
    log: state.log,
  };
}
