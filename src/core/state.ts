import { Annotation } from '@langchain/langgraph';
import type {
  Citation,
  Constraints,
  FinalAnswer,
  Intent,
  RawResult,
  ReconciledResult,
  SearchStrategy,
  SourceStatus,
} from '../schemas/product.js';

/**
 * Per-invocation conversation state. Each stage returns an update that the
 * graph merges in; `log` is append-only.
 */
export const ConversationAnnotation = Annotation.Root({
  query: Annotation<string>,
  intent: Annotation<Intent | undefined>,
  constraints: Annotation<Constraints | undefined>,
  strategy: Annotation<SearchStrategy | undefined>,
  rawCatalogResults: Annotation<RawResult[]>({
    reducer: (_prev: RawResult[], next: RawResult[]) => next,
    default: () => [],
  }),
  rawWebResults: Annotation<RawResult[]>({
    reducer: (_prev: RawResult[], next: RawResult[]) => next,
    default: () => [],
  }),
  reconciledResults: Annotation<ReconciledResult[]>({
    reducer: (_prev: ReconciledResult[], next: ReconciledResult[]) => next,
    default: () => [],
  }),
  finalAnswer: Annotation<FinalAnswer | undefined>,
  citations: Annotation<Citation[]>({
    reducer: (_prev: Citation[], next: Citation[]) => next,
    default: () => [],
  }),
  sourceStatus: Annotation<SourceStatus>({
    reducer: (_prev: SourceStatus, next: SourceStatus) => next,
    default: () => ({ catalog: 'skipped', web: 'skipped' }),
  }),
  log: Annotation<string[]>({
    reducer: (left: string[], right: string[]) => left.concat(right),
    default: () => [],
  }),
});

export type ConversationState = typeof ConversationAnnotation.State;
export type ConversationUpdate = typeof ConversationAnnotation.Update;

export function createInitialState(query: string): ConversationState {
  return {
    query,
    intent: undefined,
    constraints: undefined,
    strategy: undefined,
    rawCatalogResults: [],
    rawWebResults: [],
    reconciledResults: [],
    finalAnswer: undefined,
    citations: [],
    sourceStatus: { catalog: 'skipped', web: 'skipped' },
    log: [],
  };
}
