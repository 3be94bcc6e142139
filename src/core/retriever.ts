import type { RetrievalConfig } from '../config/app.js';
import type { RawResult, ResultSource, SearchStrategy, SourceStatus } from '../schemas/product.js';
import type { CatalogSearchAdapter } from '../tools/catalog_search.js';
import type { WebSearchAdapter } from '../tools/web_search.js';
import { toStdError } from '../tools/errors.js';
import { withTimeout } from '../util/resilience.js';
import type { Logger } from '../util/logging.js';
import { SourceUnavailableError } from './errors.js';
import { reconcile } from './reconcile.js';
import type { ConversationState, ConversationUpdate } from './state.js';

export type RetrieverDeps = {
  catalog?: CatalogSearchAdapter;
  web?: WebSearchAdapter;
  config: RetrievalConfig;
  log: Logger;
};

type SourceOutcome =
  | { source: ResultSource; status: 'ok'; results: RawResult[] }
  | { source: ResultSource; status: 'failed'; error: SourceUnavailableError }
  | { source: ResultSource; status: 'skipped'; note: string };

function wants(strategy: SearchStrategy, source: ResultSource): boolean {
  if (strategy === 'hybrid') return true;
  return strategy === (source === 'catalog' ? 'catalog_only' : 'web_only');
}

function searchText(state: ConversationState): string {
  const keywords = state.constraints?.keywords ?? [];
  return keywords.length ? keywords.join(' ') : state.query.trim();
}

function toUnavailable(source: ResultSource, err: unknown, signal?: AbortSignal): SourceUnavailableError {
  const std = toStdError(err, source);
  const reason = signal?.aborted ? 'cancelled' : std.code === 'timeout' ? 'timeout' : 'error';
  const code = signal?.aborted ? 'cancelled' : std.code;
  return new SourceUnavailableError(source, reason, code, `${source} search ${reason}: ${std.message}`);
}

/**
 * Queries both sources in parallel under independent timeouts and reconciles
 * whatever came back. Never throws: failed sources contribute nothing and
 * are recorded in `sourceStatus`.
 */
export async function retrieveResults(
  state: ConversationState,
  deps: RetrieverDeps,
  signal?: AbortSignal,
): Promise<ConversationUpdate> {
  const { config, log } = deps;
  const strategy = state.strategy ?? 'hybrid';
  const text = searchText(state);

  const run = async (source: ResultSource): Promise<SourceOutcome> => {
    if (!wants(strategy, source)) {
      return { source, status: 'skipped', note: `retriever: ${source} skipped (strategy=${strategy})` };
    }
    const { catalog, web } = deps;
    if (source === 'catalog' && !catalog) {
      return { source, status: 'skipped', note: 'retriever: catalog skipped (not configured)' };
    }
    if (source === 'web' && !web) {
      return { source, status: 'skipped', note: 'retriever: web skipped (not configured)' };
    }
    const start = Date.now();
    try {
      const results =
        source === 'catalog' && catalog
          ? await withTimeout(config.catalogTimeoutMs, (s) => catalog.query(text, config.sourceTopK, s), signal)
          : web
            ? await web.query(text, config.allowedDomains, config.sourceTopK, signal, config.webTimeoutMs)
            : [];
      log.debug({ source, count: results.length, ms: Date.now() - start }, 'source returned');
      return { source, status: 'ok', results };
    } catch (err) {
      return { source, status: 'failed', error: toUnavailable(source, err, signal) };
    }
  };

  const settled = await Promise.allSettled([run('catalog'), run('web')]);
  const outcomes = settled.map((s, i): SourceOutcome => {
    const source: ResultSource = i === 0 ? 'catalog' : 'web';
    return s.status === 'fulfilled' ? s.value : { source, status: 'failed', error: toUnavailable(source, s.reason, signal) };
  });

  if (signal?.aborted) {
    log.info({ query: state.query }, 'retrieval cancelled');
    return {
      rawCatalogResults: [],
      rawWebResults: [],
      reconciledResults: [],
      sourceStatus: { catalog: 'skipped', web: 'skipped' },
      log: ['retriever: cancelled, partial results discarded'],
    };
  }

  const sourceStatus: SourceStatus = { catalog: 'skipped', web: 'skipped' };
  const raw: Record<ResultSource, RawResult[]> = { catalog: [], web: [] };
  const notes: string[] = [];
  for (const o of outcomes) {
    sourceStatus[o.source] = o.status;
    if (o.status === 'ok') {
      raw[o.source] = o.results;
    } else if (o.status === 'failed') {
      log.warn({ source: o.source, code: o.error.code, reason: o.error.reason }, o.error.message);
      notes.push(`retriever: ${o.source} unavailable (${o.error.code})`);
    } else {
      notes.push(o.note);
    }
  }

  const reconciledResults = reconcile(raw.catalog, raw.web, {
    maxPrice: state.constraints?.maxPrice,
    topN: config.resultTopN,
    pricePrecedence: config.pricePrecedence,
  });

  const attempted = outcomes.filter((o) => o.status !== 'skipped');
  if (attempted.length > 0 && attempted.every((o) => o.status === 'failed')) {
    notes.push('retriever: all sources failed, degraded to empty results');
  }

  return {
    rawCatalogResults: raw.catalog,
    rawWebResults: raw.web,
    reconciledResults,
    sourceStatus,
    log: [
      ...notes,
      `retriever: catalog=${raw.catalog.length} web=${raw.web.length} reconciled=${reconciledResults.length}`,
    ],
  };
}
