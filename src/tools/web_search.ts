import type Bottleneck from 'bottleneck';
import type { PriceLookupClient, WebHit, WebSearchClient } from '../schemas/adapters.js';
import type { RawResult } from '../schemas/product.js';
import {
  extractItemCode,
  extractPrice,
  isProductPage,
  matchedAllowedDomain,
  normalizeUrl,
  sanitizePrice,
} from '../core/normalizer.js';
import { createPool } from '../util/limiter.js';
import { withTimeout } from '../util/resilience.js';
import { toStdError } from './errors.js';
import type { Logger } from '../util/logging.js';

export type WebSearchAdapterOptions = {
  search: WebSearchClient;
  lookup?: PriceLookupClient;
  lookupTimeoutMs: number;
  lookupMaxConcurrency: number;
  log: Logger;
};

type Candidate = { hit: WebHit; domain: string; productPage: boolean };

/**
 * Keeps allowlisted hits. Per domain, product pages win; a domain with no
 * recognised product page keeps all of its pages as a fallback pool.
 */
export function selectCandidates(hits: WebHit[], allowedDomains: readonly string[]): Candidate[] {
  const candidates: Candidate[] = [];
  for (const hit of hits) {
    const domain = matchedAllowedDomain(hit.url, allowedDomains);
    if (!domain) continue;
    candidates.push({ hit, domain, productPage: isProductPage(hit.url, allowedDomains) });
  }
  const domainsWithProducts = new Set(candidates.filter((c) => c.productPage).map((c) => c.domain));
  return candidates.filter((c) => c.productPage || !domainsWithProducts.has(c.domain));
}

/**
 * Web retrieval: allowlist and product-page filtering, then price resolution
 * (typed field, title, snippet, authoritative lookup by item code).
 */
export class WebSearchAdapter {
  private readonly pool: Bottleneck;

  constructor(private readonly opts: WebSearchAdapterOptions) {
    this.pool = createPool(opts.lookupMaxConcurrency);
  }

  get hasPriceLookup(): boolean {
    return this.opts.lookup !== undefined;
  }

  /**
   * With `budgetMs`, the search call is bounded by the budget and price
   * lookups share whatever is left of it; lookups still pending when the
   * budget runs out leave their prices absent instead of failing the source.
   */
  async query(
    text: string,
    allowedDomains: readonly string[],
    topK: number,
    signal?: AbortSignal,
    budgetMs?: number,
  ): Promise<RawResult[]> {
    const start = Date.now();
    const hits =
      budgetMs === undefined
        ? await this.opts.search.search(text, allowedDomains, topK, signal)
        : await withTimeout(budgetMs, (s) => this.opts.search.search(text, allowedDomains, topK, s), signal);
    const candidates = selectCandidates(hits, allowedDomains);
    if (candidates.length < hits.length) {
      this.opts.log.debug({ received: hits.length, kept: candidates.length }, 'web hits filtered');
    }
    const phase = lookupPhaseSignal(signal, budgetMs === undefined ? undefined : budgetMs - (Date.now() - start));
    const results = await Promise.all(candidates.map((c) => this.resolve(c.hit, phase, signal)));
    if (signal?.aborted) throw new DOMException('Aborted', 'AbortError');
    return results.filter((r): r is RawResult => r !== undefined);
  }

  private async resolve(
    hit: WebHit,
    phase: AbortSignal | undefined,
    signal?: AbortSignal,
  ): Promise<RawResult | undefined> {
    const identityKey = normalizeUrl(hit.url);
    if (!identityKey) return undefined;
    let title = hit.title?.trim() ?? '';
    const snippet = hit.snippet?.trim() || undefined;

    let price = sanitizePrice(hit.price) ?? extractPrice(title) ?? extractPrice(snippet);
    if (price === undefined) {
      const itemCode = extractItemCode(hit.url);
      if (itemCode && this.opts.lookup) {
        const quote = await this.lookup(itemCode, phase, signal);
        if (quote?.title) title = quote.title;
        price = sanitizePrice(quote?.price);
      }
    }

    return {
      identityKey,
      title: title || identityKey,
      url: hit.url,
      source: 'web',
      ...(snippet ? { snippet } : {}),
      ...(price !== undefined ? { price } : {}),
      ...(hit.score !== undefined && Number.isFinite(hit.score) ? { score: hit.score } : {}),
    };
  }

  private async lookup(itemCode: string, phase: AbortSignal | undefined, signal?: AbortSignal) {
    const client = this.opts.lookup;
    if (!client) return undefined;
    try {
      return await this.pool.schedule(async () => {
        if (phase?.aborted) return undefined;
        return withTimeout(this.opts.lookupTimeoutMs, (inner) => client.lookup(itemCode, inner), phase);
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      if (phase?.aborted) {
        this.opts.log.debug({ itemCode }, 'price lookup cut off by source budget; price left absent');
        return undefined;
      }
      const std = toStdError(err, 'price_lookup');
      this.opts.log.warn({ itemCode, code: std.code }, 'price lookup failed; price left absent');
      return undefined;
    }
  }
}

function lookupPhaseSignal(signal: AbortSignal | undefined, remainingMs: number | undefined): AbortSignal | undefined {
  if (remainingMs === undefined) return signal;
  const deadline = AbortSignal.timeout(Math.max(0, remainingMs));
  return signal ? AbortSignal.any([signal, deadline]) : deadline;
}
