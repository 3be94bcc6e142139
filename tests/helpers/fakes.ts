import type {
  CatalogHit,
  CatalogSearchClient,
  PriceLookupClient,
  PriceQuote,
  WebHit,
  WebSearchClient,
} from '../../src/schemas/adapters.js';
import type { RetrievalConfig } from '../../src/config/app.js';
import type { TextGenerator } from '../../src/core/llm.js';
import { CatalogSearchAdapter } from '../../src/tools/catalog_search.js';
import { WebSearchAdapter } from '../../src/tools/web_search.js';
import { silentLogger } from '../../src/util/logging.js';

export const log = silentLogger();

export const testConfig: RetrievalConfig = {
  allowedDomains: ['amazon.com', 'walmart.com', 'target.com'],
  catalogTimeoutMs: 500,
  webTimeoutMs: 500,
  lookupTimeoutMs: 200,
  lookupMaxConcurrency: 2,
  sourceTopK: 5,
  resultTopN: 10,
  pricePrecedence: 'catalog',
};

function abortable<T>(ms: number, value: T, signal?: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(value), ms);
    signal?.addEventListener('abort', () => {
      clearTimeout(timer);
      reject(new DOMException('Aborted', 'AbortError'));
    });
  });
}

export type FakeBehaviour<T> = { hits?: T[]; fail?: Error; delayMs?: number };

export class FakeCatalogClient implements CatalogSearchClient {
  calls: Array<{ queryText: string; topK: number }> = [];
  constructor(private readonly behaviour: FakeBehaviour<CatalogHit> = {}) {}

  async search(queryText: string, topK: number, signal?: AbortSignal): Promise<CatalogHit[]> {
    this.calls.push({ queryText, topK });
    if (this.behaviour.delayMs) await abortable(this.behaviour.delayMs, undefined, signal);
    if (this.behaviour.fail) throw this.behaviour.fail;
    return this.behaviour.hits ?? [];
  }
}

export class FakeWebClient implements WebSearchClient {
  calls: Array<{ queryText: string; allowedDomains: readonly string[]; topK: number }> = [];
  constructor(private readonly behaviour: FakeBehaviour<WebHit> = {}) {}

  async search(
    queryText: string,
    allowedDomains: readonly string[],
    topK: number,
    signal?: AbortSignal,
  ): Promise<WebHit[]> {
    this.calls.push({ queryText, allowedDomains, topK });
    if (this.behaviour.delayMs) await abortable(this.behaviour.delayMs, undefined, signal);
    if (this.behaviour.fail) throw this.behaviour.fail;
    return this.behaviour.hits ?? [];
  }
}

export class FakePriceLookup implements PriceLookupClient {
  calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  constructor(
    private readonly quotes: Record<string, PriceQuote> = {},
    private readonly opts: { delayMs?: number; fail?: Set<string> } = {},
  ) {}

  async lookup(itemCode: string, signal?: AbortSignal): Promise<PriceQuote | undefined> {
    this.calls.push(itemCode);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await abortable(this.opts.delayMs ?? 5, undefined, signal);
      if (this.opts.fail?.has(itemCode)) throw new Error('lookup_failed');
      return this.quotes[itemCode];
    } finally {
      this.inFlight -= 1;
    }
  }
}

export class FakeLlm implements TextGenerator {
  prompts: string[] = [];
  constructor(private readonly reply: string | Error) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export function catalogAdapter(behaviour: FakeBehaviour<CatalogHit> = {}) {
  const client = new FakeCatalogClient(behaviour);
  return { client, adapter: new CatalogSearchAdapter(client, log) };
}

export function webAdapter(
  behaviour: FakeBehaviour<WebHit> = {},
  lookup?: FakePriceLookup,
  overrides: { lookupTimeoutMs?: number; lookupMaxConcurrency?: number } = {},
) {
  const client = new FakeWebClient(behaviour);
  const adapter = new WebSearchAdapter({
    search: client,
    lookup,
    lookupTimeoutMs: overrides.lookupTimeoutMs ?? testConfig.lookupTimeoutMs,
    lookupMaxConcurrency: overrides.lookupMaxConcurrency ?? testConfig.lookupMaxConcurrency,
    log,
  });
  return { client, adapter };
}
