import * as answerer from '../../src/core/answerer.js';
import * as planner from '../../src/core/planner.js';
import * as retriever from '../../src/core/retriever.js';
import { citationsMatchResults } from '../../src/core/citations.js';
import { CANCELLED_MESSAGE, PIPELINE_ERROR_MESSAGE, runShoppingSearch, type PipelineDeps } from '../../src/core/graph.js';
import { SCOPE_DECLINATION } from '../../src/core/router.js';
import type { CatalogHit, WebHit } from '../../src/schemas/adapters.js';
import { catalogAdapter, FakeLlm, log, testConfig, webAdapter, type FakeBehaviour } from '../helpers/fakes.js';

const catalogHits: CatalogHit[] = [
  {
    productId: 'P-1',
    title: 'EcoShine Stainless Steel Cleaner',
    url: 'https://www.amazon.com/dp/B0CLEAN001',
    price: 12.99,
    score: 0.82,
  },
];

const webHits: WebHit[] = [
  {
    title: 'EcoShine Stainless Steel Cleaner 16 oz',
    url: 'https://www.amazon.com/dp/B0CLEAN001/',
    snippet: '$14.25 with coupon',
    score: 0.79,
  },
  {
    title: 'Green Steel Polish Spray',
    url: 'https://www.walmart.com/ip/Green-Steel-Polish/777',
    snippet: 'Now $13.50',
    score: 0.88,
  },
  { title: 'Premium Steel Cleaner Kit', url: 'https://www.target.com/p/kit/-/A-999', snippet: '$29.99', score: 0.9 },
  { title: 'Cheap Cleaner', url: 'https://cleaner-deals.example/p/1', snippet: '$3', score: 0.99 },
];

function pipeline(catalog: FakeBehaviour<CatalogHit>, web: FakeBehaviour<WebHit>, extra: Partial<PipelineDeps> = {}) {
  const c = catalogAdapter(catalog);
  const w = webAdapter(web);
  const deps: PipelineDeps = { config: testConfig, catalog: c.adapter, web: w.adapter, log, ...extra };
  return { deps, catalogClient: c.client, webClient: w.client };
}

describe('shopping search pipeline', () => {
  afterEach(() => jest.restoreAllMocks());

  test('fuses catalog and web results for a budgeted query', async () => {
    const { deps, catalogClient, webClient } = pipeline({ hits: catalogHits }, { hits: webHits });
    const out = await runShoppingSearch('eco stainless steel cleaner under $15', deps);

    expect(catalogClient.calls).toEqual([{ queryText: 'eco stainless steel cleaner', topK: 5 }]);
    expect(webClient.calls[0]?.queryText).toBe('eco stainless steel cleaner');
    expect(out.response).toEqual({
      query: 'eco stainless steel cleaner under $15',
      error: null,
      results: [
        {
          title: 'Green Steel Polish Spray',
          url: 'https://www.walmart.com/ip/Green-Steel-Polish/777',
          snippet: 'Now $13.50',
          price: 13.5,
          score: 0.88,
          source: 'web',
          rank: 0,
        },
        {
          title: 'EcoShine Stainless Steel Cleaner',
          url: 'https://www.amazon.com/dp/B0CLEAN001',
          snippet: '$14.25 with coupon',
          price: 12.99,
          score: 0.82,
          source: 'catalog',
          rank: 1,
        },
      ],
    });
    expect(out.finalAnswer.summary).toBe(
      'My top pick is Green Steel Polish Spray [1] for $13.50. I found 2 options within your $15.00 budget.',
    );
    expect(out.citations.map((c) => c.index)).toEqual([1, 2]);
    expect(out.intent).toEqual({ type: 'product_query', safetyFlags: [] });
    expect(out.log[0]).toBe('router: intent=product_query');
  });

  test('citations and reconciled results agree both ways', async () => {
    const { deps } = pipeline({ hits: catalogHits }, { hits: webHits });
    const out = await runShoppingSearch('eco stainless steel cleaner under $15', deps);
    const reconciled = out.response.results.map((r) => ({
      identityKey: r.url ?? r.title,
      title: r.title,
      source: r.source,
      rank: r.rank,
      ...(r.url !== null ? { url: r.url } : {}),
    }));
    expect(citationsMatchResults(out.citations, reconciled)).toBe(true);
  });

  test('out-of-scope queries stop after the router', async () => {
    const planSpy = jest.spyOn(planner, 'planQuery');
    const retrieveSpy = jest.spyOn(retriever, 'retrieveResults');
    const answerSpy = jest.spyOn(answerer, 'answerQuery');
    const { deps, catalogClient, webClient } = pipeline({ hits: catalogHits }, { hits: webHits });

    const out = await runShoppingSearch("what's the weather in Paris tomorrow", deps);

    expect(planSpy).not.toHaveBeenCalled();
    expect(retrieveSpy).not.toHaveBeenCalled();
    expect(answerSpy).not.toHaveBeenCalled();
    expect(catalogClient.calls).toEqual([]);
    expect(webClient.calls).toEqual([]);
    expect(out.finalAnswer).toEqual({ summary: SCOPE_DECLINATION });
    expect(out.response).toEqual({ query: "what's the weather in Paris tomorrow", results: [], error: null });
    expect(out.citations).toEqual([]);
  });

  test('greetings get a clarification without searching', async () => {
    const { deps, catalogClient } = pipeline({ hits: catalogHits }, { hits: webHits });
    const out = await runShoppingSearch('hello', deps);
    expect(out.finalAnswer).toEqual({ summary: answerer.CLARIFICATION_PROMPT });
    expect(catalogClient.calls).toEqual([]);
    expect(out.response.error).toBeNull();
  });

  test('web failure degrades to catalog results without an error', async () => {
    const { deps } = pipeline(
      {
        hits: [...catalogHits, { productId: 'P-2', title: 'Steel Wool Pads', price: 4.5, score: 0.6 }],
      },
      { fail: new Error('down') },
    );
    const out = await runShoppingSearch('eco stainless steel cleaner under $15', deps);
    expect(out.response.error).toBeNull();
    expect(out.response.results.map((r) => [r.title, r.source, r.rank])).toEqual([
      ['EcoShine Stainless Steel Cleaner', 'catalog', 0],
      ['Steel Wool Pads', 'catalog', 1],
    ]);
    expect(out.log).toContain('retriever: web unavailable (unknown_error)');
  });

  test('total source failure reports search_unavailable', async () => {
    const { deps } = pipeline({ fail: new Error('down') }, { fail: new Error('down') });
    const out = await runShoppingSearch('eco stainless steel cleaner', deps);
    expect(out.response).toEqual({ query: 'eco stainless steel cleaner', results: [], error: 'search_unavailable' });
    expect(out.finalAnswer).toEqual({ summary: answerer.SEARCH_UNAVAILABLE_MESSAGE });
  });

  test('no matches is not an error', async () => {
    const { deps } = pipeline({ hits: [] }, { hits: [] });
    const out = await runShoppingSearch('eco stainless steel cleaner', deps);
    expect(out.response).toEqual({ query: 'eco stainless steel cleaner', results: [], error: null });
    expect(out.finalAnswer.summary.startsWith('I found no matching results')).toBe(true);
  });

  test('a stage failure becomes an apology with the error set', async () => {
    jest.spyOn(answerer, 'answerQuery').mockRejectedValue(new Error('boom'));
    const { deps } = pipeline({ hits: catalogHits }, { hits: webHits });
    const out = await runShoppingSearch('eco stainless steel cleaner', deps);
    expect(out.finalAnswer).toEqual({ summary: PIPELINE_ERROR_MESSAGE });
    expect(out.response).toEqual({ query: 'eco stainless steel cleaner', results: [], error: 'pipeline_error' });
    expect(out.log[0]).toContain('answerer failed: boom');
  });

  test('uses the LLM explanation when it cites valid results', async () => {
    const llm = new FakeLlm('Green Steel Polish Spray [1] is cheapest per ounce; EcoShine [2] is the eco pick.');
    const { deps } = pipeline({ hits: catalogHits }, { hits: webHits }, { llm });
    const out = await runShoppingSearch('eco stainless steel cleaner under $15', deps);
    expect(out.finalAnswer.explanation).toBe(
      'Green Steel Polish Spray [1] is cheapest per ounce; EcoShine [2] is the eco pick.',
    );
  });

  test('a request cancelled before it starts never searches', async () => {
    const { deps, catalogClient } = pipeline({ hits: catalogHits }, { hits: webHits });
    const ac = new AbortController();
    ac.abort();
    const out = await runShoppingSearch('eco stainless steel cleaner', deps, { signal: ac.signal });
    expect(out.response).toEqual({ query: 'eco stainless steel cleaner', results: [], error: 'request_cancelled' });
    expect(out.finalAnswer).toEqual({ summary: CANCELLED_MESSAGE });
    expect(catalogClient.calls).toEqual([]);
  });

  test('cancelling mid-flight discards partial results', async () => {
    const { deps } = pipeline({ hits: catalogHits }, { hits: webHits, delayMs: 300 });
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 20);
    const out = await runShoppingSearch('eco stainless steel cleaner', deps, { signal: ac.signal });
    expect(out.response).toEqual({ query: 'eco stainless steel cleaner', results: [], error: 'request_cancelled' });
  });
});
