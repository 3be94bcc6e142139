import request from 'supertest';
import { createApp } from '../../src/api/app.js';
import type { PipelineDeps } from '../../src/core/graph.js';
import { catalogAdapter, log, testConfig, webAdapter } from '../helpers/fakes.js';

function makeApp() {
  const deps: PipelineDeps = {
    config: testConfig,
    catalog: catalogAdapter({
      hits: [
        {
          productId: 'P-1',
          title: 'EcoShine Stainless Steel Cleaner',
          url: 'https://www.amazon.com/dp/B0CLEAN001',
          price: 12.99,
          score: 0.82,
        },
      ],
    }).adapter,
    web: webAdapter({
      hits: [{ title: 'Green Steel Polish Spray', url: 'https://www.walmart.com/ip/Green-Steel-Polish/777', snippet: 'Now $13.50', score: 0.88 }],
    }).adapter,
    log,
  };
  return createApp(deps);
}

describe('HTTP API', () => {
  const app = makeApp();

  test('GET /healthz reports configured sources', async () => {
    const res = await request(app).get('/healthz').expect(200);
    expect(res.body).toEqual({
      ok: true,
      sources: { catalog: 'configured', web: 'configured', priceLookup: 'disabled' },
    });
  });

  test('POST /search returns the stable response shape', async () => {
    const res = await request(app).post('/search').send({ query: 'eco stainless steel cleaner under $15' }).expect(200);
    expect(res.body).toEqual({
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
          snippet: null,
          price: 12.99,
          score: 0.82,
          source: 'catalog',
          rank: 1,
        },
      ],
    });
  });

  test('POST /search validates the body', async () => {
    const res = await request(app).post('/search').send({ query: 5 }).expect(400);
    expect(res.body.error.fieldErrors.query).toBeDefined();
    await request(app).post('/search').send({}).expect(400);
  });

  test('POST /chat returns a cited reply', async () => {
    const res = await request(app).post('/chat').send({ message: 'eco stainless steel cleaner under $15' }).expect(200);
    expect(res.body.summary).toBe(
      'My top pick is Green Steel Polish Spray [1] for $13.50. I found 2 options within your $15.00 budget.',
    );
    expect(res.body.reply).toBe(`${res.body.summary}\n\n${res.body.explanation}`);
    expect(res.body.citations).toEqual([
      { index: 1, title: 'Green Steel Polish Spray', url: 'https://www.walmart.com/ip/Green-Steel-Polish/777', price: 13.5 },
      { index: 2, title: 'EcoShine Stainless Steel Cleaner', url: 'https://www.amazon.com/dp/B0CLEAN001', price: 12.99 },
    ]);
    expect(res.body.intent).toEqual({ type: 'product_query', safetyFlags: [] });
    expect(res.body.error).toBeNull();
  });

  test('POST /chat declines out-of-scope requests', async () => {
    const res = await request(app).post('/chat').send({ message: 'tell me a joke' }).expect(200);
    expect(res.body.intent.type).toBe('out_of_scope');
    expect(res.body.results).toEqual([]);
    expect(res.body.explanation).toBeNull();
  });

  test('POST /chat rejects an empty message', async () => {
    await request(app).post('/chat').send({ message: '' }).expect(400);
  });

  test('malformed JSON is a 400', async () => {
    const res = await request(app)
      .post('/search')
      .set('Content-Type', 'application/json')
      .send('{"query":')
      .expect(400);
    expect(res.body).toEqual({ error: 'invalid_json' });
  });
});
