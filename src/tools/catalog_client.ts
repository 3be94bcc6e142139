import {
  CatalogBatchedResponse,
  CatalogFlatResponse,
  type CatalogHit,
  type CatalogSearchClient,
} from '../schemas/adapters.js';
import { allowHost, fetchJSON } from '../util/fetch.js';
import { withResilience } from '../util/resilience.js';

function idOf(value: string | number | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const s = String(value).trim();
  return s || undefined;
}

function fromDistance(distance: number | null | undefined): number | undefined {
  if (distance === null || distance === undefined || !Number.isFinite(distance)) return undefined;
  return Math.max(0, 1 - distance);
}

/**
 * Converts either response form of the catalog service into hits. Unknown
 * shapes yield no hits.
 */
export function parseCatalogResponse(body: unknown): CatalogHit[] {
  const flat = CatalogFlatResponse.safeParse(body);
  if (flat.success) {
    return flat.data.results.map((r) => ({
      productId: idOf(r.product_id) ?? idOf(r.id),
      title: r.title ?? undefined,
      url: r.url ?? undefined,
      price: r.price ?? undefined,
      score: r.score ?? fromDistance(r.distance),
      document: r.document ?? undefined,
    }));
  }

  const batched = CatalogBatchedResponse.safeParse(body);
  if (!batched.success) return [];
  const ids = batched.data.ids[0] ?? [];
  const docs = batched.data.documents?.[0] ?? [];
  const metas = batched.data.metadatas?.[0] ?? [];
  const distances = batched.data.distances?.[0] ?? [];
  return ids.map((id, i) => {
    const meta = metas[i];
    return {
      productId: idOf(meta?.product_id) ?? idOf(id),
      title: meta?.title ?? undefined,
      url: meta?.url ?? undefined,
      price: meta?.price ?? undefined,
      score: fromDistance(distances[i]),
      document: docs[i] ?? undefined,
    };
  });
}

export type HttpCatalogClientOptions = {
  baseUrl: string;
  timeoutMs: number;
  retries?: number;
};

/**
 * Client for the catalog vector-search service: `POST {baseUrl}/search`
 * with `{ query, top_k }`.
 */
export class HttpCatalogClient implements CatalogSearchClient {
  private readonly url: string;

  constructor(private readonly opts: HttpCatalogClientOptions) {
    const base = opts.baseUrl.replace(/\/$/, '');
    this.url = `${base}/search`;
    allowHost(new URL(base).hostname);
  }

  async search(queryText: string, topK: number, signal?: AbortSignal): Promise<CatalogHit[]> {
    const body = await withResilience(
      'catalog',
      (inner) =>
        fetchJSON(this.url, {
          method: 'POST',
          body: { query: queryText, top_k: topK },
          timeoutMs: this.opts.timeoutMs,
          retries: this.opts.retries ?? 1,
          target: 'catalog',
          signal: inner,
        }),
      signal,
    );
    return parseCatalogResponse(body);
  }
}
