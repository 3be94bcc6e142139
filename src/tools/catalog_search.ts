import type { CatalogSearchClient } from '../schemas/adapters.js';
import type { RawResult } from '../schemas/product.js';
import { normalizeUrl, sanitizePrice } from '../core/normalizer.js';
import type { Logger } from '../util/logging.js';

function firstLine(text: string | undefined): string | undefined {
  const line = text?.split('\n').find((l) => l.trim())?.trim();
  return line ? line.slice(0, 200) : undefined;
}

/**
 * Adapts catalog hits into RawResults. Identity is the catalog product id;
 * prices come from stored metadata only.
 */
export class CatalogSearchAdapter {
  constructor(
    private readonly client: CatalogSearchClient,
    private readonly log: Logger,
  ) {}

  async query(text: string, topK: number, signal?: AbortSignal): Promise<RawResult[]> {
    const hits = await this.client.search(text, topK, signal);
    const out: RawResult[] = [];
    for (const hit of hits) {
      const title = hit.title?.trim() || firstLine(hit.document);
      if (!hit.productId && !title) continue;

      const url = normalizeUrl(hit.url) ? hit.url : undefined;
      const identityKey = hit.productId ?? normalizeUrl(url) ?? `catalog:${(title ?? '').toLowerCase()}`;
      const price = sanitizePrice(hit.price);
      if (price === undefined && hit.price !== undefined && hit.price !== null && hit.price !== '') {
        this.log.debug({ identityKey, price: hit.price }, 'catalog price ignored');
      }

      out.push({
        identityKey,
        title: title ?? identityKey,
        source: 'catalog',
        ...(url ? { url } : {}),
        ...(hit.document?.trim() ? { snippet: hit.document.trim() } : {}),
        ...(price !== undefined ? { price } : {}),
        ...(hit.score !== undefined && Number.isFinite(hit.score) ? { score: hit.score } : {}),
      });
    }
    return out;
  }
}
