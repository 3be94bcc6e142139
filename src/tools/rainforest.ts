import { RainforestResponse, type PriceLookupClient, type PriceQuote } from '../schemas/adapters.js';
import { sanitizePrice } from '../core/normalizer.js';
import { fetchJSON } from '../util/fetch.js';
import { withResilience } from '../util/resilience.js';

const RAINFOREST_URL = 'https://api.rainforestapi.com/request';

export type RainforestClientOptions = {
  apiKey: string;
  timeoutMs: number;
  amazonDomain?: string;
};

/**
 * Authoritative Amazon price by ASIN. Returns undefined when the product or
 * its price is missing.
 */
export class RainforestPriceClient implements PriceLookupClient {
  constructor(private readonly opts: RainforestClientOptions) {}

  async lookup(itemCode: string, signal?: AbortSignal): Promise<PriceQuote | undefined> {
    const params = new URLSearchParams({
      api_key: this.opts.apiKey,
      type: 'product',
      amazon_domain: this.opts.amazonDomain ?? 'amazon.com',
      asin: itemCode,
    });
    const raw = await withResilience(
      'rainforest',
      (inner) =>
        fetchJSON(`${RAINFOREST_URL}?${params.toString()}`, {
          timeoutMs: this.opts.timeoutMs,
          retries: 0,
          target: 'rainforest',
          signal: inner,
        }),
      signal,
    );
    const parsed = RainforestResponse.safeParse(raw);
    const product = parsed.success ? parsed.data.product : undefined;
    if (!product) return undefined;
    const price = sanitizePrice(product.price?.value) ?? sanitizePrice(product.buybox_winner?.price?.value);
    const title = product.title?.trim() || undefined;
    if (price === undefined && !title) return undefined;
    return { title, price };
  }
}
