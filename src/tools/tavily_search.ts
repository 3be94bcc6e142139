import { TavilyClient } from 'tavily';
import { TavilyResponse, type WebHit, type WebSearchClient } from '../schemas/adapters.js';
import { withResilience, withTimeout } from '../util/resilience.js';

export type TavilyClientOptions = {
  apiKey: string;
  timeoutMs: number;
};

/**
 * Web search via Tavily, restricted to the retailer allowlist with
 * `include_domains`. Tavily's `content` field becomes the snippet.
 */
export class TavilySearchClient implements WebSearchClient {
  private readonly client: TavilyClient;

  constructor(private readonly opts: TavilyClientOptions) {
    this.client = new TavilyClient({ apiKey: opts.apiKey });
  }

  async search(
    queryText: string,
    allowedDomains: readonly string[],
    topK: number,
    signal?: AbortSignal,
  ): Promise<WebHit[]> {
    if (!queryText.trim()) return [];
    const params = {
      query: queryText,
      search_depth: 'basic' as const,
      include_answer: false,
      include_images: false,
      include_domains: [...allowedDomains],
      max_results: topK,
    };
    const raw: unknown = await withResilience(
      'tavily',
      (inner) => withTimeout(this.opts.timeoutMs, () => this.client.search(params), inner),
      signal,
    );
    const parsed = TavilyResponse.safeParse(raw);
    if (!parsed.success) throw new Error('tavily_invalid_response');
    return parsed.data.results.map((r) => ({
      title: r.title ?? undefined,
      url: r.url,
      snippet: r.content ?? undefined,
      price: r.price ?? undefined,
      score: r.score ?? undefined,
    }));
  }
}
