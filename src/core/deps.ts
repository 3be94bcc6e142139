import type { AppConfig } from '../config/app.js';
import { CatalogSearchAdapter } from '../tools/catalog_search.js';
import { HttpCatalogClient } from '../tools/catalog_client.js';
import { RainforestPriceClient } from '../tools/rainforest.js';
import { TavilySearchClient } from '../tools/tavily_search.js';
import { WebSearchAdapter } from '../tools/web_search.js';
import type { Logger } from '../util/logging.js';
import type { PipelineDeps } from './graph.js';
import { LlmClient } from './llm.js';
import { LlmIntentClassifier } from './router.js';

/**
 * Wires collaborator clients from validated configuration. Sources without
 * credentials are left out and show up as `skipped`.
 */
export function createPipelineDeps(config: AppConfig, log: Logger): PipelineDeps {
  const catalog = config.catalogSearchUrl
    ? new CatalogSearchAdapter(
        new HttpCatalogClient({
          baseUrl: config.catalogSearchUrl,
          timeoutMs: config.catalogTimeoutMs,
          retries: config.httpRetries,
        }),
        log.child({ component: 'catalog' }),
      )
    : undefined;

  const web = config.tavilyApiKey
    ? new WebSearchAdapter({
        search: new TavilySearchClient({ apiKey: config.tavilyApiKey, timeoutMs: config.webTimeoutMs }),
        lookup: config.rainforestApiKey
          ? new RainforestPriceClient({ apiKey: config.rainforestApiKey, timeoutMs: config.lookupTimeoutMs })
          : undefined,
        lookupTimeoutMs: config.lookupTimeoutMs,
        lookupMaxConcurrency: config.lookupMaxConcurrency,
        log: log.child({ component: 'web' }),
      })
    : undefined;

  const llm = config.llm ? new LlmClient(config.llm, log.child({ component: 'llm' })) : undefined;

  return {
    config,
    catalog,
    web,
    llm,
    classifier: llm ? new LlmIntentClassifier(llm) : undefined,
    log,
  };
}
