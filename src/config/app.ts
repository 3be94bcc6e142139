import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_ALLOWED_DOMAINS } from '../core/normalizer.js';

const DomainEntry = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[a-z0-9-]+(\.[a-z0-9-]+)+$/, 'allowlist entries must be bare host names such as "amazon.com"');

const LlmConfigSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().min(1),
  model: z.string().min(1).default('gpt-4o-mini'),
  timeoutMs: z.coerce.number().int().min(500).max(60000).default(4000),
});

const AppConfigSchema = z.object({
  allowedDomains: z.array(DomainEntry).min(1),
  catalogSearchUrl: z.string().url().optional(),
  tavilyApiKey: z.string().min(1).optional(),
  rainforestApiKey: z.string().min(1).optional(),
  catalogTimeoutMs: z.coerce.number().int().min(100).max(60000).default(8000),
  webTimeoutMs: z.coerce.number().int().min(100).max(60000).default(8000),
  lookupTimeoutMs: z.coerce.number().int().min(100).max(60000).default(5000),
  lookupMaxConcurrency: z.coerce.number().int().min(1).max(16).default(3),
  sourceTopK: z.coerce.number().int().min(1).max(50).default(5),
  resultTopN: z.coerce.number().int().min(1).max(100).default(10),
  pricePrecedence: z.enum(['catalog', 'web']).default('catalog'),
  httpRetries: z.coerce.number().int().min(0).max(5).default(1),
  llm: LlmConfigSchema.optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;

/** Settings the retriever and adapters need. */
export type RetrievalConfig = Pick<
  AppConfig,
  | 'allowedDomains'
  | 'catalogTimeoutMs'
  | 'webTimeoutMs'
  | 'lookupTimeoutMs'
  | 'lookupMaxConcurrency'
  | 'sourceTopK'
  | 'resultTopN'
  | 'pricePrecedence'
>;

function blankToUndefined(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

/**
 * Reads and validates configuration once at startup. Throws
 * ConfigurationError; nothing downstream re-reads the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const domains = blankToUndefined(env.ALLOWED_DOMAINS);
  const llmBase = blankToUndefined(env.LLM_PROVIDER_BASEURL);
  const llmKey = blankToUndefined(env.LLM_API_KEY);

  const parsed = AppConfigSchema.safeParse({
    allowedDomains: domains ? domains.split(',').filter((d) => d.trim()) : [...DEFAULT_ALLOWED_DOMAINS],
    catalogSearchUrl: blankToUndefined(env.CATALOG_SEARCH_URL),
    tavilyApiKey: blankToUndefined(env.TAVILY_API_KEY),
    rainforestApiKey: blankToUndefined(env.RAINFOREST_API_KEY),
    catalogTimeoutMs: blankToUndefined(env.CATALOG_TIMEOUT_MS),
    webTimeoutMs: blankToUndefined(env.WEB_TIMEOUT_MS),
    lookupTimeoutMs: blankToUndefined(env.LOOKUP_TIMEOUT_MS),
    lookupMaxConcurrency: blankToUndefined(env.LOOKUP_MAX_CONCURRENCY),
    sourceTopK: blankToUndefined(env.SOURCE_TOP_K),
    resultTopN: blankToUndefined(env.RESULT_TOP_N),
    pricePrecedence: blankToUndefined(env.PRICE_PRECEDENCE),
    httpRetries: blankToUndefined(env.HTTP_RETRIES),
    llm:
      llmBase || llmKey
        ? {
            baseUrl: llmBase,
            apiKey: llmKey,
            model: blankToUndefined(env.LLM_MODEL),
            timeoutMs: blankToUndefined(env.LLM_TIMEOUT_MS),
          }
        : undefined,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const config = parsed.data;
  if (!config.catalogSearchUrl && !config.tavilyApiKey) {
    throw new ConfigurationError('No retrieval source configured', [
      'set CATALOG_SEARCH_URL and/or TAVILY_API_KEY',
    ]);
  }
  return config;
}
