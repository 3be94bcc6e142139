import { z } from 'zod';
import categoryLexiconJson from '../data/category_lexicon.json';
import stopwordsJson from '../data/stopwords.json';
import { DEFAULT_ALLOWED_DOMAINS, sanitizePrice } from './normalizer.js';
import type { Constraints, SearchStrategy } from '../schemas/product.js';
import type { ConversationState, ConversationUpdate } from './state.js';

const CATEGORY_LEXICON = z.record(z.array(z.string())).parse(categoryLexiconJson);
const STOPWORDS = new Set(z.array(z.string()).parse(stopwordsJson));

const AMOUNT = String.raw`(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?`;

const CURRENCY_SUFFIX = String.raw`(?:\s*(?:dollars?|usd|bucks)\b)?`;
const CURRENCY_RE = /\$|\b(?:usd|dollars?|bucks)\b/i;

// A bare number after "under"/"up to" is usually a size, age or headcount,
// so those phrases only count with a currency marker; "budget" implies one.
const BUDGET_PATTERNS: Array<{ re: RegExp; needsCurrency: boolean }> = [
  {
    re: new RegExp(String.raw`\bbudget(?:\s+(?:of|is))?\s*(?:\$|usd\s*)?\s*${AMOUNT}${CURRENCY_SUFFIX}`, 'gi'),
    needsCurrency: false,
  },
  {
    re: new RegExp(
      String.raw`\b(?:under|below|less than|cheaper than|up to|at most|max(?:imum)?|no more than|not more than)\s*(?:\$|usd\s*)?\s*${AMOUNT}${CURRENCY_SUFFIX}`,
      'gi',
    ),
    needsCurrency: true,
  },
  { re: new RegExp(String.raw`<\s*\$?\s*${AMOUNT}${CURRENCY_SUFFIX}`, 'g'), needsCurrency: true },
  { re: new RegExp(String.raw`\$\s*${AMOUNT}\s*(?:or less|or under|max|tops)\b`, 'gi'), needsCurrency: true },
];

const ONLINE_RE = /\b(?:online|on the web|web results)\b/i;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function retailerNames(allowedDomains: readonly string[]): string[] {
  return allowedDomains.map((d) => d.split('.')[0] ?? '').filter(Boolean);
}

/**
 * Finds a budget ceiling phrase. Returns the value and the matched text so it
 * can be removed before keyword extraction.
 */
export function parseBudget(query: string): { maxPrice: number; phrase: string } | undefined {
  for (const { re, needsCurrency } of BUDGET_PATTERNS) {
    for (const m of query.matchAll(re)) {
      if (!m[1]) continue;
      if (needsCurrency && !CURRENCY_RE.test(m[0])) continue;
      const whole = m[1].replace(/,/g, '');
      const maxPrice = sanitizePrice(m[2] ? `${whole}.${m[2]}` : whole);
      if (maxPrice !== undefined) return { maxPrice, phrase: m[0] };
    }
  }
  return undefined;
}

export function detectCategory(query: string): string | undefined {
  const text = query.toLowerCase();
  for (const [category, terms] of Object.entries(CATEGORY_LEXICON)) {
    if (terms.some((t) => new RegExp(`\\b${escapeRegExp(t.toLowerCase())}\\b`).test(text))) {
      return category;
    }
  }
  return undefined;
}

export function extractKeywords(
  query: string,
  allowedDomains: readonly string[] = DEFAULT_ALLOWED_DOMAINS,
): string[] {
  const retailers = new Set(retailerNames(allowedDomains));
  const tokens = query
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, ' ')
    .split(/\s+/)
    .map((t) => t.replace(/^-+|-+$/g, ''))
    .filter((t) => t.length > 1 && !/^\d+$/.test(t) && !STOPWORDS.has(t) && !retailers.has(t));
  return [...new Set(tokens)];
}

export function chooseStrategy(
  query: string,
  keywords: string[],
  allowedDomains: readonly string[] = DEFAULT_ALLOWED_DOMAINS,
): SearchStrategy {
  if (keywords.length === 0) return 'catalog_only';
  const names = retailerNames(allowedDomains).map(escapeRegExp);
  const retailerRe = names.length ? new RegExp(`\\b(?:on|from|at)\\s+(?:${names.join('|')})\\b`, 'i') : undefined;
  if (ONLINE_RE.test(query) || retailerRe?.test(query)) return 'web_only';
  return 'hybrid';
}

export type PlannerOptions = {
  allowedDomains?: readonly string[];
};

/**
 * Derives constraints and a search strategy from the query. Deterministic;
 * never touches the network.
 */
export function planQuery(state: ConversationState, options: PlannerOptions = {}): ConversationUpdate {
  const allowedDomains = options.allowedDomains ?? DEFAULT_ALLOWED_DOMAINS;
  const query = state.query.trim();

  const budget = parseBudget(query);
  const remainder = budget ? query.replace(budget.phrase, ' ') : query;
  const keywords = extractKeywords(remainder, allowedDomains);
  const category = detectCategory(query);
  const strategy = chooseStrategy(query, keywords, allowedDomains);

  const constraints: Constraints = {
    keywords,
    ...(budget ? { maxPrice: budget.maxPrice } : {}),
    ...(category ? { category } : {}),
  };

  return {
    constraints,
    strategy,
    log: [
      `planner: strategy=${strategy} maxPrice=${budget?.maxPrice ?? 'none'} category=${category ?? 'none'} keywords=${keywords.join(',') || 'none'}`,
    ],
  };
}
