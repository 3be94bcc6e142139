import type { RawResult, ReconciledResult } from '../schemas/product.js';
import { normalizeUrl } from './normalizer.js';

export type PricePrecedence = 'catalog' | 'web';

export type ReconcileOptions = {
  maxPrice?: number;
  topN: number;
  pricePrecedence?: PricePrecedence;
};

const SOURCE_ORDER: Record<RawResult['source'], number> = { catalog: 0, web: 1 };

function maxScore(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

/**
 * Groups records by identity. A web record whose normalized URL matches a
 * catalog record's URL joins that catalog record's group.
 */
export function mergeResults(
  catalog: RawResult[],
  web: RawResult[],
  precedence: PricePrecedence = 'catalog',
): RawResult[] {
  const groups = new Map<string, { catalog?: RawResult; web?: RawResult }>();
  const catalogByUrl = new Map<string, string>();

  for (const r of catalog) {
    const g = groups.get(r.identityKey) ?? {};
    g.catalog = g.catalog ? foldSame(g.catalog, r) : r;
    groups.set(r.identityKey, g);
    const url = normalizeUrl(r.url);
    if (url && !catalogByUrl.has(url)) catalogByUrl.set(url, r.identityKey);
  }

  for (const r of web) {
    const key = catalogByUrl.get(r.identityKey) ?? r.identityKey;
    const g = groups.get(key) ?? {};
    g.web = g.web ? foldSame(g.web, r) : r;
    groups.set(key, g);
  }

  const merged: RawResult[] = [];
  for (const [identityKey, g] of groups) {
    if (g.catalog && g.web) {
      const first = precedence === 'web' ? g.web.price ?? g.catalog.price : g.catalog.price ?? g.web.price;
      const score = maxScore(g.catalog.score, g.web.score);
      const snippet = g.catalog.snippet ?? g.web.snippet;
      const url = g.catalog.url ?? g.web.url;
      merged.push({
        identityKey,
        title: g.catalog.title,
        source: 'catalog',
        ...(url !== undefined ? { url } : {}),
        ...(snippet !== undefined ? { snippet } : {}),
        ...(first !== undefined ? { price: first } : {}),
        ...(score !== undefined ? { score } : {}),
      });
    } else {
      const only = g.catalog ?? g.web;
      if (only) merged.push({ ...only, identityKey });
    }
  }
  return merged;
}

// Two records from the same source with one identity: keep the first, fill gaps.
function foldSame(a: RawResult, b: RawResult): RawResult {
  const score = maxScore(a.score, b.score);
  const url = a.url ?? b.url;
  const snippet = a.snippet ?? b.snippet;
  const price = a.price ?? b.price;
  return {
    identityKey: a.identityKey,
    title: a.title,
    source: a.source,
    ...(url !== undefined ? { url } : {}),
    ...(snippet !== undefined ? { snippet } : {}),
    ...(price !== undefined ? { price } : {}),
    ...(score !== undefined ? { score } : {}),
  };
}

/** Drops results priced above the ceiling; unpriced results stay. */
export function applyPriceCeiling<T extends RawResult>(results: T[], maxPrice?: number): T[] {
  if (maxPrice === undefined) return results;
  return results.filter((r) => r.price === undefined || r.price <= maxPrice);
}

/**
 * Total order: score desc (absent lowest), catalog before web, price asc
 * (absent last), title, identityKey.
 */
export function compareResults(a: RawResult, b: RawResult): number {
  const sa = a.score ?? Number.NEGATIVE_INFINITY;
  const sb = b.score ?? Number.NEGATIVE_INFINITY;
  if (sa !== sb) return sb - sa;
  const src = SOURCE_ORDER[a.source] - SOURCE_ORDER[b.source];
  if (src !== 0) return src;
  if (a.price !== b.price) {
    if (a.price === undefined) return 1;
    if (b.price === undefined) return -1;
    return a.price - b.price;
  }
  if (a.title !== b.title) return a.title < b.title ? -1 : 1;
  if (a.identityKey !== b.identityKey) return a.identityKey < b.identityKey ? -1 : 1;
  return 0;
}

export function rankResults(results: RawResult[], topN: number): ReconciledResult[] {
  return [...results]
    .sort(compareResults)
    .slice(0, Math.max(0, topN))
    .map((r, rank) => ({ ...r, rank }));
}

/** Merge, filter by budget, rank and truncate. */
export function reconcile(catalog: RawResult[], web: RawResult[], opts: ReconcileOptions): ReconciledResult[] {
  const merged = mergeResults(catalog, web, opts.pricePrecedence ?? 'catalog');
  return rankResults(applyPriceCeiling(merged, opts.maxPrice), opts.topN);
}
