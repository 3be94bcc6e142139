/**
 * Price and domain normalization for retrieval results.
 *
 * Every function here is total: malformed input yields `undefined` or `false`,
 * never an exception.
 */

export const DEFAULT_ALLOWED_DOMAINS = ['amazon.com', 'walmart.com', 'target.com'] as const;

export const MIN_PRICE_EXCLUSIVE = 0;
export const MAX_PRICE_EXCLUSIVE = 10000;

const AMOUNT = String.raw`(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?`;

// Order matters: the first pattern yielding an in-range value wins.
const PRICE_PATTERNS: RegExp[] = [
  new RegExp(String.raw`\$\s*${AMOUNT}(?![\d,])`, 'g'),
  new RegExp(String.raw`\bUSD\s*${AMOUNT}\b`, 'gi'),
  new RegExp(String.raw`\b${AMOUNT}\s*USD\b`, 'gi'),
  new RegExp(String.raw`\b${AMOUNT}\s*dollars?\b`, 'gi'),
];

// ASIN: ten alphanumerics right after the product path segment.
const ASIN = String.raw`([A-Z0-9]{10})(?=[/?#]|$)`;

const PRODUCT_PATTERNS: Record<string, RegExp[]> = {
  'amazon.com': [
    new RegExp(String.raw`/dp/${ASIN}`, 'i'),
    new RegExp(String.raw`/gp/product/${ASIN}`, 'i'),
    new RegExp(String.raw`/gp/aw/d/${ASIN}`, 'i'),
    new RegExp(String.raw`/gp/offer-listing/${ASIN}`, 'i'),
  ],
  'walmart.com': [/^\/ip\/(?:[^/]+\/)?\d+(?:\/|$)/i],
  'target.com': [/^\/p\/(?:[^/]+\/)?-\/A-\d+(?:\/|$)/i],
};

function parseUrl(url: unknown): URL | undefined {
  if (typeof url !== 'string' || !url.trim()) return undefined;
  try {
    const parsed = new URL(url.trim());
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return undefined;
    return parsed;
  } catch {
    return undefined;
  }
}

function hostOf(url: URL): string {
  return url.hostname.toLowerCase().replace(/\.$/, '');
}

/**
 * Accepts a number or numeric string and keeps it only inside (0, 10000).
 */
export function sanitizePrice(value: unknown): number | undefined {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && value.trim()) {
    n = Number(value.replace(/[$,\s]/g, ''));
  } else {
    return undefined;
  }
  if (!Number.isFinite(n)) return undefined;
  return n > MIN_PRICE_EXCLUSIVE && n < MAX_PRICE_EXCLUSIVE ? n : undefined;
}

/**
 * Pulls a USD price out of free text ("$12.99", "USD 12", "12.99 USD",
 * "12 dollars"). Values outside (0, 10000) are ignored as spurious numbers.
 */
export function extractPrice(text: string | null | undefined): number | undefined {
  if (typeof text !== 'string' || !text) return undefined;
  for (const pattern of PRICE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const whole = match[1]?.replace(/,/g, '');
      if (!whole) continue;
      const value = sanitizePrice(match[2] ? `${whole}.${match[2]}` : whole);
      if (value !== undefined) return value;
    }
  }
  return undefined;
}

/**
 * Returns the allowlist entry the URL's host belongs to: the host itself or a
 * proper subdomain of it. `amazon.com.evil.tld` and `notamazon.com` do not match.
 */
export function matchedAllowedDomain(
  url: string | null | undefined,
  allowed: readonly string[] = DEFAULT_ALLOWED_DOMAINS,
): string | undefined {
  const parsed = parseUrl(url);
  if (!parsed) return undefined;
  const host = hostOf(parsed);
  return allowed.find((domain) => {
    const d = domain.toLowerCase();
    return host === d || host.endsWith(`.${d}`);
  });
}

export function isAllowedDomain(
  url: string | null | undefined,
  allowed: readonly string[] = DEFAULT_ALLOWED_DOMAINS,
): boolean {
  return matchedAllowedDomain(url, allowed) !== undefined;
}

/**
 * True for individual item pages; listing, search and category pages fail.
 * Domains without known patterns never pass.
 */
export function isProductPage(
  url: string | null | undefined,
  allowed: readonly string[] = DEFAULT_ALLOWED_DOMAINS,
): boolean {
  const domain = matchedAllowedDomain(url, allowed);
  const parsed = parseUrl(url);
  if (!domain || !parsed) return false;
  const patterns = PRODUCT_PATTERNS[domain] ?? [];
  return patterns.some((p) => p.test(parsed.pathname));
}

/**
 * Marketplace item code usable for an authoritative price lookup. Only Amazon
 * ASINs are recognised.
 */
export function extractItemCode(url: string | null | undefined): string | undefined {
  const parsed = parseUrl(url);
  if (!parsed) return undefined;
  const host = hostOf(parsed);
  if (host !== 'amazon.com' && !host.endsWith('.amazon.com')) return undefined;
  for (const pattern of PRODUCT_PATTERNS['amazon.com'] ?? []) {
    const m = pattern.exec(parsed.pathname);
    if (m?.[1]) return m[1].toUpperCase();
  }
  return undefined;
}

/**
 * Identity key for web results: scheme://host/path with query and fragment
 * dropped and a trailing slash removed.
 */
export function normalizeUrl(url: string | null | undefined): string | undefined {
  const parsed = parseUrl(url);
  if (!parsed) return undefined;
  let path = parsed.pathname;
  if (path.length > 1) path = path.replace(/\/+$/, '');
  if (!path) path = '/';
  const port = parsed.port ? `:${parsed.port}` : '';
  return `${parsed.protocol}//${hostOf(parsed)}${port}${path}`;
}
