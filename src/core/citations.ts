/**
 * Citation helpers. Citations are a 1:1 projection of the reconciled list;
 * answer text refers to them with inline `[n]` markers.
 */
import type { Citation, ReconciledResult } from '../schemas/product.js';

export function buildCitations(results: ReconciledResult[]): Citation[] {
  return [...results]
    .sort((a, b) => a.rank - b.rank)
    .map((r) => ({
      index: r.rank + 1,
      title: r.title,
      ...(r.url !== undefined ? { url: r.url } : {}),
      ...(r.price !== undefined ? { price: r.price } : {}),
    }));
}

/** Inline markers in order of first appearance, deduplicated. */
/** Rewrites `[n]` inside product text as `(n)` so it cannot pose as a citation. */
export function neutralizeCitationMarkers(text: string): string {
  return text.replace(/\[(\d+)\]/g, '($1)');
}

export function extractCitationIndices(text: string): number[] {
  const seen = new Set<number>();
  for (const m of text.matchAll(/\[(\d+)\]/g)) {
    const n = Number(m[1]);
    if (Number.isInteger(n)) seen.add(n);
  }
  return [...seen];
}

/** Markers in `text` that have no citation entry. */
export function unknownCitationIndices(text: string, citations: Citation[]): number[] {
  const known = new Set(citations.map((c) => c.index));
  return extractCitationIndices(text).filter((n) => !known.has(n));
}

export function validateCitations(text: string, citations: Citation[]): boolean {
  return unknownCitationIndices(text, citations).length === 0;
}

/**
 * Citations must mirror the results exactly: same length, index = rank + 1,
 * same title and url.
 */
export function citationsMatchResults(citations: Citation[], results: ReconciledResult[]): boolean {
  if (citations.length !== results.length) return false;
  const byRank = new Map(results.map((r) => [r.rank + 1, r]));
  return citations.every((c) => {
    const r = byRank.get(c.index);
    return r !== undefined && r.title === c.title && r.url === c.url;
  });
}

export function formatCitationList(citations: Citation[]): string[] {
  return citations.map((c) => {
    const price = c.price !== undefined ? ` ($${c.price.toFixed(2)})` : '';
    return `[${c.index}] ${c.title}${price}${c.url ? ` - ${c.url}` : ''}`;
  });
}
