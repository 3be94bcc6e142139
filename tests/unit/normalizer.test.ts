import {
  extractItemCode,
  extractPrice,
  isAllowedDomain,
  isProductPage,
  matchedAllowedDomain,
  normalizeUrl,
  sanitizePrice,
} from '../../src/core/normalizer.js';

describe('extractPrice', () => {
  test.each([
    ['$12.99', 12.99],
    ['$ 12', 12],
    ['Only $1,299.99 today', 1299.99],
    ['USD 12', 12],
    ['usd12.5', 12.5],
    ['12.99 USD', 12.99],
    ['about 12 dollars', 12],
    ['Now $13.50', 13.5],
  ])('parses %s', (text, expected) => {
    expect(extractPrice(text)).toBe(expected);
  });

  test('returns undefined when no price is present', () => {
    expect(extractPrice('free shipping')).toBeUndefined();
    expect(extractPrice('pack of 12')).toBeUndefined();
    expect(extractPrice('')).toBeUndefined();
    expect(extractPrice(undefined)).toBeUndefined();
  });

  test('ignores out-of-range values', () => {
    expect(extractPrice('$15000')).toBeUndefined();
    expect(extractPrice('$0')).toBeUndefined();
    expect(extractPrice('$0.00')).toBeUndefined();
  });

  test('skips an out-of-range match and keeps looking', () => {
    expect(extractPrice('Was $15,000 now $13.50')).toBe(13.5);
  });

  test('dollar-sign form wins over later forms', () => {
    expect(extractPrice('20 dollars or $18')).toBe(18);
  });
});

describe('sanitizePrice', () => {
  test('accepts numbers and numeric strings inside the range', () => {
    expect(sanitizePrice(12.5)).toBe(12.5);
    expect(sanitizePrice('12.50')).toBe(12.5);
    expect(sanitizePrice('$1,299')).toBe(1299);
  });

  test('rejects everything else', () => {
    expect(sanitizePrice(0)).toBeUndefined();
    expect(sanitizePrice(-5)).toBeUndefined();
    expect(sanitizePrice(10000)).toBeUndefined();
    expect(sanitizePrice(Number.NaN)).toBeUndefined();
    expect(sanitizePrice('abc')).toBeUndefined();
    expect(sanitizePrice('')).toBeUndefined();
    expect(sanitizePrice(null)).toBeUndefined();
    expect(sanitizePrice({ value: 3 })).toBeUndefined();
  });
});

describe('isAllowedDomain', () => {
  test('accepts exact hosts and proper subdomains', () => {
    expect(isAllowedDomain('https://amazon.com/dp/B0ABCDEFGH')).toBe(true);
    expect(isAllowedDomain('https://www.amazon.com/dp/B0ABCDEFGH')).toBe(true);
    expect(isAllowedDomain('http://www.walmart.com/ip/1')).toBe(true);
  });

  test('never matches by substring', () => {
    expect(isAllowedDomain('https://amazon.com.evil.tld/dp/B0ABCDEFGH')).toBe(false);
    expect(isAllowedDomain('https://notamazon.com/dp/B0ABCDEFGH')).toBe(false);
    expect(isAllowedDomain('https://evil.tld/?u=amazon.com')).toBe(false);
  });

  test('rejects non-http urls and garbage', () => {
    expect(isAllowedDomain('ftp://amazon.com/file')).toBe(false);
    expect(isAllowedDomain('not a url')).toBe(false);
    expect(isAllowedDomain('')).toBe(false);
    expect(isAllowedDomain(null)).toBe(false);
  });

  test('honours a custom allowlist', () => {
    expect(isAllowedDomain('https://shop.example.com/item', ['example.com'])).toBe(true);
    expect(isAllowedDomain('https://www.amazon.com/dp/B0ABCDEFGH', ['example.com'])).toBe(false);
    expect(matchedAllowedDomain('https://shop.example.com/item', ['example.com'])).toBe('example.com');
  });
});

describe('isProductPage', () => {
  test.each([
    'https://www.amazon.com/Eco-Cleaner/dp/B0ABCDEFGH/ref=sr_1_1',
    'https://www.amazon.com/gp/product/B012345678?th=1',
    'https://www.amazon.com/gp/aw/d/B012345678',
    'https://www.walmart.com/ip/Eco-Steel-Cleaner/123456789',
    'https://www.walmart.com/ip/123456789',
    'https://www.target.com/p/eco-cleaner/-/A-12345678',
  ])('detects item page %s', (url) => {
    expect(isProductPage(url)).toBe(true);
  });

  test.each([
    'https://www.amazon.com/s?k=steel+cleaner',
    'https://www.amazon.com/b?node=123',
    'https://www.walmart.com/search?q=cleaner',
    'https://www.walmart.com/browse/household/cleaners/1115193',
    'https://www.target.com/c/cleaning-supplies/-/N-5xsz1',
    'https://www.example.com/dp/B0ABCDEFGH',
  ])('rejects listing or foreign page %s', (url) => {
    expect(isProductPage(url)).toBe(false);
  });
});

describe('extractItemCode', () => {
  test('returns the upper-cased ASIN from Amazon product paths', () => {
    expect(extractItemCode('https://www.amazon.com/dp/b0abcdefgh')).toBe('B0ABCDEFGH');
    expect(extractItemCode('https://www.amazon.com/gp/product/B012345678?th=1')).toBe('B012345678');
  });

  test('returns undefined elsewhere', () => {
    expect(extractItemCode('https://www.walmart.com/ip/123456789')).toBeUndefined();
    expect(extractItemCode('https://www.amazon.com/s?k=cleaner')).toBeUndefined();
    expect(extractItemCode('https://amazon.com.evil.tld/dp/B0ABCDEFGH')).toBeUndefined();
    expect(extractItemCode('garbage')).toBeUndefined();
  });
});

describe('normalizeUrl', () => {
  test('drops query, fragment and trailing slash and lowercases the host', () => {
    expect(normalizeUrl('HTTPS://WWW.Amazon.com/dp/B0ABCDEFGH/?ref=x#top')).toBe(
      'https://www.amazon.com/dp/B0ABCDEFGH',
    );
  });

  test('keeps the root path and explicit ports', () => {
    expect(normalizeUrl('https://target.com')).toBe('https://target.com/');
    expect(normalizeUrl('http://localhost:8080/a/')).toBe('http://localhost:8080/a');
  });

  test('returns undefined for non-http input', () => {
    expect(normalizeUrl('mailto:someone@example.com')).toBeUndefined();
    expect(normalizeUrl('')).toBeUndefined();
  });
});
