import { describe, it, expect } from 'vitest';
import { rewriteQueryString, sanitizeQueryPairs } from '../security/query-rewriter.js';
import { MalformedFormError } from '../security/errors.js';
import { formValueText, parseFormPairs } from '../security/form-codec.js';
import { tagStrippingPolicy } from './helpers.js';

describe('rewriteQueryString', () => {
  it('sanitizes values and keeps parameter order', () => {
    const url = 'http://localhost/search?q=%3Cb%3Ehi%3C%2Fb%3E&id=5';
    expect(rewriteQueryString(url, tagStrippingPolicy())).toBe('http://localhost/search?q=hi&id=5');
  });

  it('keeps every occurrence of a repeated parameter', () => {
    const url = 'http://localhost/search?q=%3Ci%3Ea%3C/i%3E&id=5&q=b';
    expect(rewriteQueryString(url, tagStrippingPolicy())).toBe('http://localhost/search?q=a&q=b&id=5');
  });

  it('leaves skip-listed parameters untouched', () => {
    const url = 'http://localhost/login?password=%3Cb%3E&q=%3Cb%3Ex';
    expect(rewriteQueryString(url, tagStrippingPolicy())).toBe('http://localhost/login?password=%3Cb%3E&q=x');
  });

  it('keeps non-UTF-8 escapes of skip-listed parameters', () => {
    const url = 'http://localhost/login?password=%E9%FF&q=ok';
    expect(rewriteQueryString(url, tagStrippingPolicy())).toBe(url);
  });

  it('accepts non-UTF-8 escapes in sanitized parameters', () => {
    expect(rewriteQueryString('http://x/api?q=%E9&id=5', tagStrippingPolicy())).toBe('http://x/api?q=%EF%BF%BD&id=5');
  });

  it('keeps flags that have no value', () => {
    expect(rewriteQueryString('http://localhost/search?debug&q=%3Cb%3Ex', tagStrippingPolicy())).toBe(
      'http://localhost/search?debug&q=x',
    );
  });

  it('returns a URL without a query unchanged', () => {
    expect(rewriteQueryString('http://localhost/plain', tagStrippingPolicy())).toBe('http://localhost/plain');
    expect(rewriteQueryString('http://localhost/plain?', tagStrippingPolicy())).toBe('http://localhost/plain?');
  });

  it('rejects an undecodable query', () => {
    expect(() => rewriteQueryString('http://localhost/?q=100%', tagStrippingPolicy())).toThrow(MalformedFormError);
  });
});

describe('sanitizeQueryPairs', () => {
  it('rewrites values in place', () => {
    const pairs = parseFormPairs('q=%3Cb%3Ea%3C%2Fb%3E&q=%3Ci%3Eb%3C%2Fi%3E&password=%3Cu%3Ec%3C%2Fu%3E');
    const [qValues, passwordValues] = pairs.map(([, values]) => values);
    sanitizeQueryPairs(pairs, tagStrippingPolicy());
    expect(pairs[0][1]).not.toBe(qValues);
    expect(pairs[1][1]).toBe(passwordValues);
    expect(pairs.map(([key, values]): [string, string[]] => [key, values.map(formValueText)])).toEqual([
      ['q', ['a', 'b']],
      ['password', ['<u>c</u>']],
    ]);
  });
});
