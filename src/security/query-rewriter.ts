import type { FieldPolicy, FormPairs } from '../types/xss.js';
import { parseFormPairs, sanitizeFormValue, serializeFormPairs } from './form-codec.js';

/**
 * Replace every value of every non-skipped key with its sanitized form.
 * Mutates `pairs`.
 */
export function sanitizeQueryPairs(pairs: FormPairs, policy: FieldPolicy): void {
  for (const entry of pairs) {
    const [key, values] = entry;
    if (policy.shouldSkip(key)) {
      continue;
    }
    entry[1] = values.map((value) => sanitizeFormValue(value, policy));
  }
}

/**
 * Return `url` with its query string sanitized. Parameter order, repeated
 * values and bare flags are kept; a URL without a query comes back unchanged.
 */
export function rewriteQueryString(url: string, policy: FieldPolicy): string {
  const parsed = new URL(url);
  const pairs = parseFormPairs(parsed.search.slice(1));
  if (pairs.length === 0) {
    return url;
  }

  sanitizeQueryPairs(pairs, policy);
  parsed.search = `?${serializeFormPairs(pairs)}`;
  return parsed.toString();
}
