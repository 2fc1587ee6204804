import sanitizeHtml from 'sanitize-html';
import type { FieldPolicy, SanitizeFn } from '../types/xss.js';

export const DEFAULT_SKIP_FIELDS: readonly string[] = ['password'];

/**
 * Strict policy: no tags, no attributes. Text inside script/style and other
 * non-text tags is dropped along with the tag.
 */
export const strictSanitize: SanitizeFn = (text) =>
  sanitizeHtml(text, {
    allowedTags: [],
    allowedAttributes: {},
    disallowedTagsMode: 'discard',
  });

export interface FieldPolicyOptions {
  skipFields?: Iterable<string>;
  sanitize?: SanitizeFn;
}

/**
 * Build the read-only policy shared by every request. Skip-field matching is
 * exact and case-sensitive.
 */
export function createFieldPolicy(options: FieldPolicyOptions = {}): FieldPolicy {
  const skipFields: ReadonlySet<string> = new Set(options.skipFields ?? DEFAULT_SKIP_FIELDS);
  const sanitize = options.sanitize ?? strictSanitize;

  return Object.freeze({
    skipFields,
    shouldSkip: (field: string) => skipFields.has(field),
    sanitize,
  });
}
