import { createFieldPolicy } from '../security/policy.js';
import type { FieldPolicy, SanitizeFn } from '../types/xss.js';

/**
 * Deterministic stand-in for the HTML policy: drops anything that looks like a tag.
 */
export const stripTags: SanitizeFn = (text) => text.replace(/<[^>]*>/g, '');

export function tagStrippingPolicy(skipFields: string[] = ['password']): FieldPolicy {
  return createFieldPolicy({ skipFields, sanitize: stripTags });
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function text(body: Uint8Array): string {
  return new TextDecoder().decode(body);
}
