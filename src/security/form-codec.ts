import type { FieldPolicy, FormPairs, FormValue } from '../types/xss.js';
import { MalformedFormError } from './errors.js';

const decoder = new TextDecoder();
const encoder = new TextEncoder();

const AMPERSAND = 0x26;
const EQUALS = 0x3d;
const SEMICOLON = 0x3b;
const PERCENT = 0x25;
const PLUS = 0x2b;
const SPACE = 0x20;

/**
 * Parse `application/x-www-form-urlencoded` data (also used for query strings).
 * Repeated keys are grouped under their first occurrence, values in order.
 * Escapes may encode any byte; they are not required to form valid UTF-8.
 *
 * @throws {MalformedFormError} on a `;` inside a pair or a `%` without two hex digits
 */
export function parseFormPairs(raw: Uint8Array | string): FormPairs {
  const input = typeof raw === 'string' ? encoder.encode(raw) : raw;
  const pairs: FormPairs = [];
  const byKey = new Map<string, FormValue[]>();

  let start = 0;
  while (start <= input.length) {
    let end = input.indexOf(AMPERSAND, start);
    if (end === -1) {
      end = input.length;
    }
    const segment = input.subarray(start, end);
    start = end + 1;

    if (segment.length === 0) {
      continue;
    }
    if (segment.includes(SEMICOLON)) {
      throw new MalformedFormError('invalid semicolon separator in form data');
    }

    const eq = segment.indexOf(EQUALS);
    const key = decoder.decode(unescapeBytes(eq === -1 ? segment : segment.subarray(0, eq)));
    const value: FormValue =
      eq === -1 ? { bytes: new Uint8Array(0), bare: true } : { bytes: unescapeBytes(segment.subarray(eq + 1)), bare: false };

    const values = byKey.get(key);
    if (values) {
      values.push(value);
    } else {
      const fresh = [value];
      byKey.set(key, fresh);
      pairs.push([key, fresh]);
    }
  }

  return pairs;
}

/**
 * Value as text. Bytes that are not valid UTF-8 become U+FFFD.
 */
export function formValueText(value: FormValue): string {
  return decoder.decode(value.bytes);
}

export function sanitizeFormValue(value: FormValue, policy: FieldPolicy): FormValue {
  return { bytes: encoder.encode(policy.sanitize(formValueText(value))), bare: value.bare };
}

/**
 * Join pairs back into form encoding, one `key=value` per value. A bare key
 * stays bare as long as its value is still empty.
 */
export function serializeFormPairs(pairs: FormPairs): string {
  const segments: string[] = [];
  for (const [key, values] of pairs) {
    const name = escapeComponent(key);
    for (const value of values) {
      segments.push(value.bare && value.bytes.length === 0 ? name : `${name}=${escapeBytes(value.bytes)}`);
    }
  }
  return segments.join('&');
}

/**
 * Serialize a sanitized copy of the pairs; skip-listed keys keep their bytes.
 */
export function encodeFormPairs(pairs: FormPairs, policy: FieldPolicy): string {
  return serializeFormPairs(
    pairs.map(([key, values]): [string, FormValue[]] => [
      key,
      policy.shouldSkip(key) ? values : values.map((value) => sanitizeFormValue(value, policy)),
    ]),
  );
}

/**
 * Rewrite a form body. A body that holds no pairs at all is returned untouched.
 */
export function rewriteFormBody(body: Uint8Array, policy: FieldPolicy): Uint8Array {
  const pairs = parseFormPairs(body);
  if (pairs.length === 0) {
    return body;
  }
  return encoder.encode(encodeFormPairs(pairs, policy));
}

/**
 * Percent-encode everything except `A-Z a-z 0-9 - _ . ~`, with space as `+`.
 */
export function escapeComponent(value: string): string {
  return escapeBytes(encoder.encode(value));
}

function escapeBytes(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    if (isUnreserved(byte)) {
      out += String.fromCharCode(byte);
    } else if (byte === SPACE) {
      out += '+';
    } else {
      out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return out;
}

function isUnreserved(byte: number): boolean {
  return (
    (byte >= 0x41 && byte <= 0x5a) ||
    (byte >= 0x61 && byte <= 0x7a) ||
    (byte >= 0x30 && byte <= 0x39) ||
    byte === 0x2d ||
    byte === 0x5f ||
    byte === 0x2e ||
    byte === 0x7e
  );
}

function unescapeBytes(raw: Uint8Array): Uint8Array {
  const out = new Uint8Array(raw.length);
  let length = 0;

  for (let i = 0; i < raw.length; i++) {
    const byte = raw[i];
    if (byte === PERCENT) {
      const high = hexValue(raw[i + 1]);
      const low = hexValue(raw[i + 2]);
      if (high === -1 || low === -1) {
        throw new MalformedFormError(`invalid percent-encoding in ${JSON.stringify(decoder.decode(raw))}`);
      }
      out[length++] = high * 16 + low;
      i += 2;
    } else {
      out[length++] = byte === PLUS ? SPACE : byte;
    }
  }

  return out.slice(0, length);
}

function hexValue(code: number | undefined): number {
  if (code === undefined) {
    return -1;
  }
  if (code >= 0x30 && code <= 0x39) {
    return code - 0x30;
  }
  if (code >= 0x41 && code <= 0x46) {
    return code - 0x37;
  }
  if (code >= 0x61 && code <= 0x66) {
    return code - 0x57;
  }
  return -1;
}
