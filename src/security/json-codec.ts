import type { FieldPolicy, JsonObject, JsonValue } from '../types/xss.js';
import { UnsupportedValueShapeError } from './errors.js';
import { decodeJson, stringifyJson } from './json-value.js';

const utf8 = new TextEncoder();

/**
 * Decode a JSON body, sanitize it, and return the re-encoded bytes.
 */
export function rewriteJsonBody(body: Uint8Array, policy: FieldPolicy): Uint8Array {
  return utf8.encode(encodeJsonBody(decodeJson(body), policy));
}

/**
 * Encode a decoded document with every non-skipped leaf run through the policy.
 * Only an object or an array of objects is accepted at the top level.
 *
 * @throws {UnsupportedValueShapeError}
 */
export function encodeJsonBody(document: JsonValue, policy: FieldPolicy): string {
  switch (document.kind) {
    case 'object':
      return encodeObject(document, policy);
    case 'array': {
      const records = document.items.map((item, index) => {
        if (item.kind !== 'object') {
          throw new UnsupportedValueShapeError(
            `top-level array element ${index} is a ${item.kind}, expected an object`,
          );
        }
        return encodeObject(item, policy);
      });
      return `[${records.join(',')}]`;
    }
    default:
      throw new UnsupportedValueShapeError(
        `top-level JSON ${document.kind} is neither an object nor an array of objects`,
      );
  }
}

function encodeObject(object: JsonObject, policy: FieldPolicy): string {
  const members: string[] = [];
  for (const [key, value] of object.fields) {
    const encoded = policy.shouldSkip(key) ? encodeVerbatim(value) : encodeValue(value, policy);
    members.push(`${JSON.stringify(key)}:${encoded}`);
  }
  return `{${members.join(',')}}`;
}

function encodeValue(value: JsonValue, policy: FieldPolicy): string {
  switch (value.kind) {
    case 'object':
      return encodeObject(value, policy);
    case 'array':
      return `[${value.items.map((item) => encodeValue(item, policy)).join(',')}]`;
    case 'string':
      return JSON.stringify(policy.sanitize(value.value));
    // Numbers and booleans go through the policy too and are emitted unquoted
    case 'number':
      return policy.sanitize(value.text);
    case 'boolean':
      return policy.sanitize(value.value ? 'true' : 'false');
    case 'null':
      return 'null';
  }
}

/**
 * Skip-listed fields: scalars become a quoted string of their text, containers
 * are copied as-is.
 */
function encodeVerbatim(value: JsonValue): string {
  switch (value.kind) {
    case 'string':
      return JSON.stringify(value.value);
    case 'number':
      return JSON.stringify(value.text);
    case 'boolean':
      return JSON.stringify(value.value ? 'true' : 'false');
    case 'null':
    case 'array':
    case 'object':
      return stringifyJson(value);
  }
}
