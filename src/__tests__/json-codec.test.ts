import { describe, it, expect } from 'vitest';
import { encodeJsonBody, rewriteJsonBody } from '../security/json-codec.js';
import { decodeJson } from '../security/json-value.js';
import { UnsupportedValueShapeError } from '../security/errors.js';
import { createFieldPolicy, strictSanitize } from '../security/policy.js';
import type { FieldPolicy } from '../types/xss.js';
import { bytes, tagStrippingPolicy, text } from './helpers.js';

function rewrite(source: string, policy: FieldPolicy = tagStrippingPolicy()): string {
  return text(rewriteJsonBody(bytes(source), policy));
}

describe('rewriteJsonBody', () => {
  it('sanitizes strings and leaves other scalars as written', () => {
    expect(rewrite('{"name":"<b>Ann</b>","age":42,"score":1.50,"ok":true,"none":null}')).toBe(
      '{"name":"Ann","age":42,"score":1.50,"ok":true,"none":null}',
    );
  });

  it('emits skip-listed strings verbatim', () => {
    expect(rewrite('{"password":"<b>x</b>","bio":"<i>hi</i>"}')).toBe('{"password":"<b>x</b>","bio":"hi"}');
  });

  it('quotes skip-listed numbers and booleans', () => {
    expect(rewrite('{"password":12,"token":false}', tagStrippingPolicy(['password', 'token']))).toBe(
      '{"password":"12","token":"false"}',
    );
  });

  it('copies skip-listed containers and nulls without sanitizing', () => {
    expect(rewrite('{"password":{"a":"<b>"},"list":["<i>x</i>"],"p2":null}', tagStrippingPolicy(['password', 'list', 'p2']))).toBe(
      '{"password":{"a":"<b>"},"list":["<i>x</i>"],"p2":null}',
    );
  });

  it('recurses into nested objects and arrays', () => {
    expect(rewrite('{"user":{"bio":"<script>x</script>y","password":"<p>"},"tags":["<b>a</b>",1,null,[true]]}')).toBe(
      '{"user":{"bio":"xy","password":"<p>"},"tags":["a",1,null,[true]]}',
    );
  });

  it('encodes empty containers without truncating', () => {
    expect(rewrite('{}')).toBe('{}');
    expect(rewrite('[]')).toBe('[]');
    expect(rewrite('{"a":{},"b":[]}')).toBe('{"a":{},"b":[]}');
  });

  it('accepts a top-level array of objects', () => {
    expect(rewrite('[{}, {"a":"<b>x</b>"}]')).toBe('[{},{"a":"x"}]');
  });

  it('escapes keys and string content as JSON', () => {
    expect(rewrite('{"a\\"b":"line\\nbreak \\u00e9"}')).toBe('{"a\\"b":"line\\nbreak é"}');
  });

  it('keeps input field order', () => {
    expect(rewrite('{"z":"1","a":"2","m":"3"}')).toBe('{"z":"1","a":"2","m":"3"}');
  });

  it.each([
    ['a string', '"<b>x</b>"'],
    ['a number', '5'],
    ['null', 'null'],
    ['an array of scalars', '["a","b"]'],
    ['a mixed array', '[{"a":1},2]'],
  ])('rejects %s at the top level', (_label, source) => {
    expect(() => rewrite(source)).toThrow(UnsupportedValueShapeError);
  });

  it('names the offending array element', () => {
    expect(() => rewrite('[{"a":1},2]')).toThrow('top-level array element 1 is a number, expected an object');
  });

  it('passes numbers and booleans through the sanitizer', () => {
    const seen: string[] = [];
    const policy = createFieldPolicy({
      skipFields: [],
      sanitize: (value) => {
        seen.push(value);
        return value;
      },
    });
    rewrite('{"n":7,"b":true,"s":"x","z":null}', policy);
    expect(seen).toEqual(['7', 'true', 'x']);
  });
});

describe('strict policy on JSON documents', () => {
  const policy = createFieldPolicy({ sanitize: strictSanitize });

  it('removes script payloads from every string leaf', () => {
    const output = rewrite(
      '{"title":"<script>alert(1)</script>Hello <b>World</b>","items":[{"note":"<script>steal()</script>ok"}],"n":3}',
      policy,
    );
    expect(output).toBe('{"title":"Hello World","items":[{"note":"ok"}],"n":3}');
  });

  it('is idempotent on an already sanitized document', () => {
    const once = rewrite('{"title":"<script>alert(1)</script>Hello <b>World</b>","n":3}', policy);
    expect(rewrite(once, policy)).toBe(once);
  });
});

describe('encodeJsonBody', () => {
  it('encodes a decoded tree directly', () => {
    const tree = decodeJson(bytes('{"a":"<i>b</i>"}'));
    expect(encodeJsonBody(tree, tagStrippingPolicy())).toBe('{"a":"b"}');
  });
});
