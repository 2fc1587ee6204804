import type { JsonValue } from '../types/xss.js';
import { NotJsonError } from './errors.js';

const MAX_DEPTH = 1000;

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a JSON document without losing number text or field order.
 *
 * @throws {NotJsonError} on invalid UTF-8, any syntax error, or data after the document
 */
export function decodeJson(bytes: Uint8Array): JsonValue {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    throw new NotJsonError('body is not valid UTF-8');
  }
  return new JsonParser(text).parseDocument();
}

/**
 * Compact JSON text for a value, with nothing sanitized.
 */
export function stringifyJson(value: JsonValue): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return value.text;
    case 'string':
      return JSON.stringify(value.value);
    case 'array':
      return `[${value.items.map(stringifyJson).join(',')}]`;
    case 'object': {
      const members: string[] = [];
      for (const [key, field] of value.fields) {
        members.push(`${JSON.stringify(key)}:${stringifyJson(field)}`);
      }
      return `{${members.join(',')}}`;
    }
  }
}

class JsonParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseDocument(): JsonValue {
    this.skipWhitespace();
    const value = this.parseValue(0);
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw this.fail('unexpected data after JSON document');
    }
    return value;
  }

  private parseValue(depth: number): JsonValue {
    if (depth > MAX_DEPTH) {
      throw this.fail('document nested too deeply');
    }

    switch (this.text[this.pos]) {
      case '{':
        return this.parseObject(depth);
      case '[':
        return this.parseArray(depth);
      case '"':
        return { kind: 'string', value: this.parseString() };
      case 't':
        this.expectLiteral('true');
        return { kind: 'boolean', value: true };
      case 'f':
        this.expectLiteral('false');
        return { kind: 'boolean', value: false };
      case 'n':
        this.expectLiteral('null');
        return { kind: 'null' };
      case undefined:
        throw this.fail('unexpected end of JSON input');
      default:
        return { kind: 'number', text: this.parseNumber() };
    }
  }

  private parseObject(depth: number): JsonValue {
    const fields = new Map<string, JsonValue>();
    this.pos++;
    this.skipWhitespace();

    if (this.text[this.pos] === '}') {
      this.pos++;
      return { kind: 'object', fields };
    }

    for (;;) {
      if (this.text[this.pos] !== '"') {
        throw this.fail('expected string key');
      }
      const key = this.parseString();
      this.skipWhitespace();
      this.expectChar(':');
      this.skipWhitespace();
      // Duplicate keys keep their first position and take the last value
      fields.set(key, this.parseValue(depth + 1));
      this.skipWhitespace();

      if (this.text[this.pos] === ',') {
        this.pos++;
        this.skipWhitespace();
        continue;
      }
      this.expectChar('}');
      return { kind: 'object', fields };
    }
  }

  private parseArray(depth: number): JsonValue {
    const items: JsonValue[] = [];
    this.pos++;
    this.skipWhitespace();

    if (this.text[this.pos] === ']') {
      this.pos++;
      return { kind: 'array', items };
    }

    for (;;) {
      items.push(this.parseValue(depth + 1));
      this.skipWhitespace();

      if (this.text[this.pos] === ',') {
        this.pos++;
        this.skipWhitespace();
        continue;
      }
      this.expectChar(']');
      return { kind: 'array', items };
    }
  }

  private parseString(): string {
    // Opening quote already checked by the caller
    this.pos++;
    let result = '';
    let chunkStart = this.pos;

    for (;;) {
      const ch = this.text[this.pos];

      if (ch === undefined) {
        throw this.fail('unterminated string');
      }
      if (ch === '"') {
        result += this.text.slice(chunkStart, this.pos);
        this.pos++;
        return result;
      }
      if (ch < ' ') {
        throw this.fail('control character in string');
      }
      if (ch !== '\\') {
        this.pos++;
        continue;
      }

      result += this.text.slice(chunkStart, this.pos);
      const escape = this.text[this.pos + 1];
      if (escape === 'u') {
        const hex = this.text.slice(this.pos + 2, this.pos + 6);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          throw this.fail('invalid unicode escape');
        }
        result += String.fromCharCode(parseInt(hex, 16));
        this.pos += 6;
      } else if (escape !== undefined && escape in SIMPLE_ESCAPES) {
        result += SIMPLE_ESCAPES[escape];
        this.pos += 2;
      } else {
        throw this.fail('invalid escape sequence');
      }
      chunkStart = this.pos;
    }
  }

  private parseNumber(): string {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.text);
    if (!match) {
      throw this.fail(`unexpected character ${JSON.stringify(this.text[this.pos])}`);
    }
    this.pos += match[0].length;
    return match[0];
  }

  private expectLiteral(literal: string): void {
    if (!this.text.startsWith(literal, this.pos)) {
      throw this.fail(`invalid literal, expected ${literal}`);
    }
    this.pos += literal.length;
  }

  private expectChar(expected: string): void {
    if (this.text[this.pos] !== expected) {
      throw this.fail(
        this.pos >= this.text.length
          ? 'unexpected end of JSON input'
          : `expected '${expected}' but found ${JSON.stringify(this.text[this.pos])}`,
      );
    }
    this.pos++;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') {
        return;
      }
      this.pos++;
    }
  }

  private fail(reason: string): NotJsonError {
    return new NotJsonError(`invalid JSON at offset ${this.pos}: ${reason}`);
  }
}
