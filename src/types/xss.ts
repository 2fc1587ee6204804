/**
 * Decoded JSON document.
 *
 * Numbers keep the exact decimal text they were written with, and object
 * fields keep their input order.
 */
export type JsonValue =
  | { kind: 'null' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; text: string }
  | { kind: 'string'; value: string }
  | { kind: 'array'; items: JsonValue[] }
  | { kind: 'object'; fields: Map<string, JsonValue> };

export type JsonObject = Extract<JsonValue, { kind: 'object' }>;

/**
 * Removes disallowed markup from a piece of text. Must be pure.
 */
export type SanitizeFn = (text: string) => string;

/**
 * Decides, per field name, whether a value is sanitized or passed through.
 */
export interface FieldPolicy {
  readonly skipFields: ReadonlySet<string>;
  shouldSkip(field: string): boolean;
  sanitize: SanitizeFn;
}

/**
 * One occurrence of a form or query parameter.
 */
export interface FormValue {
  /** Percent-decoded bytes, not necessarily valid UTF-8 */
  bytes: Uint8Array;
  /** The key appeared without `=` */
  bare: boolean;
}

/**
 * Query-string or form body, grouped by key in order of first appearance.
 */
export type FormPairs = Array<[key: string, values: FormValue[]]>;

export interface FilePart {
  type: 'file';
  fieldName: string;
  fileName: string;
  contentType: string;
  content: Uint8Array;
}

export interface FieldPart {
  type: 'field';
  fieldName: string;
  /** Field value as sent; decoded as UTF-8 only when it is sanitized */
  content: Uint8Array;
}

export type MultipartPart = FilePart | FieldPart;

export type BodyEncoding = 'json' | 'form' | 'multipart' | 'query' | 'none';

export interface RequestSnapshot {
  method: string;
  url: string;
  contentType: string | undefined;
  contentLength: string | undefined;
  /** Reads the request body; called at most once, and only for body-carrying routes */
  readBody: () => Promise<Uint8Array>;
}

export type RequestRewrite =
  | { encoding: 'none' }
  | { encoding: 'json' | 'form' | 'multipart'; body: Uint8Array }
  | { encoding: 'query'; url: string };
