import type { Readable } from 'node:stream';
import busboy from 'busboy';
import type { FieldPolicy, MultipartPart } from '../types/xss.js';
import { EmptyPartError, MalformedMultipartError, XssFilterError } from './errors.js';

export const DEFAULT_MAX_PARTS = 100;
export const DEFAULT_FILE_CONTENT_TYPE = 'application/octet-stream';

const CRLF = Buffer.from('\r\n');
const NON_LATIN1 = /[^\u0000-\u00ff]/;

const decoder = new TextDecoder();

/**
 * Extract the boundary parameter from a multipart Content-Type header.
 *
 * @throws {MalformedMultipartError} when there is none
 */
export function parseBoundary(contentType: string): string {
  const match = /;\s*boundary\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^;\s]+))/i.exec(contentType);
  const boundary = match ? (match[1] !== undefined ? unquote(match[1]) : match[2]) : undefined;
  if (!boundary) {
    throw new MalformedMultipartError('multipart content type has no boundary parameter');
  }
  return boundary;
}

/**
 * Parse a buffered multipart body into its parts, in order. Reading stops
 * without error after `maxParts` parts; the rest of the body is ignored.
 *
 * Rejects with {@link MalformedMultipartError} on broken framing and with
 * {@link EmptyPartError} when a part has no content.
 */
export function readMultipartParts(
  body: Uint8Array,
  contentType: string,
  maxParts: number = DEFAULT_MAX_PARTS,
): Promise<MultipartPart[]> {
  return new Promise((resolve, reject) => {
    const fail = (error: unknown): void => {
      reject(
        error instanceof XssFilterError
          ? error
          : new MalformedMultipartError(`malformed multipart body: ${error instanceof Error ? error.message : String(error)}`),
      );
    };

    let parser: ReturnType<typeof busboy>;
    try {
      parser = busboy({
        headers: { 'content-type': contentType },
        preservePath: true,
        // Field values are handed over one char per byte unless the part names its own charset
        defCharset: 'latin1',
        defParamCharset: 'utf8',
        limits: { parts: maxParts, fieldSize: Infinity },
      });
    } catch (error) {
      fail(error);
      return;
    }

    const parts: Array<Promise<MultipartPart>> = [];

    parser.on('field', (name, value) => {
      const content = NON_LATIN1.test(value) ? Buffer.from(value, 'utf8') : Buffer.from(value, 'latin1');
      const part = Promise.resolve().then(() => toPart(name, '', '', content));
      part.catch(fail);
      parts.push(part);
    });

    parser.on('file', (name, stream, info) => {
      const part = readStream(stream).then((content) => toPart(name, info.filename, info.mimeType, content));
      part.catch(fail);
      parts.push(part);
    });

    parser.on('error', fail);
    parser.on('close', () => {
      Promise.all(parts).then(resolve, fail);
    });

    parser.end(Buffer.from(body.buffer, body.byteOffset, body.byteLength));
  });
}

/**
 * Rebuild a multipart body. File content is copied byte for byte; text fields
 * are sanitized unless skip-listed, in which case their bytes are copied too.
 */
export function encodeMultipart(parts: Iterable<MultipartPart>, boundary: string, policy: FieldPolicy): Uint8Array {
  const chunks: Buffer[] = [];

  for (const part of parts) {
    chunks.push(Buffer.from(`--${boundary}\r\n`));

    if (part.type === 'file') {
      chunks.push(
        Buffer.from(
          `Content-Disposition: form-data; name="${escapeQuotes(part.fieldName)}"; filename="${escapeQuotes(part.fileName)}"\r\n` +
            `Content-Type: ${part.contentType || DEFAULT_FILE_CONTENT_TYPE}\r\n\r\n`,
        ),
        Buffer.from(part.content),
        CRLF,
      );
      continue;
    }

    const value = policy.shouldSkip(part.fieldName)
      ? Buffer.from(part.content)
      : Buffer.from(policy.sanitize(decoder.decode(part.content)));
    chunks.push(Buffer.from(`Content-Disposition: form-data; name="${escapeQuotes(part.fieldName)}"\r\n\r\n`), value, CRLF);
  }

  chunks.push(Buffer.from(`--${boundary}--\r\n`));
  return Buffer.concat(chunks);
}

export async function rewriteMultipartBody(
  body: Uint8Array,
  contentType: string,
  policy: FieldPolicy,
  maxParts: number = DEFAULT_MAX_PARTS,
): Promise<Uint8Array> {
  const boundary = parseBoundary(contentType);
  return encodeMultipart(await readMultipartParts(body, contentType, maxParts), boundary, policy);
}

async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

// A part sent without a file name is a text field, whatever its content type
function toPart(fieldName: string, fileName: string | undefined, contentType: string, content: Buffer): MultipartPart {
  if (content.length === 0) {
    throw new EmptyPartError(fieldName);
  }
  if (!fileName) {
    return { type: 'field', fieldName, content: new Uint8Array(content) };
  }
  return { type: 'file', fieldName, fileName, contentType, content: new Uint8Array(content) };
}

function unquote(quoted: string): string {
  return quoted.replace(/\\(.)/g, '$1');
}

function escapeQuotes(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
